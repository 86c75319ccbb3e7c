import http from 'http';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import { config } from './config/env';
import { logger } from './utils/logger';
import { createErrorHandler, notFoundHandler } from './api/middleware/errorHandler';
import { authenticate } from './api/middleware/auth';
import { createStreamRoutes } from './api/routes/streams';
import { StreamStore } from './infrastructure/storage/StreamStore';
import { ProcessLauncher } from './infrastructure/process/ProcessLauncher';
import { StreamRegistry } from './services/registry/StreamRegistry';
import { StreamSupervisor } from './services/supervisor/StreamSupervisor';
import { StreamReaper } from './services/supervisor/StreamReaper';

class Application {
  private app: express.Application;
  private server?: http.Server;
  private supervisor!: StreamSupervisor;
  private reaper!: StreamReaper;
  private shuttingDown = false;

  constructor() {
    this.app = express();
    this.setupMiddleware();
  }

  private setupMiddleware() {
    // Security
    this.app.use(helmet());

    // CORS
    this.app.use(cors());

    // Compression
    this.app.use(compression());

    // Body parsing
    this.app.use(express.json());

    // Rate limiting
    const limiter = rateLimit({
      windowMs: config.security.rateLimit.windowMs,
      max: config.security.rateLimit.max,
      message: {
        success: false,
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests, please try again later',
        },
      },
    });
    this.app.use('/api', limiter);

    // Request logging
    this.app.use((req, _res, next) => {
      if (req.path !== '/health') {
        logger.info({ method: req.method, path: req.path }, 'Request received');
      }
      next();
    });
  }

  private async setupServices() {
    logger.info('Initializing services...');

    const store = new StreamStore(config.paths.base);
    await store.ensureLayout();

    const registry = new StreamRegistry(store);
    const launcher = new ProcessLauncher(store, {
      executable: config.ffmpeg.path,
      encoding: {
        video: config.ffmpeg.video,
        audio: config.ffmpeg.audio,
        outputFormat: config.ffmpeg.outputFormat,
      },
    });

    this.supervisor = new StreamSupervisor(registry, launcher, {
      stopTimeoutMs: config.supervisor.stopTimeoutMs,
      killTimeoutMs: config.supervisor.killTimeoutMs,
      pollIntervalMs: config.supervisor.pollIntervalMs,
      maxTailLines: config.logs.maxTailLines,
    });
    this.reaper = new StreamReaper(registry, this.supervisor, {
      intervalMs: config.supervisor.reaperIntervalMs,
    });

    logger.info({ baseDir: config.paths.base, executable: config.ffmpeg.path }, 'Services initialized');
  }

  private setupRoutes() {
    logger.info('Setting up routes...');

    // Health check
    this.app.get('/health', (_req, res) => {
      res.json({
        success: true,
        data: {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          version: '1.0.0',
          streams: this.supervisor.listAll().filter((stream) => stream.alive).length,
        },
      });
    });

    // API routes
    this.app.use(
      '/api/streams',
      createStreamRoutes(this.supervisor, this.reaper, {
        requireAuth: authenticate({
          token: config.security.authToken,
          requireAuth: config.security.requireAuth,
        }),
        defaultTailLines: config.logs.defaultTailLines,
        maxTailLines: config.logs.maxTailLines,
      })
    );

    // Error handlers
    this.app.use(notFoundHandler);
    this.app.use(
      createErrorHandler({
        redactPaths: [config.paths.base],
        exposeInternalErrors: config.server.isDevelopment,
      })
    );

    logger.info('Routes configured');
  }

  private closeServer(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((error) => {
        if (error) {
          logger.warn({ error }, 'HTTP server close reported an error');
        } else {
          logger.info('HTTP server closed');
        }
        resolve();
      });
    });
  }

  private setupGracefulShutdown() {
    const shutdown = async (signal: string, exitCode = 0) => {
      if (this.shuttingDown) {
        return;
      }
      this.shuttingDown = true;
      logger.info(`${signal} received, shutting down gracefully...`);

      this.reaper.stop();
      await this.closeServer();

      // Detached children keep running unless asked otherwise; restore() finds them next boot
      if (config.supervisor.stopStreamsOnShutdown) {
        try {
          const results = await this.supervisor.stopAll();
          logger.info({ count: results.length }, 'Streams stopped');
        } catch (error) {
          logger.error({ error }, 'Error while stopping streams');
          exitCode = 1;
        }
      } else {
        const running = this.supervisor.listAll().filter((stream) => stream.alive);
        logger.info({ count: running.length }, 'Leaving streams running');
      }

      process.exit(exitCode);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.fatal({ error }, 'Uncaught exception');
      void shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.fatal({ reason }, 'Unhandled rejection');
      void shutdown('unhandledRejection', 1);
    });
  }

  public async start() {
    try {
      logger.info('Starting stream supervisor...');

      await this.setupServices();
      this.setupRoutes();

      // Pick up streams left running by a previous instance
      const restored = await this.supervisor.restore();
      logger.info(
        {
          running: restored.running.length,
          crashed: restored.crashed.length,
          stopped: restored.stopped.length,
        },
        'Registry restored'
      );

      this.reaper.start();
      this.setupGracefulShutdown();

      this.server = this.app.listen(config.server.port, config.server.host, () => {
        logger.info(
          {
            host: config.server.host,
            port: config.server.port,
            env: process.env.NODE_ENV,
            requireAuth: config.security.requireAuth,
          },
          `Server listening on http://${config.server.host}:${config.server.port}`
        );
      });
    } catch (error) {
      logger.fatal({ error }, 'Failed to start server');
      process.exit(1);
    }
  }
}

// Start the application
const app = new Application();
void app.start();
