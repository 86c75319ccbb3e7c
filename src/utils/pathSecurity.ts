import path from 'path';
import { InvalidSpecError } from './errors';

/**
 * Security utilities for path validation and sanitization
 */

const STREAM_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

/**
 * Check if a path contains traversal sequences
 */
export function containsPathTraversal(filePath: string): boolean {
  const normalized = path.normalize(filePath);
  return normalized.includes('..') || filePath.includes('../') || filePath.includes('..\\');
}

/**
 * Validate a stream id before it is used as a registry key or file name.
 * Allowed: letters, digits, '_', '-', '.', starting with a letter or digit,
 * at most 128 characters, never '..'.
 */
export function validateStreamId(id: string): string {
  if (typeof id !== 'string' || id.length === 0) {
    throw new InvalidSpecError('Stream id is required');
  }
  if (id.includes('/') || id.includes('\\') || id.includes('\0') || containsPathTraversal(id)) {
    throw new InvalidSpecError('Stream id contains invalid characters (potential path traversal)');
  }
  if (!STREAM_ID_PATTERN.test(id)) {
    throw new InvalidSpecError(
      'Stream id may only contain letters, digits, "_", "-" and "." and must start with a letter or digit (max 128 characters)'
    );
  }
  return id;
}

/**
 * Resolve and validate that a path stays within a base directory
 */
export function validatePathWithinBase(basePath: string, targetPath: string): string {
  const resolvedBase = path.resolve(basePath);
  const resolvedTarget = path.resolve(basePath, targetPath);

  if (resolvedTarget !== resolvedBase && !resolvedTarget.startsWith(resolvedBase + path.sep)) {
    throw new InvalidSpecError('Path traversal attempt detected');
  }

  return resolvedTarget;
}

/**
 * Sanitize error messages to remove filesystem paths
 */
export function sanitizeErrorMessage(message: string, basePaths: string[] = []): string {
  let sanitized = message;

  // Remove common base paths
  for (const basePath of basePaths) {
    const regex = new RegExp(basePath.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g');
    sanitized = sanitized.replace(regex, '[REDACTED_PATH]');
  }

  // Remove absolute paths (Unix and Windows)
  sanitized = sanitized.replace(/\/[^\s]+/g, '[PATH]');
  sanitized = sanitized.replace(/[A-Z]:\\[^\s]+/g, '[PATH]');

  return sanitized;
}
