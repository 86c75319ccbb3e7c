import { z } from 'zod';
import { InvalidSpecError } from '../../utils/errors';
import { validateStreamId } from '../../utils/pathSecurity';

export type OverlayMode = 'full';

/**
 * Immutable description of a requested relay pipeline
 */
export interface StreamSpec {
  readonly id: string;
  /** Input media URL (typically an HLS playlist) */
  readonly source: string;
  /** Output target URL (typically RTMP) */
  readonly destination: string;
  /** Still image added as a second input */
  readonly overlayImage?: string;
  /** 'full' composites the overlay image centred over the video */
  readonly overlayMode?: OverlayMode;
  /** Passed to the transcoder verbatim, in order */
  readonly extraArgs?: readonly string[];
}

export const streamSpecSchema = z.object({
  id: z.string().trim().min(1, 'Stream id is required'),
  source: z.string().trim().min(1, 'Source URL is required'),
  destination: z.string().trim().min(1, 'Destination URL is required'),
  overlayImage: z.string().trim().min(1).optional(),
  overlayMode: z.enum(['full']).optional(),
  extraArgs: z.array(z.union([z.string(), z.number()]).transform(String)).optional(),
});

export type StreamSpecInput = z.input<typeof streamSpecSchema>;

/**
 * Validate untrusted input into a StreamSpec. The id is checked for
 * path-safety before anything else can use it.
 */
export function parseStreamSpec(input: unknown): StreamSpec {
  const parsed = streamSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSpecError('Invalid stream specification', parsed.error.flatten().fieldErrors);
  }

  const { id, source, destination, overlayImage, overlayMode, extraArgs } = parsed.data;
  validateStreamId(id);

  return Object.freeze({
    id,
    source,
    destination,
    ...(overlayImage !== undefined ? { overlayImage } : {}),
    ...(overlayMode !== undefined ? { overlayMode } : {}),
    ...(extraArgs !== undefined ? { extraArgs: Object.freeze([...extraArgs]) } : {}),
  });
}
