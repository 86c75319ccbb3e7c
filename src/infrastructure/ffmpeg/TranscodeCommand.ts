import { StreamSpec } from '../../domain/stream/StreamSpec';

export interface EncodingSettings {
  outputFormat: string;
  video: {
    codec: string;
    preset: string;
    tune: string;
    bitrate: string;
  };
  audio: {
    codec: string;
    sampleRate: string;
    bitrate: string;
  };
}

// Any of these in the extra args means the video can no longer be stream-copied
const REENCODE_KEYWORDS = ['-filter_complex', '-vf', 'drawtext', 'overlay', 'format=', 'scale', 'crop'];

export const FULL_OVERLAY_FILTER = '[0:v][1:v]overlay=(W-w)/2:(H-h)/2:format=auto';

export function requiresReencode(args: readonly string[]): boolean {
  if (args.length === 0) {
    return false;
  }
  const joined = args.join(' ').toLowerCase();
  return REENCODE_KEYWORDS.some((keyword) => joined.includes(keyword));
}

function hasInput(args: readonly string[], file: string): boolean {
  return args.some((arg, i) => arg === '-i' && args[i + 1] === file);
}

/**
 * Extra args with every `-i <input>` pair removed
 */
function withoutInputs(args: readonly string[]): string[] {
  return args.filter((arg, i) => arg !== '-i' && args[i - 1] !== '-i');
}

/**
 * Overlay input, unless the extra args already read the image, plus (in
 * 'full' mode) a centred overlay filter unless the caller already supplied
 * their own filter graph.
 */
function buildOverlayArgs(spec: StreamSpec): { input: string[]; filter: string[] } {
  if (!spec.overlayImage) {
    return { input: [], filter: [] };
  }

  const input = hasInput(spec.extraArgs ?? [], spec.overlayImage) ? [] : ['-i', spec.overlayImage];
  if (spec.overlayMode === 'full') {
    const existing = withoutInputs(spec.extraArgs ?? []).join(' ').toLowerCase();
    if (!existing.includes('-filter_complex') && !existing.includes('overlay')) {
      return { input, filter: ['-filter_complex', FULL_OVERLAY_FILTER] };
    }
  }
  return { input, filter: [] };
}

/**
 * Build the transcoder argument vector (without the executable) for a stream.
 * Same spec and settings always give the same vector. The destination is the
 * last token.
 */
export function buildTranscodeArgs(spec: StreamSpec, settings: EncodingSettings): string[] {
  const overlay = buildOverlayArgs(spec);
  const extraArgs = spec.extraArgs ?? [];

  // -re: read input at native frame rate
  const args: string[] = ['-re', '-i', spec.source, ...overlay.input, ...overlay.filter, ...extraArgs];

  // Only filters decide; input paths may contain any word
  if (requiresReencode([...overlay.filter, ...withoutInputs(extraArgs)])) {
    args.push(
      '-c:v', settings.video.codec,
      '-preset', settings.video.preset,
      '-tune', settings.video.tune,
      '-b:v', settings.video.bitrate
    );
  } else {
    args.push('-c:v', 'copy');
  }

  // Audio is always encoded for RTMP compatibility
  args.push(
    '-c:a', settings.audio.codec,
    '-ar', settings.audio.sampleRate,
    '-b:a', settings.audio.bitrate,
    '-f', settings.outputFormat,
    spec.destination
  );

  return args;
}
