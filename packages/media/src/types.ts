/**
 * Media Types
 * 
 * Normalised, immutable description of a probed media file.
 */

export type StreamKind = 'video' | 'audio' | 'subtitle' | 'data';

export const STREAM_KIND_ORDER: readonly StreamKind[] = ['video', 'audio', 'subtitle', 'data'];

export interface StreamDescriptor {
  /** Index of the stream inside the container, as reported by ffprobe */
  index: number;
  kind: StreamKind;
  /** Decoded codec name (e.g. "hevc"), never the encoder used to produce it */
  codec: string;
  codecLongName?: string;
  /** Raw ffprobe codec_type, kept for kinds folded into "data" (attachments) */
  codecType: string;

  // Video
  width?: number;
  height?: number;
  pixelFormat?: string;
  displayAspectRatio?: string;

  // Audio
  channels?: number;
  channelLayout?: string;
  sampleRate?: number;

  bitRate?: number;
  language?: string;
  title?: string;
}

export interface MediaDescriptor {
  /** Absolute path of the probed file */
  path: string;
  /** Container format (ffprobe format_name, e.g. "matroska,webm") */
  container: string;
  containerLongName?: string;
  /** Video, then audio, then subtitle, then data; report order within a kind */
  streams: readonly StreamDescriptor[];
  sizeBytes: number;
  durationSec: number;
  bitRate?: number;
  /** Modification time the descriptor was taken at */
  mtimeMs: number;
  /** The parsed ffprobe output, for `info --json` */
  raw: unknown;
}

export interface Resolution {
  width: number;
  height: number;
}
