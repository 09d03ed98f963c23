/**
 * Descriptor normalisation and derived properties.
 */

import type { FFProbeResult, FFProbeStream } from './probes/ffprobe.js';
import {
  STREAM_KIND_ORDER,
  type MediaDescriptor,
  type Resolution,
  type StreamDescriptor,
  type StreamKind,
} from './types.js';

export interface FileFacts {
  mtimeMs: number;
  size: number;
}

function toNumber(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = typeof value === 'number' ? value : parseFloat(value);
  return Number.isFinite(n) ? n : undefined;
}

function streamKind(codecType: string | undefined): StreamKind {
  switch (codecType) {
    case 'video':
    case 'audio':
    case 'subtitle':
      return codecType;
    default:
      return 'data';
  }
}

function toStreamDescriptor(stream: FFProbeStream): StreamDescriptor {
  const kind = streamKind(stream.codec_type);
  const descriptor: StreamDescriptor = {
    index: stream.index,
    kind,
    codec: (stream.codec_name ?? 'unknown').toLowerCase(),
    codecLongName: stream.codec_long_name,
    codecType: stream.codec_type ?? 'unknown',
    bitRate: toNumber(stream.bit_rate),
    language: stream.tags?.['language'],
    title: stream.tags?.['title'],
  };

  if (kind === 'video') {
    descriptor.width = stream.width ?? stream.coded_width ?? 0;
    descriptor.height = stream.height ?? stream.coded_height ?? 0;
    descriptor.pixelFormat = stream.pix_fmt;
    descriptor.displayAspectRatio = stream.display_aspect_ratio;
  } else if (kind === 'audio') {
    descriptor.channels = stream.channels;
    descriptor.channelLayout = stream.channel_layout;
    descriptor.sampleRate = toNumber(stream.sample_rate);
  }

  return Object.freeze(descriptor);
}

/**
 * Build an immutable descriptor from parsed ffprobe output
 */
export function toMediaDescriptor(
  path: string,
  result: FFProbeResult,
  facts: FileFacts
): MediaDescriptor {
  const rank = (kind: StreamKind): number => STREAM_KIND_ORDER.indexOf(kind);

  // Array.prototype.sort is stable, so report order survives within a kind
  const streams = result.streams
    .map(toStreamDescriptor)
    .sort((a, b) => rank(a.kind) - rank(b.kind));

  return Object.freeze({
    path,
    container: result.format.format_name,
    containerLongName: result.format.format_long_name,
    streams: Object.freeze(streams),
    sizeBytes: toNumber(result.format.size) ?? facts.size,
    durationSec: toNumber(result.format.duration) ?? 0,
    bitRate: toNumber(result.format.bit_rate),
    mtimeMs: facts.mtimeMs,
    raw: result,
  });
}

export function streamsOfKind(
  descriptor: MediaDescriptor,
  kind: StreamKind
): StreamDescriptor[] {
  return descriptor.streams.filter((s) => s.kind === kind);
}

/**
 * First stream of a kind, i.e. the one players pick by default
 */
export function primaryStream(
  descriptor: MediaDescriptor,
  kind: StreamKind
): StreamDescriptor | undefined {
  return descriptor.streams.find((s) => s.kind === kind);
}

/**
 * Largest width and largest height across all video streams. 0x0 when the
 * file has no video.
 */
export function maxResolution(descriptor: MediaDescriptor): Resolution {
  let width = 0;
  let height = 0;
  for (const stream of streamsOfKind(descriptor, 'video')) {
    width = Math.max(width, stream.width ?? 0);
    height = Math.max(height, stream.height ?? 0);
  }
  return { width, height };
}

export function formatResolution(resolution: Resolution): string {
  return `${resolution.width}x${resolution.height}`;
}
