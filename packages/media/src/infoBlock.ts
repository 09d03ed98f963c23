/**
 * Human-readable summary of a descriptor, as printed by `vidbatch info`.
 */

import { basename } from 'node:path';
import { formatBytes, formatRuntime } from '@vidbatch/utils';
import { formatResolution, maxResolution, streamsOfKind } from './descriptor.js';
import type { MediaDescriptor, StreamDescriptor, StreamKind } from './types.js';

const HEADINGS: Record<StreamKind, string> = {
  video: 'Video',
  audio: 'Audio',
  subtitle: 'Subtitle',
  data: 'Data',
};

function describeStream(stream: StreamDescriptor): string {
  const parts = [`#${stream.index} ${stream.codecType}: ${stream.codecLongName ?? stream.codec}`];

  if (stream.kind === 'video' && (stream.width ?? 0) > 0) {
    parts.push(`${stream.width} x ${stream.height}`);
    if (stream.displayAspectRatio && stream.displayAspectRatio !== 'N/A') {
      parts.push(`DAR: ${stream.displayAspectRatio}`);
    }
  }
  if (stream.kind === 'audio' && (stream.channels ?? 0) > 0) {
    parts.push(`channels: ${stream.channels}${stream.channelLayout ? ` (${stream.channelLayout})` : ''}`);
  }
  if (stream.kind === 'video' || stream.kind === 'audio') {
    parts.push(`bitrate: ${stream.bitRate ?? 'N/A'}`);
  }
  if (stream.language) {
    parts.push(`[${stream.language}]`);
  }
  return parts.join(' - ');
}

export function formatInfoBlock(descriptor: MediaDescriptor): string {
  const lines: string[] = [];
  const resolution = maxResolution(descriptor);

  lines.push(
    `${basename(descriptor.path)} - ${descriptor.container}` +
    (descriptor.containerLongName ? ` - ${descriptor.containerLongName}` : '') +
    `, Runtime = ${formatRuntime(descriptor.durationSec)}, Size = ${formatBytes(descriptor.sizeBytes)}`
  );

  if (resolution.width % 2 === 1 || resolution.height % 2 === 1) {
    lines.push(`Warning: Resolution (${formatResolution(resolution)}) is not divisible by 2.`);
  }

  for (const kind of ['video', 'audio', 'subtitle', 'data'] as const) {
    const streams = streamsOfKind(descriptor, kind);
    if (streams.length === 0) continue;

    const noun = streams.length > 1 ? 'streams' : 'stream';
    const heading = `${streams.length} ${HEADINGS[kind]} ${noun}`;
    lines.push(kind === 'video' ? `${heading}: ${formatResolution(resolution)}` : `${heading}:`);
    for (const stream of streams) {
      lines.push(`  ${describeStream(stream)}`);
    }
  }

  return lines.join('\n');
}
