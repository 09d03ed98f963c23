import { describe, it, expect } from 'vitest';
import {
  formatInfoBlock,
  maxResolution,
  primaryStream,
  streamsOfKind,
  toMediaDescriptor,
  ffprobeResultSchema,
  type FFProbeResult,
} from '../src/index.js';

function result(input: unknown): FFProbeResult {
  return ffprobeResultSchema.parse(input);
}

const MIXED = result({
  format: {
    format_name: 'matroska,webm',
    format_long_name: 'Matroska / WebM',
    duration: '3725.4',
    size: '1536',
  },
  streams: [
    { index: 0, codec_type: 'audio', codec_name: 'AAC', channels: 6, channel_layout: '5.1', tags: { language: 'eng' } },
    { index: 1, codec_type: 'video', codec_name: 'hevc', coded_width: 1279, coded_height: 720 },
    { index: 2, codec_type: 'attachment', codec_name: 'ttf' },
    { index: 3, codec_type: 'subtitle', codec_name: 'subrip' },
    { index: 4, codec_type: 'audio', codec_name: 'ac3', channels: 2 },
  ],
});

describe('toMediaDescriptor', () => {
  const descriptor = toMediaDescriptor('/media/show.mkv', MIXED, { mtimeMs: 5, size: 99 });

  it('orders streams video, audio, subtitle, data and keeps report order within a kind', () => {
    expect(descriptor.streams.map((s) => [s.index, s.kind])).toEqual([
      [1, 'video'],
      [0, 'audio'],
      [4, 'audio'],
      [3, 'subtitle'],
      [2, 'data'],
    ]);
  });

  it('lowercases codec names and keeps the raw codec type of folded kinds', () => {
    expect(primaryStream(descriptor, 'audio')?.codec).toBe('aac');
    expect(primaryStream(descriptor, 'data')?.codecType).toBe('attachment');
  });

  it('falls back to coded dimensions', () => {
    expect(maxResolution(descriptor)).toEqual({ width: 1279, height: 720 });
  });

  it('takes size from the format section, or the file when absent', () => {
    expect(descriptor.sizeBytes).toBe(1536);
    const noSize = toMediaDescriptor('/media/a.mkv', result({ format: { format_name: 'avi' } }), { mtimeMs: 1, size: 77 });
    expect(noSize.sizeBytes).toBe(77);
    expect(noSize.durationSec).toBe(0);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.streams)).toBe(true);
  });

  it('maxResolution takes the largest width and height across video streams', () => {
    const twoVideos = toMediaDescriptor(
      '/media/b.mkv',
      result({
        format: { format_name: 'matroska' },
        streams: [
          { index: 0, codec_type: 'video', codec_name: 'h264', width: 1920, height: 800 },
          { index: 1, codec_type: 'video', codec_name: 'mjpeg', width: 640, height: 960 },
        ],
      }),
      { mtimeMs: 1, size: 1 }
    );
    expect(maxResolution(twoVideos)).toEqual({ width: 1920, height: 960 });
    expect(streamsOfKind(twoVideos, 'audio')).toEqual([]);
  });
});

describe('formatInfoBlock', () => {
  it('renders the header, an odd-resolution warning and stream sections', () => {
    const descriptor = toMediaDescriptor('/media/show.mkv', MIXED, { mtimeMs: 5, size: 99 });
    const lines = formatInfoBlock(descriptor).split('\n');

    expect(lines[0]).toBe('show.mkv - matroska,webm - Matroska / WebM, Runtime = 1:02:05, Size = 1.5 KB');
    expect(lines[1]).toBe('Warning: Resolution (1279x720) is not divisible by 2.');
    expect(lines[2]).toBe('1 Video stream: 1279x720');
    expect(lines[3]).toBe('  #1 video: hevc - 1279 x 720 - bitrate: N/A');
    expect(lines[4]).toBe('2 Audio streams:');
    expect(lines[5]).toBe('  #0 audio: aac - channels: 6 (5.1) - bitrate: N/A - [eng]');
    expect(lines).toContain('1 Subtitle stream:');
    expect(lines).toContain('1 Data stream:');
  });
});
