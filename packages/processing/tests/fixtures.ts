import { ffprobeResultSchema, toMediaDescriptor, type MediaDescriptor } from '@vidbatch/media';

export interface StreamFixture {
  type: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';
  codec: string;
  width?: number;
  height?: number;
}

/**
 * Descriptor for `path` with the given streams, indexed in order
 */
export function makeDescriptor(
  path: string,
  streams: StreamFixture[],
  durationSec: number = 60
): MediaDescriptor {
  return toMediaDescriptor(
    path,
    ffprobeResultSchema.parse({
      format: { format_name: 'matroska,webm', duration: String(durationSec), size: '1000' },
      streams: streams.map((s, index) => ({
        index,
        codec_type: s.type,
        codec_name: s.codec,
        width: s.width,
        height: s.height,
      })),
    }),
    { mtimeMs: 1, size: 1000 }
  );
}

/** 1080p h264 with one audio, one subtitle and one data stream */
export function movie(path: string = '/media/movie.mkv', width: number = 1920, height: number = 1080): MediaDescriptor {
  return makeDescriptor(path, [
    { type: 'video', codec: 'h264', width, height },
    { type: 'audio', codec: 'ac3' },
    { type: 'subtitle', codec: 'subrip' },
    { type: 'data', codec: 'bin_data' },
  ]);
}
