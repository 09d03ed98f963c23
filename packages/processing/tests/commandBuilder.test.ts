import { describe, it, expect } from 'vitest';
import { OptionConflictError, TemplateError } from '@vidbatch/core';
import {
  FFmpegCommandBuilder,
  buildTranscodeCommand,
  createTranscodeOptions,
  formatCommandLine,
} from '../src/index.js';
import { makeDescriptor, movie } from './fixtures.js';

const ALL_MAPS = ['-map', '0:0', '-map', '0:1', '-map', '0:2', '-map', '0:3'];

describe('buildTranscodeCommand', () => {
  it('maps every stream and copies by default', () => {
    const spec = buildTranscodeCommand(movie(), createTranscodeOptions(), '/out/movie.mp4');

    expect(spec.binary).toBe('ffmpeg');
    expect(spec.inputPath).toBe('/media/movie.mkv');
    expect(spec.outputPath).toBe('/out/movie.mp4');
    expect(spec.args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-i', '/media/movie.mkv',
      ...ALL_MAPS,
      '-c', 'copy',
      '/out/movie.mp4',
    ]);
  });

  it('encodes video with x265 after the copy baseline', () => {
    const spec = buildTranscodeCommand(movie(), createTranscodeOptions({ x265: true }), '/out/movie.mkv', {
      progress: true,
    });

    expect(spec.args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-progress', 'pipe:1', '-nostats',
      '-i', '/media/movie.mkv',
      ...ALL_MAPS,
      '-c', 'copy',
      '-c:v', 'libx265', '-crf', '28',
      '/out/movie.mkv',
    ]);
  });

  it('places -err_detect before the input and custom flags before the output', () => {
    const spec = buildTranscodeCommand(
      movie(),
      createTranscodeOptions({ fixErrors: true, audioCodec: 'aac', customFlags: ['-b:a 192k'] }),
      '/out/movie.mkv',
      { overwrite: false }
    );

    expect(spec.args).toEqual([
      '-hide_banner', '-nostdin', '-n',
      '-err_detect', 'ignore_err',
      '-i', '/media/movie.mkv',
      ...ALL_MAPS,
      '-c', 'copy',
      '-c:a', 'aac',
      '-b:a', '192k',
      '/out/movie.mkv',
    ]);
  });

  it('keeps only video and audio with av-copy-only', () => {
    const spec = buildTranscodeCommand(movie(), createTranscodeOptions({ avCopyOnly: true }), '/out/movie.mkv');
    expect(spec.args.filter((arg) => arg.startsWith('0:'))).toEqual(['0:0', '0:1']);
  });

  it('drops stripped kinds from the mapping', () => {
    const spec = buildTranscodeCommand(
      movie(),
      createTranscodeOptions({ stripAudio: true, stripData: true }),
      '/out/movie.mkv'
    );
    expect(spec.args.filter((arg) => arg.startsWith('0:'))).toEqual(['0:0', '0:2']);
  });

  it('scales odd dimensions down to even ones', () => {
    const spec = buildTranscodeCommand(
      movie('/media/odd.mkv', 1919, 1079),
      createTranscodeOptions({ videoCodec: 'libx264', fixResolution: true }),
      '/out/odd.mkv'
    );
    const vf = spec.args.indexOf('-vf');
    expect(vf).toBeGreaterThan(spec.args.indexOf('-c:v'));
    expect(spec.args[vf + 1]).toBe('scale=1918:1078');
  });

  it('scales with the default video encoder when no encoder is given', () => {
    const spec = buildTranscodeCommand(
      movie('/media/odd.mkv', 1919, 1080),
      createTranscodeOptions({ fixResolution: true }),
      '/out/odd.mkv'
    );

    expect(spec.args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-i', '/media/odd.mkv',
      ...ALL_MAPS,
      '-c:a', 'copy',
      '-c:s', 'copy',
      '-c:d', 'copy',
      '-vf', 'scale=1918:1080',
      '/out/odd.mkv',
    ]);
  });

  it('copies attachments with -c:t and leaves an encoded audio kind to its encoder', () => {
    const descriptor = makeDescriptor('/media/odd.mkv', [
      { type: 'video', codec: 'h264', width: 721, height: 480 },
      { type: 'audio', codec: 'ac3' },
      { type: 'attachment', codec: 'ttf' },
    ]);
    const spec = buildTranscodeCommand(
      descriptor,
      createTranscodeOptions({ fixResolution: true, audioCodec: 'aac' }),
      '/out/odd.mkv'
    );

    expect(spec.args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-i', '/media/odd.mkv',
      '-map', '0:0', '-map', '0:1', '-map', '0:2',
      '-c:t', 'copy',
      '-vf', 'scale=720:480',
      '-c:a', 'aac',
      '/out/odd.mkv',
    ]);
  });

  it('keeps the plain copy baseline when fix-resolution finds even dimensions', () => {
    const spec = buildTranscodeCommand(movie(), createTranscodeOptions({ fixResolution: true }), '/out/movie.mp4');
    expect(spec.args).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-i', '/media/movie.mkv',
      ...ALL_MAPS,
      '-c', 'copy',
      '/out/movie.mp4',
    ]);
  });

  it('leaves even dimensions untouched by fix-resolution', () => {
    const withFix = buildTranscodeCommand(
      movie(),
      createTranscodeOptions({ videoCodec: 'libx264', fixResolution: true }),
      '/out/movie.mkv'
    );
    const withoutFix = buildTranscodeCommand(
      movie(),
      createTranscodeOptions({ videoCodec: 'libx264' }),
      '/out/movie.mkv'
    );
    expect(withFix.args).toEqual(withoutFix.args);
  });

  it('fails when no stream survives the mapping', () => {
    const audioOnly = makeDescriptor('/media/song.mka', [{ type: 'audio', codec: 'flac' }]);
    expect(() =>
      buildTranscodeCommand(audioOnly, createTranscodeOptions({ stripAudio: true }), '/out/song.mka')
    ).toThrow(OptionConflictError);
  });

  it('refuses to write over the input', () => {
    let error: unknown;
    try {
      buildTranscodeCommand(movie(), createTranscodeOptions(), '/media/../media/movie.mkv');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(TemplateError);
    expect(error).toMatchObject({ kind: 'SameAsInput' });
  });

  it('uses the configured binary and quotes paths with spaces', () => {
    const spec = buildTranscodeCommand(
      movie('/media/my movie.mkv'),
      createTranscodeOptions(),
      '/out/my movie.mkv',
      { ffmpegPath: '/opt/ffmpeg/bin/ffmpeg' }
    );
    expect(spec.binary).toBe('/opt/ffmpeg/bin/ffmpeg');
    expect(spec.commandLine.startsWith('/opt/ffmpeg/bin/ffmpeg -hide_banner')).toBe(true);
    expect(spec.commandLine.endsWith('"/out/my movie.mkv"')).toBe(true);
  });
});

describe('FFmpegCommandBuilder', () => {
  it('ignores video filters when video is copied', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mkv')
      .setDefaultCodec('copy')
      .addVideoFilter('scale=2:2')
      .setOutput('out.mkv')
      .build();
    expect(args).toEqual(['-i', 'in.mkv', '-c', 'copy', 'out.mkv']);
  });

  it('emits per-specifier codecs after the default and applies filters without a copy default', () => {
    const args = new FFmpegCommandBuilder()
      .addInput('in.mkv')
      .setStreamCodec('s', 'copy')
      .addVideoFilter('scale=2:2')
      .setOutput('out.mkv')
      .build();
    expect(args).toEqual(['-i', 'in.mkv', '-c:s', 'copy', '-vf', 'scale=2:2', 'out.mkv']);
  });

  it('requires an output file', () => {
    expect(() => new FFmpegCommandBuilder().addInput('in.mkv').build()).toThrow('Output file not specified');
  });
});

describe('formatCommandLine', () => {
  it('quotes only arguments that need it', () => {
    expect(formatCommandLine('ffmpeg', ['-i', 'a b.mkv', '-metadata', 'title=x'])).toBe(
      'ffmpeg -i "a b.mkv" -metadata title=x'
    );
  });
});
