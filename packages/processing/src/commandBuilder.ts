/**
 * FFmpeg Command Builder
 * 
 * Fluent API for building FFmpeg argument lists, plus the pure translation
 * of (descriptor, options, output path) into one transcode command.
 * 
 * Stream copy is the baseline; only the kinds an option asks to encode are
 * re-encoded.
 */

import { resolve } from 'node:path';
import { OptionConflictError, TemplateError } from '@vidbatch/core';
import { primaryStream, type MediaDescriptor, type StreamDescriptor } from '@vidbatch/media';
import { createLogger } from '@vidbatch/utils';
import type { CodecSelector, TranscodeOptions } from './transcodeOptions.js';

const log = createLogger({ module: 'command-builder' });

export interface InputOptions {
  extraArgs?: string[];   // Args placed before -i
}

export interface StreamMapping {
  inputIndex: number;
  streamSpec: string;     // e.g., '3', 'v:0', 'a'
}

export interface VideoCodecOptions {
  codec: string;
  crf?: number;
}

export interface AudioCodecOptions {
  codec: string;
}

export interface StreamCodec {
  specifier: string;      // e.g., 'a', 's', 'd', 't'
  codec: string;
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: StreamMapping[] = [];
  private defaultCodec: string | null = null;
  private streamCodecs: StreamCodec[] = [];
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private videoFilters: string[] = [];
  private outputArgs: string[] = [];
  private outputFile: string = '';
  private globalArgs: string[] = [];

  /**
   * Add global arguments (before inputs)
   */
  addGlobalArg(...args: string[]): this {
    this.globalArgs.push(...args);
    return this;
  }

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push({ inputIndex, streamSpec });
    return this;
  }

  /**
   * Codec applied to every mapped stream not given a per-kind codec (`-c`)
   */
  setDefaultCodec(codec: string): this {
    this.defaultCodec = codec;
    return this;
  }

  /**
   * Codec for one stream specifier (`-c:s copy`), emitted after the default
   */
  setStreamCodec(specifier: string, codec: string): this {
    this.streamCodecs.push({ specifier, codec });
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  addVideoFilter(filter: string): this {
    this.videoFilters.push(filter);
    return this;
  }

  /**
   * Add arguments placed after codecs, right before the output file
   */
  addOutputArgs(...args: string[]): this {
    this.outputArgs.push(...args);
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    args.push(...this.globalArgs);

    for (const input of this.inputs) {
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    for (const mapping of this.mappings) {
      args.push('-map', `${mapping.inputIndex}:${mapping.streamSpec}`);
    }

    if (this.defaultCodec) {
      args.push('-c', this.defaultCodec);
    }

    for (const { specifier, codec } of this.streamCodecs) {
      args.push(`-c:${specifier}`, codec);
    }

    // Video codec
    const videoCopied = this.videoCodec === null && this.defaultCodec === 'copy';
    if (this.videoCodec) {
      args.push('-c:v', this.videoCodec.codec);
      if (this.videoCodec.crf !== undefined) args.push('-crf', this.videoCodec.crf.toString());
    }

    // Video filters (only if not copying)
    if (this.videoFilters.length > 0) {
      if (videoCopied) {
        log.warn('Video filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-vf', this.videoFilters.join(','));
      }
    }

    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec.codec);
    }

    args.push(...this.outputArgs);

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }

  /**
   * Build command as string for logging
   */
  buildString(binary: string = 'ffmpeg'): string {
    return formatCommandLine(binary, this.build());
  }
}

/**
 * Quote arguments containing whitespace or quotes for display
 */
export function formatCommandLine(binary: string, args: readonly string[]): string {
  const quote = (arg: string): string =>
    /[\s"'$`\\]/.test(arg) || arg === '' ? `"${arg.replace(/(["$`\\])/g, '\\$1')}"` : arg;
  return [binary, ...args].map(quote).join(' ');
}

export interface BuildContext {
  /** `-y` when true (default), `-n` otherwise */
  overwrite?: boolean;
  /** Emit `-progress pipe:1 -nostats` for machine-readable progress on stdout */
  progress?: boolean;
  /** Binary recorded on the CommandSpec; defaults to `ffmpeg` */
  ffmpegPath?: string;
}

export interface CommandSpec {
  readonly binary: string;
  readonly args: readonly string[];
  readonly inputPath: string;
  readonly outputPath: string;
  /** Display form of the full command */
  readonly commandLine: string;
}

function keepsStream(stream: StreamDescriptor, options: TranscodeOptions): boolean {
  switch (stream.kind) {
    case 'video':
      return options.video.mode !== 'strip';
    case 'audio':
      return options.audio.mode !== 'strip';
    case 'subtitle':
      return options.subtitles === 'copy';
    case 'data':
      return options.data === 'copy';
  }
}

function even(value: number): number {
  return Math.max(2, value - (value % 2));
}

/**
 * Scale filter bringing odd dimensions down to even ones, or null when the
 * primary video stream already has even dimensions
 */
export function evenScaleFilter(descriptor: MediaDescriptor): string | null {
  const video = primaryStream(descriptor, 'video');
  if (!video?.width || !video.height) return null;
  if (video.width % 2 === 0 && video.height % 2 === 0) return null;
  return `scale=${even(video.width)}:${even(video.height)}`;
}

/** Per-kind specifier; attachments are folded into data but copied with `-c:t` */
function codecSpecifier(stream: StreamDescriptor): string {
  switch (stream.kind) {
    case 'video':
      return 'v';
    case 'audio':
      return 'a';
    case 'subtitle':
      return 's';
    case 'data':
      return stream.codecType === 'attachment' ? 't' : 'd';
  }
}

function isEncoded(selector: CodecSelector): selector is { mode: 'encode'; codec: string } {
  return selector.mode === 'encode';
}

/**
 * Translate one file's descriptor and validated options into an ffmpeg
 * invocation. Pure: no filesystem access, no spawning.
 *
 * @throws TemplateError(SameAsInput) when outputPath resolves to the input
 * @throws OptionConflictError when no stream of this file survives the mapping
 */
export function buildTranscodeCommand(
  descriptor: MediaDescriptor,
  options: TranscodeOptions,
  outputPath: string,
  context: BuildContext = {}
): CommandSpec {
  const inputPath = resolve(descriptor.path);
  const target = resolve(outputPath);
  if (target === inputPath) {
    throw new TemplateError('SameAsInput', `Output path is the input file: ${inputPath}`, {
      path: inputPath,
    });
  }

  const kept = descriptor.streams.filter((stream) => keepsStream(stream, options));
  if (kept.length === 0) {
    throw new OptionConflictError([`no streams of ${inputPath} are left after stripping`]);
  }

  const builder = new FFmpegCommandBuilder()
    .addGlobalArg('-hide_banner', '-nostdin', context.overwrite === false ? '-n' : '-y');

  if (context.progress) {
    builder.addGlobalArg('-progress', 'pipe:1', '-nostats');
  }

  builder.addInput(inputPath, {
    extraArgs: options.fixErrors ? ['-err_detect', 'ignore_err'] : undefined,
  });

  for (const stream of kept) {
    builder.map(0, String(stream.index));
  }

  const keepsVideo = kept.some((stream) => stream.kind === 'video');
  const keepsAudio = kept.some((stream) => stream.kind === 'audio');
  const encodesVideo = isEncoded(options.video) && keepsVideo;
  const encodesAudio = isEncoded(options.audio) && keepsAudio;
  const scale = options.fixResolution && keepsVideo ? evenScaleFilter(descriptor) : null;

  if (scale && !encodesVideo) {
    // Scaling needs decoded video: copy the other kinds one by one and let
    // ffmpeg pick its default video encoder
    const specifiers = new Set(
      kept.filter((stream) => stream.kind !== 'video' && !(stream.kind === 'audio' && encodesAudio)).map(codecSpecifier)
    );
    for (const specifier of specifiers) {
      builder.setStreamCodec(specifier, 'copy');
    }
  } else {
    builder.setDefaultCodec('copy');
  }

  if (encodesVideo && isEncoded(options.video)) {
    builder.setVideoCodec({ codec: options.video.codec, crf: options.crf });
  }
  if (scale) {
    builder.addVideoFilter(scale);
  }

  if (encodesAudio && isEncoded(options.audio)) {
    builder.setAudioCodec({ codec: options.audio.codec });
  }

  builder.addOutputArgs(...options.customFlags).setOutput(target);

  const binary = context.ffmpegPath ?? 'ffmpeg';
  const args = builder.build();

  return Object.freeze({
    binary,
    args: Object.freeze(args),
    inputPath,
    outputPath: target,
    commandLine: formatCommandLine(binary, args),
  });
}
