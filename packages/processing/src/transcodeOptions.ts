/**
 * Transcode Options
 *
 * The declarative option set for one reencode. Raw input (CLI flags or a
 * stored preset) is validated once; contradictory combinations are rejected
 * here rather than at spawn time.
 */

import { z } from 'zod';
import { OptionConflictError, ValidationError } from '@vidbatch/core';

export const DEFAULT_X265_CRF = 28;

export const transcodeInputSchema = z
  .object({
    videoCodec: z.string().trim().min(1).optional(),
    audioCodec: z.string().trim().min(1).optional(),
    stripVideo: z.boolean().default(false),
    stripAudio: z.boolean().default(false),
    stripSubs: z.boolean().default(false),
    stripData: z.boolean().default(false),
    avCopyOnly: z.boolean().default(false),
    x265: z.boolean().default(false),
    crf: z.number().int().min(0).max(63).optional(),
    fixResolution: z.boolean().default(false),
    fixErrors: z.boolean().default(false),
    customFlags: z.array(z.string()).default([]),
  })
  .strict();

/** Raw option input; every flag is optional */
export type TranscodeInput = z.input<typeof transcodeInputSchema>;

/** Input with defaults applied and spellings normalised */
export type CanonicalTranscodeInput = z.output<typeof transcodeInputSchema>;

export type CodecSelector =
  | { readonly mode: 'copy' }
  | { readonly mode: 'strip' }
  | { readonly mode: 'encode'; readonly codec: string };

export type PassthroughSelector = 'copy' | 'strip';

export interface TranscodeOptions {
  readonly video: CodecSelector;
  readonly audio: CodecSelector;
  readonly subtitles: PassthroughSelector;
  readonly data: PassthroughSelector;
  readonly avCopyOnly: boolean;
  readonly crf?: number;
  readonly fixResolution: boolean;
  readonly fixErrors: boolean;
  readonly customFlags: readonly string[];
  /** Canonical input this value was built from; what presets store */
  readonly input: Readonly<CanonicalTranscodeInput>;
}

function canonicalize(raw: TranscodeInput): CanonicalTranscodeInput {
  const parsed = transcodeInputSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.path.join('.') || 'options', issue?.message ?? 'invalid');
  }
  const data = parsed.data;

  // "strip" as a codec name is the strip flag spelled differently
  const stripVideo = data.stripVideo || data.videoCodec?.toLowerCase() === 'strip';
  const stripAudio = data.stripAudio || data.audioCodec?.toLowerCase() === 'strip';

  return {
    ...data,
    videoCodec: data.videoCodec?.toLowerCase() === 'strip' ? undefined : data.videoCodec,
    audioCodec: data.audioCodec?.toLowerCase() === 'strip' ? undefined : data.audioCodec,
    stripVideo,
    stripAudio,
    customFlags: data.customFlags.flatMap((flag) => flag.split(/\s+/)).filter(Boolean),
  };
}

function isCopy(codec: string | undefined): boolean {
  return codec?.toLowerCase() === 'copy';
}

function findConflicts(input: CanonicalTranscodeInput, video: CodecSelector): string[] {
  const conflicts: string[] = [];

  if (input.stripVideo && input.videoCodec !== undefined) {
    conflicts.push('--strip-video cannot be combined with --vcodec');
  }
  if (input.stripVideo && input.x265) {
    conflicts.push('--strip-video cannot be combined with --x265');
  }
  if (input.stripAudio && input.audioCodec !== undefined) {
    conflicts.push('--strip-audio cannot be combined with --acodec');
  }
  if (input.x265 && input.videoCodec !== undefined) {
    conflicts.push('--x265 cannot be combined with --vcodec');
  }
  if (input.avCopyOnly && input.stripVideo) {
    conflicts.push('--av-copy-only cannot be combined with --strip-video');
  }
  if (input.avCopyOnly && input.stripAudio) {
    conflicts.push('--av-copy-only cannot be combined with --strip-audio');
  }
  if (input.avCopyOnly && input.x265) {
    conflicts.push('--av-copy-only cannot be combined with --x265');
  }
  if (input.avCopyOnly && input.videoCodec !== undefined && !isCopy(input.videoCodec)) {
    conflicts.push('--av-copy-only cannot be combined with --vcodec');
  }
  if (input.avCopyOnly && input.audioCodec !== undefined && !isCopy(input.audioCodec)) {
    conflicts.push('--av-copy-only cannot be combined with --acodec');
  }
  if (input.avCopyOnly && input.fixResolution) {
    conflicts.push('--av-copy-only cannot be combined with --fix-resolution');
  }
  if (input.stripVideo && input.fixResolution) {
    conflicts.push('--fix-resolution cannot be combined with --strip-video');
  }
  if (input.crf !== undefined && video.mode !== 'encode') {
    conflicts.push('--crf requires a video encoder (--vcodec or --x265)');
  }
  if (input.stripVideo && input.stripAudio && input.stripSubs && input.stripData) {
    conflicts.push('every stream kind is stripped; nothing would be written');
  }

  return conflicts;
}

function videoSelector(input: CanonicalTranscodeInput): CodecSelector {
  if (input.stripVideo) return { mode: 'strip' };
  if (input.x265) return { mode: 'encode', codec: 'libx265' };
  if (input.videoCodec !== undefined && !isCopy(input.videoCodec)) {
    return { mode: 'encode', codec: input.videoCodec };
  }
  return { mode: 'copy' };
}

function audioSelector(input: CanonicalTranscodeInput): CodecSelector {
  if (input.stripAudio) return { mode: 'strip' };
  if (input.audioCodec !== undefined && !isCopy(input.audioCodec)) {
    return { mode: 'encode', codec: input.audioCodec };
  }
  return { mode: 'copy' };
}

/**
 * Validate raw input and build an immutable option set.
 *
 * @throws ValidationError when a field has the wrong type
 * @throws OptionConflictError listing every contradictory combination
 */
export function createTranscodeOptions(raw: TranscodeInput = {}): TranscodeOptions {
  const input = canonicalize(raw);
  const video = videoSelector(input);

  const conflicts = findConflicts(input, video);
  if (conflicts.length > 0) {
    throw new OptionConflictError(conflicts);
  }

  return Object.freeze({
    video: Object.freeze(video),
    audio: Object.freeze(audioSelector(input)),
    subtitles: input.avCopyOnly || input.stripSubs ? 'strip' : 'copy',
    data: input.avCopyOnly || input.stripData ? 'strip' : 'copy',
    avCopyOnly: input.avCopyOnly,
    crf: input.x265 ? (input.crf ?? DEFAULT_X265_CRF) : input.crf,
    fixResolution: input.fixResolution,
    fixErrors: input.fixErrors,
    customFlags: Object.freeze([...input.customFlags]),
    input: Object.freeze({ ...input, customFlags: [...input.customFlags] }),
  });
}

/**
 * Canonical input form; `createTranscodeOptions(toTranscodeInput(o))` equals `o`
 */
export function toTranscodeInput(options: TranscodeOptions): CanonicalTranscodeInput {
  return { ...options.input, customFlags: [...options.input.customFlags] };
}

/**
 * Layer `override` on `base`: set flags accumulate, codec names and crf from
 * the override win, custom flags are appended after the base's.
 */
export function mergeTranscodeInput(base: TranscodeInput, override: TranscodeInput): TranscodeInput {
  return {
    videoCodec: override.videoCodec ?? base.videoCodec,
    audioCodec: override.audioCodec ?? base.audioCodec,
    stripVideo: Boolean(base.stripVideo || override.stripVideo),
    stripAudio: Boolean(base.stripAudio || override.stripAudio),
    stripSubs: Boolean(base.stripSubs || override.stripSubs),
    stripData: Boolean(base.stripData || override.stripData),
    avCopyOnly: Boolean(base.avCopyOnly || override.avCopyOnly),
    x265: Boolean(base.x265 || override.x265),
    crf: override.crf ?? base.crf,
    fixResolution: Boolean(base.fixResolution || override.fixResolution),
    fixErrors: Boolean(base.fixErrors || override.fixErrors),
    customFlags: [...(base.customFlags ?? []), ...(override.customFlags ?? [])],
  };
}

/**
 * Short human summary, e.g. "video libx265 crf 28, audio copy, subs strip"
 */
export function describeTranscodeOptions(options: TranscodeOptions): string {
  const selector = (s: CodecSelector): string => (s.mode === 'encode' ? s.codec : s.mode);
  const parts = [
    `video ${selector(options.video)}${options.crf !== undefined ? ` crf ${options.crf}` : ''}`,
    `audio ${selector(options.audio)}`,
    `subs ${options.subtitles}`,
    `data ${options.data}`,
  ];
  if (options.fixResolution) parts.push('fix-resolution');
  if (options.fixErrors) parts.push('fix-errors');
  if (options.customFlags.length > 0) parts.push(`custom: ${options.customFlags.join(' ')}`);
  return parts.join(', ');
}
