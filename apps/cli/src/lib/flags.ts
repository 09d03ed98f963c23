/**
 * Flag Mapping
 * 
 * Pure translation of parsed command-line flags into engine inputs.
 */

import { isAbsolute, join, resolve } from 'node:path';
import { ValidationError } from '@vidbatch/core';
import type { CollisionPolicy, TranscodeInput } from '@vidbatch/processing';
import { isRecursiveGlob } from '@vidbatch/selection';

export interface ReencodeFlags {
  vcodec?: string;
  acodec?: string;
  stripVideo?: boolean;
  stripAudio?: boolean;
  stripSubs?: boolean;
  stripData?: boolean;
  avCopyOnly?: boolean;
  x265?: boolean;
  crf?: string;
  customFlags?: string[];
  batch?: boolean;
  depth?: string;
  fixResolution?: boolean;
  fixErrors?: boolean;
  force?: boolean;
  /** Commander sets false for --no-clobber */
  clobber?: boolean;
  increment?: boolean;
  name?: string;
  preset?: string;
  savePreset?: string;
  concurrency?: string;
  dryRun?: boolean;
  json?: boolean;
}

export function parseIntegerFlag(flag: string, value: string, min: number): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(flag, `expected an integer, got "${value}"`);
  }
  const parsed = Number(trimmed);
  if (parsed < min) {
    throw new ValidationError(flag, `must be at least ${min}`);
  }
  return parsed;
}

/**
 * Transcode input from flags only; presets are layered underneath by the caller
 */
export function flagsToTranscodeInput(flags: ReencodeFlags): TranscodeInput {
  return {
    videoCodec: flags.vcodec,
    audioCodec: flags.acodec,
    stripVideo: Boolean(flags.stripVideo),
    stripAudio: Boolean(flags.stripAudio),
    stripSubs: Boolean(flags.stripSubs),
    stripData: Boolean(flags.stripData),
    avCopyOnly: Boolean(flags.avCopyOnly),
    x265: Boolean(flags.x265),
    crf: flags.crf === undefined ? undefined : parseIntegerFlag('--crf', flags.crf, 0),
    fixResolution: Boolean(flags.fixResolution),
    fixErrors: Boolean(flags.fixErrors),
    customFlags: flags.customFlags ?? [],
  };
}

/**
 * @throws ValidationError when more than one policy flag is given
 */
export function collisionPolicyFromFlags(flags: ReencodeFlags): CollisionPolicy {
  const chosen: CollisionPolicy[] = [];
  if (flags.force) chosen.push('force');
  if (flags.clobber === false) chosen.push('no-clobber');
  if (flags.increment) chosen.push('increment');

  if (chosen.length > 1) {
    throw new ValidationError(
      'collision',
      `--${chosen.join(', --')} are mutually exclusive`
    );
  }
  return chosen[0] ?? 'prompt';
}

export interface BatchSelection {
  root: string;
  pattern: string;
  depth: number;
}

const WILDCARD = /[*?[\]]/;

/**
 * Split a batch glob into the directory to walk and the pattern to match.
 * Leading segments without wildcards become part of the root; `**` makes
 * the walk unbounded, and a pattern with more segments walks that deep.
 */
export function batchSelection(pattern: string, depthFlag: string | undefined, cwd: string): BatchSelection {
  const requested = depthFlag === undefined ? 0 : parseIntegerFlag('--depth', depthFlag, -1);
  const segments = pattern.split('/');
  const fixed: string[] = [];

  while (segments.length > 1 && !WILDCARD.test(segments[0] ?? '')) {
    const segment = segments.shift();
    if (segment !== undefined) fixed.push(segment);
  }

  const rest = segments.join('/');
  const rootPath = fixed.length === 0 ? '' : fixed.join('/') || '/';
  const root = isAbsolute(rootPath) ? rootPath : resolve(join(cwd, rootPath));

  let depth = requested;
  if (isRecursiveGlob(rest)) {
    depth = -1;
  } else if (depth >= 0) {
    depth = Math.max(depth, segments.length - 1);
  }

  return { root, pattern: rest, depth };
}
