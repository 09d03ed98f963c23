/**
 * Selection Criteria
 *
 * A conjunction of optional predicates, validated and compiled once per
 * invocation. An absent predicate always holds.
 */

import { z } from 'zod';
import { ValidationError } from '@vidbatch/core';
import { normalizeExtension } from '@vidbatch/utils';
import {
  maxResolution,
  streamsOfKind,
  type MediaDescriptor,
  type StreamKind,
} from '@vidbatch/media';
import { compileGlob, compileRegex, testPattern, type CompiledPattern } from './pattern.js';
import { normalizeCodecName } from './codecAliases.js';

export const VIDEO_EXTENSIONS: readonly string[] = [
  '.avi', '.mpg', '.mpeg', '.mkv', '.mp4', '.mov', '.webm',
  '.wmv', '.m4v', '.ogv', '.divx', '.flv', '.ts', '.m2ts',
];

const resolutionBoundSchema = z
  .object({
    width: z.number().int().nonnegative().optional(),
    height: z.number().int().nonnegative().optional(),
  })
  .strict();

export const selectionCriteriaSchema = z
  .object({
    pattern: z
      .union([
        z.string().min(1),
        z.object({ kind: z.enum(['glob', 'regex']), value: z.string().min(1) }).strict(),
      ])
      .optional(),
    exclude: z.array(z.string().min(1)).optional(),
    extensions: z.array(z.string().min(1)).optional(),
    videoCodecs: z.array(z.string().min(1)).optional(),
    audioCodecs: z.array(z.string().min(1)).optional(),
    minResolution: resolutionBoundSchema.optional(),
    maxResolution: resolutionBoundSchema.optional(),
    minSizeBytes: z.number().nonnegative().optional(),
    maxSizeBytes: z.number().nonnegative().optional(),
    minDurationSec: z.number().nonnegative().optional(),
    maxDurationSec: z.number().nonnegative().optional(),
  })
  .strict();

export type SelectionCriteriaInput = z.input<typeof selectionCriteriaSchema>;

type ResolutionBound = z.infer<typeof resolutionBoundSchema>;

export interface SelectionCriteria {
  readonly pattern?: CompiledPattern;
  readonly exclude: readonly CompiledPattern[];
  readonly extensions?: ReadonlySet<string>;
  readonly videoCodecs?: ReadonlySet<string>;
  readonly audioCodecs?: ReadonlySet<string>;
  readonly minResolution?: Readonly<ResolutionBound>;
  readonly maxResolution?: Readonly<ResolutionBound>;
  readonly minSizeBytes?: number;
  readonly maxSizeBytes?: number;
  readonly minDurationSec?: number;
  readonly maxDurationSec?: number;
}

function checkRange(field: string, min: number | undefined, max: number | undefined): void {
  if (min !== undefined && max !== undefined && min > max) {
    throw new ValidationError(field, `minimum ${min} exceeds maximum ${max}`);
  }
}

function nonEmptySet(values: string[] | undefined, map: (v: string) => string): ReadonlySet<string> | undefined {
  if (!values || values.length === 0) return undefined;
  return new Set(values.map(map));
}

/**
 * Validate and compile criteria. Throws ValidationError on bad input.
 */
export function createSelectionCriteria(input: SelectionCriteriaInput = {}): SelectionCriteria {
  const parsed = selectionCriteriaSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue?.path.join('.') || 'criteria', issue?.message ?? 'invalid');
  }
  const data = parsed.data;

  checkRange('size', data.minSizeBytes, data.maxSizeBytes);
  checkRange('duration', data.minDurationSec, data.maxDurationSec);
  checkRange('width', data.minResolution?.width, data.maxResolution?.width);
  checkRange('height', data.minResolution?.height, data.maxResolution?.height);

  let pattern: CompiledPattern | undefined;
  if (typeof data.pattern === 'string') {
    pattern = compileGlob(data.pattern);
  } else if (data.pattern) {
    pattern = data.pattern.kind === 'glob'
      ? compileGlob(data.pattern.value)
      : compileRegex(data.pattern.value);
  }

  return Object.freeze({
    pattern,
    exclude: Object.freeze((data.exclude ?? []).map(compileGlob)),
    extensions: nonEmptySet(data.extensions, (e) => normalizeExtension(e).toLowerCase()),
    videoCodecs: nonEmptySet(data.videoCodecs, normalizeCodecName),
    audioCodecs: nonEmptySet(data.audioCodecs, normalizeCodecName),
    minResolution: data.minResolution,
    maxResolution: data.maxResolution,
    minSizeBytes: data.minSizeBytes,
    maxSizeBytes: data.maxSizeBytes,
    minDurationSec: data.minDurationSec,
    maxDurationSec: data.maxDurationSec,
  });
}

/**
 * Whether any predicate needs probed metadata
 */
export function needsMetadata(criteria: SelectionCriteria): boolean {
  return (
    criteria.videoCodecs !== undefined ||
    criteria.audioCodecs !== undefined ||
    criteria.minResolution !== undefined ||
    criteria.maxResolution !== undefined ||
    criteria.minSizeBytes !== undefined ||
    criteria.maxSizeBytes !== undefined ||
    criteria.minDurationSec !== undefined ||
    criteria.maxDurationSec !== undefined
  );
}

/**
 * Metadata-free predicates: pattern, exclusions, extensions
 */
export function matchesPath(
  criteria: SelectionCriteria,
  fileName: string,
  relativePath: string,
  extension: string
): boolean {
  if (criteria.pattern && !testPattern(criteria.pattern, fileName, relativePath)) {
    return false;
  }
  if (criteria.exclude.some((p) => testPattern(p, fileName, relativePath))) {
    return false;
  }
  if (criteria.extensions && !criteria.extensions.has(extension.toLowerCase())) {
    return false;
  }
  return true;
}

function hasCodec(
  descriptor: MediaDescriptor,
  kind: StreamKind,
  allowed: ReadonlySet<string>
): boolean {
  return streamsOfKind(descriptor, kind).some((s) => allowed.has(normalizeCodecName(s.codec)));
}

function within(value: number, min: number | undefined, max: number | undefined): boolean {
  if (min !== undefined && value < min) return false;
  if (max !== undefined && value > max) return false;
  return true;
}

/**
 * Metadata predicates, cheapest first
 */
export function matchesDescriptor(
  criteria: SelectionCriteria,
  descriptor: MediaDescriptor
): boolean {
  if (!within(descriptor.sizeBytes, criteria.minSizeBytes, criteria.maxSizeBytes)) {
    return false;
  }
  if (!within(descriptor.durationSec, criteria.minDurationSec, criteria.maxDurationSec)) {
    return false;
  }

  const { width, height } = maxResolution(descriptor);
  if (!within(width, criteria.minResolution?.width, criteria.maxResolution?.width)) {
    return false;
  }
  if (!within(height, criteria.minResolution?.height, criteria.maxResolution?.height)) {
    return false;
  }

  if (criteria.videoCodecs && !hasCodec(descriptor, 'video', criteria.videoCodecs)) {
    return false;
  }
  if (criteria.audioCodecs && !hasCodec(descriptor, 'audio', criteria.audioCodecs)) {
    return false;
  }
  return true;
}
