/**
 * Selector
 *
 * Walks the given roots and keeps the files that satisfy the criteria.
 * Path predicates run first; the prober is only called for survivors, and
 * only when a metadata predicate is present.
 */

import { stat } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { ProbeError, SelectionError } from '@vidbatch/core';
import { createLogger, errnoCode } from '@vidbatch/utils';
import type { MediaDescriptor, Prober } from '@vidbatch/media';
import {
  matchesDescriptor,
  matchesPath,
  needsMetadata,
  type SelectionCriteria,
} from './criteria.js';
import { walkRoot } from './walker.js';

const log = createLogger({ module: 'selector' });

export interface SelectionWarning {
  path: string;
  error: ProbeError;
}

export interface SelectionResult {
  /** Unique absolute paths; lexicographic within a root, roots in given order */
  paths: readonly string[];
  /** Descriptors probed while selecting, keyed by absolute path */
  descriptors: ReadonlyMap<string, MediaDescriptor>;
  /** Candidates excluded because probing them failed */
  warnings: readonly SelectionWarning[];
}

export interface SelectOptions {
  onCandidate?: (path: string) => void;
}

export class Selector {
  constructor(private readonly prober: Prober) {}

  async select(
    rootPaths: readonly string[],
    criteria: SelectionCriteria,
    recursionDepth: number,
    options: SelectOptions = {}
  ): Promise<SelectionResult> {
    const roots = rootPaths.map((r) => resolve(r));
    await assertRootsExist(roots);

    const probeNeeded = needsMetadata(criteria);
    const seen = new Set<string>();
    const paths: string[] = [];
    const descriptors = new Map<string, MediaDescriptor>();
    const warnings: SelectionWarning[] = [];

    for (const root of roots) {
      const entries = await walkRoot(root, recursionDepth);

      for (const entry of entries) {
        if (seen.has(entry.path)) continue;
        if (!matchesPath(criteria, entry.name, entry.relativePath, extname(entry.name))) {
          continue;
        }
        options.onCandidate?.(entry.path);

        if (probeNeeded) {
          let descriptor: MediaDescriptor;
          try {
            descriptor = await this.prober.probe(entry.path);
          } catch (error) {
            // A missing probe tool fails every candidate; abort instead
            if (error instanceof ProbeError && error.kind !== 'ToolMissing') {
              log.warn({ path: entry.path, kind: error.kind }, error.message);
              warnings.push({ path: entry.path, error });
              continue;
            }
            throw error;
          }
          if (!matchesDescriptor(criteria, descriptor)) continue;
          descriptors.set(entry.path, descriptor);
        }

        seen.add(entry.path);
        paths.push(entry.path);
      }
    }

    log.debug({ roots, selected: paths.length, warnings: warnings.length }, 'Selection complete');

    return Object.freeze({
      paths: Object.freeze(paths),
      descriptors,
      warnings: Object.freeze(warnings),
    });
  }
}

async function assertRootsExist(roots: readonly string[]): Promise<void> {
  for (const root of roots) {
    try {
      await stat(root);
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'ENOTDIR') {
        throw new SelectionError(root);
      }
      throw error;
    }
  }
}
