/**
 * Resolution Renamer
 * 
 * Renames `name.ext` to `name-WxH.ext` in place, never replacing an
 * existing file.
 */

import { rename } from 'node:fs/promises';
import { resolve } from 'node:path';
import { TemplateError } from '@vidbatch/core';
import type { Prober } from '@vidbatch/media';
import { createLogger } from '@vidbatch/utils';
import { createOutputOptions, resolveOutputPath } from './pathTemplate.js';

const log = createLogger({ module: 'renamer' });

export const RESOLUTION_RENAME_PATTERN = '{stem}-{resolution}.{ext}';

export interface RenameResult {
  from: string;
  to: string;
  /** False when the target name was already taken */
  renamed: boolean;
}

export interface RenameDeps {
  exists?: (path: string) => Promise<boolean>;
  rename?: (from: string, to: string) => Promise<void>;
}

export async function renameWithResolution(
  filePath: string,
  prober: Prober,
  deps: RenameDeps = {}
): Promise<RenameResult> {
  const from = resolve(filePath);
  const descriptor = await prober.probe(from);
  const output = createOutputOptions({
    pattern: RESOLUTION_RENAME_PATTERN,
    extension: '',
    collisionPolicy: 'no-clobber',
  });

  let to: string;
  try {
    to = (await resolveOutputPath(from, descriptor, output, { exists: deps.exists })).path;
  } catch (error) {
    if (error instanceof TemplateError && error.kind === 'CollisionDenied') {
      const taken = typeof error.details?.path === 'string' ? error.details.path : from;
      log.info({ from, to: taken }, 'Rename target exists, skipping');
      return { from, to: taken, renamed: false };
    }
    throw error;
  }

  await (deps.rename ?? rename)(from, to);
  log.debug({ from, to }, 'Renamed');
  return { from, to, renamed: true };
}
