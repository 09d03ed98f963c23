/**
 * Preset Store
 * 
 * Named transcode option sets persisted as one JSON document. Every mutation
 * is serialised through a store-wide lock and replaces the file atomically;
 * the in-memory map only changes once the write has landed.
 */

import { z } from 'zod';
import { PresetNotFoundError, PresetStoreError } from '@vidbatch/core';
import { Mutex, createLogger, safeReadFile, writeFileAtomic } from '@vidbatch/utils';
import { DEFAULT_PRESETS } from './defaultPresets.js';
import {
  createTranscodeOptions,
  toTranscodeInput,
  transcodeInputSchema,
  type CanonicalTranscodeInput,
  type TranscodeInput,
  type TranscodeOptions,
} from './transcodeOptions.js';

const log = createLogger({ module: 'preset-store' });

export const PRESET_FILE_VERSION = 1;

const storedPresetSchema = z.object({
  description: z.string().optional(),
  options: transcodeInputSchema,
});

export const presetFileSchema = z.object({
  version: z.literal(PRESET_FILE_VERSION),
  presets: z.record(storedPresetSchema),
});

export type PresetFile = z.infer<typeof presetFileSchema>;

interface StoredPreset {
  description?: string;
  options: CanonicalTranscodeInput;
}

export interface PresetEntry {
  name: string;
  description?: string;
  options: TranscodeOptions;
}

export interface OpenPresetStoreOptions {
  /** Write the built-in presets when the file does not exist yet */
  seedDefaults?: boolean;
}

export type ImportConflictPolicy = 'overwrite' | 'rename';

function normalizeName(name: string): string {
  const trimmed = name.trim();
  if (trimmed === '') {
    throw new PresetStoreError('InvalidName', 'Preset name must not be empty');
  }
  return trimmed;
}

async function readPresetFile(file: string): Promise<Map<string, StoredPreset> | null> {
  let content: string | null;
  try {
    content = await safeReadFile(file);
  } catch (error) {
    throw new PresetStoreError(
      'Unreadable',
      `Cannot read preset file ${file}: ${error instanceof Error ? error.message : String(error)}`,
      file
    );
  }
  if (content === null) return null;

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new PresetStoreError('Unreadable', `Preset file is not valid JSON: ${file}`, file);
  }

  const parsed = presetFileSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PresetStoreError(
      'InvalidFormat',
      `Preset file ${file} has an invalid format at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown'}`,
      file
    );
  }

  const presets = new Map<string, StoredPreset>();
  for (const [name, preset] of Object.entries(parsed.data.presets)) {
    presets.set(name, preset);
  }
  return presets;
}

function serialize(presets: ReadonlyMap<string, StoredPreset>): string {
  const document: PresetFile = { version: PRESET_FILE_VERSION, presets: {} };
  for (const name of [...presets.keys()].sort()) {
    const preset = presets.get(name);
    if (preset) document.presets[name] = preset;
  }
  return `${JSON.stringify(document, null, 2)}\n`;
}

async function writePresetFile(file: string, presets: ReadonlyMap<string, StoredPreset>): Promise<void> {
  try {
    await writeFileAtomic(file, serialize(presets));
  } catch (error) {
    throw new PresetStoreError(
      'WriteFailed',
      `Cannot write preset file ${file}: ${error instanceof Error ? error.message : String(error)}`,
      file
    );
  }
}

function canonicalInput(input: TranscodeInput): CanonicalTranscodeInput {
  return toTranscodeInput(createTranscodeOptions(input));
}

export class PresetStore {
  private readonly lock = new Mutex();

  private constructor(
    readonly file: string,
    private presets: Map<string, StoredPreset>
  ) {}

  /**
   * Open (or lazily create) the store backed by `file`
   *
   * @throws PresetStoreError when the file exists but cannot be used
   */
  static async open(file: string, options: OpenPresetStoreOptions = {}): Promise<PresetStore> {
    const existing = await readPresetFile(file);
    if (existing) {
      log.debug({ file, count: existing.size }, 'Preset file loaded');
      return new PresetStore(file, existing);
    }

    const presets = new Map<string, StoredPreset>();
    if (options.seedDefaults) {
      for (const [name, preset] of Object.entries(DEFAULT_PRESETS)) {
        presets.set(name, { description: preset.description, options: canonicalInput(preset.options) });
      }
      await writePresetFile(file, presets);
      log.info({ file, count: presets.size }, 'Preset file created with built-in presets');
    }
    return new PresetStore(file, presets);
  }

  /**
   * Store `options` under `name`, replacing any preset of that name
   */
  async save(name: string, options: TranscodeOptions, description?: string): Promise<void> {
    const key = normalizeName(name);
    await this.mutate((presets) => {
      presets.set(key, { description, options: toTranscodeInput(options) });
    });
  }

  /**
   * @throws PresetNotFoundError
   */
  load(name: string): TranscodeOptions {
    return this.describe(name).options;
  }

  /**
   * @throws PresetNotFoundError
   */
  describe(name: string): PresetEntry {
    const key = name.trim();
    const preset = this.presets.get(key);
    if (!preset) {
      throw new PresetNotFoundError(key);
    }
    return {
      name: key,
      description: preset.description,
      options: createTranscodeOptions(preset.options),
    };
  }

  has(name: string): boolean {
    return this.presets.has(name.trim());
  }

  list(): string[] {
    return [...this.presets.keys()].sort();
  }

  /**
   * Remove a preset; absent names are ignored. Returns whether one was removed.
   */
  async delete(name: string): Promise<boolean> {
    const key = name.trim();
    let removed = false;
    await this.mutate((presets) => {
      removed = presets.delete(key);
    });
    return removed;
  }

  /**
   * @throws PresetNotFoundError when `from` does not exist
   * @throws PresetStoreError(InvalidName) when `to` is taken
   */
  async rename(from: string, to: string): Promise<void> {
    const source = from.trim();
    const target = normalizeName(to);
    await this.mutate((presets) => {
      const preset = presets.get(source);
      if (!preset) throw new PresetNotFoundError(source);
      if (source === target) return;
      if (presets.has(target)) {
        throw new PresetStoreError('InvalidName', `A preset named "${target}" already exists`, this.file);
      }
      presets.delete(source);
      presets.set(target, preset);
    });
  }

  /**
   * Write `names` (default: all presets) to another file in the store format
   */
  async exportTo(file: string, names?: readonly string[]): Promise<string[]> {
    return this.lock.runExclusive(async () => {
      const selected = new Map<string, StoredPreset>();
      for (const name of names ?? this.list()) {
        const key = name.trim();
        const preset = this.presets.get(key);
        if (!preset) throw new PresetNotFoundError(key);
        selected.set(key, preset);
      }
      await writePresetFile(file, selected);
      log.info({ file, count: selected.size }, 'Presets exported');
      return [...selected.keys()].sort();
    });
  }

  /**
   * Merge presets from another store file.
   * Returns the names the imported presets were stored under.
   */
  async importFrom(
    file: string,
    options: { onConflict?: ImportConflictPolicy } = {}
  ): Promise<string[]> {
    const incoming = await readPresetFile(file);
    if (!incoming) {
      throw new PresetStoreError('Unreadable', `Preset file not found: ${file}`, file);
    }

    const policy = options.onConflict ?? 'rename';
    const imported: string[] = [];

    await this.mutate((presets) => {
      for (const [name, preset] of incoming) {
        let target = normalizeName(name);
        if (presets.has(target) && policy === 'rename') {
          let n = 1;
          while (presets.has(`${target} (${n})`)) n++;
          target = `${target} (${n})`;
        }
        presets.set(target, preset);
        imported.push(target);
      }
    });

    log.info({ file, count: imported.length }, 'Presets imported');
    return imported;
  }

  private async mutate(change: (presets: Map<string, StoredPreset>) => void): Promise<void> {
    await this.lock.runExclusive(async () => {
      const next = new Map(this.presets);
      change(next);
      await writePresetFile(this.file, next);
      this.presets = next;
    });
  }
}
