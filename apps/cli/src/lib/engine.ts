/**
 * Engine wiring shared by the commands
 */

import { assertBinaries, type BinariesConfig } from '@vidbatch/core';
import { MediaProber } from '@vidbatch/media';
import { PresetStore } from '@vidbatch/processing';
import type { CliConfig } from '../config/index.js';

export interface Engine {
  binaries: BinariesConfig;
  prober: MediaProber;
}

/**
 * Resolve ffmpeg and ffprobe up front so a missing tool fails before any job
 */
export async function createEngine(config: CliConfig): Promise<Engine> {
  const binaries = await assertBinaries({
    configured: { ffmpeg: config.ffmpegPath, ffprobe: config.ffprobePath },
  });
  const prober = new MediaProber({
    ffprobePath: binaries.ffprobe.resolvedPath,
    timeoutMs: config.probeTimeoutMs,
  });
  return { binaries, prober };
}

export function openPresetStore(config: CliConfig): Promise<PresetStore> {
  return PresetStore.open(config.presetFile, { seedDefaults: true });
}
