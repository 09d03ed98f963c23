/**
 * Built-in Presets
 * 
 * Seeded into a fresh preset file. Stream copy stays the default for every
 * kind a preset does not name.
 */

import type { TranscodeInput } from './transcodeOptions.js';

export interface PresetDefinition {
  description?: string;
  options: TranscodeInput;
}

// Quality levels for CRF-based encoding
export const CRF_LEVELS = {
  highQuality: { x264: 18, x265: 20 },
  balanced: { x264: 22, x265: 24 },
  efficient: { x264: 26, x265: 28 },
} as const;

export const DEFAULT_PRESETS: Readonly<Record<string, PresetDefinition>> = {
  remux: {
    description: 'Copy every stream into a new container',
    options: {},
  },
  'av-only': {
    description: 'Keep only video and audio, dropping subtitles and data',
    options: { avCopyOnly: true },
  },
  'archive-x265': {
    description: 'High quality x265 with lossless audio',
    options: { x265: true, crf: CRF_LEVELS.highQuality.x265, audioCodec: 'flac' },
  },
  'compact-x265': {
    description: 'Smaller x265 encode; audio, subtitles and data copied',
    options: { x265: true, crf: CRF_LEVELS.efficient.x265 },
  },
  'compat-x264': {
    description: 'x264 with even dimensions and AAC audio for older players',
    options: {
      videoCodec: 'libx264',
      crf: CRF_LEVELS.balanced.x264,
      audioCodec: 'aac',
      fixResolution: true,
      customFlags: ['-pix_fmt', 'yuv420p'],
    },
  },
  salvage: {
    description: 'Remux while ignoring decode errors in damaged files',
    options: { fixErrors: true },
  },
};
