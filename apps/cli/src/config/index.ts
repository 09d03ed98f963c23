/**
 * CLI Configuration
 * 
 * Priority order: environment (including a `.env` in the working
 * directory), then ~/.vidbatch/config.json, then defaults.
 * Binary paths are resolved later by @vidbatch/core, which applies the same
 * order and then searches PATH.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { readFileSync } from 'node:fs';
import { ValidationError } from '@vidbatch/core';
import { errnoCode } from '@vidbatch/utils';

// Config file location
export const CONFIG_DIR = join(homedir(), '.vidbatch');
export const CONFIG_FILE = join(CONFIG_DIR, 'config.json');

/**
 * Load `.env` from `cwd` into process.env. Variables already set win.
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  dotenvConfig({ path: join(cwd, '.env') });
}

// Environment schema
const envSchema = z.object({
  VIDBATCH_CONFIG: z.string().min(1).optional(),
  VIDBATCH_PRESET_FILE: z.string().min(1).optional(),
  VIDBATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).optional(),
});

// Config file schema
const configFileSchema = z
  .object({
    ffmpegPath: z.string().min(1).optional(),
    ffprobePath: z.string().min(1).optional(),
    presetFile: z.string().min(1).optional(),
    concurrency: z.number().int().min(1).max(64).default(1),
    probeTimeoutMs: z.number().int().min(1000).default(60000),
    killGraceMs: z.number().int().min(0).default(5000),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliConfig {
  ffmpegPath?: string;
  ffprobePath?: string;
  presetFile: string;
  concurrency: number;
  probeTimeoutMs: number;
  killGraceMs: number;
  configFile: string;
}

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  return issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid';
}

// Load config from file; a missing file means defaults
function loadConfigFile(file: string): unknown {
  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return {};
    throw new ValidationError('config', `cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new ValidationError('config', `${file} is not valid JSON`);
  }
}

/**
 * @throws ValidationError when the environment or the config file is invalid
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ValidationError('environment', firstIssue(parsedEnv.error));
  }

  const configFile = parsedEnv.data.VIDBATCH_CONFIG ?? CONFIG_FILE;
  const parsedFile = configFileSchema.safeParse(loadConfigFile(configFile));
  if (!parsedFile.success) {
    throw new ValidationError('config', `${configFile}: ${firstIssue(parsedFile.error)}`);
  }
  const file = parsedFile.data;

  return {
    ffmpegPath: file.ffmpegPath,
    ffprobePath: file.ffprobePath,
    presetFile: parsedEnv.data.VIDBATCH_PRESET_FILE ?? file.presetFile ?? join(CONFIG_DIR, 'presets.json'),
    concurrency: parsedEnv.data.VIDBATCH_CONCURRENCY ?? file.concurrency,
    probeTimeoutMs: file.probeTimeoutMs,
    killGraceMs: file.killGraceMs,
    configFile,
  };
}
