/**
 * Binary Configuration
 * 
 * Resolves the external media tools the engine drives.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. Explicitly configured paths
 * 3. System PATH
 */

import { access } from 'node:fs/promises';
import { constants } from 'node:fs';
import { delimiter, isAbsolute, join } from 'node:path';
import { ToolMissingError } from '../errors/index.js';

export type BinaryName = 'ffmpeg' | 'ffprobe';

const ENV_VARS: Record<BinaryName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
};

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: BinaryName;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'config' | 'path';
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export interface ResolveBinaryOptions {
  configured?: Partial<Record<BinaryName, string>>;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

/**
 * Get executable extension for current OS
 */
function getExeExt(platform: NodeJS.Platform): string {
  return platform === 'win32' ? '.exe' : '';
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search the PATH for an executable. Returns the first hit or null.
 */
export async function findOnPath(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): Promise<string | null> {
  const exeName = name + getExeExt(platform);
  const dirs = (env['PATH'] ?? '').split(delimiter).filter(Boolean);

  for (const dir of dirs) {
    const candidate = join(dir, exeName);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Resolve one binary. Throws ToolMissingError when no candidate is executable.
 */
export async function resolveBinary(
  name: BinaryName,
  options: ResolveBinaryOptions = {}
): Promise<BinaryConfig> {
  const env = options.env ?? process.env;
  const envVar = ENV_VARS[name];
  const searched: string[] = [];

  // 1. Check environment variable
  const envPath = env[envVar];
  if (envPath) {
    searched.push(`${envVar}=${envPath}`);
    if (await isExecutable(envPath)) {
      return { name, envVar, resolvedPath: envPath, source: 'env' };
    }
  }

  // 2. Check configured path (absolute file, or a bare command name)
  const configured = options.configured?.[name];
  if (configured) {
    searched.push(`config: ${configured}`);
    if (isAbsolute(configured)) {
      if (await isExecutable(configured)) {
        return { name, envVar, resolvedPath: configured, source: 'config' };
      }
    } else {
      const found = await findOnPath(configured, env, options.platform);
      if (found) {
        return { name, envVar, resolvedPath: found, source: 'config' };
      }
    }
  }

  // 3. Search system PATH
  searched.push('PATH');
  const onPath = await findOnPath(name, env, options.platform);
  if (onPath) {
    return { name, envVar, resolvedPath: onPath, source: 'path' };
  }

  throw new ToolMissingError(name, searched);
}

/**
 * Resolve every binary the engine needs, failing before any work is attempted
 */
export async function assertBinaries(
  options: ResolveBinaryOptions = {}
): Promise<BinariesConfig> {
  const [ffmpeg, ffprobe] = await Promise.all([
    resolveBinary('ffmpeg', options),
    resolveBinary('ffprobe', options),
  ]);
  return { ffmpeg, ffprobe };
}
