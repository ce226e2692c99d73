/**
 * Binary Configuration
 * 
 * Centralized configuration for the external media tools.
 * 
 * Priority order:
 * 1. Environment variables (FFMPEG_PATH, FFPROBE_PATH)
 * 2. System PATH
 */

import { executeCommand } from '@hls-kit/utils';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  fromEnv: boolean;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && envPath.trim().length > 0) {
    return { name, envVar, resolvedPath: envPath, fromEnv: true };
  }

  // Let the system PATH resolve it; a missing binary fails at spawn time
  const exeName = process.platform === 'win32' ? `${name}.exe` : name;
  return { name, envVar, resolvedPath: exeName, fromEnv: false };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
  };
}

// Singleton instance
let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: keyof BinariesConfig): string {
  return binaries()[name].resolvedPath;
}

/**
 * Check if a binary is available
 */
export async function isBinaryAvailable(name: keyof BinariesConfig): Promise<boolean> {
  try {
    const result = await executeCommand(getBinaryPath(name), ['-version'], {
      timeout: 5000,
    });
    return result.exitCode === 0;
  } catch {
    return false;
  }
}
