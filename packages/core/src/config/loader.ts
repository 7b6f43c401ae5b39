/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { CultureGridConfig, LoadConfigResult } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

const MAX_FIND_UP_DEPTH = 10;

/**
 * Search upward through directories for a file.
 */
export async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = path.resolve(cwd);

  for (let depth = 0; depth <= MAX_FIND_UP_DEPTH; depth += 1) {
    const filePath = path.join(currentDir, filename);
    try {
      await fs.access(filePath);
      return filePath;
    } catch {
      // not here, keep climbing
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

async function readConfigFile(resolvedPath: string): Promise<unknown> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    const err = error as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      throw new Error(`Config file not found at ${resolvedPath}.`);
    }
    throw new Error(`Unable to read config file at ${resolvedPath}: ${err.message}`);
  }

  try {
    return JSON.parse(fileContents) as unknown;
  } catch (error) {
    throw new Error(
      `Config file at ${resolvedPath} contains invalid JSON: ${(error as Error).message}`
    );
  }
}

async function resolveConfigPath(configPath: string, cwd: string): Promise<string> {
  if (path.isAbsolute(configPath)) {
    return configPath;
  }

  const cwdPath = path.resolve(cwd, configPath);
  try {
    await fs.access(cwdPath);
    return cwdPath;
  } catch {
    // Only bare file names are searched for in parent directories
    if (configPath.includes('/') || configPath.includes(path.sep)) {
      return cwdPath;
    }
    return (await findUp(configPath, cwd)) ?? cwdPath;
  }
}

/**
 * Load config file with upward directory traversal.
 * @param configPath - Path to config file (relative or absolute)
 * @returns Config object and metadata about where it was found
 */
export async function loadConfigWithMeta(
  configPath = DEFAULT_CONFIG_FILENAME,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  const resolvedPath = await resolveConfigPath(configPath, cwd);

  const rawConfig = await readConfigFile(resolvedPath);
  const config = normalizeConfig(rawConfig);
  assertConfigValid(config);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
  };
}

export async function loadConfig(
  configPath = DEFAULT_CONFIG_FILENAME,
  options?: { cwd?: string }
): Promise<CultureGridConfig> {
  const result = await loadConfigWithMeta(configPath, options);
  return result.config;
}
