/**
 * Configuration module.
 *
 * Loads config from config/config.{DOC2HELP_CONFIG}.json
 * Provides typed access to configuration values.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError } from './errors.js';
import { HelpFlavour } from './serializer.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Project root: relative paths in the config file are taken from here */
export const PROJECT_ROOT = path.resolve(__dirname, '..');

export interface AppConfig {
  /** Directory with _entities.json and the docstrings */
  contentDir: string;
  /** Metadata JSON file */
  metadataFile: string;
  /** Directory of previously published help files, if any */
  helpDir?: string;
  dtd: HelpFlavour;
  /** Preview server port */
  port: number;
  debug: boolean;
}

export interface LoadConfigOptions {
  /** Directory holding the config files (default: <root>/config) */
  configDir?: string;
  /** Environment name (default: DOC2HELP_CONFIG or "dev") */
  env?: string;
}

export const DEFAULT_CONFIG: AppConfig = {
  contentDir: path.join(PROJECT_ROOT, 'content'),
  metadataFile: path.join(PROJECT_ROOT, 'config', 'metadata.json'),
  dtd: 'ahelp',
  port: 3000,
  debug: false
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function resolvePath(value: unknown, field: string, baseDir: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`config "${field}" must be a path`);
  }
  return path.resolve(baseDir, value);
}

/**
 * Check the raw config file contents and fill in defaults
 */
export function parseConfig(raw: unknown, baseDir = PROJECT_ROOT): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('config must be a JSON object');
  }

  const config: AppConfig = { ...DEFAULT_CONFIG };

  config.contentDir = resolvePath(raw.contentDir, 'contentDir', baseDir) ?? config.contentDir;
  config.metadataFile = resolvePath(raw.metadataFile, 'metadataFile', baseDir) ?? config.metadataFile;

  const helpDir = resolvePath(raw.helpDir, 'helpDir', baseDir);
  if (helpDir !== undefined) config.helpDir = helpDir;

  if (raw.dtd !== undefined) {
    if (raw.dtd !== 'ahelp' && raw.dtd !== 'sxml') {
      throw new ConfigError(`config "dtd" must be "ahelp" or "sxml", not ${JSON.stringify(raw.dtd)}`);
    }
    config.dtd = raw.dtd;
  }

  if (raw.port !== undefined) {
    if (typeof raw.port !== 'number' || !Number.isInteger(raw.port) || raw.port <= 0) {
      throw new ConfigError('config "port" must be a positive integer');
    }
    config.port = raw.port;
  }

  if (raw.debug !== undefined) {
    if (typeof raw.debug !== 'boolean') {
      throw new ConfigError('config "debug" must be true or false');
    }
    config.debug = raw.debug;
  }

  return config;
}

/**
 * Load configuration from file, falling back to the defaults when there is none.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configDir = options.configDir ?? path.join(PROJECT_ROOT, 'config');
  const configEnv = options.env ?? process.env.DOC2HELP_CONFIG ?? 'dev';
  const configFileName = `config.${configEnv}.json`;
  const configPath = path.join(configDir, configFileName);

  if (!(await fs.pathExists(configPath))) {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    return { ...DEFAULT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (err) {
    throw new ConfigError(`Unable to read ${configFileName}: ${err instanceof Error ? err.message : String(err)}`);
  }

  return parseConfig(raw, path.dirname(configDir));
}
