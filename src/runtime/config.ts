/**
 * Configuration loader for WordLang.
 *
 * Loads wordlang.config.json from the script's directory or the working
 * directory. Settings here change output formatting and how load() and
 * string literals behave; CLI flags and environment variables override them.
 */

import * as fs from 'fs';
import * as path from 'path';
import { PrintFormat, PRINT_FORMATS } from './words';

export interface WordLangConfig {
  printFormat?: PrintFormat;
  decodeEscapes?: boolean;
  warnOnUnreadableFiles?: boolean;
  /** Directory for relative paths in load(). Relative values resolve against the config file. */
  baseDir?: string;
  trace?: boolean;
}

const CONFIG_FILENAMES = ['wordlang.config.json', '.wordlangrc.json'];

const BOOLEAN_KEYS = ['decodeEscapes', 'warnOnUnreadableFiles', 'trace'] as const;

/**
 * Load configuration from an explicit path, or from the first config file
 * found in the working directory. Returns an empty config if there is none.
 */
export function loadConfig(explicitPath?: string): WordLangConfig {
  if (explicitPath) {
    return readConfigFile(path.resolve(explicitPath));
  }
  return findConfigIn(process.cwd()) ?? {};
}

/**
 * Load config relative to a script file's directory, falling back to the
 * working directory.
 */
export function loadConfigForScript(scriptPath: string): WordLangConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return findConfigIn(scriptDir) ?? loadConfig();
}

function findConfigIn(dir: string): WordLangConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): WordLangConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
export function validateConfig(raw: unknown, filePath: string): WordLangConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  const config: WordLangConfig = {};

  const printFormat = entries.get('printFormat');
  if (printFormat !== undefined) {
    const format = PRINT_FORMATS.find(f => f === printFormat);
    if (!format) {
      throw new Error(
        `Invalid "printFormat" in ${filePath}: must be one of ${PRINT_FORMATS.map(f => `"${f}"`).join(', ')}`,
      );
    }
    config.printFormat = format;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new Error(`Invalid "${key}" in ${filePath}: must be true or false`);
    }
    config[key] = value;
  }

  const baseDir = entries.get('baseDir');
  if (baseDir !== undefined) {
    if (typeof baseDir !== 'string') {
      throw new Error(`Invalid "baseDir" in ${filePath}: must be a string`);
    }
    config.baseDir = path.resolve(path.dirname(filePath), baseDir);
  }

  return config;
}
