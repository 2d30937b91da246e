/**
 * Configuration loader for Corvo.
 *
 * Loads corvo.config.json from the working directory or a specified path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TextEncoding, TEXT_ENCODINGS } from './files';

export interface CorvoConfig {
  /** Stop a `while` loop with LoopLimitError after this many iterations. */
  whileLimit?: number;
  trace?: boolean;
  encoding?: TextEncoding;
  /** Directory relative file paths in programs resolve against. */
  workingDir?: string;
}

const CONFIG_FILENAMES = ['corvo.config.json', '.corvorc.json'];

/**
 * Load Corvo configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. corvo.config.json in cwd
 * 3. .corvorc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): CorvoConfig {
  if (explicitPath) {
    return readConfigFile(path.resolve(explicitPath));
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return {};
}

/**
 * Load config relative to a program file's directory, falling back to cwd.
 */
export function loadConfigForScript(scriptPath: string): CorvoConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(scriptDir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return loadConfig();
}

function readConfigFile(filePath: string): CorvoConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTextEncoding(value: unknown): value is TextEncoding {
  return TEXT_ENCODINGS.some(encoding => encoding === value);
}

/**
 * Validate config structure. Throws on invalid config.
 */
function validateConfig(raw: unknown, filePath: string): CorvoConfig {
  if (!isRecord(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const config: CorvoConfig = {};

  if (raw.whileLimit !== undefined) {
    if (typeof raw.whileLimit !== 'number' || !Number.isInteger(raw.whileLimit) || raw.whileLimit < 1) {
      throw new Error(`Invalid "whileLimit" in ${filePath}: must be a positive integer`);
    }
    config.whileLimit = raw.whileLimit;
  }

  if (raw.trace !== undefined) {
    if (typeof raw.trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be true or false`);
    }
    config.trace = raw.trace;
  }

  if (raw.encoding !== undefined) {
    if (!isTextEncoding(raw.encoding)) {
      throw new Error(`Invalid "encoding" in ${filePath}: must be one of ${TEXT_ENCODINGS.join(', ')}`);
    }
    config.encoding = raw.encoding;
  }

  if (raw.workingDir !== undefined) {
    if (typeof raw.workingDir !== 'string' || raw.workingDir === '') {
      throw new Error(`Invalid "workingDir" in ${filePath}: must be a non-empty string`);
    }
    config.workingDir = path.resolve(path.dirname(filePath), raw.workingDir);
  }

  return config;
}
