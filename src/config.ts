/**
 * Configuration module.
 *
 * Loads config/config.{YEAREND_CONFIG}.json and fills in defaults for
 * anything the file leaves out.
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { ConfigError } from './errors.js';

export interface ReviewConfig {
  /** Directory holding script.md and skills.md */
  contentDir: string;
  /** Directory the .tex and .pdf files are written to */
  outputDir: string;
  /** LaTeX engine executable */
  latexCommand: string;
  /** Extra arguments passed to the engine ahead of the standard ones */
  latexArgs: string[];
  /** Engine runs per document */
  compilePasses: number;
  /** Time allowed for each engine run */
  compileTimeoutMs: number;
  /** Keep the .tex file after a successful compile */
  keepTex: boolean;
  /** Preview server port */
  port: number;
}

export const DEFAULT_CONFIG: ReviewConfig = {
  contentDir: 'content',
  outputDir: 'outputs',
  latexCommand: 'pdflatex',
  latexArgs: [],
  compilePasses: 2,
  compileTimeoutMs: 30000,
  keepTex: false,
  port: 3000,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(raw: Record<string, unknown>, key: keyof ReviewConfig, fallback: string): string {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string' || value === '') {
    throw new ConfigError(`"${key}" must be a non-empty string`);
  }
  return value;
}

function expectPositiveInt(raw: Record<string, unknown>, key: keyof ReviewConfig, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`"${key}" must be a positive integer`);
  }
  return value;
}

/**
 * Validate a parsed config file and merge it over the defaults.
 */
export function resolveConfig(raw: unknown): ReviewConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Config file must contain a JSON object');
  }

  const latexArgs = raw.latexArgs ?? DEFAULT_CONFIG.latexArgs;
  if (!Array.isArray(latexArgs) || !latexArgs.every((arg): arg is string => typeof arg === 'string')) {
    throw new ConfigError('"latexArgs" must be an array of strings');
  }

  const keepTex = raw.keepTex ?? DEFAULT_CONFIG.keepTex;
  if (typeof keepTex !== 'boolean') {
    throw new ConfigError('"keepTex" must be true or false');
  }

  return {
    contentDir: expectString(raw, 'contentDir', DEFAULT_CONFIG.contentDir),
    outputDir: expectString(raw, 'outputDir', DEFAULT_CONFIG.outputDir),
    latexCommand: expectString(raw, 'latexCommand', DEFAULT_CONFIG.latexCommand),
    latexArgs,
    compilePasses: expectPositiveInt(raw, 'compilePasses', DEFAULT_CONFIG.compilePasses),
    compileTimeoutMs: expectPositiveInt(raw, 'compileTimeoutMs', DEFAULT_CONFIG.compileTimeoutMs),
    keepTex,
    port: expectPositiveInt(raw, 'port', DEFAULT_CONFIG.port),
  };
}

/**
 * Load configuration from `configDir`. A missing file means defaults;
 * a malformed one is a ConfigError.
 */
export async function loadConfig(configDir: string = 'config'): Promise<ReviewConfig> {
  const configEnv = process.env.YEAREND_CONFIG ?? 'default';
  const configFileName = `config.${configEnv}.json`;
  const configPath = path.join(configDir, configFileName);

  let config: ReviewConfig;
  if (await fs.pathExists(configPath)) {
    let raw: unknown;
    try {
      raw = await fs.readJson(configPath);
    } catch (err) {
      throw new ConfigError(`Could not read ${configPath}: ${err}`);
    }
    config = resolveConfig(raw);
    console.log(`Loaded config from ${configFileName}`);
  } else {
    console.warn(`Config file ${configFileName} not found, using defaults`);
    config = { ...DEFAULT_CONFIG };
  }

  if (process.env.PORT) {
    const port = Number(process.env.PORT);
    if (!Number.isInteger(port) || port <= 0) {
      throw new ConfigError(`PORT must be a positive integer, got "${process.env.PORT}"`);
    }
    config.port = port;
  }

  return config;
}
