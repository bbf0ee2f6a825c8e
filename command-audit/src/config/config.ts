import fs from 'fs/promises';
import path from 'path';
import type { AuditConfig, PatternKind, ReportFormat, RunMode } from './types.js';
import { defaultConfig } from './defaults.js';
import { isErrnoException } from '../errors.js';

const RUN_MODES: readonly RunMode[] = ['prompt', 'extract', 'compare'];
const FORMATS: readonly ReportFormat[] = ['text', 'json'];
const PATTERN_KINDS: readonly PatternKind[] = ['comparison', 'annotation'];

/**
 * Loads configuration from a JSON file
 * @param configPath - Path to the configuration file
 * @returns Loaded configuration merged with defaults
 */
export async function loadConfig(configPath: string): Promise<AuditConfig> {
  let configContent: string;
  try {
    configContent = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new Error(`Configuration file not found: ${configPath}`);
    }
    throw error;
  }

  const userConfig = readConfigFields(JSON.parse(configContent));
  const config: AuditConfig = {
    ...defaultConfig,
    ...userConfig
  };

  validateConfig(config);

  return config;
}

/**
 * Picks the recognized fields out of parsed JSON, rejecting wrongly typed ones
 */
export function readConfigFields(raw: unknown): Partial<AuditConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Configuration error: top level must be a JSON object');
  }

  const fields: Partial<AuditConfig> = {};
  const entries = new Map(Object.entries(raw));

  const str = (key: string): string | undefined => {
    const value = entries.get(key);
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      throw new Error(`Configuration error: ${key} must be a string`);
    }
    return value;
  };

  const repositoryRoot = str('repositoryRoot');
  if (repositoryRoot !== undefined) fields.repositoryRoot = repositoryRoot;

  const sourceFile = str('sourceFile');
  if (sourceFile !== undefined) fields.sourceFile = sourceFile;

  const outputDir = str('outputDir');
  if (outputDir !== undefined) fields.outputDir = outputDir;

  const docsCommandPrefix = str('docsCommandPrefix');
  if (docsCommandPrefix !== undefined) fields.docsCommandPrefix = docsCommandPrefix;

  const docsPath = entries.get('docsPath');
  if (docsPath === null || typeof docsPath === 'string') {
    fields.docsPath = docsPath;
  } else if (docsPath !== undefined) {
    throw new Error('Configuration error: docsPath must be a string or null');
  }

  const runMode = str('runMode');
  if (runMode !== undefined) {
    const mode = RUN_MODES.find(m => m === runMode);
    if (!mode) {
      throw new Error('Configuration error: runMode must be "prompt", "extract" or "compare"');
    }
    fields.runMode = mode;
  }

  const format = str('format');
  if (format !== undefined) {
    const match = FORMATS.find(f => f === format);
    if (!match) {
      throw new Error('Configuration error: output format must be "text" or "json"');
    }
    fields.format = match;
  }

  const patterns = entries.get('patterns');
  if (patterns !== undefined) {
    if (!Array.isArray(patterns)) {
      throw new Error('Configuration error: patterns must be an array');
    }
    fields.patterns = patterns.map((p: unknown) => {
      const kind = PATTERN_KINDS.find(k => k === p);
      if (!kind) {
        throw new Error(`Configuration error: unknown pattern "${String(p)}"`);
      }
      return kind;
    });
  }

  return fields;
}

/**
 * Validates the configuration
 * @throws Error if configuration is invalid
 */
export function validateConfig(config: AuditConfig): void {
  if (!config.repositoryRoot) {
    throw new Error('Configuration error: repositoryRoot is required');
  }

  if (!config.sourceFile) {
    throw new Error('Configuration error: sourceFile is required');
  }

  if (!config.outputDir) {
    throw new Error('Configuration error: outputDir is required');
  }

  if (config.runMode === 'compare' && !config.docsPath) {
    throw new Error('Configuration error: docsPath is required when runMode is "compare"');
  }
}

/**
 * Finds the configuration file path
 * @param providedPath - Optional path provided by user
 * @returns Path to configuration file
 */
export function resolveConfigPath(providedPath?: string): string {
  if (providedPath) {
    return path.resolve(providedPath);
  }

  // Default to command-audit.json in current directory
  return path.resolve('command-audit.json');
}

/**
 * Full path of the admin commands source file
 */
export function resolveSourcePath(config: AuditConfig): string {
  return path.resolve(config.repositoryRoot, config.sourceFile);
}
