import type { AuditConfig } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: AuditConfig = {
  repositoryRoot: '',
  sourceFile: 'AdminCommands.java',
  docsPath: null,
  runMode: 'prompt',
  outputDir: 'output',
  format: 'text',
  patterns: ['comparison', 'annotation'],
  docsCommandPrefix: '!'
};
