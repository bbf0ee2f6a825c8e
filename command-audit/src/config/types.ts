/**
 * How a run decides whether to compare against the docs
 * - prompt: ask the user at run time
 * - extract: never compare
 * - compare: always compare
 */
export type RunMode = 'prompt' | 'extract' | 'compare';

export type ReportFormat = 'text' | 'json';

/** Source conventions the extractor recognizes */
export type PatternKind = 'comparison' | 'annotation';

/**
 * Configuration for a command audit run
 */
export interface AuditConfig {
  /** Base path of the server repository */
  repositoryRoot: string;

  /** Admin commands source file, relative to repositoryRoot */
  sourceFile: string;

  /** Documentation file to compare against (null = none configured) */
  docsPath: string | null;

  /** Whether to perform the docs comparison */
  runMode: RunMode;

  /** Directory the report is written to */
  outputDir: string;

  /** Report format: 'text' or 'json' */
  format: ReportFormat;

  /** Source conventions to match (empty = all) */
  patterns: PatternKind[];

  /** Prefix stripped from command names in the docs (e.g. "!") */
  docsCommandPrefix: string;
}
