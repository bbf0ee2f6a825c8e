import chalk from 'chalk';
import { loadConfig, resolveConfigPath, resolveSourcePath, validateConfig } from './config/config.js';
import type { AuditConfig, ReportFormat, RunMode } from './config/types.js';
import { extractCommands } from './extractor/extractor.js';
import type { CommandSet } from './extractor/types.js';
import { parseDocs } from './docs/docs-parser.js';
import { compareCommandSets, getComparisonStats } from './comparator/command-comparator.js';
import type { ComparisonResult } from './comparator/types.js';
import { writeReport } from './report/report.js';
import { askYesNo } from './utils/prompt.js';
import { logger } from './utils/logger.js';

export const COMPARE_QUESTION = 'Would you also like to check the commands against the docs?';

export interface AuditOptions {
  configPath?: string;
  rootOverride?: string;
  docsOverride?: string;
  modeOverride?: RunMode;
  outputOverride?: string;
  formatOverride?: ReportFormat;
  debug?: boolean;

  /** Answers the compare question in prompt mode (defaults to a terminal prompt) */
  confirm?: (question: string) => Promise<boolean>;

  /** Clock for the report timestamp */
  now?: () => Date;
}

export interface AuditOutcome {
  reportPath: string;
  commands: CommandSet;
  comparison: ComparisonResult | null;
}

/**
 * Main entry point: extract admin commands, optionally compare with the docs, write the report
 */
export async function auditCommands(options: AuditOptions = {}): Promise<AuditOutcome> {
  try {
    if (options.debug) {
      logger.enableDebug();
    }

    const configPath = resolveConfigPath(options.configPath);
    logger.info(`Loading configuration from: ${configPath}`);
    const config = applyOverrides(await loadConfig(configPath), options);

    const sourcePath = resolveSourcePath(config);
    logger.info(`Extracting admin commands from: ${sourcePath}`);
    const commands = await extractCommands(sourcePath, { patterns: config.patterns });
    logger.info(`Found ${commands.length} admin command${commands.length === 1 ? '' : 's'}`);

    const compare = await shouldCompare(config, options.confirm ?? (question => askYesNo(question)));
    logger.info(`Check against docs: ${compare}`);

    let comparison: ComparisonResult | null = null;
    if (compare && config.docsPath) {
      logger.info(`Parsing docs: ${config.docsPath}`);
      const documented = await parseDocs(config.docsPath, { commandPrefix: config.docsCommandPrefix });
      logger.info(`Found ${documented.length} documented commands`);

      logger.info('Comparing commands against docs...');
      comparison = compareCommandSets(commands, documented);
    }

    const reportPath = await writeReport(
      {
        generatedAt: (options.now ?? (() => new Date()))(),
        sourcePath,
        docsPath: comparison ? config.docsPath : null,
        commands,
        comparison
      },
      config.outputDir,
      config.format
    );
    logger.info(`Report written to: ${reportPath}`);

    printSummary(commands, comparison);
    logger.success('Audit complete!');

    return { reportPath, commands, comparison };
  } catch (error) {
    logger.failure('Audit failed:', error);
    throw error;
  }
}

/**
 * Applies CLI overrides on top of the loaded configuration and re-validates
 */
export function applyOverrides(config: AuditConfig, options: AuditOptions): AuditConfig {
  const merged: AuditConfig = {
    ...config,
    repositoryRoot: options.rootOverride ?? config.repositoryRoot,
    docsPath: options.docsOverride ?? config.docsPath,
    runMode: options.modeOverride ?? config.runMode,
    outputDir: options.outputOverride ?? config.outputDir,
    format: options.formatOverride ?? config.format
  };

  validateConfig(merged);
  return merged;
}

async function shouldCompare(
  config: AuditConfig,
  confirm: (question: string) => Promise<boolean>
): Promise<boolean> {
  switch (config.runMode) {
    case 'extract':
      return false;
    case 'compare':
      return true;
    case 'prompt':
      if (!config.docsPath) {
        logger.warn('No docs path configured, skipping docs comparison');
        return false;
      }
      return confirm(COMPARE_QUESTION);
  }
}

function printSummary(commands: CommandSet, comparison: ComparisonResult | null): void {
  console.log('');
  console.log(chalk.bold.cyan('SUMMARY'));
  console.log(`  Commands in code:  ${chalk.green(commands.length.toString())}`);

  if (comparison) {
    const stats = getComparisonStats(comparison);
    console.log(`  Only in code:      ${chalk.yellow(stats.codeOnly.toString())}`);
    console.log(`  Only in docs:      ${chalk.magenta(stats.docsOnly.toString())}`);
    console.log(`  Wrong permission:  ${chalk.red(stats.permissionMismatches.toString())}`);
  }
  console.log('');
}
