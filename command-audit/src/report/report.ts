import fs from 'node:fs/promises';
import path from 'node:path';
import type { ReportFormat } from '../config/types.js';
import type { CommandEntry, CommandSet } from '../extractor/types.js';
import type { ComparisonResult } from '../comparator/types.js';
import { getComparisonStats } from '../comparator/command-comparator.js';
import { OutputWriteError } from '../errors.js';

export const REPORT_BASENAME = 'admin-commands';
export const NO_COMMANDS_MESSAGE = 'no commands found';

export interface AuditReport {
  generatedAt: Date;
  sourcePath: string;

  /** Docs file compared against (null when no comparison was run) */
  docsPath: string | null;

  commands: CommandSet;

  /** Present only when the docs comparison was run */
  comparison: ComparisonResult | null;
}

const RULE = '='.repeat(80);
const SUBRULE = '-'.repeat(80);

/**
 * Formats the report as human-readable text
 */
export function formatTextReport(report: AuditReport): string {
  const lines: string[] = [];

  lines.push(RULE);
  lines.push('ADMIN COMMANDS REPORT');
  lines.push(RULE);
  lines.push(`Generated: ${report.generatedAt.toISOString()}`);
  lines.push(`Source:    ${report.sourcePath}`);
  if (report.comparison && report.docsPath) {
    lines.push(`Docs:      ${report.docsPath}`);
  }
  lines.push('');

  lines.push(`Extracted commands (${report.commands.length}):`);
  lines.push(SUBRULE);
  if (report.commands.length === 0) {
    lines.push(`  ${NO_COMMANDS_MESSAGE}`);
  } else {
    for (const entry of report.commands) {
      lines.push(formatEntry(entry));
    }
  }
  lines.push('');

  const { comparison } = report;
  if (comparison) {
    pushSection(lines, 'Commands in CODE but NOT in docs', comparison.codeOnly.map(name => `  ${name}`));
    pushSection(lines, 'Commands in DOCS but NOT in code', comparison.docsOnly.map(name => `  ${name}`));
    pushSection(
      lines,
      'Permission level mismatches',
      comparison.permissionMismatches.map(
        m => `  ${m.name}: code requires ${m.codePermission}, docs list ${m.docsPermission}`
      )
    );
  }

  lines.push('SUMMARY');
  lines.push(SUBRULE);
  if (comparison) {
    const stats = getComparisonStats(comparison);
    lines.push(`  Commands in code:       ${stats.totalCodeCommands}`);
    lines.push(`  Commands in docs:       ${stats.totalDocsCommands}`);
    lines.push(`  Only in code:           ${stats.codeOnly}`);
    lines.push(`  Only in docs:           ${stats.docsOnly}`);
    lines.push(`  In both:                ${stats.inBoth}`);
    lines.push(`  Permission mismatches:  ${stats.permissionMismatches}`);
  } else {
    lines.push(`  Commands in code:       ${report.commands.length}`);
  }
  lines.push(RULE);

  return lines.join('\n') + '\n';
}

function pushSection(lines: string[], title: string, items: string[]): void {
  lines.push(`${title} (${items.length}):`);
  lines.push(SUBRULE);
  if (items.length === 0) {
    lines.push('  (none)');
  } else {
    lines.push(...items);
  }
  lines.push('');
}

/**
 * One report line for an extracted command, e.g. `  heal [Admin] (HealCommand, line 12)`
 */
export function formatEntry(entry: CommandEntry): string {
  const permission = entry.permission ? ` [${entry.permission}]` : '';
  const origin = entry.group ? `${entry.group}, line ${entry.line}` : `line ${entry.line}`;
  return `  ${entry.name}${permission} (${origin})`;
}

/**
 * Formats the report as JSON
 */
export function formatJsonReport(report: AuditReport): string {
  const output = {
    timestamp: report.generatedAt.toISOString(),
    source: report.sourcePath,
    commands: report.commands,
    ...(report.commands.length === 0 ? { message: NO_COMMANDS_MESSAGE } : {}),
    ...(report.comparison && {
      docs: report.docsPath,
      comparison: {
        codeOnly: report.comparison.codeOnly,
        docsOnly: report.comparison.docsOnly,
        permissionMismatches: report.comparison.permissionMismatches,
        summary: getComparisonStats(report.comparison)
      }
    })
  };

  return JSON.stringify(output, null, 2) + '\n';
}

export function reportFileName(format: ReportFormat): string {
  return `${REPORT_BASENAME}.${format === 'json' ? 'json' : 'txt'}`;
}

/**
 * Writes the report into the output directory, creating it if absent
 * @returns Path of the written file
 * @throws OutputWriteError if the directory or file cannot be written
 */
export async function writeReport(
  report: AuditReport,
  outputDir: string,
  format: ReportFormat
): Promise<string> {
  const outputPath = path.resolve(outputDir, reportFileName(format));
  const content = format === 'json' ? formatJsonReport(report) : formatTextReport(report);

  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, 'utf-8');
  } catch (error) {
    throw new OutputWriteError(outputPath, { cause: error });
  }

  return outputPath;
}
