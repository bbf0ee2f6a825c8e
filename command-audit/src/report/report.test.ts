import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { formatEntry, formatJsonReport, formatTextReport, reportFileName, writeReport } from './report.js';
import type { AuditReport } from './report.js';
import { OutputWriteError } from '../errors.js';

const RULE = '='.repeat(80);
const SUBRULE = '-'.repeat(80);
const generatedAt = new Date('2026-01-02T03:04:05.000Z');

function extractOnlyReport(overrides: Partial<AuditReport> = {}): AuditReport {
  return {
    generatedAt,
    sourcePath: '/repo/AdminCommands.java',
    docsPath: null,
    commands: [],
    comparison: null,
    ...overrides
  };
}

function comparedReport(): AuditReport {
  return extractOnlyReport({
    docsPath: '/docs/COMMANDS.md',
    commands: [
      { name: 'heal', line: 2, group: 'Heal', permission: 'Tester' },
      { name: 'fly', line: 5 },
      { name: 'kill', line: 8 }
    ],
    comparison: {
      codeOnly: ['kill'],
      docsOnly: ['teleport'],
      inBoth: ['heal', 'fly'],
      permissionMismatches: []
    }
  });
}

describe('formatTextReport', () => {
  it('should state that no commands were found', () => {
    const text = formatTextReport(extractOnlyReport());

    expect(text).toBe(
      [
        RULE,
        'ADMIN COMMANDS REPORT',
        RULE,
        'Generated: 2026-01-02T03:04:05.000Z',
        'Source:    /repo/AdminCommands.java',
        '',
        'Extracted commands (0):',
        SUBRULE,
        '  no commands found',
        '',
        'SUMMARY',
        SUBRULE,
        '  Commands in code:       0',
        RULE,
        ''
      ].join('\n')
    );
  });

  it('should list only the extracted commands when no comparison was run', () => {
    const lines = formatTextReport(
      extractOnlyReport({ commands: [{ name: 'heal', line: 1 }, { name: 'fly', line: 2 }] })
    ).split('\n');

    expect(lines).toContain('Extracted commands (2):');
    expect(lines).toContain('  heal (line 1)');
    expect(lines).toContain('  fly (line 2)');
    expect(lines.some(line => line.startsWith('Commands in CODE'))).toBe(false);
    expect(lines.some(line => line.startsWith('Commands in DOCS'))).toBe(false);
    expect(lines.some(line => line.startsWith('Docs:'))).toBe(false);
  });

  it('should list both differences with section headers', () => {
    const lines = formatTextReport(comparedReport()).split('\n');

    expect(lines).toContain('Docs:      /docs/COMMANDS.md');

    const codeOnly = lines.indexOf('Commands in CODE but NOT in docs (1):');
    expect(lines[codeOnly + 2]).toBe('  kill');

    const docsOnly = lines.indexOf('Commands in DOCS but NOT in code (1):');
    expect(lines[docsOnly + 2]).toBe('  teleport');

    const mismatches = lines.indexOf('Permission level mismatches (0):');
    expect(lines[mismatches + 2]).toBe('  (none)');

    expect(lines).toContain('  Only in code:           1');
    expect(lines).toContain('  Only in docs:           1');
    expect(lines).toContain('  In both:                2');
  });

  it('should write (none) for empty differences', () => {
    const report = comparedReport();
    const lines = formatTextReport({
      ...report,
      comparison: { codeOnly: [], docsOnly: [], inBoth: ['heal', 'fly', 'kill'], permissionMismatches: [] }
    }).split('\n');

    const codeOnly = lines.indexOf('Commands in CODE but NOT in docs (0):');
    expect(lines[codeOnly + 2]).toBe('  (none)');
    const docsOnly = lines.indexOf('Commands in DOCS but NOT in code (0):');
    expect(lines[docsOnly + 2]).toBe('  (none)');
  });

  it('should describe permission mismatches', () => {
    const report = comparedReport();
    const lines = formatTextReport({
      ...report,
      comparison: {
        codeOnly: [],
        docsOnly: [],
        inBoth: ['heal'],
        permissionMismatches: [{ name: 'heal', codePermission: 'Tester', docsPermission: 'Player' }]
      }
    }).split('\n');

    expect(lines).toContain('  heal: code requires Tester, docs list Player');
  });
});

describe('formatEntry', () => {
  it('should include permission and class when known', () => {
    expect(formatEntry({ name: 'heal', line: 12, group: 'Heal', permission: 'Tester' })).toBe(
      '  heal [Tester] (Heal, line 12)'
    );
    expect(formatEntry({ name: 'fly', line: 3 })).toBe('  fly (line 3)');
  });
});

describe('formatJsonReport', () => {
  it('should include the comparison when run', () => {
    const output = JSON.parse(formatJsonReport(comparedReport()));

    expect(output.timestamp).toBe('2026-01-02T03:04:05.000Z');
    expect(output.docs).toBe('/docs/COMMANDS.md');
    expect(output.commands.map((c: { name: string }) => c.name)).toEqual(['heal', 'fly', 'kill']);
    expect(output.comparison.codeOnly).toEqual(['kill']);
    expect(output.comparison.docsOnly).toEqual(['teleport']);
    expect(output.comparison.summary.inBoth).toBe(2);
    expect(output).not.toHaveProperty('message');
  });

  it('should omit the comparison when not run', () => {
    const output = JSON.parse(formatJsonReport(extractOnlyReport()));

    expect(output.commands).toEqual([]);
    expect(output.message).toBe('no commands found');
    expect(output).not.toHaveProperty('comparison');
    expect(output).not.toHaveProperty('docs');
  });
});

describe('writeReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'command-audit-report-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should create the output directory and write the report', async () => {
    const outputDir = path.join(tempDir, 'nested', 'output');
    const report = comparedReport();

    const outputPath = await writeReport(report, outputDir, 'text');

    expect(outputPath).toBe(path.join(outputDir, 'admin-commands.txt'));
    await expect(fs.readFile(outputPath, 'utf-8')).resolves.toBe(formatTextReport(report));
  });

  it('should overwrite an existing report', async () => {
    await writeReport(comparedReport(), tempDir, 'json');
    const outputPath = await writeReport(extractOnlyReport(), tempDir, 'json');

    const output = JSON.parse(await fs.readFile(outputPath, 'utf-8'));
    expect(output.commands).toEqual([]);
  });

  it('should throw OutputWriteError when the location is not writable', async () => {
    const blocker = path.join(tempDir, 'blocker');
    await fs.writeFile(blocker, 'not a directory');

    await expect(writeReport(extractOnlyReport(), path.join(blocker, 'out'), 'text')).rejects.toBeInstanceOf(
      OutputWriteError
    );
  });
});

describe('reportFileName', () => {
  it('should pick the extension from the format', () => {
    expect(reportFileName('text')).toBe('admin-commands.txt');
    expect(reportFileName('json')).toBe('admin-commands.json');
  });
});
