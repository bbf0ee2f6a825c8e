import fs from 'node:fs/promises';
import type { PatternKind } from '../config/types.js';
import { InputNotFoundError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { CommandEntry, CommandSet, ExtractOptions } from './types.js';
import { dedupeEntries, splitLines } from './types.js';

// A quoted literal on the right of ==, ===, .equals( and friends, or a switch case label
// (`case "x":` or `case "x" ->`). `!=` and `!==` are not equality checks.
const COMPARISON_PATTERN =
  /(?:(?<![!=])===?|\.(?:equals|equalsIgnoreCase|contains|includes|startsWith)\()\s*(?:"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)')|\bcase\s+(?:"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)')\s*(?::|->)/g;

// 'x' or '\n' in Java source is a char, not a string
const CHAR_LITERAL = /^(?:[^\\]|\\.)$/;

const ANNOTATION_PATTERN = /@Command\s*\(([^)]*)\)/g;
const NAMES_PATTERN = /\bnames\s*=\s*(\{[^}]*\}|"(?:[^"\\]|\\.)*")/;
const LITERAL_PATTERN = /"((?:[^"\\]|\\.)*)"/g;
const REQUIRED_TYPE_PATTERN = /\brequiredType\s*=\s*([\w.]+)/;
const CLASS_PATTERN = /\bclass\s+(\w+)/;

/** How far below an annotation the declaring class is looked for */
const CLASS_LOOKAHEAD = 3;

export interface LineMatch {
  column: number;
  name: string;
  group?: string;
  permission?: string;
}

/**
 * Reads a source file and extracts the admin command names declared in it
 * @param filePath - Path to the admin commands source file
 * @returns Unique command entries in order of first appearance
 * @throws InputNotFoundError if the file does not exist or cannot be read
 */
export async function extractCommands(
  filePath: string,
  options: ExtractOptions = {}
): Promise<CommandSet> {
  let content: string;

  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputNotFoundError(filePath, 'source', { cause: error });
  }

  logger.debug(`Read ${content.length} characters from ${filePath}`);
  return extractCommandsFromText(content, options);
}

/**
 * Extracts command entries from source text, line by line
 */
export function extractCommandsFromText(text: string, options: ExtractOptions = {}): CommandSet {
  const kinds = enabledPatterns(options.patterns);
  const lines = splitLines(text);
  const found: CommandEntry[] = [];

  lines.forEach((line, index) => {
    const matches: LineMatch[] = [];

    if (kinds.has('annotation')) {
      matches.push(...matchAnnotations(line, lines, index));
    }
    if (kinds.has('comparison')) {
      matches.push(...matchComparisons(line));
    }

    matches.sort((a, b) => a.column - b.column);

    for (const match of matches) {
      found.push({
        name: match.name,
        line: index + 1,
        group: match.group,
        permission: match.permission
      });
    }
  });

  const entries = dedupeEntries(found);
  logger.debug(`Matched ${found.length} command literals, ${entries.length} unique`);
  return entries;
}

function enabledPatterns(patterns: PatternKind[] | undefined): Set<PatternKind> {
  if (!patterns || patterns.length === 0) {
    return new Set<PatternKind>(['comparison', 'annotation']);
  }
  return new Set(patterns);
}

/**
 * Finds quoted literals used as the right-hand side of an equality check
 */
export function matchComparisons(line: string): LineMatch[] {
  const matches: LineMatch[] = [];

  for (const m of line.matchAll(COMPARISON_PATTERN)) {
    const name = m[1] ?? m[3];
    if (name) {
      matches.push({ column: m.index ?? 0, name });
      continue;
    }

    const quoted = m[2] ?? m[4];
    if (!quoted || CHAR_LITERAL.test(quoted)) continue;
    matches.push({ column: m.index ?? 0, name: quoted });
  }

  return matches;
}

/**
 * Finds `@Command(names = {...}, requiredType = ...)` declarations.
 * Each alias becomes a match at the annotation's column, in declared order.
 */
export function matchAnnotations(line: string, lines: readonly string[], index: number): LineMatch[] {
  const matches: LineMatch[] = [];

  for (const m of line.matchAll(ANNOTATION_PATTERN)) {
    const args = m[1] ?? '';
    const namesClause = NAMES_PATTERN.exec(args);
    const aliasSource = namesClause?.[1] ?? args.replace(REQUIRED_TYPE_PATTERN, '');

    const permission = REQUIRED_TYPE_PATTERN.exec(args)?.[1]?.split('.').pop();
    const group = findDeclaringClass(lines, index);
    const column = m.index ?? 0;

    for (const literal of aliasSource.matchAll(LITERAL_PATTERN)) {
      const name = literal[1];
      if (!name) continue;
      matches.push({ column, name, group, permission });
    }
  }

  return matches;
}

function findDeclaringClass(lines: readonly string[], index: number): string | undefined {
  const end = Math.min(lines.length, index + 1 + CLASS_LOOKAHEAD);

  for (let i = index + 1; i < end; i++) {
    const match = CLASS_PATTERN.exec(lines[i] ?? '');
    if (match) return match[1];
  }

  return undefined;
}
