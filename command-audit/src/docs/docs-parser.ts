import fs from 'node:fs/promises';
import { InputNotFoundError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { CommandEntry, CommandSet } from '../extractor/types.js';
import { dedupeEntries, splitLines } from '../extractor/types.js';

export interface DocsParseOptions {
  /** Prefix stripped from command names, e.g. "!" */
  commandPrefix?: string;
}

/** Permission levels a section heading may name, matched case-insensitively */
export const PERMISSION_LEVELS = ['Player', 'Tester', 'Intern', 'GameMaster', 'Admin'] as const;

const HEADING_PATTERN = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const FENCE_PATTERN = /^\s*(```|~~~)/;
const LIST_ITEM_PATTERN = /^\s*(?:[-*+]|\d+[.)])\s+(.*)$/;
const BOLD_LINE_PATTERN = /^\*\*.*\*\*\\?$/;
const BOLD_SPAN_PATTERN = /\*\*(.+?)\*\*/g;
const TABLE_SEPARATOR_CELL = /^:?-+:?$/;
const IDENTIFIER_PATTERN = /^[A-Za-z0-9_.-]+$/;

interface Section {
  depth: number;
  heading: string;
  permission?: string;
}

/**
 * Reads a markdown documentation file and collects the commands it lists
 * @throws InputNotFoundError if the file does not exist or cannot be read
 */
export async function parseDocs(filePath: string, options: DocsParseOptions = {}): Promise<CommandSet> {
  let content: string;

  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InputNotFoundError(filePath, 'docs', { cause: error });
  }

  logger.debug(`Read ${content.length} characters from ${filePath}`);
  return parseDocsText(content, options);
}

/**
 * Collects commands from bold entry lines, list items and the first column
 * of tables. Headings set the section (and permission level) of what follows.
 */
export function parseDocsText(text: string, options: DocsParseOptions = {}): CommandSet {
  const prefix = options.commandPrefix ?? '';
  const lines = splitLines(text);
  const found: CommandEntry[] = [];
  // Enclosing headings, outermost first
  const sections: Section[] = [];
  let inFence = false;

  lines.forEach((line, index) => {
    if (FENCE_PATTERN.test(line)) {
      inFence = !inFence;
      return;
    }
    if (inFence) return;

    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      const depth = heading[1]?.length ?? 1;
      const title = stripFormatting(heading[2] ?? '').replace(/:$/, '').trim();
      while (sections.length > 0 && (sections[sections.length - 1]?.depth ?? 0) >= depth) {
        sections.pop();
      }
      // A subheading keeps the enclosing level unless it names one itself
      const inherited = sections[sections.length - 1]?.permission;
      sections.push({ depth, heading: title, permission: detectPermission(title) ?? inherited });
      return;
    }

    const section = sections[sections.length - 1];

    for (const candidate of candidatesForLine(line, lines[index + 1])) {
      const name = cleanCommandName(candidate, prefix);
      if (!name) continue;
      found.push({
        name,
        line: index + 1,
        group: section?.heading,
        permission: section?.permission
      });
    }
  });

  const entries = dedupeEntries(found);
  logger.debug(`Found ${entries.length} documented commands`);
  return entries;
}

function candidatesForLine(line: string, nextLine: string | undefined): string[] {
  const trimmed = line.trim();

  if (trimmed.startsWith('|')) {
    const cells = tableCells(trimmed);
    if (isSeparatorRow(cells)) return [];
    // A row directly above the separator is the header
    if (nextLine !== undefined && isSeparatorRow(tableCells(nextLine.trim()))) return [];
    const first = cells[0];
    return first ? [firstToken(first)] : [];
  }

  const listItem = LIST_ITEM_PATTERN.exec(line);
  if (listItem) {
    return [firstToken(listItem[1] ?? '')];
  }

  if (BOLD_LINE_PATTERN.test(trimmed)) {
    return Array.from(trimmed.matchAll(BOLD_SPAN_PATTERN), m => firstToken(m[1] ?? ''));
  }

  return [];
}

function tableCells(row: string): string[] {
  if (!row.startsWith('|')) return [];
  return row
    .replace(/^\|/, '')
    .replace(/\|$/, '')
    .split('|')
    .map(cell => cell.trim());
}

function isSeparatorRow(cells: string[]): boolean {
  return cells.length > 0 && cells.every(cell => TABLE_SEPARATOR_CELL.test(cell));
}

/**
 * First word of a markdown fragment, looking inside a leading bold or code span
 */
function firstToken(fragment: string): string {
  const text = fragment.trim();

  const bold = /^\*\*(.+?)\*\*/.exec(text);
  if (bold?.[1]) return firstWord(bold[1]);

  const code = /^`([^`]+)`/.exec(text);
  if (code?.[1]) return firstWord(code[1]);

  return firstWord(text);
}

function firstWord(text: string): string {
  return text.trim().split(/\s+/)[0] ?? '';
}

function stripFormatting(text: string): string {
  return text.replace(/[*_`]/g, '').trim();
}

/**
 * Normalizes a candidate to a bare command name, or returns null if it does not look like one
 */
export function cleanCommandName(candidate: string, prefix: string): string | null {
  let name = candidate.replace(/[*`]/g, '').trim().replace(/\\$/, '');
  if (prefix && name.startsWith(prefix)) {
    name = name.slice(prefix.length);
  }
  name = name.replace(/[:;,.]+$/, '');

  return IDENTIFIER_PATTERN.test(name) ? name : null;
}

/**
 * Permission level named by a section heading, e.g. "Game Master commands" -> "GameMaster"
 */
export function detectPermission(heading: string): string | undefined {
  const compact = heading.replace(/[\s_-]+/g, '').toLowerCase();
  return PERMISSION_LEVELS.find(level => compact.includes(level.toLowerCase()));
}
