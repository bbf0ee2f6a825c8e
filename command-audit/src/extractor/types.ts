import type { PatternKind } from '../config/types.js';

/**
 * A single admin command name and where it came from
 */
export interface CommandEntry {
  readonly name: string;

  /** 1-based line of first appearance */
  readonly line: number;

  /** Declaring class (source) or section heading (docs) */
  readonly group?: string;

  /** Required permission level, when the input states one */
  readonly permission?: string;
}

/** Unique by name, in order of first appearance */
export type CommandSet = readonly CommandEntry[];

export interface ExtractOptions {
  /** Conventions to match (empty or omitted = all) */
  patterns?: PatternKind[];
}

/**
 * Keeps the first entry for each name, preserving order
 */
export function dedupeEntries(entries: Iterable<CommandEntry>): CommandEntry[] {
  const seen = new Set<string>();
  const unique: CommandEntry[] = [];

  for (const entry of entries) {
    if (seen.has(entry.name)) continue;
    seen.add(entry.name);
    unique.push(entry);
  }

  return unique;
}

export function commandNames(set: CommandSet): string[] {
  return set.map(entry => entry.name);
}

export function splitLines(text: string): string[] {
  if (text.length === 0) return [];
  const lines = text.split(/\r?\n/);
  // A trailing newline does not start another line
  if (lines[lines.length - 1] === '') lines.pop();
  return lines;
}
