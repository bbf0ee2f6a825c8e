import type { CommandSet } from '../extractor/types.js';
import type { ComparisonResult, ComparisonStats, PermissionMismatch } from './types.js';

/**
 * Compares code-extracted commands with documented commands by exact name
 * @param code - Commands found in the source file
 * @param docs - Commands found in the docs file
 * @returns Differences in both directions, each in its side's original order
 */
export function compareCommandSets(code: CommandSet, docs: CommandSet): ComparisonResult {
  const docsByName = new Map(docs.map(entry => [entry.name, entry]));
  const codeNames = new Set(code.map(entry => entry.name));

  const codeOnly: string[] = [];
  const inBoth: string[] = [];
  const permissionMismatches: PermissionMismatch[] = [];

  for (const entry of code) {
    const documented = docsByName.get(entry.name);
    if (!documented) {
      codeOnly.push(entry.name);
      continue;
    }

    inBoth.push(entry.name);

    // Only flagged when both sides state a level
    if (entry.permission && documented.permission && entry.permission !== documented.permission) {
      permissionMismatches.push({
        name: entry.name,
        codePermission: entry.permission,
        docsPermission: documented.permission
      });
    }
  }

  const docsOnly = docs.filter(entry => !codeNames.has(entry.name)).map(entry => entry.name);

  return {
    codeOnly,
    docsOnly,
    inBoth,
    permissionMismatches
  };
}

/**
 * Generates statistics from a comparison result
 */
export function getComparisonStats(result: ComparisonResult): ComparisonStats {
  return {
    totalCodeCommands: result.codeOnly.length + result.inBoth.length,
    totalDocsCommands: result.docsOnly.length + result.inBoth.length,
    codeOnly: result.codeOnly.length,
    docsOnly: result.docsOnly.length,
    inBoth: result.inBoth.length,
    permissionMismatches: result.permissionMismatches.length
  };
}
