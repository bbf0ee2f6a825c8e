import { describe, it, expect } from 'vitest';
import { compareCommandSets, getComparisonStats } from './command-comparator.js';
import type { CommandEntry } from '../extractor/types.js';
import { parseDocsText } from '../docs/docs-parser.js';

function entries(...names: string[]): CommandEntry[] {
  return names.map((name, index) => ({ name, line: index + 1 }));
}

describe('compareCommandSets', () => {
  it('should find commands missing on each side', () => {
    const code = entries('heal', 'fly', 'kill');
    const docs = entries('heal', 'fly', 'teleport');

    const result = compareCommandSets(code, docs);

    expect(result.codeOnly).toEqual(['kill']);
    expect(result.docsOnly).toEqual(['teleport']);
    expect(result.inBoth).toEqual(['heal', 'fly']);
  });

  it('should report no differences for identical sets', () => {
    const names = entries('heal', 'fly');

    const result = compareCommandSets(names, names);

    expect(result.codeOnly).toEqual([]);
    expect(result.docsOnly).toEqual([]);
    expect(result.inBoth).toEqual(['heal', 'fly']);
  });

  it('should keep the original order of each side', () => {
    const code = entries('zeta', 'alpha', 'mid');
    const docs = entries('yak', 'beta');

    const result = compareCommandSets(code, docs);

    expect(result.codeOnly).toEqual(['zeta', 'alpha', 'mid']);
    expect(result.docsOnly).toEqual(['yak', 'beta']);
  });

  it('should handle empty sides', () => {
    expect(compareCommandSets([], entries('heal')).docsOnly).toEqual(['heal']);
    expect(compareCommandSets(entries('heal'), []).codeOnly).toEqual(['heal']);
    expect(compareCommandSets([], [])).toEqual({
      codeOnly: [],
      docsOnly: [],
      inBoth: [],
      permissionMismatches: []
    });
  });

  it('should compare names exactly', () => {
    const result = compareCommandSets(entries('Heal'), entries('heal'));

    expect(result.codeOnly).toEqual(['Heal']);
    expect(result.docsOnly).toEqual(['heal']);
  });

  it('should flag permission mismatches only when both sides state a level', () => {
    const code: CommandEntry[] = [
      { name: 'heal', line: 1, permission: 'Tester' },
      { name: 'kill', line: 2, permission: 'Admin' },
      { name: 'fly', line: 3 }
    ];
    const docs: CommandEntry[] = [
      { name: 'heal', line: 1, permission: 'Tester' },
      { name: 'kill', line: 2, permission: 'GameMaster' },
      { name: 'fly', line: 3, permission: 'Player' }
    ];

    const result = compareCommandSets(code, docs);

    expect(result.permissionMismatches).toEqual([
      { name: 'kill', codePermission: 'Admin', docsPermission: 'GameMaster' }
    ]);
  });

  it('should flag a mismatch for a command documented under a subheading', () => {
    const code: CommandEntry[] = [{ name: 'kill', line: 4, permission: 'Tester' }];
    const docs = parseDocsText('## Admin level commands:\n### Character\n**!kill**\\\n', { commandPrefix: '!' });

    expect(compareCommandSets(code, docs).permissionMismatches).toEqual([
      { name: 'kill', codePermission: 'Tester', docsPermission: 'Admin' }
    ]);
  });
});

describe('getComparisonStats', () => {
  it('should calculate correct statistics', () => {
    const result = {
      codeOnly: ['kill'],
      docsOnly: ['teleport', 'warp'],
      inBoth: ['heal', 'fly', 'hide'],
      permissionMismatches: [{ name: 'hide', codePermission: 'Admin', docsPermission: 'Intern' }]
    };

    const stats = getComparisonStats(result);

    expect(stats).toEqual({
      totalCodeCommands: 4,
      totalDocsCommands: 5,
      codeOnly: 1,
      docsOnly: 2,
      inBoth: 3,
      permissionMismatches: 1
    });
  });
});
