#!/usr/bin/env node

import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { auditCommands } from './command-audit.js';

interface AuditFlags {
  config?: string;
  root?: string;
  docs?: string;
  mode?: 'prompt' | 'extract' | 'compare';
  output?: string;
  format?: 'text' | 'json';
  debug: boolean;
}

const auditCommand = buildCommand({
  docs: {
    brief: 'Extract admin commands from a server source file and check them against the docs'
  },
  parameters: {
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      root: {
        kind: 'parsed',
        brief: 'Override repository root',
        parse: String,
        optional: true
      },
      docs: {
        kind: 'parsed',
        brief: 'Override docs file path',
        parse: String,
        optional: true
      },
      mode: {
        kind: 'enum',
        brief: 'Override run mode',
        values: ['prompt', 'extract', 'compare'] as const,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'Override output directory',
        parse: String,
        optional: true
      },
      format: {
        kind: 'enum',
        brief: 'Override report format',
        values: ['text', 'json'] as const,
        optional: true
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      r: 'root',
      m: 'mode',
      o: 'output',
      f: 'format',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: AuditFlags): Promise<void> {
    try {
      await auditCommands({
        configPath: flags.config,
        rootOverride: flags.root,
        docsOverride: flags.docs,
        modeOverride: flags.mode,
        outputOverride: flags.output,
        formatOverride: flags.format,
        debug: flags.debug
      });
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(auditCommand, {
  name: 'command-audit',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

await run(app, process.argv.slice(2), { process });
