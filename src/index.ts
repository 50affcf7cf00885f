#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { configSet, configShow } from './commands/config.js';
import { runCommand } from './commands/run.js';
import { OllamaClient } from './lib/ai.js';
import { CONFIG_KEYS, DEFAULT_MODEL, VALID_LANGS } from './lib/config.js';
import { createTerminalOutput } from './ui/output.js';
import { renderBanner } from './ui/panels.js';

// ============================================================================
// CLI Arguments
// ============================================================================

const RunFlagsSchema = z.object({
  commitMsg: z.boolean().optional(),
  cwd: z.string().optional(),
  html: z.string().optional(),
  lang: z.enum(VALID_LANGS).optional(),
  model: z.string().optional(),
  outputFile: z.string().optional(),
  ref: z.string().optional(),
  staged: z.boolean().optional()
});

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
  );
  return z.object({ version: z.string() }).parse(raw).version;
}

// ============================================================================
// Main Flow
// ============================================================================

async function main() {
  const version = readVersion();
  const output = createTerminalOutput();
  const program = new Command();

  program
    .name('diff-sage')
    .description('Analyze git changes with a local Ollama model')
    .version(version);

  program
    .command('run', { isDefault: true })
    .description('Analyze the diff (or the last commit when clean), or generate a commit message')
    .option('-s, --staged', 'analyze only staged changes')
    .option('-r, --ref <ref>', 'analyze this commit (e.g. HEAD, HEAD~1)')
    .option('-m, --model <name>', `Ollama model (overrides config, default ${DEFAULT_MODEL})`)
    .addOption(
      new Option('-l, --lang <lang>', 'response language (overrides config)').choices(VALID_LANGS)
    )
    .option('--commit-msg', 'generate only a one-line commit message')
    .option('--cwd <dir>', 'repository directory (default: current)')
    .option('-o, --output-file <path>', 'write the commit message to a file (prepare-commit-msg hook)')
    .option('--html <path>', 'write a self-contained HTML report to this file')
    .action(async (flags: unknown) => {
      const options = RunFlagsSchema.parse(flags);
      if (process.stdout.isTTY && !options.outputFile) {
        console.log(renderBanner(version));
      }
      const code = await runCommand(options, {
        client: new OllamaClient(),
        output,
        version
      });
      process.exit(code);
    });

  const config = program.command('config').description('Set or show default model, language and report options');

  config
    .command('set')
    .description(`Set a default (${CONFIG_KEYS.join(', ')})`)
    .argument('<key>', 'config key')
    .argument('<value>', 'new value')
    .action((key: string, value: string) => {
      process.exit(configSet(key, value, output));
    });

  config
    .command('show')
    .description('Show the current config')
    .action(() => {
      process.exit(configShow(output));
    });

  await program.parseAsync(process.argv);
}

// Run
main().catch((err) => {
  createTerminalOutput().error(err instanceof Error ? err.message : String(err), 'en');
  process.exit(1);
});
