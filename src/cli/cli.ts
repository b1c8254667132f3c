import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createCompressCommand } from './commands/compress.js';
import { createStreamCommand } from './commands/stream.js';
import { createConfigCommand } from './commands/config.js';
import { processIO } from './options.js';
import type { CommandIO } from './options.js';

/**
 * Read version from package.json (two levels up from both src/cli and dist/cli)
 */
function getVersion(): string {
  try {
    const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', '..', 'package.json');
    const packageJson: { version?: string } = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    return packageJson.version || '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createCLI(io: CommandIO = processIO): Command {
  const program = new Command();

  program
    .name('ts-compressor')
    .description('Reduce timestamped JSON records into time-windowed aggregates')
    .version(getVersion());

  program.addCommand(createCompressCommand(io));
  program.addCommand(createStreamCommand(io));
  program.addCommand(createConfigCommand(io));

  return program;
}
