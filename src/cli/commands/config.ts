import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { logger } from '../../utils/logger.js';
import { addConfigOptions, processIO, toOverrides } from '../options.js';
import type { CommandIO, ConfigOptions } from '../options.js';

export function createConfigCommand(io: CommandIO = processIO): Command {
  const command = new Command('config');

  command.description('Print the resolved configuration as JSON');

  addConfigOptions(command)
    .action(async (options: ConfigOptions) => {
      try {
        const config = await loadConfig({ path: options.config, overrides: toOverrides(options) });
        io.stdout.write(JSON.stringify(config, null, 2) + '\n');
      } catch (error: unknown) {
        logger.error('Failed to load configuration', error);
        process.exitCode = 1;
      }
    });

  return command;
}
