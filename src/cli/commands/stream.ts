import { Command } from 'commander';
import { createInterface } from 'node:readline';
import { Compressor } from '../../compressor/compressor.js';
import { loadConfig } from '../../config/loader.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { addConfigOptions, formatStats, processIO, toOverrides } from '../options.js';
import type { CommandIO, ConfigOptions } from '../options.js';

interface StreamOptions extends ConfigOptions {
  stats?: boolean;
}

/**
 * Compress every stdin line as its own message. A message that fails is
 * logged and dropped; the stream keeps going.
 */
export function createStreamCommand(io: CommandIO = processIO): Command {
  const command = new Command('stream');

  command.description('Compress newline-delimited messages from stdin, one JSON array per line');

  addConfigOptions(command)
    .option('--stats', 'Log the size reduction of every message')
    .action(async (options: StreamOptions) => {
      try {
        const config = await loadConfig({ path: options.config, overrides: toOverrides(options) });
        const compressor = new Compressor(config);
        const lines = createInterface({ input: io.stdin, crlfDelay: Infinity });

        let received = 0;
        let dropped = 0;
        for await (const line of lines) {
          if (line.trim() === '') continue;
          received++;

          const input = Buffer.from(line, 'utf8');
          let output: Uint8Array;
          try {
            output = compressor.compressJSON(input);
          } catch (error) {
            dropped++;
            logger.warn(`Failed to compress message ${received}: ${getErrorMessage(error)}`);
            continue;
          }

          if (options.stats) {
            logger.info(formatStats(`message ${received}`, input.length, output.length, compressor.getCompressionRatio(input, output)));
          }
          io.stdout.write(Buffer.concat([output, Buffer.from('\n')]));
        }

        logger.debug(`Stream closed after ${received} messages (${dropped} dropped)`);
      } catch (error: unknown) {
        logger.error('Stream failed', error);
        process.exitCode = 1;
      }
    });

  return command;
}
