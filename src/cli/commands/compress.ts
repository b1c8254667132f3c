import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { Compressor } from '../../compressor/compressor.js';
import { loadConfig } from '../../config/loader.js';
import { createSemaphore } from '../../utils/concurrency.js';
import { getErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { addConfigOptions, formatStats, processIO, toOverrides } from '../options.js';
import type { CommandIO, ConfigOptions } from '../options.js';

interface CompressOptions extends ConfigOptions {
  outDir?: string;
  stats?: boolean;
}

async function readAll(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  }
  return Buffer.concat(chunks);
}

export function createCompressCommand(io: CommandIO = processIO): Command {
  const command = new Command('compress');

  command
    .description('Aggregate JSON-array payloads from files (or stdin) into time-windowed records')
    .argument('[files...]', 'Input files, one JSON array each; reads stdin when omitted');

  addConfigOptions(command)
    .option('-o, --out-dir <dir>', 'Write each result to <dir>/<input file name> instead of stdout')
    .option('--stats', 'Log the size reduction of every payload')
    .action(async (files: string[], options: CompressOptions) => {
      try {
        const config = await loadConfig({ path: options.config, overrides: toOverrides(options) });
        const compressor = new Compressor(config);

        if (files.length === 0) {
          const input = await readAll(io.stdin);
          const output = compressor.compressJSON(input);
          if (options.stats) {
            logger.info(formatStats('stdin', input.length, output.length, compressor.getCompressionRatio(input, output)));
          }
          io.stdout.write(Buffer.concat([output, Buffer.from('\n')]));
          return;
        }

        let failures = 0;
        const reader = createSemaphore(config.workers);
        const inputs = await Promise.all(files.map(file => reader.run(async () => {
          try {
            return await readFile(file);
          } catch (error: unknown) {
            failures++;
            logger.error(`Failed to read ${file}`, getErrorMessage(error));
            return undefined;
          }
        })));

        const readable = inputs.flatMap((input, index) => (input ? [{ file: files[index], input }] : []));
        const outputs = await compressor.compressBatch(readable.map(item => item.input), {
          onItemError: (index, error) => {
            failures++;
            logger.error(`Failed to compress ${readable[index].file}`, getErrorMessage(error));
          },
        });

        if (options.outDir) {
          await mkdir(options.outDir, { recursive: true });
        }

        for (const [index, output] of outputs.entries()) {
          if (!output) continue;
          const { file, input } = readable[index];

          if (options.stats) {
            logger.info(formatStats(file, input.length, output.length, compressor.getCompressionRatio(input, output)));
          }

          if (options.outDir) {
            await writeFile(join(options.outDir, basename(file)), output);
          } else {
            io.stdout.write(Buffer.concat([output, Buffer.from('\n')]));
          }
        }

        if (failures > 0) {
          logger.warn(`${failures} of ${files.length} payloads could not be compressed`);
          process.exitCode = 1;
        }
      } catch (error: unknown) {
        logger.error('Compression failed', error);
        process.exitCode = 1;
      }
    });

  return command;
}
