import { Readable, Writable } from 'node:stream';
import type { CommandIO } from '../../options.js';

/**
 * In-memory stdin/stdout for driving commands in tests
 */
export function createTestIO(input = ''): { io: CommandIO; output: () => string } {
  const chunks: Buffer[] = [];
  const stdout = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      callback();
    },
  });

  return {
    io: { stdin: Readable.from([Buffer.from(input, 'utf8')]), stdout },
    output: () => Buffer.concat(chunks).toString('utf8'),
  };
}
