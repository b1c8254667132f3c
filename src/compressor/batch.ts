/**
 * Batch Runner
 *
 * Compresses independent payloads with at most `config.workers` in flight.
 * Results are written by index, so the output lines up with the input no
 * matter in which order items finish.
 */

import { compressJSON } from './grouping.js';
import type { BatchOptions, CompressorConfig, Payload } from './types.js';
import { createSemaphore } from '../utils/concurrency.js';
import { getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * @returns One slot per payload: the compressed bytes, or undefined when
 * that payload failed. A failure never affects other slots.
 */
export async function compressBatch(
  payloads: readonly Payload[],
  config: CompressorConfig,
  options: BatchOptions = {}
): Promise<Array<Uint8Array | undefined>> {
  const results = new Array<Uint8Array | undefined>(payloads.length).fill(undefined);
  const semaphore = createSemaphore(config.workers);

  const reportFailure = (index: number, error: unknown): void => {
    logger.debug(`[compressBatch] item ${index} failed: ${getErrorMessage(error)}`);
    if (!options.onItemError) return;
    try {
      options.onItemError(index, error);
    } catch (hookError) {
      logger.debug(`[compressBatch] onItemError hook threw for item ${index}: ${getErrorMessage(hookError)}`);
    }
  };

  await Promise.all(
    payloads.map((payload, index) =>
      semaphore
        .run(() => compressJSON(payload, config))
        .then(
          compressed => {
            results[index] = compressed;
          },
          (error: unknown) => reportFailure(index, error)
        )
    )
  );

  return results;
}
