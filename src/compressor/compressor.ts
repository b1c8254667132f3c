import { compressBatch } from './batch.js';
import { resolveConfig } from './config.js';
import { compressJSON } from './grouping.js';
import { getCompressionRatio } from './ratio.js';
import type { BatchOptions, CompressorConfig, Payload } from './types.js';

/**
 * Compressor bound to one resolved configuration
 */
export class Compressor {
  readonly config: CompressorConfig;

  constructor(config?: Partial<CompressorConfig>) {
    this.config = resolveConfig(config);
  }

  compressJSON(payload: Payload): Uint8Array {
    return compressJSON(payload, this.config);
  }

  compressBatch(payloads: readonly Payload[], options?: BatchOptions): Promise<Array<Uint8Array | undefined>> {
    return compressBatch(payloads, this.config, options);
  }

  getCompressionRatio(input: ArrayLike<unknown> | number, output: ArrayLike<unknown> | number): number {
    return getCompressionRatio(input, output);
  }
}
