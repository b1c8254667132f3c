/**
 * Compressor types
 */

/**
 * Decoded JSON value. Records are looked up through this variant so that
 * "field absent" and "field of an unexpected type" stay distinguishable.
 */
export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Known aggregation methods. Any other name is accepted by the aggregator
 * and behaves like 'sum'.
 */
export type AggregationMethod =
  | 'sum'
  | 'avg'
  | 'mean'
  | 'min'
  | 'max'
  | 'count'
  | 'first'
  | 'last';

/**
 * Resolved compressor configuration.
 * Shared read-only between concurrent invocations.
 */
export interface CompressorConfig {
  /** Field holding the record's integer timestamp (seconds) */
  readonly timestampField: string;
  /** Fields whose numeric values are aggregated */
  readonly valueFields: readonly string[];
  /** Fields that label and separate output series, e.g. ['host', 'service'] */
  readonly groupByFields: readonly string[];
  /** Fields that must match for two records to aggregate together, e.g. ['customer_id'] */
  readonly uniqueFields: readonly string[];
  /** Aggregation method name; unknown names aggregate like 'sum' */
  readonly aggregationMethod: string;
  /** Window length in milliseconds */
  readonly timeWindowMs: number;
  /** Maximum number of payloads compressed at once by the batch runner */
  readonly workers: number;
  /** Accept a literal 0 timestamp instead of treating it as missing */
  readonly allowZeroTimestamp: boolean;
}

/**
 * Default compressor configuration
 */
export const DEFAULT_COMPRESSOR_CONFIG: CompressorConfig = {
  timestampField: 'timestamp',
  valueFields: ['value'],
  groupByFields: [],
  uniqueFields: [],
  aggregationMethod: 'sum',
  timeWindowMs: 60_000, // 1 minute
  workers: 4,
  allowZeroTimestamp: false,
};

/**
 * Accumulator for all records sharing one window and one combination of
 * group-by and unique field values
 */
export interface Group {
  window: number;
  /** Captured tag values in group-by then unique order */
  tags: Map<string, string>;
  values: number[];
  count: number;
  firstTime: number;
  lastTime: number;
}

/**
 * One emitted record: timestamp, aggregate value and the captured tags
 */
export type AggregationResult = Record<string, string | number>;

/**
 * Accepted payload input. Strings are treated as already-decoded UTF-8 text.
 */
export type Payload = Uint8Array | string;

export interface BatchOptions {
  /**
   * Called once for every failed item. The batch result still only carries
   * an undefined slot for that index.
   */
  onItemError?: (index: number, error: unknown) => void;
}
