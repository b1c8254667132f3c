/**
 * Grouping Engine
 *
 * Single-pass reduction of one JSON-array payload: records are bucketed by
 * time window and group key, each bucket is reduced with the configured
 * aggregation method, and the buckets are written back as a JSON array.
 */

import { aggregate } from './aggregate.js';
import { getPath, isJsonObject, valueToFloat, valueToInt, valueToString } from './json-value.js';
import type {
  AggregationResult,
  CompressorConfig,
  Group,
  JsonObject,
  JsonValue,
  Payload
} from './types.js';
import { InputFormatError, SerializationError } from '../utils/errors.js';

const FALLBACK_WINDOW_SECONDS = 60;
const FALLBACK_VALUE_FIELD = 'value';

/**
 * Composite group identity: window start, then (field, value) pairs of the
 * group-by fields present on the record, then those of the unique fields.
 * Encoded as a JSON tuple so tag values cannot collide through delimiters.
 */
type GroupKeyPart = ['group' | 'unique', string, string];

export function decodePayload(payload: Payload): string {
  if (typeof payload === 'string') {
    return payload;
  }
  return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString('utf8');
}

function parseArray(payload: Payload): JsonValue[] {
  let parsed: JsonValue;
  try {
    parsed = JSON.parse(decodePayload(payload));
  } catch {
    throw new InputFormatError('expected JSON array');
  }
  if (!Array.isArray(parsed)) {
    throw new InputFormatError('expected JSON array');
  }
  return parsed;
}

/**
 * Window length in whole seconds; sub-second windows fall back to one minute
 */
export function windowSeconds(config: CompressorConfig): number {
  const seconds = Math.trunc(config.timeWindowMs / 1000);
  return seconds > 0 ? seconds : FALLBACK_WINDOW_SECONDS;
}

/**
 * Read the record's timestamp.
 * @returns The integer timestamp, or null when the record must be skipped
 */
function readTimestamp(record: JsonObject, config: CompressorConfig): number | null {
  const raw = getPath(record, config.timestampField);
  if (raw === undefined) {
    return null;
  }
  const timestamp = valueToInt(raw);
  if (timestamp === 0 && !(config.allowZeroTimestamp && typeof raw === 'number')) {
    // Zero is indistinguishable from a missing timestamp unless explicitly allowed
    return null;
  }
  return timestamp;
}

function collectKeyParts(record: JsonObject, config: CompressorConfig): GroupKeyPart[] {
  const parts: GroupKeyPart[] = [];
  for (const field of config.groupByFields) {
    const value = getPath(record, field);
    if (value !== undefined) {
      parts.push(['group', field, valueToString(value)]);
    }
  }
  for (const field of config.uniqueFields) {
    const value = getPath(record, field);
    if (value !== undefined) {
      parts.push(['unique', field, valueToString(value)]);
    }
  }
  return parts;
}

/**
 * Scan the records and build one Group per distinct key
 */
export function groupRecords(records: readonly JsonValue[], config: CompressorConfig): Map<string, Group> {
  const groups = new Map<string, Group>();
  const windowSec = windowSeconds(config);

  for (const record of records) {
    if (!isJsonObject(record)) {
      continue;
    }

    const timestamp = readTimestamp(record, config);
    if (timestamp === null) {
      continue;
    }

    const window = Math.floor(timestamp / windowSec) * windowSec;
    const parts = collectKeyParts(record, config);
    const key = JSON.stringify([window, parts]);

    let group = groups.get(key);
    if (!group) {
      group = {
        window,
        tags: new Map(parts.map(([, field, value]): [string, string] => [field, value])),
        values: [],
        count: 0,
        firstTime: timestamp,
        lastTime: timestamp,
      };
      groups.set(key, group);
    }

    if (timestamp < group.firstTime) group.firstTime = timestamp;
    if (timestamp > group.lastTime) group.lastTime = timestamp;

    for (const field of config.valueFields) {
      const value = getPath(record, field);
      if (value !== undefined) {
        group.values.push(valueToFloat(value));
      }
    }

    group.count++;
  }

  return groups;
}

/**
 * Turn one Group into its output record
 */
export function summarizeGroup(group: Group, config: CompressorConfig): AggregationResult {
  let timestamp: number;
  switch (config.aggregationMethod) {
    case 'first':
      timestamp = group.firstTime;
      break;
    case 'last':
      timestamp = group.lastTime;
      break;
    default:
      timestamp = Math.trunc((group.firstTime + group.lastTime) / 2);
  }

  const valueField = config.valueFields.length === 1 ? config.valueFields[0] : FALLBACK_VALUE_FIELD;

  // fromEntries defines keys, so a tag named __proto__ stays an own property
  return Object.fromEntries<string | number>([
    [config.timestampField, timestamp],
    [valueField, aggregate(group.values, config.aggregationMethod)],
    ...group.tags,
  ]);
}

/**
 * Compress one JSON-array payload.
 *
 * @throws InputFormatError when the payload is not a JSON array
 * @throws SerializationError when an aggregate is not a finite number
 */
export function compressJSON(payload: Payload, config: CompressorConfig): Uint8Array {
  const records = parseArray(payload);
  const groups = groupRecords(records, config);

  const output: AggregationResult[] = [];
  for (const group of groups.values()) {
    const result = summarizeGroup(group, config);
    for (const [field, value] of Object.entries(result)) {
      if (typeof value === 'number' && !Number.isFinite(value)) {
        throw new SerializationError(`non-finite number in field "${field}"`);
      }
    }
    output.push(result);
  }

  return Buffer.from(JSON.stringify(output), 'utf8');
}
