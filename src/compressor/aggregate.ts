/**
 * Aggregator
 *
 * Reduces a group's collected values to one number. Every method returns 0
 * for an empty sequence, so 'avg' never divides by zero.
 */

import type { AggregationMethod } from './types.js';

export const AGGREGATION_METHODS: readonly AggregationMethod[] = [
  'sum', 'avg', 'mean', 'min', 'max', 'count', 'first', 'last'
];

export function isAggregationMethod(name: string): name is AggregationMethod {
  return AGGREGATION_METHODS.some(method => method === name);
}

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

export function aggregate(values: readonly number[], method: string): number {
  if (values.length === 0) {
    return 0;
  }

  switch (method) {
    case 'avg':
    case 'mean':
      return sum(values) / values.length;

    case 'min':
      return values.reduce((acc, v) => (v < acc ? v : acc), values[0]);

    case 'max':
      return values.reduce((acc, v) => (v > acc ? v : acc), values[0]);

    case 'count':
      return values.length;

    case 'first':
      return values[0];

    case 'last':
      return values[values.length - 1];

    case 'sum':
    default:
      return sum(values);
  }
}
