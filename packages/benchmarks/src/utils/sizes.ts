/**
 * Common workload sizes for benchmarking
 */

export interface SequenceSize {
  name: string;
  /** Number of arrays in the sequence */
  count: number;
  /** Number of distinct arrays the sequence draws from */
  distinct: number;
}

export interface ArraySize {
  name: string;
  length: number;
}

export const ARRAY_SIZES: ArraySize[] = [
  { name: 'rgb', length: 3 },
  { name: 'rgba', length: 4 },
  { name: 'small', length: 16 },
  { name: 'medium', length: 256 },
];

export const SEQUENCE_SIZES: SequenceSize[] = [
  { name: 'tiny', count: 100, distinct: 8 },
  { name: 'small', count: 1_000, distinct: 64 },
  { name: 'medium', count: 10_000, distinct: 256 },
  { name: 'large', count: 100_000, distinct: 4096 },
  { name: 'all distinct', count: 10_000, distinct: 10_000 },
];

export function formatSize(size: SequenceSize): string {
  return `${size.name} (${size.count.toLocaleString()} arrays, ${size.distinct.toLocaleString()} distinct)`;
}
