export * from './dtype';
export * from './errors';
export * from './fixed-array';
export * from './indexing';
export type {
  IsInteger,
  IsNegative,
  IsNonNegativeInteger,
  ValidIndex,
} from './arithmetic';
