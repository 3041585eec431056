// Re-export tinybench types
export { Bench } from 'tinybench';
export type { Task, Options, TaskResult } from 'tinybench';

// Export utilities
export * from './utils/sizes';
export * from './utils/data';
export * from './utils/formatting';
export * from './utils/config';

// Export runners
export { runElementwiseBenchmarks } from './runners/elementwise-ops';
export { runUniqueIndexingBenchmarks } from './runners/unique-indexing';
