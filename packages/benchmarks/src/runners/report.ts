/**
 * Shared console reporting for the standalone runners
 */

import { pathToFileURL } from 'node:url';
import { Bench } from 'tinybench';
import { getBenchmarkConfig, getBenchmarkProfile, getBenchmarkRecommendations } from '../utils/config';
import {
  formatBenchResults,
  formatIndividualResults,
  resultsToMarkdownTable,
  type FormattedResult,
} from '../utils/formatting';

/**
 * Create a Bench for the active profile and print the run header
 */
export function createBench(title: string): Bench {
  console.log(`🚀 Running ${title} Benchmarks\n`);

  console.log('💡 Benchmark Reliability Tips:');
  getBenchmarkRecommendations().forEach((tip) => console.log(`   ${tip}`));
  console.log('');

  const profile = getBenchmarkProfile();
  const config = getBenchmarkConfig(profile);
  console.log(`📊 Using profile: ${profile}`);
  console.log(
    `⏱️  Runtime: ${String(config.time)}ms per benchmark, min ${String(config.iterations)} iterations\n`,
  );

  return new Bench(config);
}

/**
 * Warm up, run and print every task of `bench`
 */
export async function runAndReport(bench: Bench): Promise<FormattedResult[]> {
  console.log(`\nRunning ${bench.tasks.length.toString()} benchmarks...\n`);

  await bench.warmup();
  await bench.run();

  console.log('\n📊 Benchmark Results\n');
  console.log('='.repeat(80));

  const results = formatBenchResults(bench);
  console.log(resultsToMarkdownTable(results));
  console.log(`\n${formatIndividualResults(results)}`);
  return results;
}

/**
 * Whether the module at `url` is the process entry point
 */
export function isEntryPoint(url: string): boolean {
  const entry = process.argv[1];
  return entry !== undefined && url === pathToFileURL(entry).href;
}
