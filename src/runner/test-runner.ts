import * as path from 'path';
import type { RunOptions, TestReport, TestResult } from '../types.js';
import { Interpreter } from '../process/interpreter.js';
import { discoverTests } from '../utils/test-discovery.js';
import { DEFAULT_WORKERS, runWithConcurrency } from '../utils/worker-pool.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { executeTestCase, type ExecuteCaseOptions } from './execute-case.js';

export interface TestRunnerOptions extends RunOptions {
  /** Aborting stops dispatch and interrupts running scripts. */
  signal?: AbortSignal;
  logger?: Logger;
}

export async function runTests(
  folderPath: string,
  options: TestRunnerOptions = {},
): Promise<TestReport> {
  const startTime = Date.now();
  const logger = options.logger ?? silentLogger;
  const testFiles = discoverTests(folderPath, options.extension);

  logger.verbose('Discovered %d test files in %s', testFiles.length, folderPath);

  const caseOptions: ExecuteCaseOptions = {
    interpreter: new Interpreter({
      executable: options.executable,
      timeoutMs: options.timeoutMs,
      logger,
    }),
    checkOutput: options.checkOutput,
    expectedErrors: options.expectedErrors,
    marker: options.marker,
    goldenExtension: options.goldenExtension,
    signal: options.signal,
    logger,
  };

  const results = options.parallel
    ? await runParallel(testFiles, caseOptions, options.workers ?? DEFAULT_WORKERS)
    : await runSequential(testFiles, caseOptions, logger);

  const passed = results
    .filter((r) => r.status === 'passed')
    .map((r) => r.testFile);
  const failed = results
    .filter((r) => r.status === 'failed')
    .map((r) => r.testFile);
  const interrupted =
    results.some((r) => r.status === 'interrupted') ||
    passed.length + failed.length < testFiles.length;

  return {
    totalTests: testFiles.length,
    passed,
    failed,
    interrupted,
    results,
    durationMs: Date.now() - startTime,
  };
}

async function runSequential(
  testFiles: string[],
  options: ExecuteCaseOptions,
  logger: Logger,
): Promise<TestResult[]> {
  const results: TestResult[] = [];

  for (let i = 0; i < testFiles.length; i++) {
    const testFile = testFiles[i];

    if (options.signal?.aborted) {
      logger.warning('Execution interrupted by user.');
      break;
    }

    logger.debug(
      '[%d/%d] Running: %s',
      i + 1,
      testFiles.length,
      path.basename(testFile),
    );

    const result = await executeTestCase(testFile, options);
    results.push(result);

    if (result.status === 'interrupted') {
      break;
    }
  }

  return results;
}

async function runParallel(
  testFiles: string[],
  options: ExecuteCaseOptions,
  workers: number,
): Promise<TestResult[]> {
  const pooled = await runWithConcurrency(
    testFiles,
    {
      concurrency: workers,
      shouldStop: (result: TestResult) => result.status === 'interrupted',
      signal: options.signal,
    },
    (testFile) => executeTestCase(testFile, options),
  );

  return pooled.filter((result): result is TestResult => result !== undefined);
}

/**
 * Two-list form of {@link runTests}: the paths that passed and the paths
 * that failed.
 */
export async function runAll(
  folderPath: string,
  options: TestRunnerOptions = {},
): Promise<[passed: string[], failed: string[]]> {
  const report = await runTests(folderPath, options);
  return [report.passed, report.failed];
}
