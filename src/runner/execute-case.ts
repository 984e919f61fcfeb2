import type { TestResult } from '../types.js';
import { InterruptedError, isPreconditionError } from '../errors.js';
import type { ExecutionOutcome, Interpreter } from '../process/interpreter.js';
import { isExpectedError } from '../utils/expected-error.js';
import { checkOutput } from '../utils/output-check.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface ExecuteCaseOptions {
  interpreter: Pick<Interpreter, 'run'>;
  checkOutput?: boolean;
  expectedErrors?: readonly string[];
  marker?: string;
  goldenExtension?: string;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Runs one script and reconciles what happened with what was expected.
 *
 * | expected error | outcome            | result                           |
 * | -------------- | ------------------ | -------------------------------- |
 * | any            | interpreter absent | fail (precondition)              |
 * | yes            | exit/launch failed | pass                             |
 * | yes            | exit 0             | fail (unexpected success)        |
 * | no             | exit/launch failed | fail                             |
 * | no             | exit 0             | pass, or the golden file decides |
 *
 * Never throws. An operator interrupt comes back as status `interrupted`.
 */
export async function executeTestCase(
  testFile: string,
  options: ExecuteCaseOptions,
): Promise<TestResult> {
  const logger = options.logger ?? silentLogger;
  const startTime = Date.now();
  const elapsed = () => Date.now() - startTime;

  logger.verbose('Found test file: %s', testFile);

  let expectedError: boolean;
  try {
    expectedError = await isExpectedError(testFile, {
      marker: options.marker,
      expectedErrors: options.expectedErrors,
    });
  } catch (error) {
    logger.exception('Could not read test file %s', error, testFile);
    return {
      testFile,
      status: 'failed',
      reason: 'unreadable-script',
      error: errorMessage(error),
      durationMs: elapsed(),
    };
  }
  logger.verbose("'%s' exp error status: %s", testFile, expectedError);

  let outcome: ExecutionOutcome;
  try {
    outcome = await options.interpreter.run(testFile, {
      signal: options.signal,
    });
  } catch (error) {
    if (error instanceof InterruptedError) {
      logger.warning('Execution interrupted by user.');
      logger.debug('Last file was: %s', testFile);
      return { testFile, status: 'interrupted', durationMs: elapsed() };
    }
    logger.exception('Unexpected error for %s', error, testFile);
    return {
      testFile,
      status: 'failed',
      reason: 'precondition',
      error: errorMessage(error),
      durationMs: elapsed(),
    };
  }

  if (outcome.type === 'launch-failure' && isPreconditionError(outcome.error)) {
    // A broken interpreter setup says nothing about the script.
    logger.exception('Could not run %s', outcome.error, testFile);
    return {
      testFile,
      status: 'failed',
      reason: 'precondition',
      error: outcome.error.message,
      durationMs: elapsed(),
    };
  }

  if (outcome.type !== 'success') {
    if (expectedError) {
      logger.warning('Expected error for %s: %s', testFile, outcome.error.message);
      return {
        testFile,
        status: 'passed',
        reason: 'expected-error',
        durationMs: elapsed(),
      };
    }
    logger.exception('Unexpected error for %s', outcome.error, testFile);
    return {
      testFile,
      status: 'failed',
      reason: outcome.type === 'launch-failure' ? 'precondition' : 'exit-failure',
      error: outcome.error.message,
      durationMs: elapsed(),
    };
  }

  if (expectedError) {
    logger.error("File DIDN'T error when expected to: %s", testFile);
    return {
      testFile,
      status: 'failed',
      reason: 'unexpected-success',
      error: 'Script exited successfully but was expected to fail',
      durationMs: elapsed(),
    };
  }

  if (options.checkOutput) {
    try {
      const check = await checkOutput(testFile, outcome.stdout, {
        goldenExtension: options.goldenExtension,
      });
      if (check.status === 'mismatch') {
        logger.error(
          "Output didn't match expected output for %s (first difference on line %d).",
          testFile,
          check.line,
        );
        return {
          testFile,
          status: 'failed',
          reason: 'output-mismatch',
          error: `Output differs from ${check.goldenPath} at line ${check.line}`,
          durationMs: elapsed(),
        };
      }
      logger.verbose('Executed: %s', testFile);
      return {
        testFile,
        status: 'passed',
        reason: check.status === 'match' ? 'output-match' : 'success',
        durationMs: elapsed(),
      };
    } catch (error) {
      logger.exception('Could not read expected output for %s', error, testFile);
      return {
        testFile,
        status: 'failed',
        reason: 'output-mismatch',
        error: errorMessage(error),
        durationMs: elapsed(),
      };
    }
  }

  logger.verbose('Executed: %s', testFile);
  return { testFile, status: 'passed', reason: 'success', durationMs: elapsed() };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
