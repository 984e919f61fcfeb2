export * from './types.js';
export * from './errors.js';
export { Interpreter, DEFAULT_EXECUTABLE } from './process/interpreter.js';
export type {
  ExecutionOutcome,
  InterpreterOptions,
  InvokeOptions,
} from './process/interpreter.js';
export { executeTestCase } from './runner/execute-case.js';
export type { ExecuteCaseOptions } from './runner/execute-case.js';
export { runTests, runAll } from './runner/test-runner.js';
export type { TestRunnerOptions } from './runner/test-runner.js';
export { discoverTests } from './utils/test-discovery.js';
export { isExpectedError, hasExpectedErrorMarker } from './utils/expected-error.js';
export { checkOutput, matchesExpected, goldenPathFor } from './utils/output-check.js';
export type { OutputCheck } from './utils/output-check.js';
export { ConsoleLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel } from './utils/logger.js';
