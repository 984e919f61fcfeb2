import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import type { TestReport } from './types.js';
import { isPreconditionError } from './errors.js';
import { Interpreter } from './process/interpreter.js';
import { runTests } from './runner/test-runner.js';
import {
  loadConfigFile,
  parsePositiveInteger,
  resolveConfig,
  type HarnessConfig,
} from './utils/config.js';
import { isExpectedError } from './utils/expected-error.js';
import {
  ConsoleLogger,
  parseLogLevel,
  type LogLevel,
} from './utils/logger.js';
import { discoverTests } from './utils/test-discovery.js';

export const VERSION = '1.0.0';

export const EXIT_INTERRUPTED = 130;

export interface CliOptions {
  executable?: string;
  checkOutput?: boolean;
  parallel?: boolean;
  jobs?: number;
  timeout?: number;
  expectedError?: string[];
  marker?: string;
  extension?: string;
  goldenExtension?: string;
  config?: string;
  output?: string;
  dryRun?: boolean;
  verbose?: boolean;
  debug?: boolean;
  quiet?: boolean;
  logLevel?: LogLevel;
}

function positiveInteger(name: string) {
  return (value: string): number => {
    try {
      return parsePositiveInteger(value, name);
    } catch (error) {
      throw new InvalidArgumentError(
        error instanceof Error ? error.message : String(error),
      );
    }
  };
}

function logLevelOption(value: string): LogLevel {
  try {
    return parseLogLevel(value);
  } catch (error) {
    throw new InvalidArgumentError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function createProgram(
  onResult: (exitCode: number) => void = () => {},
): Command {
  const program = new Command();

  program
    .name('slo-conformance')
    .description(
      'Runs every .slo script in a folder through the interpreter and checks the results',
    )
    .version(VERSION)
    .argument('[folder]', 'Folder to search for test scripts (default: tests/slo)')
    .option('-e, --executable <path>', 'Path to the interpreter under test')
    .option('--check-output', 'Compare stdout with the matching .out file')
    .option('--no-check-output', 'Do not compare stdout, even if the config file asks to')
    .option('-p, --parallel', 'Run scripts concurrently')
    .option('--no-parallel', 'Run scripts one at a time, even if the config file asks otherwise')
    .option(
      '-j, --jobs <n>',
      'Number of concurrent workers with --parallel',
      positiveInteger('jobs'),
    )
    .option(
      '--timeout <ms>',
      'Kill a script that runs longer than this',
      positiveInteger('timeout'),
    )
    .option(
      '--expected-error <files...>',
      'Script file names that are expected to fail',
    )
    .option('--marker <line>', 'Line that marks a script as expected to fail')
    .option('--extension <ext>', 'Extension of test scripts')
    .option('--golden-extension <ext>', 'Extension of expected-output files')
    .option('-c, --config <file>', 'JSON config file (default: slo-conformance.json)')
    .option('-o, --output <file>', 'Output JSON report to file')
    .option('--dry-run', 'Discover tests without running them')
    .option('--verbose', 'Log every case')
    .option('--debug', 'Log interpreter invocations and stack traces')
    .option('-q, --quiet', 'Only log warnings and errors')
    .option('--log-level <level>', 'debug, verbose, info, warning or error', logLevelOption)
    .action(async (folder: string | undefined, options: CliOptions) => {
      onResult(await runCommand(folder, options));
    });

  return program;
}

export async function main(argv: string[]): Promise<number> {
  let exitCode = 0;
  const program = createProgram((code) => {
    exitCode = code;
  });
  await program.parseAsync(argv, { from: 'user' });
  return exitCode;
}

function resolveLogLevel(options: CliOptions): LogLevel {
  if (options.logLevel) return options.logLevel;
  if (options.debug) return 'debug';
  if (options.verbose) return 'verbose';
  if (options.quiet) return 'warning';
  return 'info';
}

export async function runCommand(
  folder: string | undefined,
  options: CliOptions,
): Promise<number> {
  try {
    const config = resolveConfig(loadConfigFile(options.config), {
      executable: options.executable,
      testDir: folder,
      extension: options.extension,
      goldenExtension: options.goldenExtension,
      marker: options.marker,
      expectedErrors: options.expectedError,
      checkOutput: options.checkOutput,
      parallel: options.parallel,
      workers: options.jobs,
      timeoutMs: options.timeout,
    });

    const folderPath = path.resolve(config.testDir);
    if (!fs.existsSync(folderPath)) {
      console.error(`Error: Folder does not exist: ${folderPath}`);
      return 1;
    }

    const logger = new ConsoleLogger({ level: resolveLogLevel(options) });
    const testFiles = discoverTests(folderPath, config.extension);

    console.log(`\nslo-conformance v${VERSION}`);
    console.log(`================`);
    console.log(`Interpreter: ${config.executable}`);
    console.log(`Test folder: ${folderPath}`);
    console.log(`Tests found: ${testFiles.length}`);
    console.log(
      `Mode:        ${config.parallel ? `parallel (${config.workers} workers)` : 'sequential'}${config.checkOutput ? ', checking output' : ''}`,
    );

    if (options.dryRun) {
      await printDryRun(testFiles, folderPath, config);
      return 0;
    }

    if (testFiles.length === 0) {
      console.log('\nNo test files found.');
      if (options.output) {
        writeReport(options.output, {
          totalTests: 0,
          passed: [],
          failed: [],
          interrupted: false,
          results: [],
          durationMs: 0,
        });
      }
      return 0;
    }

    try {
      await new Interpreter({ executable: config.executable }).checkExecutable();
    } catch (error) {
      if (isPreconditionError(error)) {
        console.error(`Error: ${error.message}`);
        return 1;
      }
      throw error;
    }

    const controller = new AbortController();
    const onSigint = () => {
      logger.warning('\nInterrupt received, stopping running scripts...');
      controller.abort();
    };
    process.once('SIGINT', onSigint);

    let report: TestReport;
    try {
      report = await runTests(folderPath, {
        executable: config.executable,
        checkOutput: config.checkOutput,
        parallel: config.parallel,
        workers: config.workers,
        timeoutMs: config.timeoutMs,
        expectedErrors: config.expectedErrors,
        marker: config.marker,
        extension: config.extension,
        goldenExtension: config.goldenExtension,
        signal: controller.signal,
        logger,
      });
    } finally {
      process.removeListener('SIGINT', onSigint);
    }

    printSummary(report, folderPath);

    if (options.output) {
      writeReport(options.output, report);
    }

    if (report.interrupted) {
      return EXIT_INTERRUPTED;
    }
    return report.failed.length > 0 ? 1 : 0;
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }
}

async function printDryRun(
  testFiles: string[],
  folderPath: string,
  config: HarnessConfig,
): Promise<void> {
  console.log('\n[DRY RUN] Would run the following tests:');
  for (let i = 0; i < testFiles.length; i++) {
    const expected = await isExpectedError(testFiles[i], {
      marker: config.marker,
      expectedErrors: config.expectedErrors,
    });
    const name = path.relative(folderPath, testFiles[i]);
    console.log(`  ${i + 1}. ${name}${expected ? ' (expected error)' : ''}`);
  }
}

function printSummary(report: TestReport, folderPath: string): void {
  console.log('\n================');
  console.log('Summary');
  console.log('================');
  console.log(`Total:  ${report.totalTests}`);
  console.log(`Passed: ${report.passed.length}`);
  console.log(`Failed: ${report.failed.length}`);
  if (report.interrupted) {
    console.log(
      `Not run: ${report.totalTests - report.passed.length - report.failed.length}`,
    );
  }
  console.log(`Time:   ${report.durationMs}ms`);

  if (report.failed.length > 0) {
    console.log('\nSome files failed to execute:');
    for (const result of report.results) {
      if (result.status === 'failed') {
        console.log(
          `- ${path.relative(folderPath, result.testFile)} (${result.reason})`,
        );
      }
    }
  } else if (!report.interrupted) {
    console.log('\nAll files executed successfully.');
  }
}

function writeReport(output: string, report: TestReport): void {
  const outputPath = path.resolve(output);
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2));
  console.log(`\nReport written to: ${outputPath}`);
}
