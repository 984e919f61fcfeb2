import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { runAll, runTests } from '../../src/lib.js';

// /bin/sh plays the interpreter: scripts are shell, the marker is a comment.
const SHELL = '/bin/sh';
const MARKER = '# slo: exp error';

describe('runTests', () => {
  let tempDir: string;

  const write = (name: string, content: string) => {
    const file = path.join(tempDir, name);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
  };

  const sorted = (paths: string[]) => [...paths].sort();

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'slo-runner-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeSuite() {
    return {
      ok: write('ok.slo', "printf '42\\n'\n"),
      okOut: write('ok.out', '42\n'),
      wrong: write('nested/wrong.slo', "printf '43\\n'\n"),
      wrongOut: write('nested/wrong.out', '42\n'),
      bad: write('bad.slo', `${MARKER}\nexit 1\n`),
      silent: write('nested/deeper/silent.slo', `${MARKER}\necho fine\n`),
      crash: write('crash.slo', 'echo boom >&2\nexit 2\n'),
      plain: write('plain.slo', 'echo no golden file\n'),
      ignored: write('notes.txt', 'exit 1\n'),
    };
  }

  it('partitions every discovered script into passed or failed', async () => {
    const suite = writeSuite();

    const report = await runTests(tempDir, { executable: SHELL, checkOutput: true });

    expect(report.totalTests).toBe(6);
    expect(report.interrupted).toBe(false);
    expect(sorted(report.passed)).toEqual(
      sorted([suite.ok, suite.bad, suite.plain]),
    );
    expect(sorted(report.failed)).toEqual(
      sorted([suite.wrong, suite.silent, suite.crash]),
    );
  });

  it('records why each case failed', async () => {
    const suite = writeSuite();

    const report = await runTests(tempDir, { executable: SHELL, checkOutput: true });
    const reasons = Object.fromEntries(
      report.results.map((r) => [path.basename(r.testFile), r.reason]),
    );

    expect(reasons).toEqual({
      'ok.slo': 'output-match',
      'wrong.slo': 'output-mismatch',
      'bad.slo': 'expected-error',
      'silent.slo': 'unexpected-success',
      'crash.slo': 'exit-failure',
      'plain.slo': 'success',
    });
    expect(report.results.map((r) => r.testFile)).toContain(suite.ok);
  });

  it('skips golden files unless output checking is on', async () => {
    const suite = writeSuite();

    const [passed, failed] = await runAll(tempDir, { executable: SHELL });

    expect(passed).toContain(suite.wrong);
    expect(sorted(failed)).toEqual(sorted([suite.silent, suite.crash]));
  });

  it('gives the same partition in parallel mode', async () => {
    writeSuite();

    const sequential = await runTests(tempDir, {
      executable: SHELL,
      checkOutput: true,
    });
    const parallel = await runTests(tempDir, {
      executable: SHELL,
      checkOutput: true,
      parallel: true,
      workers: 3,
    });

    expect(sorted(parallel.passed)).toEqual(sorted(sequential.passed));
    expect(sorted(parallel.failed)).toEqual(sorted(sequential.failed));
    expect(parallel.results.map((r) => r.testFile)).toEqual(
      sequential.results.map((r) => r.testFile),
    );
  });

  it('fails every case when the interpreter is missing', async () => {
    const suite = writeSuite();
    const missing = path.join(tempDir, 'build', 'cslo');

    const report = await runTests(tempDir, { executable: missing });

    expect(report.passed).toEqual([]);
    expect(sorted(report.failed)).toEqual(
      sorted([
        suite.ok,
        suite.wrong,
        suite.bad,
        suite.silent,
        suite.crash,
        suite.plain,
      ]),
    );
    expect(report.results.every((r) => r.reason === 'precondition')).toBe(true);
  });

  it('honours the file-name allow-list', async () => {
    const exit = write('exit.slo', 'exit 4\n');

    const [passed, failed] = await runAll(tempDir, {
      executable: SHELL,
      expectedErrors: ['exit.slo'],
    });

    expect(passed).toEqual([exit]);
    expect(failed).toEqual([]);
  });

  it('returns partial results when interrupted in sequential mode', async () => {
    const first = write('a.slo', 'true\n');
    write('b.slo', 'exec sleep 10\n');
    write('c.slo', 'true\n');
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);

    const report = await runTests(tempDir, {
      executable: SHELL,
      signal: controller.signal,
    });

    expect(report.interrupted).toBe(true);
    expect(report.passed).toEqual([first]);
    expect(report.failed).toEqual([]);
    expect(report.results.map((r) => r.status)).toEqual(['passed', 'interrupted']);
  });

  it('stops dispatching when interrupted in parallel mode', async () => {
    write('a.slo', 'exec sleep 10\n');
    write('b.slo', 'exec sleep 10\n');
    write('c.slo', 'true\n');
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);

    const report = await runTests(tempDir, {
      executable: SHELL,
      parallel: true,
      workers: 2,
      signal: controller.signal,
    });

    expect(report.interrupted).toBe(true);
    expect(report.passed).toEqual([]);
    expect(report.failed).toEqual([]);
    expect(report.results.map((r) => r.status)).toEqual([
      'interrupted',
      'interrupted',
    ]);
  });

  it('does not return before an interrupted script has exited', async () => {
    const pidFile = path.join(tempDir, 'pid');
    write(
      'stubborn.slo',
      `trap '' TERM\necho $$ > '${pidFile}'\nwhile :; do sleep 0.1; done\n`,
    );
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 300);

    const report = await runTests(tempDir, {
      executable: SHELL,
      signal: controller.signal,
    });

    expect(report.interrupted).toBe(true);
    expect(report.results.map((r) => r.status)).toEqual(['interrupted']);
    const pid = Number(fs.readFileSync(pidFile, 'utf-8').trim());
    expect(() => process.kill(pid, 0)).toThrow();
  });

  it('runs nothing when the signal is already aborted', async () => {
    write('a.slo', 'true\n');
    const controller = new AbortController();
    controller.abort();

    const report = await runTests(tempDir, {
      executable: SHELL,
      signal: controller.signal,
    });

    expect(report.interrupted).toBe(true);
    expect(report.results).toEqual([]);
  });

  it('returns an empty report for a folder without scripts', async () => {
    const report = await runTests(tempDir, { executable: SHELL });

    expect(report).toMatchObject({
      totalTests: 0,
      passed: [],
      failed: [],
      interrupted: false,
      results: [],
    });
  });
});
