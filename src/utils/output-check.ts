import * as fs from 'fs';
import * as path from 'path';
import { decodeUtf8 } from './expected-error.js';

export const DEFAULT_GOLDEN_EXTENSION = '.out';

export type OutputCheck =
  | { status: 'missing'; goldenPath: string }
  | { status: 'match'; goldenPath: string }
  | {
      status: 'mismatch';
      goldenPath: string;
      expected: string;
      actual: string;
      /** 1-based number of the first line that differs. */
      line: number;
    };

export interface OutputCheckOptions {
  goldenExtension?: string;
}

export function goldenPathFor(
  scriptPath: string,
  goldenExtension: string = DEFAULT_GOLDEN_EXTENSION,
): string {
  const parsed = path.parse(scriptPath);
  return path.join(parsed.dir, `${parsed.name}${goldenExtension}`);
}

/**
 * Compares captured stdout with the golden file next to the script.
 * No golden file means there is nothing to verify.
 */
export async function checkOutput(
  scriptPath: string,
  actualOutput: Buffer,
  options: OutputCheckOptions = {},
): Promise<OutputCheck> {
  const goldenPath = goldenPathFor(scriptPath, options.goldenExtension);

  if (!fs.existsSync(goldenPath)) {
    return { status: 'missing', goldenPath };
  }

  const expected = decodeUtf8(
    await fs.promises.readFile(goldenPath),
    goldenPath,
  );
  const actual = tryDecodeUtf8(actualOutput);

  if (actual !== null && actual === expected) {
    return { status: 'match', goldenPath };
  }

  const shown = actual ?? actualOutput.toString('utf-8');
  return {
    status: 'mismatch',
    goldenPath,
    expected,
    actual: shown,
    line: firstDifferingLine(expected, shown),
  };
}

export async function matchesExpected(
  scriptPath: string,
  actualOutput: Buffer,
  options: OutputCheckOptions = {},
): Promise<boolean> {
  const result = await checkOutput(scriptPath, actualOutput, options);
  return result.status !== 'mismatch';
}

// Output that is not valid UTF-8 can never equal a golden file.
function tryDecodeUtf8(bytes: Buffer): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
      bytes,
    );
  } catch {
    return null;
  }
}

export function firstDifferingLine(expected: string, actual: string): number {
  const expectedLines = expected.split('\n');
  const actualLines = actual.split('\n');
  const count = Math.max(expectedLines.length, actualLines.length);

  for (let i = 0; i < count; i++) {
    if (expectedLines[i] !== actualLines[i]) {
      return i + 1;
    }
  }
  return count;
}
