import * as fs from 'fs/promises';
import * as path from 'path';
import { ScriptDecodeError } from '../errors.js';

export const DEFAULT_EXPECTED_ERROR_MARKER = '# slo: exp error';

/** Number of leading lines searched for the marker. */
export const EXPECTED_ERROR_WINDOW = 5;

export interface ExpectedErrorOptions {
  marker?: string;
  /** Base names of scripts that are expected to fail regardless of content. */
  expectedErrors?: readonly string[];
}

export function hasExpectedErrorMarker(
  content: string,
  marker: string = DEFAULT_EXPECTED_ERROR_MARKER,
): boolean {
  const lines = content.split('\n', EXPECTED_ERROR_WINDOW);
  return lines.some((line) => stripCarriageReturn(line) === marker);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

export function decodeUtf8(bytes: Uint8Array, filePath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(
      bytes,
    );
  } catch {
    throw new ScriptDecodeError(filePath);
  }
}

/**
 * Whether the script at `scriptPath` is supposed to make the interpreter
 * exit with an error, either through the in-file marker or by being listed
 * in `expectedErrors`.
 */
export async function isExpectedError(
  scriptPath: string,
  options: ExpectedErrorOptions = {},
): Promise<boolean> {
  const content = decodeUtf8(await fs.readFile(scriptPath), scriptPath);

  if (options.expectedErrors?.includes(path.basename(scriptPath))) {
    return true;
  }

  return hasExpectedErrorMarker(
    content,
    options.marker ?? DEFAULT_EXPECTED_ERROR_MARKER,
  );
}
