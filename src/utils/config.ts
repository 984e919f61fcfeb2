import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../errors.js';
import { DEFAULT_EXECUTABLE } from '../process/interpreter.js';
import { DEFAULT_EXPECTED_ERROR_MARKER } from './expected-error.js';
import { DEFAULT_GOLDEN_EXTENSION } from './output-check.js';
import { DEFAULT_TEST_EXTENSION } from './test-discovery.js';
import { DEFAULT_WORKERS } from './worker-pool.js';

export const DEFAULT_CONFIG_FILE = 'slo-conformance.json';
export const DEFAULT_TEST_DIR = path.join('tests', 'slo');
export const EXECUTABLE_ENV_VAR = 'SLO_EXECUTABLE';

export interface HarnessConfig {
  executable: string;
  testDir: string;
  extension: string;
  goldenExtension: string;
  marker: string;
  expectedErrors: string[];
  checkOutput: boolean;
  parallel: boolean;
  workers: number;
  timeoutMs?: number;
}

export const DEFAULT_CONFIG: HarnessConfig = {
  executable: DEFAULT_EXECUTABLE,
  testDir: DEFAULT_TEST_DIR,
  extension: DEFAULT_TEST_EXTENSION,
  goldenExtension: DEFAULT_GOLDEN_EXTENSION,
  marker: DEFAULT_EXPECTED_ERROR_MARKER,
  expectedErrors: [],
  checkOutput: false,
  parallel: false,
  workers: DEFAULT_WORKERS,
};

const STRING_KEYS = [
  'executable',
  'testDir',
  'extension',
  'goldenExtension',
  'marker',
] as const;
const BOOLEAN_KEYS = ['checkOutput', 'parallel'] as const;
const KNOWN_KEYS: readonly string[] = [
  ...STRING_KEYS,
  ...BOOLEAN_KEYS,
  'expectedErrors',
  'workers',
  'timeoutMs',
];

export function parseConfigFile(content: string): Partial<HarnessConfig> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content.trim());
  } catch (e) {
    throw new ConfigError(
      `Invalid JSON in config file: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError('Config file must contain a JSON object');
  }

  const obj = parsed as Record<string, unknown>;
  const config: Partial<HarnessConfig> = {};

  for (const key of Object.keys(obj)) {
    if (!KNOWN_KEYS.includes(key)) {
      throw new ConfigError(`Unknown config key: "${key}"`);
    }
  }

  for (const key of STRING_KEYS) {
    const value = obj[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`"${key}" must be a non-empty string`);
    }
    config[key] = value;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = obj[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new ConfigError(`"${key}" must be a boolean`);
    }
    config[key] = value;
  }

  if (obj.expectedErrors !== undefined) {
    const list = obj.expectedErrors;
    if (
      !Array.isArray(list) ||
      !list.every((item): item is string => typeof item === 'string')
    ) {
      throw new ConfigError('"expectedErrors" must be an array of file names');
    }
    config.expectedErrors = list;
  }

  if (obj.workers !== undefined) {
    config.workers = parsePositiveInteger(obj.workers, 'workers');
  }

  if (obj.timeoutMs !== undefined) {
    config.timeoutMs = parsePositiveInteger(obj.timeoutMs, 'timeoutMs');
  }

  return config;
}

export function parsePositiveInteger(value: unknown, name: string): number {
  const number = typeof value === 'string' ? Number(value) : value;
  if (typeof number !== 'number' || !Number.isInteger(number) || number < 1) {
    throw new ConfigError(`"${name}" must be a positive integer, got ${String(value)}`);
  }
  return number;
}

/**
 * Reads the config file if there is one. An explicitly named file must
 * exist; the default one is optional.
 */
export function loadConfigFile(
  configPath: string | undefined,
  cwd: string = process.cwd(),
): Partial<HarnessConfig> {
  const filePath = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(filePath)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file does not exist: ${filePath}`);
    }
    return {};
  }

  return parseConfigFile(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Layers the sources: overrides (CLI flags), then the environment, then
 * the config file, then defaults.
 */
export function resolveConfig(
  fileConfig: Partial<HarnessConfig>,
  overrides: Partial<HarnessConfig>,
  env: NodeJS.ProcessEnv = process.env,
): HarnessConfig {
  const pick = <K extends keyof HarnessConfig>(key: K): HarnessConfig[K] =>
    overrides[key] ?? fileConfig[key] ?? DEFAULT_CONFIG[key];

  return {
    executable:
      overrides.executable ??
      (env[EXECUTABLE_ENV_VAR] || undefined) ??
      fileConfig.executable ??
      DEFAULT_CONFIG.executable,
    testDir: pick('testDir'),
    extension: pick('extension'),
    goldenExtension: pick('goldenExtension'),
    marker: pick('marker'),
    expectedErrors: pick('expectedErrors'),
    checkOutput: pick('checkOutput'),
    parallel: pick('parallel'),
    workers: pick('workers'),
    timeoutMs: overrides.timeoutMs ?? fileConfig.timeoutMs,
  };
}
