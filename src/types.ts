export type TestStatus = 'passed' | 'failed' | 'interrupted';

export type PassReason = 'expected-error' | 'output-match' | 'success';

export type FailureReason =
  | 'precondition'
  | 'exit-failure'
  | 'unexpected-success'
  | 'output-mismatch'
  | 'unreadable-script';

export interface TestResult {
  testFile: string;
  status: TestStatus;
  reason?: PassReason | FailureReason;
  error?: string;
  durationMs: number;
}

export interface TestReport {
  totalTests: number;
  /** Paths of cases that passed, in discovery order. */
  passed: string[];
  failed: string[];
  interrupted: boolean;
  results: TestResult[];
  durationMs: number;
}

export interface RunOptions {
  executable?: string;
  checkOutput?: boolean;
  parallel?: boolean;
  workers?: number;
  timeoutMs?: number;
  expectedErrors?: readonly string[];
  marker?: string;
  extension?: string;
  goldenExtension?: string;
}
