/**
 * Types for compliance verdicts and evaluation reports.
 */

import type { Metric } from './analysis.types';
import type { TestKind, TestStage } from './dut.types';
import type { FileError, RunWarning } from './measurement.types';

export type VerdictStatus = 'pass' | 'fail' | 'indeterminate';

/** Limits applied to one metric */
export interface Bounds {
  min?: number;
  max?: number;
}

/** Comparison against a single limit */
export interface BoundCheck {
  limit: number;
  /** Room remaining; negative means the limit is violated */
  margin: number;
  satisfied: boolean;
}

export interface DecidedVerdict {
  status: 'pass' | 'fail';
  testKind: TestKind;
  metric: Metric;
  bounds: Bounds;
  /** Margin to the nearer (or violated) bound */
  margin: number;
  checks: {
    min?: BoundCheck;
    max?: BoundCheck;
  };
}

export interface IndeterminateVerdict {
  status: 'indeterminate';
  testKind: TestKind;
  metric: Metric;
  bounds: Bounds | null;
  reason: string;
}

export type Verdict = DecidedVerdict | IndeterminateVerdict;

export interface VerdictCounts {
  pass: number;
  fail: number;
  indeterminate: number;
}

/** Outcome for one enabled test kind */
export type TestKindResult =
  | {
      testKind: TestKind;
      outcome: 'evaluated';
      status: VerdictStatus;
      counts: VerdictCounts;
      verdicts: Verdict[];
    }
  | {
      testKind: TestKind;
      outcome: 'rejected';
      error: { code: string; message: string };
    };

export interface EvaluationReport {
  runId: string;
  dutName: string;
  stage: TestStage;
  createdAt: string;
  metrics: Metric[];
  verdicts: Verdict[];
  testKinds: TestKindResult[];
  overall: VerdictStatus;
  warnings: RunWarning[];
  fileErrors: FileError[];
  /** True when loading was aborted before every file was processed */
  cancelled: boolean;
}

/** Evaluator output for one stage; metrics are supplied by the caller */
export interface ComplianceEvaluation {
  stage: TestStage;
  verdicts: Verdict[];
  testKinds: TestKindResult[];
  overall: VerdictStatus;
}
