import type { DeploymentResult } from './plan.js';
import type { OperationKind } from './operation.js';

export type StepPhase =
  | 'networks'
  | 'pull'
  | 'replace'
  | 'create'
  | 'start'
  | 'verify'
  | 'wait-exit'
  | 'maintenance'
  | 'handoff';

export type StepOutcome = 'started' | 'succeeded' | 'failed' | 'skipped' | 'warning';

export interface ProgressEvent {
  type: 'progress';
  operationId: string;
  environmentId: string;
  stackName: string | null;
  /** Service the event concerns; null for stack-level events. */
  step: string | null;
  phase: StepPhase;
  outcome: StepOutcome;
  message: string;
  sequence: number;
  timestamp: string;
}

export interface OperationCompletedEvent {
  type: 'completed';
  operationId: string;
  kind: OperationKind;
  environmentId: string;
  stackName: string | null;
  result: DeploymentResult;
  sequence: number;
  timestamp: string;
}

export type OperationEvent = ProgressEvent | OperationCompletedEvent;
