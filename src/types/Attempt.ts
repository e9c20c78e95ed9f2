import { FailureClassification } from './Classification.js';

export type AttemptMode = 'Generated' | 'Auto-Debugged';

export type AttemptAction =
  | 'succeeded'
  | 'installed'
  | 'install-failed-repaired'
  | 'repaired'
  | 'exhausted';

export interface AttemptRecord {
  index: number;
  mode: AttemptMode;
  action: AttemptAction;
  classification?: FailureClassification;
  durationMs: number;
}

export interface SucceededOutcome {
  status: 'succeeded';
  task: string;
  attempt: number;  // 0-based index of the attempt that ran cleanly
  scriptPath: string;
  stdout: string;
  attempts: AttemptRecord[];
}

export interface ExhaustedOutcome {
  status: 'exhausted';
  task: string;
  attemptsUsed: number;
  scriptPath: string;
  diagnostic: string;
  attempts: AttemptRecord[];
}

export type RepairOutcome = SucceededOutcome | ExhaustedOutcome;

export function attemptModeFor(index: number): AttemptMode {
  return index > 0 ? 'Auto-Debugged' : 'Generated';
}
