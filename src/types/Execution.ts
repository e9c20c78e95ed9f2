export interface ExecutionResult {
  success: boolean;
  exitCode: number | null;
  signal: string | null;
  stdout: string;  // Empty when stdout was inherited live
  stderr: string;
  diagnostic: string;  // stderr, falling back to stdout; empty on success
  durationMs: number;
  timedOut: boolean;
}

export const UNKNOWN_ERROR_DIAGNOSTIC = 'Unknown Error';

/**
 * Pick the text used to diagnose a failed run
 */
export function pickDiagnostic(stderr: string, stdout: string): string {
  if (stderr.trim().length > 0) return stderr;
  if (stdout.trim().length > 0) return stdout;
  return UNKNOWN_ERROR_DIAGNOSTIC;
}
