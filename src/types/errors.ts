/**
 * Base error for failures raised by scriptmender itself
 */
export class ScriptMenderError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScriptMenderError';
    this.code = code;
  }
}

/**
 * The model backend could not be reached or refused the request.
 * The repair loop never catches this; it aborts the whole run.
 */
export class GatewayUnavailableError extends ScriptMenderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'GATEWAY_UNAVAILABLE', options);
    this.name = 'GatewayUnavailableError';
  }
}

export function isGatewayUnavailableError(error: unknown): error is GatewayUnavailableError {
  return error instanceof GatewayUnavailableError;
}
