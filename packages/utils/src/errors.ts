/**
 * Error taxonomy shared by every workspace.
 *
 * Domain packages subclass ComplianceError; the transport layer only needs
 * toErrorPayload to turn any thrown value into a response body.
 */

export type ErrorDetails = Record<string, unknown>;

export interface ErrorPayload {
  statusCode: number;
  body: {
    error: string;
    message: string;
    details?: ErrorDetails;
    requestId?: string;
  };
}

export abstract class ComplianceError extends Error {
  abstract readonly code: string;
  abstract readonly httpStatus: number;
  readonly details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }

  toPayload(requestId?: string): ErrorPayload {
    return {
      statusCode: this.httpStatus,
      body: {
        error: this.code,
        message: this.message,
        details: this.details,
        requestId,
      },
    };
  }
}

/**
 * Invalid or incomplete process settings.
 */
export class ConfigurationError extends ComplianceError {
  readonly code = 'configuration_error';
  readonly httpStatus = 500;
}

/**
 * Safely extract a message from any thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

export function toErrorPayload(error: unknown, requestId?: string): ErrorPayload {
  if (error instanceof ComplianceError) {
    return error.toPayload(requestId);
  }
  return {
    statusCode: 500,
    body: {
      error: 'internal_error',
      message: getErrorMessage(error),
      requestId,
    },
  };
}
