/**
 * vastcheck error types with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error for failures that stop a run before a report exists.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class VastCheckError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'VastCheckError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for JSON output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Why a raw request could not be split into parameters. */
export type RequestParseFailure = 'MissingQuery' | 'EmptyRequest';

/** The request string is structurally unusable for the selected context. */
export class RequestParseError extends VastCheckError {
  readonly reason: RequestParseFailure;

  constructor(reason: RequestParseFailure, message: string, options?: { fix?: string }) {
    super(ExitCode.INVALID_INPUT, message, options);
    this.name = 'RequestParseError';
    this.reason = reason;
  }
}
