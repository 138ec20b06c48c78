import { HttpStatus } from '@nestjs/common';
import type { FieldIssue } from '@rfq-intake/types';

/**
 * Base for every recoverable RFQ failure. Raising one never changes session state;
 * the exception filter turns it into `{ error, message, ... }` with `status`.
 */
export abstract class RfqError extends Error {
  abstract readonly status: HttpStatus;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toResponse(): Record<string, unknown> {
    return { error: this.name, message: this.message };
  }
}

/** A field write the current step does not accept. */
export class ValidationError extends RfqError {
  readonly status = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }

  override toResponse(): Record<string, unknown> {
    return this.field === undefined ? super.toResponse() : { ...super.toResponse(), field: this.field };
  }
}

export class IncompleteStepError extends RfqError {
  readonly status = HttpStatus.UNPROCESSABLE_ENTITY;

  constructor(
    readonly step: string,
    readonly issues: FieldIssue[],
  ) {
    super(`Step "${step}" is incomplete: ${issues.map((issue) => issue.field).join(', ')}`);
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), step: this.step, issues: this.issues };
  }
}

export class CategoryNotFoundError extends RfqError {
  readonly status = HttpStatus.NOT_FOUND;

  constructor(readonly category: string) {
    super(`Unknown option category "${category}"`);
  }
}

export class DraftIncompleteError extends RfqError {
  readonly status = HttpStatus.CONFLICT;
}

export class DraftSubmittedError extends RfqError {
  readonly status = HttpStatus.CONFLICT;

  constructor() {
    super('This RFQ has already been submitted');
  }
}

/** A submission for this session is still being sent. */
export class SessionBusyError extends RfqError {
  readonly status = HttpStatus.CONFLICT;

  constructor() {
    super('A submission is in progress for this session');
  }
}

export class TransportError extends RfqError {
  readonly status = HttpStatus.BAD_GATEWAY;

  constructor(
    readonly reason: string,
    readonly transient: boolean,
    readonly attempts: number,
  ) {
    super(`Email dispatch failed after ${attempts} attempt(s): ${reason}`);
  }

  override toResponse(): Record<string, unknown> {
    return { ...super.toResponse(), reason: this.reason, attempts: this.attempts };
  }
}

/** Startup only: the option workbook could not be turned into a catalog. */
export class CatalogLoadError extends Error {
  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(details.length > 0 ? `${message}: ${details.join('; ')}` : message);
    this.name = 'CatalogLoadError';
  }
}

/** Startup only: the environment does not describe a runnable service. */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
