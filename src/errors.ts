import type { FailureKind } from './types/migration.js';

/**
 * Base class for every error the pipeline raises on purpose. The `kind` is the
 * classification the retry classifier trusts without inspecting the message.
 */
export class MigrationError extends Error {
  readonly kind: FailureKind;

  constructor(message: string, kind: FailureKind, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class TransientError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transient', options);
  }
}

export class PermanentError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'permanent', options);
  }
}

export class CorruptInputError extends MigrationError {
  constructor(
    message: string,
    readonly sourcePath?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'corrupt-input', options);
  }
}

export class ResourceExhaustedError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'resource-exhausted', options);
  }
}

// Infrastructure failures below are fatal to the run and never classified per unit.

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}

export class StateCorruptionError extends Error {
  constructor(
    message: string,
    readonly filePath: string,
    options?: { cause?: unknown }
  ) {
    super(`${message} (${filePath})`, options);
    this.name = 'StateCorruptionError';
  }
}

export class DiskBudgetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DiskBudgetError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly unitId: string,
    readonly from: string,
    readonly to: string
  ) {
    super(`Illegal transition ${from} -> ${to} for ${unitId}`);
    this.name = 'InvalidTransitionError';
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const toError = (error: unknown): Error => (error instanceof Error ? error : new Error(String(error)));
