/**
 * Error taxonomy for the conversation engine.
 *
 * Every error is scoped to a single request, contact or message; callers decide
 * whether it is fatal for that unit of work. Nothing here aborts work on other contacts.
 */

export type EngineErrorCode =
  | 'unknown_contact'
  | 'invalid_transition'
  | 'generation_failure'
  | 'gateway_error'
  | 'version_conflict'
  | 'configuration_error';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    if (options?.cause) {
      this.cause = options.cause;
    }
  }
}

/** Phone number does not belong to a known service customer. */
export class UnknownContactError extends EngineError {
  readonly phone: string;

  constructor(phone: string) {
    super('unknown_contact', `No known customer for ${phone}`);
    this.name = 'UnknownContactError';
    this.phone = phone;
  }
}

export class InvalidTransitionError extends EngineError {
  readonly from: string;
  readonly trigger: string;
  readonly target?: string;

  constructor(from: string, trigger: string, target?: string) {
    super(
      'invalid_transition',
      target
        ? `Transition ${from} --${trigger}--> ${target} is not allowed`
        : `No transition from ${from} on ${trigger}`,
    );
    this.name = 'InvalidTransitionError';
    this.from = from;
    this.trigger = trigger;
    this.target = target;
  }
}

export type GenerationFailureReason = 'timeout' | 'http' | 'network' | 'empty' | 'auth';

export class GenerationFailureError extends EngineError {
  readonly reason: GenerationFailureReason;

  constructor(reason: GenerationFailureReason, message: string, options?: { cause?: unknown }) {
    super('generation_failure', message, options);
    this.name = 'GenerationFailureError';
    this.reason = reason;
  }
}

export class GatewayError extends EngineError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super('gateway_error', message, options);
    this.name = 'GatewayError';
    this.timedOut = options?.timedOut ?? false;
  }
}

/** Optimistic version check kept failing; the contact is being written elsewhere. */
export class VersionConflictError extends EngineError {
  readonly contactId: string;

  constructor(contactId: string, attempts: number) {
    super('version_conflict', `Contact ${contactId} changed concurrently ${attempts} times`);
    this.name = 'VersionConflictError';
    this.contactId = contactId;
  }
}

export class ConfigurationError extends EngineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('configuration_error', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
