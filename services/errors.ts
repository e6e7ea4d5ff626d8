export type CompanionErrorKind =
  | 'DocumentAccess'
  | 'Transport'
  | 'MalformedResponse'
  | 'MissingCredential'
  | 'Configuration'
  | 'SessionBusy';

export abstract class CompanionError extends Error {
  abstract readonly kind: CompanionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class DocumentAccessError extends CompanionError {
  readonly kind = 'DocumentAccess';

  constructor(readonly path: string, cause: unknown) {
    super(`Cannot read document ${path}: ${causeMessage(cause)}`, { cause });
  }
}

/** Network failure, timeout, or an HTTP status of 400 or more. */
export class TransportError extends CompanionError {
  readonly kind = 'Transport';

  constructor(
    message: string,
    readonly status?: number,
    readonly body?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class MalformedResponseError extends CompanionError {
  readonly kind = 'MalformedResponse';

  constructor(message: string, readonly body?: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MissingCredentialError extends CompanionError {
  readonly kind = 'MissingCredential';

  constructor(readonly variable: string) {
    super(`Environment variable ${variable} is not set`);
  }
}

export class ConfigurationError extends CompanionError {
  readonly kind = 'Configuration';
}

export class SessionBusyError extends CompanionError {
  readonly kind = 'SessionBusy';

  constructor() {
    super('A request is already in flight; wait for the answer before sending again');
  }
}

export function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/** Wraps anything thrown inside a send so the surface only ever sees CompanionError. */
export function toCompanionError(error: unknown): CompanionError {
  if (error instanceof CompanionError) return error;
  return new TransportError(`Unexpected failure: ${causeMessage(error)}`, undefined, undefined, { cause: error });
}

export function describeError(error: CompanionError): string {
  const lines = [`ERROR: ${error.kind}: ${error.message}`];
  if ((error instanceof TransportError || error instanceof MalformedResponseError) && error.body) {
    lines.push(error.body);
  }
  return lines.join('\n');
}
