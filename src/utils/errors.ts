export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export type CalendarProviderErrorKind =
  | 'Unauthorized'
  | 'RateLimited'
  | 'NotFound'
  | 'TransientFailure'
  | 'SlotTaken';

/**
 * Raised by calendar adapters. The kind is the only thing the core looks at;
 * provider specifics stay in `cause`.
 */
export class CalendarProviderError extends Error {
  constructor(
    public kind: CalendarProviderErrorKind,
    message: string,
    public cause?: unknown
  ) {
    super(message);
    Object.setPrototypeOf(this, CalendarProviderError.prototype);
  }

  get retryable(): boolean {
    return this.kind === 'RateLimited' || this.kind === 'TransientFailure';
  }
}

export type SchedulingErrorCode =
  | 'AMBIGUOUS_TIME_EXPRESSION'
  | 'AVAILABILITY_SOURCE_UNAVAILABLE'
  | 'NO_AVAILABILITY'
  | 'CALENDAR_WRITE_CONFLICT'
  | 'CALENDAR_UNAVAILABLE'
  | 'SESSION_ABANDONED';

export class SchedulingError extends Error {
  constructor(
    public code: SchedulingErrorCode,
    message: string,
    public recoverable: boolean
  ) {
    super(message);
    Object.setPrototypeOf(this, SchedulingError.prototype);
  }
}

export class AmbiguousTimeExpression extends SchedulingError {
  constructor(public fragment: string, reason?: string) {
    super('AMBIGUOUS_TIME_EXPRESSION', reason ?? `Could not interpret "${fragment}" as a time`, true);
    Object.setPrototypeOf(this, AmbiguousTimeExpression.prototype);
  }
}

export class AvailabilitySourceUnavailable extends SchedulingError {
  constructor(public calendarId: string, public cause?: unknown) {
    super(
      'AVAILABILITY_SOURCE_UNAVAILABLE',
      `Availability for calendar ${calendarId} could not be loaded: ${describeError(cause)}`,
      true
    );
    Object.setPrototypeOf(this, AvailabilitySourceUnavailable.prototype);
  }
}

export class NoAvailability extends SchedulingError {
  constructor(message = 'No free time was found in the booking window') {
    super('NO_AVAILABILITY', message, false);
    Object.setPrototypeOf(this, NoAvailability.prototype);
  }
}

export class CalendarWriteConflict extends SchedulingError {
  constructor(message = 'The slot was taken before the event could be written') {
    super('CALENDAR_WRITE_CONFLICT', message, true);
    Object.setPrototypeOf(this, CalendarWriteConflict.prototype);
  }
}

export class CalendarUnavailable extends SchedulingError {
  constructor(message: string, public cause?: unknown, public retryable: boolean = true) {
    super('CALENDAR_UNAVAILABLE', message, retryable);
    Object.setPrototypeOf(this, CalendarUnavailable.prototype);
  }
}

export class SessionAbandoned extends SchedulingError {
  constructor(message = 'Too many invalid selections') {
    super('SESSION_ABANDONED', message, false);
    Object.setPrototypeOf(this, SessionAbandoned.prototype);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'unknown error';
}

/** HTTP status carried by an SDK or gaxios error, if any. */
export function errorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('status' in error && typeof error.status === 'number') return error.status;
  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }
  if ('code' in error) {
    const code = Number(error.code);
    if (Number.isInteger(code)) return code;
  }
  return undefined;
}
