/** Half-open interval [start, end) as ISO-8601 UTC instants. */
export interface TimeInterval {
  start: string;
  end: string;
}

export interface BusyInterval {
  interval: TimeInterval;
  /** Calendar the busy time was read from. */
  source: string;
  /** Provider event behind the busy time, when the provider exposes it. */
  eventId?: string;
}

export interface BookingIntent {
  subject?: string;
  durationMinutes?: number;
  attendees: string[];
  /** Last time expression the user gave, kept so candidates can be rebuilt when the duration changes. */
  timeText?: string;
  candidateIntervals: TimeInterval[];
  /** Vague time text ("sometime next week") that still needs expanding. */
  constraintDescription?: string;
}

export type SessionState =
  | 'COLLECTING'
  | 'RESOLVING'
  | 'AWAITING_DISAMBIGUATION'
  | 'CONFIRMED'
  | 'FAILED';

export const TERMINAL_STATES: readonly SessionState[] = ['CONFIRMED', 'FAILED'];

export interface BookingResult {
  eventId: string;
  finalInterval: TimeInterval;
  status: 'CREATED' | 'UPDATED';
}

export type ResolutionOutcome =
  | { kind: 'accepted'; interval: TimeInterval }
  | { kind: 'needs_disambiguation'; alternatives: TimeInterval[] }
  | { kind: 'no_availability' };
