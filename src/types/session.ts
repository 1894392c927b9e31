import { BookingIntent, BookingResult, SessionState, TimeInterval } from './scheduling';

export interface SessionRecord {
  id: string;
  /** Changes every time a new intent starts; feeds the idempotency key. */
  intentId: string;
  state: SessionState;
  intent: BookingIntent;
  calendarId: string;
  timezone: string;
  alternatives: TimeInterval[];
  invalidSelections: number;
  conflictRetries: number;
  /** Set once the writer has been called for this intent. */
  writeIssued: boolean;
  existingEventId?: string;
  result?: BookingResult;
  failureReason?: string;
  createdAt: string;
  updatedAt: string;
}

export type TurnInput = string | number;

export type TurnOutcome =
  | { question: string }
  | { result: BookingResult }
  | { failure: string };

export interface SessionStore {
  get(sessionId: string): Promise<SessionRecord | null>;
  set(record: SessionRecord): Promise<void>;
  delete(sessionId: string): Promise<void>;
}
