import { BookingIntent } from './scheduling';

/** Partial update proposed by the extractor, after validation. */
export interface ExtractedEntities {
  subject?: string;
  durationText?: string;
  timeText?: string;
  attendees?: string[];
}

export interface EntityExtractor {
  readonly name: string;
  /** Output is untrusted; callers validate it with parseExtractedEntities. */
  extract(text: string, intent: BookingIntent): Promise<unknown>;
}
