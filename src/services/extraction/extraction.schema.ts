import { z } from 'zod';
import { ExtractedEntities } from '../../types/extraction';
import { logger } from '../../utils/logger';

const subjectSchema = z.string().trim().min(1).max(200);
const textSchema = z.string().trim().min(1).max(200);
const attendeeSchema = z.string().trim().toLowerCase().email();

const rawSchema = z.record(z.string(), z.unknown());

/**
 * Validates untrusted extractor output field by field. A bad field is
 * dropped on its own; the rest of the update still applies.
 */
export function parseExtractedEntities(raw: unknown): ExtractedEntities {
  const record = rawSchema.safeParse(raw);
  if (!record.success) {
    logger.warn('Extractor returned a non-object payload, ignoring it');
    return {};
  }

  const fields = record.data;
  const entities: ExtractedEntities = {};
  const dropped: string[] = [];

  if (fields.subject !== undefined && fields.subject !== null) {
    const subject = subjectSchema.safeParse(fields.subject);
    if (subject.success) entities.subject = subject.data;
    else dropped.push('subject');
  }

  if (fields.durationText !== undefined && fields.durationText !== null) {
    const duration = textSchema.safeParse(
      typeof fields.durationText === 'number' ? `${fields.durationText} minutes` : fields.durationText
    );
    if (duration.success) entities.durationText = duration.data;
    else dropped.push('durationText');
  }

  if (fields.timeText !== undefined && fields.timeText !== null) {
    const time = textSchema.safeParse(fields.timeText);
    if (time.success) entities.timeText = time.data;
    else dropped.push('timeText');
  }

  if (Array.isArray(fields.attendees)) {
    const attendees: string[] = [];
    for (const candidate of fields.attendees) {
      const attendee = attendeeSchema.safeParse(candidate);
      if (attendee.success) attendees.push(attendee.data);
      else dropped.push('attendees');
    }
    if (attendees.length > 0) entities.attendees = [...new Set(attendees)];
  } else if (fields.attendees !== undefined && fields.attendees !== null) {
    dropped.push('attendees');
  }

  if (dropped.length > 0) {
    logger.debug('Dropped invalid extracted fields', { fields: [...new Set(dropped)] });
  }

  return entities;
}
