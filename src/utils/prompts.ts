import { DateTime } from 'luxon';
import { BookingIntent } from '../types/scheduling';

export const EXTRACTION_TOOL_NAME = 'record_booking_details';

export const EXTRACTION_TOOL_DESCRIPTION =
  'Record the meeting details the user mentioned in their latest message.';

/** JSON schema shared by the tool-use and function-calling extractors. */
export const EXTRACTION_PARAMETERS = {
  type: 'object',
  properties: {
    subject: {
      type: 'string',
      description: 'What the meeting is about, as a short title.',
    },
    durationText: {
      type: 'string',
      description: 'How long the meeting lasts, copied as the user said it (e.g. "45 minutes").',
    },
    timeText: {
      type: 'string',
      description:
        'When the meeting should happen, copied as the user said it (e.g. "next Friday afternoon"). Do not convert it to a date.',
    },
    attendees: {
      type: 'array',
      items: { type: 'string' },
      description: 'E-mail addresses of people to invite.',
    },
  },
  required: [],
} as const;

const BASE_PROMPT = `You extract meeting booking details from chat messages.

RULES:
- Only record details present in the latest user message
- Copy time and duration phrases verbatim; never resolve them to dates
- Leave a field out when the message does not mention it
- Attendees must be e-mail addresses
- Always answer by calling the ${EXTRACTION_TOOL_NAME} tool`;

export interface PromptContext {
  timezone: string;
  now: Date;
}

export function buildExtractionPrompt(intent: BookingIntent, context: PromptContext): string {
  const parts: string[] = [BASE_PROMPT];

  const now = DateTime.fromJSDate(context.now, { zone: context.timezone });
  parts.push(`\nCurrent time for the user: ${now.toFormat('cccc, LLLL d yyyy, h:mm a')} (${context.timezone}).`);

  const known: string[] = [];
  if (intent.subject) known.push(`Subject: ${intent.subject}`);
  if (intent.durationMinutes) known.push(`Duration: ${intent.durationMinutes} minutes`);
  if (intent.timeText) known.push(`Requested time: ${intent.timeText}`);
  if (intent.attendees.length > 0) known.push(`Attendees: ${intent.attendees.join(', ')}`);

  if (known.length > 0) {
    parts.push(`\nALREADY KNOWN (only record changes):\n${known.join('\n')}`);
  } else {
    parts.push('\nNothing is known about this meeting yet.');
  }

  return parts.join('\n');
}
