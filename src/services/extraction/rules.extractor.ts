import * as chrono from 'chrono-node';
import { BookingIntent } from '../../types/scheduling';
import { EntityExtractor, ExtractedEntities } from '../../types/extraction';
import { logger } from '../../utils/logger';

interface Span {
  start: number;
  end: number;
}

const EMAIL_PATTERN = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/gi;

const DURATION_PATTERN =
  /\b(?:for\s+)?(half an hour|\d+h\d{1,2}m?|(?:\d+(?:\.\d+)?\s*(?:h|m)|(?:an?|one|two|three|four|five|six|seven|eight|nine|ten|twelve|fifteen|twenty|thirty|forty[- ]five|forty|sixty|ninety|\d+(?:\.\d+)?)\s*-?\s*(?:hours?|hrs?|minutes?|mins?))(?:\s+and\s+a\s+half)?)\b/gi;

const VAGUE_TIME_PATTERN =
  /\b(?:(?:this|next)\s+weekend|(?:later\s+)?this\s+week|rest\s+of\s+the\s+week|next\s+week|day\s+after\s+tomorrow|tomorrow|today|tonight|morning|afternoon|evening|in\s+\d+\s+(?:days?|weeks?))\b/gi;

const QUOTED_PATTERN = /["“]([^"”]{1,200})["”]/;

const STOP = '(?=\\s+(?:with|on|at|for|tomorrow|today|next|this|in|from|between|about|regarding)\\b|[,.!?;]|$)';
const ABOUT_PATTERN = new RegExp(`\\b(?:about|regarding|re:|to discuss|titled|called)\\s+(.+?)${STOP}`, 'i');
const BOOK_PATTERN = new RegExp(
  `\\b(?:schedule|book|set up|setup|arrange|plan|add|create)\\s+(?:(?:an|a|the|my|our)\\s+)?(.+?)${STOP}`,
  'i'
);
const BOOKING_VERBS = /\b(?:schedule|book|set up|setup|arrange|plan|meet|meeting|call|cancel)\b/i;

const GENERIC_SUBJECTS = new Set([
  'meeting', 'call', 'appointment', 'event', 'session', 'sync', 'chat', 'time', 'slot', 'something', 'it',
]);

const EDGE_FILLER = /^(?:(?:with|and|at|on|for|the|a|an|ok|okay|yes|sure|please)\b\s*)+|(?:\s*\b(?:with|and|at|on|for|please))+$/gi;

function blank(text: string, spans: Span[]): string {
  let result = text;
  for (const span of spans) {
    result = result.slice(0, span.start) + ' '.repeat(span.end - span.start) + result.slice(span.end);
  }
  return result;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Regex and chrono-node extraction. Used when no LLM is configured and as
 * the fallback when the LLM call fails.
 */
export class RuleBasedEntityExtractor implements EntityExtractor {
  readonly name = 'rules';

  constructor(private now: () => Date = () => new Date()) {}

  async extract(text: string, intent: BookingIntent): Promise<ExtractedEntities> {
    return this.extractSync(text, intent);
  }

  extractSync(text: string, intent: BookingIntent): ExtractedEntities {
    const entities: ExtractedEntities = {};
    const spans: Span[] = [];

    const attendees = [...text.matchAll(EMAIL_PATTERN)].map((m) => {
      spans.push({ start: m.index ?? 0, end: (m.index ?? 0) + m[0].length });
      return m[0].toLowerCase();
    });
    if (attendees.length > 0) entities.attendees = [...new Set(attendees)];

    const duration = this.findDuration(text);
    if (duration) {
      entities.durationText = duration.text;
      spans.push(duration.span);
    }

    const withoutDuration = blank(text, spans);
    const timeSpan = this.findTimeSpan(withoutDuration);
    if (timeSpan) {
      entities.timeText = collapse(withoutDuration.slice(timeSpan.start, timeSpan.end));
      spans.push(timeSpan);
    }

    const remainder = blank(text, spans);
    const subject = this.findSubject(text, remainder, intent);
    if (subject) entities.subject = subject;

    if (!entities.durationText && intent.subject && !intent.durationMinutes && /^\s*\d{1,4}\s*$/.test(text)) {
      entities.durationText = `${text.trim()} minutes`;
    }

    logger.debug('Rule-based extraction', { fields: Object.keys(entities) });
    return entities;
  }

  private findDuration(text: string): { text: string; span: Span } | null {
    for (const match of text.matchAll(DURATION_PATTERN)) {
      const index = match.index ?? 0;
      // "in 20 minutes" is a time, not a length.
      if (/\bin\s+$/i.test(text.slice(0, index))) continue;
      return { text: match[1], span: { start: index, end: index + match[0].length } };
    }
    return null;
  }

  private findTimeSpan(text: string): Span | null {
    const spans: Span[] = chrono
      .parse(text, this.now(), { forwardDate: true })
      .map((r) => ({ start: r.index, end: r.index + r.text.length }));

    for (const match of text.matchAll(VAGUE_TIME_PATTERN)) {
      const index = match.index ?? 0;
      spans.push({ start: index, end: index + match[0].length });
    }

    if (spans.length === 0) return null;
    return {
      start: Math.min(...spans.map((s) => s.start)),
      end: Math.max(...spans.map((s) => s.end)),
    };
  }

  private findSubject(text: string, remainder: string, intent: BookingIntent): string | null {
    const quoted = text.match(QUOTED_PATTERN);
    if (quoted) return collapse(quoted[1]);

    for (const pattern of [ABOUT_PATTERN, BOOK_PATTERN]) {
      const match = remainder.match(pattern);
      const candidate = match ? collapse(match[1]) : '';
      if (candidate && !GENERIC_SUBJECTS.has(candidate.toLowerCase())) {
        return candidate;
      }
    }

    // A plain answer to "What is the meeting about?"
    if (!intent.subject && !BOOKING_VERBS.test(text)) {
      const answer = collapse(collapse(remainder).replace(EDGE_FILLER, ''));
      if (/[a-z]{2,}/i.test(answer) && !GENERIC_SUBJECTS.has(answer.toLowerCase())) {
        return answer.slice(0, 200);
      }
    }

    return null;
  }
}
