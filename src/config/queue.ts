import { ConnectionOptions, Queue } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';
import { describeError } from '../utils/errors';

export const QUEUE_NAMES = {
  CALENDAR_COMPENSATION: 'calendar-compensation',
} as const;

export interface CompensationJobData {
  sessionId: string;
  calendarId: string;
  eventId: string;
  reason: string;
}

/** bullmq takes ioredis options, not a URL. */
export function connectionFromUrl(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = parsed.pathname.replace('/', '');
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    db: db ? Number(db) : 0,
    tls: parsed.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}

export const connection = connectionFromUrl(env.REDIS_URL);

let compensationQueue: Queue<CompensationJobData> | null = null;

export function getCompensationQueue(): Queue<CompensationJobData> {
  if (!compensationQueue) {
    compensationQueue = new Queue<CompensationJobData>(QUEUE_NAMES.CALENDAR_COMPENSATION, { connection });
  }
  return compensationQueue;
}

/**
 * Queues a delete for an event written by a booking the user cancelled.
 * The job id is fixed per event so a repeated cancel does not queue twice.
 */
export async function addCompensationJob(data: CompensationJobData): Promise<void> {
  try {
    await getCompensationQueue().add('delete-event', data, {
      jobId: `compensate-${data.calendarId}-${data.eventId}`,
      attempts: 5,
      backoff: { type: 'exponential', delay: 2000 },
      removeOnComplete: 100,
      removeOnFail: 500,
    });
    logger.info('Compensation job queued', { sessionId: data.sessionId, eventId: data.eventId });
  } catch (error) {
    logger.error('Failed to queue compensation job', {
      sessionId: data.sessionId,
      eventId: data.eventId,
      error: describeError(error),
    });
    throw error;
  }
}

export async function closeQueues(): Promise<void> {
  if (compensationQueue) {
    await compensationQueue.close();
    compensationQueue = null;
  }
}
