import { Job, Worker } from 'bullmq';
import { CompensationJobData, QUEUE_NAMES, connection } from '../config/queue';
import { CalendarWriter } from '../services/calendar-writer.service';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

export async function processCompensation(
  job: Pick<Job<CompensationJobData>, 'id' | 'data' | 'attemptsMade'>,
  writer: CalendarWriter
): Promise<void> {
  const { sessionId, calendarId, eventId, reason } = job.data;

  logger.info('Processing compensation', {
    jobId: job.id,
    sessionId,
    eventId,
    reason,
    attempt: job.attemptsMade + 1,
  });

  try {
    await writer.cancel(calendarId, eventId);
  } catch (error) {
    logger.error('Compensation failed', { sessionId, eventId, error: describeError(error) });
    throw error;
  }
}

export function startCompensationWorker(writer: CalendarWriter): Worker<CompensationJobData> {
  const worker = new Worker<CompensationJobData>(
    QUEUE_NAMES.CALENDAR_COMPENSATION,
    (job) => processCompensation(job, writer),
    { connection, concurrency: 2 }
  );

  worker.on('failed', (job, error) => {
    logger.error('Compensation job failed', {
      jobId: job?.id,
      attempts: job?.attemptsMade,
      error: error.message,
    });
  });

  return worker;
}
