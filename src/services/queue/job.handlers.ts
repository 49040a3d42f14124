import type { Job } from 'bullmq';

import type { EventReceiver } from '@services/alert/event.receiver.js';

import { logger } from '@utils/logger.js';

import type { AlertEventJob } from '../../types/index.js';

export function createJobProcessor(receiver: EventReceiver) {
  return async function processJob(job: Job<AlertEventJob>): Promise<void> {
    const receivedAt = new Date(job.data.receivedAt);
    const outcome = await receiver.receive(
      job.data.event,
      Number.isNaN(receivedAt.getTime()) ? new Date() : receivedAt,
    );
    logger.debug('[queue] job processed', { jobId: job.id, outcome });
  };
}
