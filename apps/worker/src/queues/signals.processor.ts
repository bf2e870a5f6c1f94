import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import {
  RedisService,
  SIGNAL_ACCEPTED_JOB,
  SIGNALS_QUEUE_CONCURRENCY,
  SIGNALS_QUEUE_NAME,
} from '@libs/core';
import { SignalAcceptedJobData, signalAcceptedJobSchema } from './signal-accepted.job';

export type SignalJob = Pick<Job, 'name' | 'id' | 'data' | 'attemptsMade'>;

export const lastSignalKey = (instrument: string): string => `signals:last:${instrument.toUpperCase()}`;

/**
 * Consumer side of the accepted-signal hand-off. Downstream delivery (chat, dashboards)
 * reads `signals:last:<instrument>`; the trade history itself is written by the runner.
 */
@Injectable()
@Processor(SIGNALS_QUEUE_NAME, { concurrency: SIGNALS_QUEUE_CONCURRENCY })
export class SignalsProcessor extends WorkerHost {
  private readonly logger = new Logger(SignalsProcessor.name);

  constructor(
    @Inject(RedisService)
    private readonly redisService: Pick<RedisService, 'set'>,
  ) {
    super();
  }

  async process(job: SignalJob): Promise<void> {
    switch (job.name) {
      case SIGNAL_ACCEPTED_JOB:
        await this.handleSignalAccepted(job);
        return;

      default:
        this.logger.warn(`Unknown job name "${job.name}" (id=${job.id ?? 'unknown'})`);
        return;
    }
  }

  private async handleSignalAccepted(job: SignalJob): Promise<void> {
    const parsed = signalAcceptedJobSchema.safeParse(job.data);
    if (!parsed.success) {
      // Retrying cannot fix a malformed payload.
      this.logger.error(
        JSON.stringify({
          event: 'signal_job_invalid',
          jobId: job.id ?? null,
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        }),
      );
      return;
    }

    const { signal, trade }: SignalAcceptedJobData = parsed.data;
    await this.redisService.set(
      lastSignalKey(signal.instrument),
      JSON.stringify({ ...signal, sequence: trade.sequence, realizedPnl: trade.realizedPnl }),
    );

    this.logger.log(
      JSON.stringify({
        event: 'signal_delivered',
        jobId: job.id ?? null,
        instrument: signal.instrument,
        direction: signal.direction,
        price: signal.price,
        confidenceScore: signal.confidenceScore,
        sequence: trade.sequence,
        realizedPnl: trade.realizedPnl,
        attempt: job.attemptsMade + 1,
      }),
    );
  }
}
