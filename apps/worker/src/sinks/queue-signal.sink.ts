import { InjectQueue } from '@nestjs/bullmq';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Queue } from 'bullmq';
import { SIGNALS_QUEUE_NAME } from '@libs/core';
import { Signal, SignalSink, SignalSinkContext } from '@libs/signals';
import { enqueueSignalAccepted } from '../queues/signal-accepted.job';

@Injectable()
export class QueueSignalSink implements SignalSink {
  private readonly logger = new Logger(QueueSignalSink.name);

  constructor(
    private readonly configService: ConfigService,
    @InjectQueue(SIGNALS_QUEUE_NAME)
    private readonly signalsQueue: Pick<Queue, 'add'>,
  ) {}

  async onSignalAccepted(signal: Signal, context: SignalSinkContext): Promise<void> {
    await enqueueSignalAccepted(this.signalsQueue, signal, context.trade, {
      attempts: this.configService.get<number>('SIGNALS_JOB_ATTEMPTS', 5),
      backoffDelayMs: this.configService.get<number>('SIGNALS_JOB_BACKOFF_DELAY_MS', 3000),
    });
    this.logger.log(
      JSON.stringify({
        event: 'signal_enqueued',
        instrument: context.instrument,
        direction: signal.direction,
        sequence: context.trade.sequence,
        confidenceScore: signal.confidenceScore,
      }),
    );
  }
}
