import { Queue } from 'bullmq';
import { z } from 'zod';
import { SIGNAL_ACCEPTED_JOB } from '@libs/core';
import { Signal, TradeRecord } from '@libs/signals';

const direction = z.enum(['buy', 'sell']);

const componentSchema = z.object({
  passed: z.boolean(),
  points: z.number(),
  weight: z.number(),
  // NaN becomes null in JSON
  value: z.number().nullable(),
});

export const signalAcceptedJobSchema = z.object({
  signal: z.object({
    instrument: z.string().min(1),
    timestamp: z.number(),
    direction,
    price: z.number().positive(),
    confidenceScore: z.number().min(0).max(100),
    baseScore: z.number(),
    advisoryAdjustment: z.number(),
    accepted: z.literal(true),
    breakdown: z.object({
      volume: componentSchema,
      volumeTrend: componentSchema,
      rsi: componentSchema,
      bollinger: componentSchema,
      obv: componentSchema,
      trend: componentSchema,
    }),
  }),
  trade: z.object({
    instrument: z.string().min(1),
    sequence: z.number().int().positive(),
    timestamp: z.number(),
    direction,
    price: z.number().positive(),
    quantity: z.number().positive(),
    confidenceScore: z.number(),
    realizedPnl: z.number().nullable(),
  }),
});

export type SignalAcceptedJobData = z.infer<typeof signalAcceptedJobSchema>;

export interface SignalAcceptedJobOptions {
  attempts: number;
  backoffDelayMs: number;
}

/** Job id is stable per trade leg, so a retried tick cannot enqueue twice. */
export const signalAcceptedJobId = (trade: TradeRecord): string =>
  `${trade.instrument}-${trade.sequence}-${trade.direction}`;

export const enqueueSignalAccepted = async (
  queue: Pick<Queue, 'add'>,
  signal: Signal,
  trade: TradeRecord,
  options: SignalAcceptedJobOptions,
): Promise<void> => {
  const payload = signalAcceptedJobSchema.parse(JSON.parse(JSON.stringify({ signal, trade })));
  await queue.add(SIGNAL_ACCEPTED_JOB, payload, {
    jobId: signalAcceptedJobId(trade),
    attempts: options.attempts,
    backoff: { type: 'exponential', delay: options.backoffDelayMs },
    removeOnComplete: true,
    removeOnFail: { count: 50 },
  });
};
