import type { ProviderError } from '@libs/core';
import { DetectorState, Direction, IndicatorFrame, OpenPosition, Signal, TradeRecord } from './types';

export interface InapplicableCandidate {
  direction: Direction;
  timestamp: number;
  state: DetectorState;
}

export interface TickSummary {
  instrument: string;
  tickAt: number;
  candlesProcessed: number;
  /** Latest defined frame after the tick, null while warming up. */
  indicators: IndicatorFrame | null;
  acceptedSignals: Signal[];
  rejectedCandidates: Signal[];
  /** Only populated under the `report` out-of-state policy. */
  inapplicableCandidates: InapplicableCandidate[];
  ledgerState: DetectorState;
  openPosition: OpenPosition | null;
  consecutiveFailures: number;
  skipped?: string;
}

export interface SignalSinkContext {
  instrument: string;
  trade: TradeRecord;
}

export interface SignalSink {
  onSignalAccepted(signal: Signal, context: SignalSinkContext): Promise<void> | void;
}

export interface TradeRecordSink {
  append(record: TradeRecord): Promise<void>;
  list(instrument: string): Promise<TradeRecord[]>;
}

export interface ObservabilitySink {
  onTickSummary(summary: TickSummary): Promise<void> | void;
  onProviderError?(error: ProviderError): Promise<void> | void;
  /** The runner stopped itself because of an unrecoverable error. */
  onRunnerStopped?(instrument: string, error: Error): Promise<void> | void;
}

export interface LiveRunnerSinks {
  signals?: SignalSink;
  trades?: TradeRecordSink;
  observability?: ObservabilitySink;
}
