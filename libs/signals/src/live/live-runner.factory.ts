import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AdvisoryOverlay } from '../advisory';
import { createInstrumentContext } from '../pipeline';
import { RubricConfig } from '../rubric/rubric';
import { rubricFromEnv } from '../rubric/rubric-from-env';
import { LiveRunnerSinks } from '../sinks';
import { CandleSource, LiveRunner, LiveRunnerOptions } from './live-runner';

@Injectable()
export class LiveRunnerFactory {
  private readonly logger = new Logger(LiveRunnerFactory.name);
  private cachedRubric?: Readonly<RubricConfig>;

  constructor(private readonly configService: ConfigService) {}

  /** Rubric from env; a ConfigError here is fatal at startup. */
  get rubric(): Readonly<RubricConfig> {
    if (!this.cachedRubric) {
      this.cachedRubric = rubricFromEnv((key) => this.configService.get(key));
      this.logger.log(
        JSON.stringify({
          event: 'rubric_loaded',
          rubric: this.cachedRubric.name,
          threshold: this.cachedRubric.confidenceThreshold,
          outOfStatePolicy: this.cachedRubric.outOfStatePolicy,
        }),
      );
    }
    return this.cachedRubric;
  }

  runnerOptions(instrument: string): LiveRunnerOptions {
    return {
      instrument,
      interval: this.configService.get<string>('CANDLE_INTERVAL', '1h'),
      pollIntervalMs: this.configService.get<number>('POLL_INTERVAL_SECONDS', 60) * 1000,
      fetchTimeoutMs: this.configService.get<number>('FETCH_TIMEOUT_MS', 10000),
      maxConsecutiveFailures: this.configService.get<number>('MAX_CONSECUTIVE_FAILURES', 5),
      maxBackoffMs: this.configService.get<number>('MAX_BACKOFF_SECONDS', 600) * 1000,
      windowMargin: this.configService.get<number>('WINDOW_MARGIN', 50),
      catchUpLimit: this.configService.get<number>('CATCH_UP_LIMIT', 5),
      sinkTimeoutMs: this.configService.get<number>('SINK_TIMEOUT_MS', 5000),
    };
  }

  create(
    instrument: string,
    provider: CandleSource,
    sinks: LiveRunnerSinks = {},
    advisory?: AdvisoryOverlay,
  ): LiveRunner {
    const context = createInstrumentContext(instrument, this.rubric, { advisory });
    return new LiveRunner(this.runnerOptions(instrument), context, provider, sinks);
  }
}
