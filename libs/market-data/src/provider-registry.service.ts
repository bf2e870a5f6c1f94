import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigError } from '@libs/core';
import { MarketDataProvider } from './interfaces';
import { ProviderSnapshot } from './models';

export const MARKET_DATA_PROVIDERS = Symbol('MARKET_DATA_PROVIDERS');

@Injectable()
export class ProviderRegistryService {
  private readonly logger = new Logger(ProviderRegistryService.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(MARKET_DATA_PROVIDERS)
    private readonly providers: MarketDataProvider[],
  ) {}

  getProvider(name: string): MarketDataProvider {
    const normalized = name.trim().toLowerCase();
    const provider = this.providers.find((candidate) => candidate.provider === normalized);
    if (!provider) {
      const known = this.providers.map((candidate) => candidate.provider).join(', ');
      throw new ConfigError([`MARKET_DATA_PROVIDER: unknown provider "${name}" (expected one of ${known})`]);
    }
    return provider;
  }

  /** The provider selected by MARKET_DATA_PROVIDER. */
  getConfiguredProvider(): MarketDataProvider {
    const name = this.configService.get<string>('MARKET_DATA_PROVIDER', 'binance');
    const provider = this.getProvider(name);
    this.logger.log(JSON.stringify({ event: 'provider_selected', provider: provider.provider }));
    return provider;
  }

  getSnapshots(): ProviderSnapshot[] {
    return this.providers.map((provider) => provider.getSnapshot());
  }
}
