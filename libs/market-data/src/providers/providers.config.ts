import { ConfigService } from '@nestjs/config';
import { MarketDataProviderName } from '../models';

export interface ProviderEndpoints {
  rest: string;
}

const DEFAULT_ENDPOINTS: Record<MarketDataProviderName, ProviderEndpoints> = {
  binance: { rest: 'https://data-api.binance.vision' },
  max: { rest: 'https://max-api.maicoin.com' },
};

export const getProviderEndpoints = (
  configService: ConfigService,
  provider: MarketDataProviderName,
): ProviderEndpoints => {
  const restOverride = configService.get<string>(`${provider.toUpperCase()}_REST_URL`);
  return { rest: restOverride || DEFAULT_ENDPOINTS[provider].rest };
};
