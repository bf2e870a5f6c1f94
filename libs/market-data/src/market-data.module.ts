import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ProviderRegistryService, MARKET_DATA_PROVIDERS } from './provider-registry.service';
import { BinanceMarketDataProvider } from './providers/binance.provider';
import { MaxMarketDataProvider } from './providers/max.provider';

@Module({
  imports: [ConfigModule],
  providers: [
    ProviderRegistryService,
    BinanceMarketDataProvider,
    MaxMarketDataProvider,
    {
      provide: MARKET_DATA_PROVIDERS,
      useFactory: (binance: BinanceMarketDataProvider, max: MaxMarketDataProvider) => [binance, max],
      inject: [BinanceMarketDataProvider, MaxMarketDataProvider],
    },
  ],
  exports: [ProviderRegistryService, MARKET_DATA_PROVIDERS],
})
export class MarketDataModule {}
