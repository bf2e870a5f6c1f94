export * from './interfaces';
export * from './models';
export * from './market-data.module';
export * from './provider-registry.service';
export * from './providers/base-rest.provider';
export * from './providers/binance.provider';
export * from './providers/max.provider';
export * from './providers/interval-mapper';
export * from './providers/providers.config';
export * from './utils/http.util';
export * from './utils/retry.util';
export * from './utils/timeout.util';
