export type { CatalogAdapter, ShopIdentity } from './base.adapter';
export { SquareCatalogAdapter } from './square.adapter';
export { CloverCatalogAdapter } from './clover.adapter';

import type { AxiosInstance } from 'axios';
import type { CredentialBroker } from '../services/credentialBroker';
import type { PosType } from '../types/shopContracts';
import type { Clock } from '../utils/cache';
import type { ServiceLogger } from '../utils/logger';
import type { CatalogAdapter } from './base.adapter';
import { CloverCatalogAdapter } from './clover.adapter';
import { SquareCatalogAdapter } from './square.adapter';

export type AdapterRegistry = Record<PosType, CatalogAdapter>;

type AdapterRegistryOptions = {
  broker: CredentialBroker;
  http?: Partial<Record<PosType, AxiosInstance>>;
  logger?: ServiceLogger;
  clock?: Clock;
};

export function createAdapter(posType: PosType, options: AdapterRegistryOptions): CatalogAdapter {
  const { broker, logger, clock } = options;

  switch (posType) {
    case 'square':
      return new SquareCatalogAdapter({ broker, http: options.http?.square, logger, clock });
    case 'clover':
      return new CloverCatalogAdapter({ broker, http: options.http?.clover, logger, clock });
  }
}

export function createAdapterRegistry(options: AdapterRegistryOptions): AdapterRegistry {
  return {
    square: createAdapter('square', options),
    clover: createAdapter('clover', options),
  };
}
