import type { AxiosInstance } from 'axios';
import { providerConfig } from '../config/menu';
import type { CredentialBroker } from '../services/credentialBroker';
import type { CloverCredentials } from '../types/credentialContracts';
import {
  CloverCategoriesResponseSchema,
  CloverErrorResponseSchema,
  CloverItemsResponseSchema,
  CloverModifierGroupsResponseSchema,
  CloverOpeningHoursResponseSchema,
  CloverOrderResponseSchema,
} from '../types/cloverContracts';
import type { BusinessHoursInfo, MenuCategory } from '../types/menuContracts';
import type { OrderStatusValue } from '../types/orderStatus';
import { buildBusinessHoursInfo } from '../utils/businessHours';
import { systemClock } from '../utils/cache';
import type { Clock } from '../utils/cache';
import { createHttpClient } from '../utils/http';
import { menuLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';
import type { CatalogAdapter, ShopIdentity } from './base.adapter';
import { buildCloverMenu, buildCloverWeeklyHours, mapCloverOrderStatus } from './cloverCatalog';
import { encodePathSegment, sendProviderRequest, withCredentialRetry } from './providerClient';
import type { ProviderRequest } from './providerClient';

const extractCloverError = (body: unknown): string | null => {
  const parsed = CloverErrorResponseSchema.safeParse(body);
  return parsed.success ? parsed.data.message : null;
};

type CloverAdapterOptions = {
  broker: CredentialBroker;
  http?: AxiosInstance;
  logger?: ServiceLogger;
  clock?: Clock;
};

export class CloverCatalogAdapter implements CatalogAdapter {
  readonly provider = 'clover' as const;

  private readonly broker: CredentialBroker;
  private readonly http: AxiosInstance;
  private readonly log: ServiceLogger;
  private readonly clock: Clock;

  constructor(options: CloverAdapterOptions) {
    this.broker = options.broker;
    this.http =
      options.http ??
      createHttpClient({ baseURL: providerConfig.cloverBaseUrl, timeoutMs: providerConfig.timeoutMs });
    this.log = options.logger ?? menuLogger;
    this.clock = options.clock ?? systemClock;
  }

  async fetchMenu(shop: ShopIdentity): Promise<MenuCategory[]> {
    const [categories, items, modifierGroups] = await this.withCredentials(
      shop.merchantId,
      (credentials) =>
        Promise.all([
          this.request(credentials, {
            label: 'Clover categories',
            path: 'categories',
            schema: CloverCategoriesResponseSchema,
          }),
          this.request(credentials, {
            label: 'Clover items',
            path: 'items',
            params: { expand: 'categories,modifierGroups' },
            schema: CloverItemsResponseSchema,
          }),
          this.request(credentials, {
            label: 'Clover modifier groups',
            path: 'modifier_groups',
            params: { expand: 'modifiers' },
            schema: CloverModifierGroupsResponseSchema,
          }),
        ]),
    );

    const menu = buildCloverMenu(
      categories.elements ?? [],
      items.elements ?? [],
      modifierGroups.elements ?? [],
    );
    this.log.debug(
      { shopId: shop.id, items: items.elements?.length ?? 0, categories: menu.length },
      'clover inventory normalized',
    );
    return menu;
  }

  async fetchOrderStatus(orderId: string, merchantId: string): Promise<OrderStatusValue> {
    const order = await this.withCredentials(merchantId, (credentials) =>
      this.request(credentials, {
        label: 'Clover order lookup',
        path: `orders/${encodePathSegment(orderId)}`,
        schema: CloverOrderResponseSchema,
      }),
    );
    return mapCloverOrderStatus(order);
  }

  async fetchBusinessHours(shop: ShopIdentity): Promise<BusinessHoursInfo | null> {
    const response = await this.withCredentials(shop.merchantId, (credentials) =>
      this.request(credentials, {
        label: 'Clover opening hours',
        path: 'opening_hours',
        schema: CloverOpeningHoursResponseSchema,
      }),
    );

    const weeklyHours = buildCloverWeeklyHours(response.elements ?? []);
    return weeklyHours ? buildBusinessHoursInfo(weeklyHours, new Date(this.clock())) : null;
  }

  // Clover paths are scoped to the merchant the credentials were issued for.
  private request<T>(
    credentials: CloverCredentials,
    request: Omit<ProviderRequest<T>, 'accessToken'>,
  ): Promise<T> {
    return sendProviderRequest(
      this.http,
      {
        ...request,
        path: `merchants/${encodePathSegment(credentials.merchantId)}/${request.path}`,
        accessToken: credentials.accessToken,
      },
      extractCloverError,
    );
  }

  private withCredentials<T>(
    merchantId: string,
    call: (credentials: CloverCredentials) => Promise<T>,
  ): Promise<T> {
    return withCredentialRetry(
      () => this.broker.getCredentials(merchantId, 'clover'),
      () => this.broker.evict(merchantId, 'clover'),
      call,
    );
  }
}
