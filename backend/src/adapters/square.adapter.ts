import type { AxiosInstance } from 'axios';
import { providerConfig } from '../config/menu';
import type { CredentialBroker } from '../services/credentialBroker';
import type { SquareCredentials } from '../types/credentialContracts';
import type { BusinessHoursInfo, MenuCategory } from '../types/menuContracts';
import type { OrderStatusValue } from '../types/orderStatus';
import {
  SquareCatalogSearchResponseSchema,
  SquareErrorResponseSchema,
  SquareLocationResponseSchema,
  SquareLocationsResponseSchema,
  SquareOrderResponseSchema,
} from '../types/squareContracts';
import type { SquareCatalogObject, SquareLocation } from '../types/squareContracts';
import { addPeriod, buildBusinessHoursInfo, toWeekdayKey } from '../utils/businessHours';
import type { WeeklyHours } from '../utils/businessHours';
import { systemClock } from '../utils/cache';
import type { Clock } from '../utils/cache';
import { MalformedResponseError } from '../utils/errors';
import { createHttpClient } from '../utils/http';
import { menuLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';
import type { CatalogAdapter, ShopIdentity } from './base.adapter';
import {
  encodePathSegment,
  sendProviderRequest,
  withCredentialRetry,
} from './providerClient';
import type { ProviderRequest } from './providerClient';
import { buildSquareMenu, mapSquareOrderStatus } from './squareCatalog';

const CATALOG_OBJECT_TYPES = ['ITEM', 'CATEGORY', 'IMAGE', 'MODIFIER_LIST'];
const MAX_CATALOG_PAGES = 20;

const extractSquareError = (body: unknown): string | null => {
  const parsed = SquareErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return null;
  }

  const first = parsed.data.errors?.[0];
  if (!first) {
    return null;
  }
  return first.detail ?? first.code;
};

type SquareAdapterOptions = {
  broker: CredentialBroker;
  http?: AxiosInstance;
  logger?: ServiceLogger;
  clock?: Clock;
};

export class SquareCatalogAdapter implements CatalogAdapter {
  readonly provider = 'square' as const;

  private readonly broker: CredentialBroker;
  private readonly http: AxiosInstance;
  private readonly log: ServiceLogger;
  private readonly clock: Clock;

  constructor(options: SquareAdapterOptions) {
    this.broker = options.broker;
    this.http =
      options.http ??
      createHttpClient({ baseURL: providerConfig.squareBaseUrl, timeoutMs: providerConfig.timeoutMs });
    this.log = options.logger ?? menuLogger;
    this.clock = options.clock ?? systemClock;
  }

  async fetchMenu(shop: ShopIdentity): Promise<MenuCategory[]> {
    const objects = await this.withCredentials(shop.merchantId, (credentials) =>
      this.searchCatalog(credentials),
    );
    const categories = buildSquareMenu(objects);
    this.log.debug(
      { shopId: shop.id, objects: objects.length, categories: categories.length },
      'square catalog normalized',
    );
    return categories;
  }

  async fetchOrderStatus(orderId: string, merchantId: string): Promise<OrderStatusValue> {
    const response = await this.withCredentials(merchantId, (credentials) =>
      this.request(credentials, {
        label: 'Square order lookup',
        path: `orders/${encodePathSegment(orderId)}`,
        schema: SquareOrderResponseSchema,
      }),
    );

    if (!response.order) {
      throw new MalformedResponseError(`Square order ${orderId} missing from response`);
    }
    return mapSquareOrderStatus(response.order);
  }

  async fetchBusinessHours(shop: ShopIdentity): Promise<BusinessHoursInfo | null> {
    const location = await this.withCredentials(shop.merchantId, async (credentials) => {
      const list = await this.request(credentials, {
        label: 'Square locations',
        path: 'locations',
        schema: SquareLocationsResponseSchema,
      });

      const first = list.locations?.[0];
      if (!first) {
        return null;
      }

      const detail = await this.request(credentials, {
        label: 'Square location',
        path: `locations/${encodePathSegment(first.id)}`,
        schema: SquareLocationResponseSchema,
      });
      return detail.location ?? null;
    });

    return location ? this.toBusinessHours(location) : null;
  }

  private toBusinessHours(location: SquareLocation): BusinessHoursInfo | null {
    const periods = location.business_hours?.periods ?? [];
    if (periods.length === 0) {
      return null;
    }

    const weeklyHours: WeeklyHours = {};
    for (const period of periods) {
      const day = toWeekdayKey(period.day_of_week);
      if (!day || !period.start_local_time || !period.end_local_time) {
        continue;
      }
      addPeriod(weeklyHours, day, {
        startTime: period.start_local_time,
        endTime: period.end_local_time,
      });
    }

    return buildBusinessHoursInfo(weeklyHours, new Date(this.clock()));
  }

  private async searchCatalog(credentials: SquareCredentials): Promise<SquareCatalogObject[]> {
    // Related objects repeat across pages.
    const objects = new Map<string, SquareCatalogObject>();
    let cursor: string | undefined;

    for (let page = 0; page < MAX_CATALOG_PAGES; page += 1) {
      const response = await this.request(credentials, {
        label: 'Square catalog search',
        method: 'POST',
        path: 'catalog/search',
        body: {
          object_types: CATALOG_OBJECT_TYPES,
          include_related_objects: true,
          ...(cursor ? { cursor } : {}),
        },
        schema: SquareCatalogSearchResponseSchema,
      });

      for (const object of [...(response.objects ?? []), ...(response.related_objects ?? [])]) {
        objects.set(object.id, object);
      }
      if (!response.cursor) {
        return [...objects.values()];
      }
      cursor = response.cursor;
    }

    this.log.warn({ pages: MAX_CATALOG_PAGES }, 'square catalog truncated at page limit');
    return [...objects.values()];
  }

  private request<T>(
    credentials: SquareCredentials,
    request: Omit<ProviderRequest<T>, 'accessToken'>,
  ): Promise<T> {
    return sendProviderRequest(
      this.http,
      { ...request, accessToken: credentials.accessToken },
      extractSquareError,
    );
  }

  private withCredentials<T>(
    merchantId: string,
    call: (credentials: SquareCredentials) => Promise<T>,
  ): Promise<T> {
    return withCredentialRetry(
      () => this.broker.getCredentials(merchantId, 'square'),
      () => this.broker.evict(merchantId, 'square'),
      call,
    );
  }
}
