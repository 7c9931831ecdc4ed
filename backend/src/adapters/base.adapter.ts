import type { BusinessHoursInfo, MenuCategory } from '../types/menuContracts';
import type { OrderStatusValue } from '../types/orderStatus';
import type { PosType, Shop } from '../types/shopContracts';

export type ShopIdentity = Pick<Shop, 'id' | 'name' | 'merchantId' | 'posType'>;

export interface CatalogAdapter {
  readonly provider: PosType;

  fetchMenu(shop: ShopIdentity): Promise<MenuCategory[]>;

  fetchOrderStatus(orderId: string, merchantId: string): Promise<OrderStatusValue>;

  fetchBusinessHours(shop: ShopIdentity): Promise<BusinessHoursInfo | null>;
}
