import { z } from 'zod';
import { OrderStatus } from './orderStatus';
import { PosTypeSchema } from './shopContracts';

export const OrderStatusSchema = z.nativeEnum(OrderStatus);

export const OrderShopSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  merchantId: z.string().min(1),
  posType: PosTypeSchema,
});

export const OrderLineItemSchema = z.object({
  id: z.string(),
  name: z.string(),
  quantity: z.number().int().positive(),
  price: z.number().nonnegative(),
  customizations: z.string().optional(),
});

export const OrderSchema = z.object({
  id: z.string().min(1),
  date: z.string().datetime({ offset: true }),
  shop: OrderShopSchema,
  items: z.array(OrderLineItemSchema),
  totalAmount: z.number().nonnegative(),
  transactionId: z.string(),
  status: OrderStatusSchema,
  receiptUrl: z.string().optional(),
  providerOrderId: z.string().min(1).optional(),
});

export type Order = z.infer<typeof OrderSchema>;

export const OrderFileSchema = z.object({
  orders: z.array(OrderSchema),
});

export const OrderStatusParamsSchema = z.object({
  orderId: z.string().trim().min(1, 'orderId is required'),
});

export const OrderStatusQuerySchema = z.object({
  merchantId: z.string().trim().min(1, 'merchantId is required'),
  posType: PosTypeSchema,
});

export type ReconciliationSummary = {
  checked: number;
  updated: number;
  unchanged: number;
  failed: number;
  skipped: number;
};
