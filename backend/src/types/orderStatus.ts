export const OrderStatus = {
  AUTHORIZED: 'AUTHORIZED',
  SUBMITTED: 'SUBMITTED',
  IN_PROGRESS: 'IN_PROGRESS',
  READY: 'READY',
  COMPLETED: 'COMPLETED',
  CANCELLED: 'CANCELLED',
  // Legacy values, still present on older order records.
  DRAFT: 'DRAFT',
  PENDING: 'PENDING',
  ACTIVE: 'active',
} as const;

export type OrderStatusValue = (typeof OrderStatus)[keyof typeof OrderStatus];

