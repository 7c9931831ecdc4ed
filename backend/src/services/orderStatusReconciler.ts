import type { AdapterRegistry } from '../adapters';
import type { Order, ReconciliationSummary } from '../types/orderContracts';
import { describeError } from '../utils/errors';
import { orderLogger } from '../utils/logger';
import type { ServiceLogger } from '../utils/logger';
import type { OrderStore } from './orderStore';

type OrderStatusReconcilerOptions = {
  store: OrderStore;
  adapters: AdapterRegistry;
  logger?: ServiceLogger;
};

type OrderOutcome = 'updated' | 'unchanged' | 'failed' | 'skipped';

export class OrderStatusReconciler {
  private readonly store: OrderStore;
  private readonly adapters: AdapterRegistry;
  private readonly log: ServiceLogger;

  constructor(options: OrderStatusReconcilerOptions) {
    this.store = options.store;
    this.adapters = options.adapters;
    this.log = options.logger ?? orderLogger;
  }

  async reconcile(): Promise<ReconciliationSummary> {
    const orders = await this.store.list();
    const summary: ReconciliationSummary = {
      checked: 0,
      updated: 0,
      unchanged: 0,
      failed: 0,
      skipped: 0,
    };

    for (const order of orders) {
      const outcome = await this.reconcileOrder(order);
      summary[outcome] += 1;
      if (outcome !== 'skipped') {
        summary.checked += 1;
      }
    }

    this.log.info({ ...summary }, 'order reconciliation finished');
    return summary;
  }

  private async reconcileOrder(order: Order): Promise<OrderOutcome> {
    if (!order.providerOrderId) {
      return 'skipped';
    }

    const adapter = this.adapters[order.shop.posType];
    try {
      const status = await adapter.fetchOrderStatus(order.providerOrderId, order.shop.merchantId);
      if (status === order.status) {
        return 'unchanged';
      }

      await this.store.updateStatus(order.id, status);
      this.log.info({ orderId: order.id, from: order.status, to: status }, 'order status updated');
      return 'updated';
    } catch (error) {
      this.log.warn({ orderId: order.id, err: describeError(error) }, 'order status check failed');
      return 'failed';
    }
  }
}
