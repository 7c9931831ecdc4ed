import { randomUUID } from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { OrderFileSchema } from '../types/orderContracts';
import type { Order } from '../types/orderContracts';
import type { OrderStatusValue } from '../types/orderStatus';
import { DataFileError, NotFoundError, describeError } from '../utils/errors';

export interface OrderStore {
  list(): Promise<Order[]>;
  updateStatus(orderId: string, status: OrderStatusValue): Promise<Order>;
}

const isMissingFile = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class JsonFileOrderStore implements OrderStore {
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async list(): Promise<Order[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new DataFileError(`Order file ${this.filePath} is not valid JSON`, [describeError(error)]);
    }

    const parsed = OrderFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new DataFileError(
        `Order file ${this.filePath} is invalid`,
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    return parsed.data.orders;
  }

  updateStatus(orderId: string, status: OrderStatusValue): Promise<Order> {
    const next = this.writeChain.then(async () => {
      const orders = await this.list();
      const index = orders.findIndex((order) => order.id === orderId);
      const current = orders[index];
      if (!current) {
        throw new NotFoundError(`Order ${orderId} not found`);
      }

      const updated: Order = { ...current, status };
      orders[index] = updated;
      await this.write(orders);
      return updated;
    });

    // The caller sees the failure through `next`; the chain only keeps the order.
    this.writeChain = next.catch(() => undefined);
    return next;
  }

  private async write(orders: Order[]): Promise<void> {
    const temp = `${this.filePath}.${randomUUID()}.tmp`;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await writeFile(temp, `${JSON.stringify({ orders }, null, 2)}\n`, 'utf8');
      await rename(temp, this.filePath);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }
}
