import { Injectable } from '@nestjs/common';
import { IOrderRepository } from '../domain/interfaces/order.repository.interface';
import { Order } from '../domain/entities/order.entity';
import { Specification } from '../domain/specifications/specification';

/**
 * Order Repository Implementation (In-Memory)
 */
@Injectable()
export class OrderMemoryRepository implements IOrderRepository {
  private orders: Map<number, Order> = new Map();
  private currentId = 1;

  // ANCHOR list
  async list(spec: Specification<Order>): Promise<Order[]> {
    return Array.from(this.orders.values())
      .filter((order) => spec.isSatisfiedBy(order))
      .sort((a, b) => b.orderDate.getTime() - a.orderDate.getTime())
      .map((order) => (spec.includeItems ? order : order.withoutItems()));
  }

  // ANCHOR add
  /**
   * id가 0인 주문에는 새 id를 부여하고, 그 외에는 주어진 id로 저장한다.
   */
  async add(order: Order): Promise<Order> {
    const saved = order.id === 0 ? order.withId(this.currentId++) : order;
    if (saved.id >= this.currentId) {
      this.currentId = saved.id + 1;
    }
    this.orders.set(saved.id, saved);
    return saved;
  }

  // ANCHOR clear
  clear(): void {
    this.orders.clear();
    this.currentId = 1;
  }
}
