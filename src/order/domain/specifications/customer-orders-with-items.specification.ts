import { Order } from '../entities/order.entity';
import { Specification } from './specification';

/**
 * 특정 구매자의 주문을 주문 상품과 함께 조회하는 조건
 */
export class CustomerOrdersWithItemsSpecification
  implements Specification<Order>
{
  readonly includeItems = true;

  constructor(public readonly buyerId: string) {}

  isSatisfiedBy(order: Order): boolean {
    return order.isOwnedBy(this.buyerId);
  }
}
