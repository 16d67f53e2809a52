import { ErrorCode, ValidationException } from '@common/exception';
import { Address } from './address.vo';
import { OrderItem } from './order-item.entity';
import { OrderStatus } from './order-status.vo';

/**
 * Order Entity
 * 구매자의 주문 (배송지, 주문 상품 목록 포함)
 */
export class Order {
  constructor(
    public readonly id: number,
    public readonly buyerId: string,
    public readonly shipToAddress: Address,
    public readonly orderItems: readonly OrderItem[],
    public readonly orderDate: Date,
  ) {
    this.validateBuyerId();
  }

  /**
   * 주문 상태는 아직 저장되지 않으므로 항상 PENDING으로 도출된다.
   */
  get status(): OrderStatus {
    return OrderStatus.PENDING;
  }

  /**
   * 주문 총액 (단가 × 수량의 합, 소수점 둘째 자리 반올림)
   */
  total(): number {
    const sum = this.orderItems.reduce((acc, item) => acc + item.subtotal(), 0);
    return Math.round(sum * 100) / 100;
  }

  isOwnedBy(buyerId: string): boolean {
    return this.buyerId === buyerId;
  }

  withId(id: number): Order {
    return new Order(
      id,
      this.buyerId,
      this.shipToAddress,
      this.orderItems,
      this.orderDate,
    );
  }

  withoutItems(): Order {
    return new Order(
      this.id,
      this.buyerId,
      this.shipToAddress,
      [],
      this.orderDate,
    );
  }

  private validateBuyerId(): void {
    if (this.buyerId.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_BUYER);
    }
  }
}
