import { Injectable } from '@nestjs/common';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { Order } from '../entities/order.entity';
import { CustomerOrdersWithItemsSpecification } from '../specifications/customer-orders-with-items.specification';
import { ErrorCode, DomainException } from '@common/exception';

/**
 * OrderDomainService
 * 주문 저장소와 상호작용하며 구매자 단위 조회 규칙을 담당한다.
 */
@Injectable()
export class OrderDomainService {
  constructor(private readonly orderRepository: IOrderRepository) {}

  /**
   * ANCHOR 구매자 주문 목록 조회 (주문 상품 포함)
   * 저장소 오류는 변환하지 않고 그대로 전파한다.
   */
  async getBuyerOrders(buyerId: string): Promise<Order[]> {
    if (buyerId.trim().length === 0) {
      throw new DomainException(ErrorCode.INVALID_BUYER);
    }

    const spec = new CustomerOrdersWithItemsSpecification(buyerId);
    return await this.orderRepository.list(spec);
  }

  /**
   * ANCHOR 구매자 주문 단건 조회
   * 단건 조회 경로가 없으므로 구매자 주문 목록에서 찾는다.
   * 존재하지 않는 주문과 다른 구매자의 주문은 구분하지 않고 null을 반환한다.
   */
  async findBuyerOrder(buyerId: string, orderId: number): Promise<Order | null> {
    const orders = await this.getBuyerOrders(buyerId);

    return (
      orders.find((order) => order.id === orderId && order.isOwnedBy(buyerId)) ??
      null
    );
  }
}
