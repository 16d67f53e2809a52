import { Order } from '@/order/domain/entities/order.entity';
import { Specification } from '@/order/domain/specifications/specification';

/**
 * Order Repository Port
 * 주문 데이터 접근 계약
 */
export abstract class IOrderRepository {
  /**
   * 조건을 만족하는 주문 목록. 없으면 빈 배열을 반환한다.
   */
  abstract list(spec: Specification<Order>): Promise<Order[]>;
}
