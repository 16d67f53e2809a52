import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { GetMyOrdersQuery } from './dto/get-my-orders.dto';
import { OrderSummaryViewModel } from './dto/order-view-model';

@Injectable()
export class GetMyOrdersUseCase {
  constructor(private readonly orderService: OrderDomainService) {}

  /**
   * ANCHOR 내 주문 목록 조회
   */
  async execute(query: GetMyOrdersQuery): Promise<OrderSummaryViewModel[]> {
    const orders = await this.orderService.getBuyerOrders(query.buyerId);

    return orders.map((order) => OrderSummaryViewModel.fromDomain(order));
  }
}
