import { Injectable, Logger } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { ErrorCode, ApplicationException } from '@common/exception';
import { CatalogUriComposer } from './catalog-uri-composer';
import { GetOrderDetailQuery } from './dto/get-order-detail.dto';
import { OrderViewModel } from './dto/order-view-model';

@Injectable()
export class GetOrderDetailUseCase {
  private readonly logger = new Logger(GetOrderDetailUseCase.name);

  constructor(
    private readonly orderService: OrderDomainService,
    private readonly uriComposer: CatalogUriComposer,
  ) {}

  /**
   * ANCHOR 주문 상세 조회
   * 없는 주문과 타인의 주문은 같은 예외로 응답한다.
   */
  async execute(query: GetOrderDetailQuery): Promise<OrderViewModel> {
    const order = await this.orderService.findBuyerOrder(
      query.buyerId,
      query.orderId,
    );

    if (!order) {
      this.logger.warn(`주문 조회 실패: orderId=${query.orderId}`);
      throw new ApplicationException(ErrorCode.ORDER_NOT_FOUND_FOR_USER);
    }

    return OrderViewModel.fromDomain(order, this.uriComposer);
  }
}
