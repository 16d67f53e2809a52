import { Module } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { OrderMemoryRepository } from '@/order/infrastructure/order.memory.repository';
import { OrderController } from '@/order/presentation/order.controller';

// Use Cases
import { GetMyOrdersUseCase } from '@/order/application/get-my-orders.use-case';
import { GetOrderDetailUseCase } from '@/order/application/get-order-detail.use-case';
import { CatalogUriComposer } from '@/order/application/catalog-uri-composer';

/**
 * Order Module
 * 주문 내역 조회 모듈
 */
@Module({
  controllers: [OrderController],
  providers: [
    // Order Repository (영속 계층은 외부 협력자이므로 메모리 구현을 기본으로 둔다)
    OrderMemoryRepository,
    {
      provide: IOrderRepository,
      useExisting: OrderMemoryRepository,
    },

    // Domain Service
    OrderDomainService,

    // Use Cases
    GetMyOrdersUseCase,
    GetOrderDetailUseCase,
    CatalogUriComposer,
  ],
  exports: [OrderDomainService, IOrderRepository],
})
export class OrderModule {}
