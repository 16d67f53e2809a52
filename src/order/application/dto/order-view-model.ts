import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { Address } from '@/order/domain/entities/address.vo';
import { CatalogUriComposer } from '../catalog-uri-composer';

/**
 * 애플리케이션 레이어 DTO: 배송지
 */
export class AddressViewModel {
  constructor(
    public readonly street: string,
    public readonly city: string,
    public readonly state: string,
    public readonly country: string,
    public readonly zipCode: string,
  ) {}

  static fromDomain(address: Address): AddressViewModel {
    return new AddressViewModel(
      address.street,
      address.city,
      address.state,
      address.country,
      address.zipCode,
    );
  }
}

/**
 * 애플리케이션 레이어 DTO: 주문 상품
 */
export class OrderItemViewModel {
  constructor(
    public readonly productId: number,
    public readonly productName: string,
    public readonly unitPrice: number,
    public readonly discount: number,
    public readonly units: number,
    public readonly pictureUrl: string,
  ) {}

  static fromDomain(
    item: OrderItem,
    uriComposer: CatalogUriComposer,
  ): OrderItemViewModel {
    return new OrderItemViewModel(
      item.itemOrdered.catalogItemId,
      item.itemOrdered.productName,
      item.unitPrice,
      0,
      item.units,
      uriComposer.composePictureUri(item.itemOrdered.pictureUri),
    );
  }
}

/**
 * 애플리케이션 레이어 DTO: 주문 상세
 */
export class OrderViewModel {
  constructor(
    public readonly orderNumber: number,
    public readonly orderDate: Date,
    public readonly total: number,
    public readonly status: string,
    public readonly shippingAddress: AddressViewModel,
    public readonly orderItems: OrderItemViewModel[],
  ) {}

  static fromDomain(
    order: Order,
    uriComposer: CatalogUriComposer,
  ): OrderViewModel {
    return new OrderViewModel(
      order.id,
      order.orderDate,
      order.total(),
      order.status.label,
      AddressViewModel.fromDomain(order.shipToAddress),
      order.orderItems.map((item) =>
        OrderItemViewModel.fromDomain(item, uriComposer),
      ),
    );
  }
}

/**
 * 애플리케이션 레이어 DTO: 주문 목록의 한 행
 */
export class OrderSummaryViewModel {
  constructor(
    public readonly orderNumber: number,
    public readonly orderDate: Date,
    public readonly total: number,
    public readonly status: string,
    public readonly itemCount: number,
  ) {}

  static fromDomain(order: Order): OrderSummaryViewModel {
    return new OrderSummaryViewModel(
      order.id,
      order.orderDate,
      order.total(),
      order.status.label,
      order.orderItems.length,
    );
  }
}
