import { ApiProperty } from '@nestjs/swagger';
import { GetMyOrdersQuery } from '@/order/application/dto/get-my-orders.dto';
import { GetOrderDetailQuery } from '@/order/application/dto/get-order-detail.dto';
import {
  OrderSummaryViewModel,
  OrderViewModel,
} from '@/order/application/dto/order-view-model';

/**
 * 내 주문 목록 조회 요청 DTO
 */
export class GetMyOrdersRequest {
  static toQuery(userName: string): GetMyOrdersQuery {
    return new GetMyOrdersQuery(userName);
  }
}

/**
 * 주문 목록 행 DTO
 */
export class OrderSummaryDto {
  @ApiProperty({ description: '주문 번호', example: 1 })
  orderNumber!: number;

  @ApiProperty({ description: '주문 일시' })
  orderDate!: Date;

  @ApiProperty({ description: '주문 총액', example: 36.25 })
  total!: number;

  @ApiProperty({ description: '주문 상태', example: 'Pending' })
  status!: string;

  @ApiProperty({ description: '주문 상품 종류 수', example: 2 })
  itemCount!: number;
}

/**
 * 내 주문 목록 조회 응답 DTO
 */
export class GetMyOrdersResponse {
  @ApiProperty({ description: '주문 목록', type: [OrderSummaryDto] })
  orders!: OrderSummaryDto[];

  static fromResult(results: OrderSummaryViewModel[]): GetMyOrdersResponse {
    const response = new GetMyOrdersResponse();
    response.orders = results.map((result) => ({
      orderNumber: result.orderNumber,
      orderDate: result.orderDate,
      total: result.total,
      status: result.status,
      itemCount: result.itemCount,
    }));
    return response;
  }
}

/**
 * 주문 상세 조회 요청 DTO
 */
export class GetOrderDetailRequest {
  static toQuery(userName: string, orderId: number): GetOrderDetailQuery {
    return new GetOrderDetailQuery(userName, orderId);
  }
}

/**
 * 배송지 DTO
 */
export class AddressDto {
  @ApiProperty({ description: '도로명 주소' })
  street!: string;

  @ApiProperty({ description: '도시' })
  city!: string;

  @ApiProperty({ description: '주/도' })
  state!: string;

  @ApiProperty({ description: '국가' })
  country!: string;

  @ApiProperty({ description: '우편번호' })
  zipCode!: string;
}

/**
 * 주문 상품 DTO (조회용)
 */
export class OrderItemDetailDto {
  @ApiProperty({ description: '상품 ID' })
  productId!: number;

  @ApiProperty({ description: '상품명' })
  productName!: string;

  @ApiProperty({ description: '주문 시점 단가' })
  unitPrice!: number;

  @ApiProperty({ description: '할인 금액' })
  discount!: number;

  @ApiProperty({ description: '수량' })
  units!: number;

  @ApiProperty({ description: '상품 이미지 URL' })
  pictureUrl!: string;
}

/**
 * 주문 상세 정보 DTO
 */
export class OrderDetailDto {
  @ApiProperty({ description: '주문 번호', example: 1 })
  orderNumber!: number;

  @ApiProperty({ description: '주문 일시' })
  orderDate!: Date;

  @ApiProperty({ description: '주문 총액', example: 36.25 })
  total!: number;

  @ApiProperty({ description: '주문 상태', example: 'Pending' })
  status!: string;

  @ApiProperty({ description: '배송지', type: AddressDto })
  shippingAddress!: AddressDto;

  @ApiProperty({ description: '주문 상품 목록', type: [OrderItemDetailDto] })
  orderItems!: OrderItemDetailDto[];
}

/**
 * 주문 상세 조회 응답 DTO
 */
export class GetOrderDetailResponse {
  @ApiProperty({ description: '주문 상세 정보', type: OrderDetailDto })
  order!: OrderDetailDto;

  static fromResult(result: OrderViewModel): GetOrderDetailResponse {
    const response = new GetOrderDetailResponse();
    response.order = {
      orderNumber: result.orderNumber,
      orderDate: result.orderDate,
      total: result.total,
      status: result.status,
      shippingAddress: { ...result.shippingAddress },
      orderItems: result.orderItems.map((item) => ({ ...item })),
    };
    return response;
  }
}
