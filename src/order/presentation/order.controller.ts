import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Session,
  UseGuards,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse, ApiParam } from '@nestjs/swagger';
import { AuthGuard } from '@common/guards/auth.guard';
import {
  UserSession,
  requireUserName,
} from '@common/session/session.types';

// DTOs
import {
  GetMyOrdersRequest,
  GetMyOrdersResponse,
  GetOrderDetailRequest,
  GetOrderDetailResponse,
} from './dto/get-orders.dto';

// Use Cases
import { GetMyOrdersUseCase } from '@/order/application/get-my-orders.use-case';
import { GetOrderDetailUseCase } from '@/order/application/get-order-detail.use-case';

/**
 * Order Controller
 * 로그인한 사용자의 주문 내역 API 엔드포인트
 */
@ApiTags('orders')
@Controller('api/orders')
@UseGuards(AuthGuard)
export class OrderController {
  constructor(
    private readonly getMyOrdersUseCase: GetMyOrdersUseCase,
    private readonly getOrderDetailUseCase: GetOrderDetailUseCase,
  ) {}

  /**
   * ANCHOR 내 주문 내역 조회
   */
  @Get()
  @ApiOperation({
    summary: '내 주문 내역 조회',
    description: '로그인한 사용자의 주문 목록을 조회합니다.',
  })
  @ApiResponse({
    status: 200,
    description: '주문 내역 조회 성공',
    type: GetMyOrdersResponse,
  })
  @ApiResponse({ status: 401, description: '로그인 필요' })
  async getMyOrders(
    @Session() session: UserSession,
  ): Promise<GetMyOrdersResponse> {
    const query = GetMyOrdersRequest.toQuery(requireUserName(session));
    const result = await this.getMyOrdersUseCase.execute(query);

    return GetMyOrdersResponse.fromResult(result);
  }

  /**
   * ANCHOR 주문 상세 조회
   */
  @Get(':orderId')
  @ApiOperation({
    summary: '주문 상세 조회',
    description: '로그인한 사용자의 특정 주문 상세 정보를 조회합니다.',
  })
  @ApiParam({ name: 'orderId', description: '주문 번호' })
  @ApiResponse({
    status: 200,
    description: '주문 상세 조회 성공',
    type: GetOrderDetailResponse,
  })
  @ApiResponse({
    status: 400,
    description: '주문이 없거나 다른 사용자의 주문임',
  })
  @ApiResponse({ status: 401, description: '로그인 필요' })
  async getOrderDetail(
    @Param('orderId', ParseIntPipe) orderId: number,
    @Session() session: UserSession,
  ): Promise<GetOrderDetailResponse> {
    const query = GetOrderDetailRequest.toQuery(
      requireUserName(session),
      orderId,
    );
    const result = await this.getOrderDetailUseCase.execute(query);

    return GetOrderDetailResponse.fromResult(result);
  }
}
