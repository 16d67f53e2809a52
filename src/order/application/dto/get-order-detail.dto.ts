/**
 * 애플리케이션 레이어 DTO: GetOrderDetail 요청
 */
export class GetOrderDetailQuery {
  constructor(
    public readonly buyerId: string,
    public readonly orderId: number,
  ) {}
}
