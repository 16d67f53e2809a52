/**
 * 애플리케이션 레이어 DTO: GetMyOrders 요청
 */
export class GetMyOrdersQuery {
  constructor(public readonly buyerId: string) {}
}
