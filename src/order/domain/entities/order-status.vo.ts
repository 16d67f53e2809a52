/**
 * OrderStatus Value Object
 * 주문 상태를 나타내는 값 객체
 */
export class OrderStatus {
  private constructor(
    public readonly value: string,
    public readonly label: string,
  ) {}

  static readonly PENDING = new OrderStatus('PENDING', 'Pending');
}
