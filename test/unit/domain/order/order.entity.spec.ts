import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { OrderStatus } from '@/order/domain/entities/order-status.vo';
import { CatalogItemOrdered } from '@/order/domain/entities/catalog-item-ordered.vo';
import { ErrorCode, ValidationException } from '@common/exception';
import {
  TEST_BUYER,
  buildAddress,
  buildCustomerOrders,
} from '../../../helpers/order.fixture';

describe('Order Entity', () => {
  describe('생성자', () => {
    it('유효한 값으로 Order를 생성한다', () => {
      // given
      const address = buildAddress();
      const orderDate = new Date('2026-03-01T00:00:00.000Z');
      const items = [
        new OrderItem(new CatalogItemOrdered(1, 'Product1', 'a.jpg'), 5, 1),
      ];

      // when
      const order = new Order(7, TEST_BUYER, address, items, orderDate);

      // then
      expect(order.id).toBe(7);
      expect(order.buyerId).toBe(TEST_BUYER);
      expect(order.shipToAddress).toBe(address);
      expect(order.orderItems).toBe(items);
      expect(order.orderDate).toBe(orderDate);
    });

    it('buyerId가 비어 있으면 INVALID_BUYER 예외를 던진다', () => {
      // given
      const act = () => new Order(1, '  ', buildAddress(), [], new Date());

      // when & then
      expect(act).toThrow(ValidationException);
      expect(act).toThrow(ErrorCode.INVALID_BUYER.message);
    });
  });

  describe('total', () => {
    it('given: 두 개의 주문 상품이 있는 주문 / when: total을 호출함 / then: 단가 × 수량의 합을 반환함', () => {
      // given
      const [order] = buildCustomerOrders();

      // when
      const total = order.total();

      // then
      expect(total).toBe(36.25);
    });

    it('given: 단일 상품 3개 주문 / when: total을 호출함 / then: 60을 반환함', () => {
      // given
      const [, order] = buildCustomerOrders();

      // when & then
      expect(order.total()).toBe(60);
    });

    it('given: 주문 상품이 없는 주문 / when: total을 호출함 / then: 0을 반환함', () => {
      // given
      const order = new Order(1, TEST_BUYER, buildAddress(), [], new Date());

      // when & then
      expect(order.total()).toBe(0);
    });

    it('given: 부동소수 오차가 생기는 단가 / when: total을 호출함 / then: 소수점 둘째 자리로 반올림함', () => {
      // given
      const order = new Order(
        1,
        TEST_BUYER,
        buildAddress(),
        [
          new OrderItem(new CatalogItemOrdered(1, 'A', 'a.jpg'), 0.1, 1),
          new OrderItem(new CatalogItemOrdered(2, 'B', 'b.jpg'), 0.2, 1),
        ],
        new Date(),
      );

      // when & then
      expect(order.total()).toBe(0.3);
    });
  });

  describe('status', () => {
    it('저장된 상태가 없으므로 항상 PENDING을 반환한다', () => {
      // given
      const [order] = buildCustomerOrders();

      // when & then
      expect(order.status).toBe(OrderStatus.PENDING);
      expect(order.status.label).toBe('Pending');
    });
  });

  describe('isOwnedBy', () => {
    it('주문자와 같은 식별자이면 true, 다르면 false를 반환한다', () => {
      // given
      const [order] = buildCustomerOrders();

      // when & then
      expect(order.isOwnedBy(TEST_BUYER)).toBe(true);
      expect(order.isOwnedBy('someone@example.com')).toBe(false);
    });
  });

  describe('withId / withoutItems', () => {
    it('withId는 id만 바꾼 새 주문을 반환한다', () => {
      // given
      const [order] = buildCustomerOrders();

      // when
      const copied = order.withId(42);

      // then
      expect(copied).not.toBe(order);
      expect(copied.id).toBe(42);
      expect(order.id).toBe(1);
      expect(copied.orderItems).toBe(order.orderItems);
    });

    it('withoutItems는 주문 상품을 비운 새 주문을 반환한다', () => {
      // given
      const [order] = buildCustomerOrders();

      // when
      const stripped = order.withoutItems();

      // then
      expect(stripped.id).toBe(order.id);
      expect(stripped.orderItems).toEqual([]);
      expect(order.orderItems).toHaveLength(2);
    });
  });
});
