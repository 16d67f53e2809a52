/**
 * Specification
 * 저장소 조회 조건을 도메인 객체로 표현한 계약
 */
export interface Specification<T> {
  /** 연관된 하위 항목(주문 상품 등)을 함께 적재할지 여부 */
  readonly includeItems: boolean;

  isSatisfiedBy(candidate: T): boolean;
}
