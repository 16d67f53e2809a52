import { ErrorCode, ValidationException } from '@common/exception';
import { CatalogItemOrdered } from './catalog-item-ordered.vo';

/**
 * OrderItem Entity
 * 주문 상품 상세
 */
export class OrderItem {
  constructor(
    public readonly itemOrdered: CatalogItemOrdered,
    public readonly unitPrice: number,
    public readonly units: number,
  ) {
    this.validatePrice();
    this.validateUnits();
  }

  subtotal(): number {
    return this.unitPrice * this.units;
  }

  private validatePrice(): void {
    if (!Number.isFinite(this.unitPrice) || this.unitPrice < 0) {
      throw new ValidationException(ErrorCode.INVALID_PRICE);
    }
  }

  private validateUnits(): void {
    if (!Number.isInteger(this.units) || this.units <= 0) {
      throw new ValidationException(ErrorCode.INVALID_QUANTITY);
    }
  }
}
