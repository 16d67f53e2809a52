import { ErrorCode, ValidationException } from '@common/exception';

/**
 * CatalogItemOrdered Value Object
 * 주문 시점의 상품 스냅샷 (이후 카탈로그 변경에 영향받지 않음)
 */
export class CatalogItemOrdered {
  constructor(
    public readonly catalogItemId: number,
    public readonly productName: string,
    public readonly pictureUri: string,
  ) {
    this.validate();
  }

  private validate(): void {
    if (!Number.isInteger(this.catalogItemId) || this.catalogItemId <= 0) {
      throw new ValidationException(ErrorCode.INVALID_CATALOG_ITEM);
    }
    if (this.productName.trim().length === 0) {
      throw new ValidationException(ErrorCode.INVALID_CATALOG_ITEM);
    }
  }
}
