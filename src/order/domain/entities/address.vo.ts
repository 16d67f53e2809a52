import { ErrorCode, ValidationException } from '@common/exception';

/**
 * Address Value Object
 * 주문 시점의 배송지
 */
export class Address {
  constructor(
    public readonly street: string,
    public readonly city: string,
    public readonly state: string,
    public readonly country: string,
    public readonly zipCode: string,
  ) {
    this.validateRequiredFields();
  }

  private validateRequiredFields(): void {
    const fields = [this.street, this.city, this.country, this.zipCode];
    if (fields.some((field) => field.trim().length === 0)) {
      throw new ValidationException(ErrorCode.INVALID_ADDRESS);
    }
  }
}
