import { ApiProperty } from '@nestjs/swagger';
import { IsIn, IsNumber } from 'class-validator';
import { PAYMENT_METHODS, PaymentMethod } from '../cart.types';

// Range checks live in CartEngine so the cart reports its own error codes.

export class SetDiscountDto {
  @ApiProperty({ example: 5, description: 'Discount amount (<= subtotal)' })
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'amount must be a number with at most 2 decimals' })
  amount!: number;
}

export class SetTaxRateDto {
  @ApiProperty({ example: 10, description: 'Tax rate in percent (0-100)' })
  @IsNumber({}, { message: 'percent must be a number' })
  percent!: number;
}

export class SetPaymentMethodDto {
  @ApiProperty({ enum: PAYMENT_METHODS, example: 'cash' })
  @IsIn(PAYMENT_METHODS, { message: 'method must be one of cash, card, upi, cheque, bank_transfer' })
  method!: PaymentMethod;
}
