import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsIn,
  IsInt,
  IsISO8601,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { PAYMENT_METHODS, PaymentMethod } from '../../cart/cart.types';
import { DATE_PATTERN } from '../../common/utils/date';

export class SaleItemCandidate {
  @IsInt({ message: 'item medicineId must be a whole number' })
  @IsPositive({ message: 'item medicineId must be positive' })
  medicineId!: number;

  @IsString({ message: 'item name must be text' })
  name!: string;

  @IsInt({ message: 'item quantity must be a whole number' })
  @IsPositive({ message: 'item quantity must be positive' })
  quantity!: number;

  @IsNumber({}, { message: 'item unitPrice must be a number' })
  @Min(0, { message: 'item unitPrice cannot be negative' })
  unitPrice!: number;

  @IsNumber({}, { message: 'item totalPrice must be a number' })
  @Min(0, { message: 'item totalPrice cannot be negative' })
  totalPrice!: number;

  @IsOptional()
  @IsString({ message: 'item batchNo must be text' })
  batchNo!: string | null;
}

/**
 * A sale about to be recorded: no id yet.
 */
export class SaleCandidate {
  @Matches(DATE_PATTERN, { message: 'date must be in YYYY-MM-DD format' })
  @IsISO8601({ strict: true }, { message: 'date must be a valid calendar date' })
  date!: string;

  @ArrayNotEmpty({ message: 'sale must contain at least one item' })
  @ValidateNested({ each: true })
  @Type(() => SaleItemCandidate)
  items!: SaleItemCandidate[];

  @IsNumber({}, { message: 'subtotal must be a number' })
  @Min(0, { message: 'subtotal cannot be negative' })
  subtotal!: number;

  @IsNumber({}, { message: 'discount must be a number' })
  @Min(0, { message: 'discount cannot be negative' })
  discount!: number;

  @IsNumber({}, { message: 'tax must be a number' })
  @Min(0, { message: 'tax cannot be negative' })
  tax!: number;

  @IsNumber({}, { message: 'total must be a number' })
  @Min(0, { message: 'total cannot be negative' })
  total!: number;

  @IsIn(PAYMENT_METHODS, {
    message: 'payment method must be one of cash, card, upi, cheque, bank_transfer',
  })
  paymentMethod!: PaymentMethod;

  @IsOptional()
  @IsInt({ message: 'cashierId must be a whole number' })
  @IsPositive({ message: 'cashierId must be positive' })
  cashierId!: number | null;

  @IsOptional()
  @IsString({ message: 'customerName must be text' })
  @MaxLength(100, { message: 'customerName must be at most 100 characters' })
  customerName!: string | null;

  @IsOptional()
  @IsString({ message: 'notes must be text' })
  @MaxLength(500, { message: 'notes must be at most 500 characters' })
  notes!: string | null;
}
