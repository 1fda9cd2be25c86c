import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  Length,
  Matches,
  Max,
  MaxLength,
  Min,
} from 'class-validator';

const trim = ({ value }: { value: unknown }) =>
  typeof value === 'string' ? value.trim() : value;

export class CreateMedicineDto {
  @ApiProperty({ example: 'Paracetamol 500mg' })
  @Transform(trim)
  @IsString({ message: 'name must be text' })
  @Length(2, 100, { message: 'name must be 2-100 characters long' })
  name!: string;

  @ApiProperty({ example: 'Analgesic' })
  @Transform(trim)
  @IsString({ message: 'category must be text' })
  @IsNotEmpty({ message: 'category is required' })
  @MaxLength(50, { message: 'category must be at most 50 characters' })
  category!: string;

  @ApiProperty({ example: 'PCM-2406-A' })
  @Transform(trim)
  @IsString({ message: 'batchNo must be text' })
  @IsNotEmpty({ message: 'batchNo is required' })
  @MaxLength(50, { message: 'batchNo must be at most 50 characters' })
  batchNo!: string;

  @ApiProperty({ example: '2027-06-30', description: 'YYYY-MM-DD' })
  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'expiryDate must be in YYYY-MM-DD format' })
  @IsISO8601({ strict: true }, { message: 'expiryDate must be a valid calendar date' })
  expiryDate!: string;

  @ApiProperty({ example: 120, minimum: 0, maximum: 999999 })
  @IsInt({ message: 'quantity must be a whole number' })
  @Min(0, { message: 'quantity cannot be negative' })
  @Max(999999, { message: 'quantity cannot exceed 999,999' })
  quantity!: number;

  @ApiProperty({ example: 1.2 })
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'purchasePrice must have at most 2 decimals' })
  @Min(0, { message: 'purchasePrice cannot be negative' })
  @Max(999999.99, { message: 'purchasePrice cannot exceed 999,999.99' })
  purchasePrice!: number;

  @ApiProperty({ example: 2.5 })
  @IsNumber({ maxDecimalPlaces: 2 }, { message: 'sellingPrice must have at most 2 decimals' })
  @Min(0, { message: 'sellingPrice cannot be negative' })
  @Max(999999.99, { message: 'sellingPrice cannot exceed 999,999.99' })
  sellingPrice!: number;

  @ApiPropertyOptional({ example: 'PCM500A01' })
  @IsOptional()
  @Transform(trim)
  @Matches(/^[A-Za-z0-9]{8,20}$/, { message: 'barcode must be 8-20 alphanumeric characters' })
  barcode?: string;
}
