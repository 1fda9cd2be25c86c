import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsPositive, Min } from 'class-validator';

export class AddCartItemDto {
  @ApiProperty({ example: 12, description: 'Medicine id' })
  @IsInt({ message: 'medicineId must be a whole number' })
  @IsPositive({ message: 'medicineId must be positive' })
  medicineId!: number;

  @ApiProperty({ example: 2, description: 'Units to add (> 0)' })
  @IsInt({ message: 'quantity must be a whole number' })
  @IsPositive({ message: 'quantity must be positive' })
  quantity!: number;
}

export class UpdateCartItemDto {
  @ApiProperty({ example: 3, description: 'New quantity; 0 removes the line' })
  @IsInt({ message: 'quantity must be a whole number' })
  @Min(0, { message: 'quantity cannot be negative' })
  quantity!: number;
}
