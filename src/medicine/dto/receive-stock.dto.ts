import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsPositive, Max } from 'class-validator';

export class ReceiveStockDto {
  @ApiProperty({ example: 50, description: 'Units received (> 0)' })
  @IsInt({ message: 'quantity must be a whole number' })
  @IsPositive({ message: 'quantity must be positive' })
  @Max(999999)
  quantity!: number;
}
