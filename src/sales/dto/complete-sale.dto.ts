import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsOptional, IsPositive, IsString, MaxLength } from 'class-validator';

export class CompleteSaleDto {
  @ApiPropertyOptional({ description: 'Cashier processing the sale', example: 3 })
  @IsOptional()
  @IsInt({ message: 'cashierId must be a whole number' })
  @IsPositive({ message: 'cashierId must be positive' })
  cashierId?: number;

  @ApiPropertyOptional({ description: 'Customer name', example: 'Jane Doe' })
  @IsOptional()
  @IsString({ message: 'customerName must be text' })
  @MaxLength(100)
  customerName?: string;

  @ApiPropertyOptional({ description: 'Free-text note', example: 'Prescription #4411' })
  @IsOptional()
  @IsString({ message: 'notes must be text' })
  @MaxLength(500)
  notes?: string;
}
