import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import { IsBoolean, IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import { PaginationQueryDto } from '../../common/dto/pagination.dto';

export class ListMedicinesQueryDto extends PaginationQueryDto {
  @ApiPropertyOptional({ description: 'Exact category' })
  @IsOptional()
  @IsString()
  category?: string;

  @ApiPropertyOptional({ description: 'Only medicines with stock > 0' })
  @IsOptional()
  @Transform(({ value }) => value === true || value === 'true')
  @IsBoolean()
  inStockOnly: boolean = false;
}

export class LowStockQueryDto {
  @ApiPropertyOptional({ description: 'Quantity at or below which stock is low' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  threshold?: number;
}

export class ExpiringQueryDto {
  @ApiPropertyOptional({ description: 'Days ahead to look for expiries' })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(3650)
  days?: number;
}
