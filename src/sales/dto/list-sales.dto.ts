import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, Matches, Max, Min } from 'class-validator';
import { DATE_PATTERN } from '../../common/utils/date';

export class ListSalesByDateRangeQueryDto {
  @ApiProperty({ description: 'First day (YYYY-MM-DD), inclusive', example: '2026-10-01' })
  @Matches(DATE_PATTERN, { message: 'from must be in YYYY-MM-DD format' })
  from!: string;

  @ApiProperty({ description: 'Last day (YYYY-MM-DD), inclusive', example: '2026-10-31' })
  @Matches(DATE_PATTERN, { message: 'to must be in YYYY-MM-DD format' })
  to!: string;
}

export class ListRecentSalesQueryDto {
  @ApiPropertyOptional({ description: 'Number of sales to return', default: 10, maximum: 100 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  limit: number = 10;
}

export class DailySalesQueryDto {
  @ApiPropertyOptional({ description: 'Day (YYYY-MM-DD), defaults to today' })
  @IsOptional()
  @Matches(DATE_PATTERN, { message: 'date must be in YYYY-MM-DD format' })
  date?: string;
}
