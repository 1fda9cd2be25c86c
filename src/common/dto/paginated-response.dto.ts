import { ApiProperty } from '@nestjs/swagger';

export class PaginationMetaDto {
  @ApiProperty({ description: 'Total number of records' })
  total: number;

  @ApiProperty({ description: 'Records per page' })
  limit: number;

  @ApiProperty({ description: 'Current page number' })
  page: number;

  @ApiProperty({ description: 'Total number of pages' })
  totalPages: number;

  @ApiProperty({ description: 'Whether another page follows' })
  hasMore: boolean;

  constructor(total: number, page: number, limit: number) {
    this.total = total;
    this.limit = limit;
    this.page = page;
    this.totalPages = Math.ceil(total / limit);
    this.hasMore = page * limit < total;
  }
}

export class PaginatedResponseDto<T> {
  data: T[];

  @ApiProperty({ type: () => PaginationMetaDto })
  meta: PaginationMetaDto;

  constructor(data: T[], meta: PaginationMetaDto) {
    this.data = data;
    this.meta = meta;
  }
}
