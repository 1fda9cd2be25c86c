import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiTags } from '@nestjs/swagger';
import { SalesService } from './sales.service';
import { StockAlertService } from './stock-alert.service';
import { CompleteSaleDto } from './dto/complete-sale.dto';
import {
  DailySalesQueryDto,
  ListRecentSalesQueryDto,
  ListSalesByDateRangeQueryDto,
} from './dto/list-sales.dto';

@ApiTags('Sales')
@Controller('sales')
export class SalesController {
  constructor(
    private readonly salesService: SalesService,
    private readonly stockAlerts: StockAlertService,
  ) {}

  @Post()
  @ApiHeader({ name: 'x-session-id', required: true })
  @ApiOperation({ summary: 'Complete the session cart: record the sale and decrement stock' })
  checkout(@Body() dto: CompleteSaleDto) {
    return this.salesService.checkout(dto);
  }

  @Get()
  @ApiOperation({ summary: 'Sales within a date range (inclusive)' })
  listByDateRange(@Query() query: ListSalesByDateRangeQueryDto) {
    return this.salesService.listByDateRange(query.from, query.to);
  }

  @Get('recent')
  @ApiOperation({ summary: 'Most recent sales' })
  listRecent(@Query() query: ListRecentSalesQueryDto) {
    return this.salesService.listRecent(query.limit);
  }

  @Get('daily')
  @ApiOperation({ summary: 'Sales of one day (defaults to today)' })
  listDaily(@Query() query: DailySalesQueryDto) {
    return this.salesService.listDaily(query.date);
  }

  @Get('stock-alerts')
  @ApiOperation({ summary: 'Sales whose stock adjustment failed and need reconciliation' })
  listStockAlerts() {
    return this.stockAlerts.recent();
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a sale' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.salesService.findOne(id);
  }
}
