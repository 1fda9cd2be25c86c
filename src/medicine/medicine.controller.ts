import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { MedicineService } from './medicine.service';
import { CreateMedicineDto } from './dto/create-medicine.dto';
import { UpdateMedicineDto } from './dto/update-medicine.dto';
import { ReceiveStockDto } from './dto/receive-stock.dto';
import {
  ExpiringQueryDto,
  ListMedicinesQueryDto,
  LowStockQueryDto,
} from './dto/list-medicines.dto';

@ApiTags('Medicines')
@Controller('medicines')
export class MedicineController {
  constructor(private readonly medicineService: MedicineService) {}

  @Get()
  @ApiOperation({ summary: 'List medicines (search, category, in-stock filter)' })
  list(@Query() query: ListMedicinesQueryDto) {
    return this.medicineService.list(query);
  }

  @Get('categories')
  @ApiOperation({ summary: 'Distinct medicine categories' })
  listCategories() {
    return this.medicineService.listCategories();
  }

  @Get('low-stock')
  @ApiOperation({ summary: 'Medicines at or below the low-stock threshold' })
  listLowStock(@Query() query: LowStockQueryDto) {
    return this.medicineService.listLowStock(query.threshold);
  }

  @Get('expiring')
  @ApiOperation({ summary: 'Medicines expiring within the warning window' })
  listExpiring(@Query() query: ExpiringQueryDto) {
    return this.medicineService.listExpiringSoon(query.days);
  }

  @Get('expired')
  @ApiOperation({ summary: 'Medicines whose expiry date has passed' })
  listExpired() {
    return this.medicineService.listExpired();
  }

  @Get('barcode/:barcode')
  @ApiOperation({ summary: 'Find a medicine by barcode' })
  findByBarcode(@Param('barcode') barcode: string) {
    return this.medicineService.findByBarcode(barcode);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a medicine' })
  findOne(@Param('id', ParseIntPipe) id: number) {
    return this.medicineService.findById(id);
  }

  @Post()
  @ApiOperation({ summary: 'Add a medicine to inventory' })
  create(@Body() dto: CreateMedicineDto) {
    return this.medicineService.create(dto);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Edit a medicine' })
  update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateMedicineDto) {
    return this.medicineService.update(id, dto);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a medicine' })
  remove(@Param('id', ParseIntPipe) id: number) {
    return this.medicineService.remove(id);
  }

  @Post(':id/receive')
  @ApiOperation({ summary: 'Receive stock for a medicine' })
  receive(@Param('id', ParseIntPipe) id: number, @Body() dto: ReceiveStockDto) {
    return this.medicineService.receiveStock(id, dto.quantity);
  }
}
