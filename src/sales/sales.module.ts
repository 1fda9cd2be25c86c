import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Sale } from './sale.entity';
import { SaleStore } from './sale.store';
import { SalesService } from './sales.service';
import { SaleCommitService } from './sale-commit.service';
import { StockAlertService } from './stock-alert.service';
import { SalesController } from './sales.controller';
import { MedicineModule } from '../medicine/medicine.module';
import { CartModule } from '../cart/cart.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([Sale]),
    MedicineModule, // stock decrement
    CartModule,     // session carts
  ],
  providers: [SaleStore, SaleCommitService, StockAlertService, SalesService],
  controllers: [SalesController],
  exports: [SalesService, SaleStore],
})
export class SalesModule {}
