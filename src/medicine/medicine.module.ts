import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Medicine } from './medicine.entity';
import { MedicineService } from './medicine.service';
import { MedicineController } from './medicine.controller';
import { MedicineStockRepository } from './medicine-stock.repository';

@Module({
  imports: [TypeOrmModule.forFeature([Medicine])],
  providers: [MedicineService, MedicineStockRepository],
  controllers: [MedicineController],
  exports: [MedicineService, MedicineStockRepository],
})
export class MedicineModule {}
