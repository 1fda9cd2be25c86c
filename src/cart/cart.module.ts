import { Module } from '@nestjs/common';
import { CartService } from './cart.service';
import { CartSessionService } from './cart-session.service';
import { CartController } from './cart.controller';
import { MedicineModule } from '../medicine/medicine.module';

@Module({
  imports: [
    MedicineModule, // live stock snapshots
  ],
  providers: [CartService, CartSessionService],
  controllers: [CartController],
  exports: [CartService],
})
export class CartModule {}
