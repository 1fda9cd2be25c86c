import { Injectable, Logger } from '@nestjs/common';

import { CartSessionService } from './cart-session.service';
import { CartEngine } from './cart-engine';
import { CartLine, CartSnapshot } from './cart.types';
import { MedicineService } from '../medicine/medicine.service';
import { AppContextService } from '../common/context/app-context.service';

export interface CartSummary extends CartSnapshot {
  sessionId: string;
  itemCount: number;
  totalQuantity: number;
}

/**
 * Session-facing cart operations. Looks up the live medicine record and
 * hands it to the session's CartEngine as the stock snapshot.
 */
@Injectable()
export class CartService {
  private readonly logger = new Logger(CartService.name);

  constructor(
    private readonly sessions: CartSessionService,
    private readonly medicineService: MedicineService,
    private readonly appContext: AppContextService,
  ) {}

  getCart(): CartEngine {
    return this.sessions.getOrCreate(this.appContext.getSessionIdOrThrow());
  }

  // read-only: an unknown session gets an empty cart that is not stored
  summary(): CartSummary {
    const sessionId = this.appContext.getSessionIdOrThrow();
    const cart = this.sessions.find(sessionId) ?? this.sessions.createDetached();

    return {
      sessionId,
      itemCount: cart.itemCount,
      totalQuantity: cart.totalQuantity,
      ...cart.snapshot(),
    };
  }

  async addItem(medicineId: number, quantity: number): Promise<CartLine> {
    const cart = this.getCart();
    const medicine = await this.medicineService.findById(medicineId);

    const line = cart.addItem(medicineId, quantity, medicine);
    this.logger.log(`Added ${quantity} x "${medicine.name}" (line qty=${line.quantity})`);

    return line;
  }

  async updateQuantity(medicineId: number, quantity: number): Promise<CartLine | null> {
    const cart = this.getCart();

    if (quantity <= 0) {
      cart.removeItem(medicineId);
      this.logger.log(`Removed medicine ${medicineId} from cart`);
      return null;
    }

    const medicine = await this.medicineService.findById(medicineId);
    const line = cart.updateQuantity(medicineId, quantity, medicine);
    this.logger.log(`Updated "${medicine.name}" quantity to ${quantity}`);

    return line;
  }

  removeItem(medicineId: number): void {
    this.getCart().removeItem(medicineId);
    this.logger.log(`Removed medicine ${medicineId} from cart`);
  }

  setDiscount(amount: number): CartSummary {
    this.getCart().setDiscount(amount);
    return this.summary();
  }

  setTaxRate(percent: number): CartSummary {
    this.getCart().setTaxRate(percent);
    return this.summary();
  }

  setPaymentMethod(method: string): CartSummary {
    this.getCart().setPaymentMethod(method);
    return this.summary();
  }

  clear(): CartSummary {
    this.getCart().clear();
    this.logger.log('Cart cleared');
    return this.summary();
  }

  discardSession(): boolean {
    return this.sessions.discard(this.appContext.getSessionIdOrThrow());
  }
}
