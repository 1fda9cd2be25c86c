import { BadRequestException, ConflictException, NotFoundException } from '@nestjs/common';

import { CartErrors } from '../common/errors/cart.errors';
import { roundMoney, sumMoney } from '../common/utils/money';
import {
  CartLine,
  CartSnapshot,
  CartTotals,
  DEFAULT_PAYMENT_METHOD,
  isPaymentMethod,
  PaymentMethod,
  StockSnapshot,
} from './cart.types';

/**
 * In-progress sale for one session: ordered lines (one per medicine),
 * discount, tax rate and payment method.
 *
 * Synchronous and storage-free. Every mutator either applies completely or
 * throws and leaves the cart as it was.
 *
 * While a checkout holds the cart (beginCheckout .. endCheckout) every
 * mutator and a second checkout fail with CART_CHECKOUT_IN_PROGRESS.
 */
export class CartEngine {
  private readonly _lines: CartLine[] = [];
  private _discount = 0;
  private _taxRatePercent = 0;
  private _paymentMethod: PaymentMethod = DEFAULT_PAYMENT_METHOD;
  private _checkoutInProgress = false;

  constructor(defaults: { taxRatePercent?: number } = {}) {
    if (defaults.taxRatePercent !== undefined) {
      this.setTaxRate(defaults.taxRatePercent);
    }
  }

  // ---- Read access ----

  get lines(): readonly CartLine[] {
    return this._lines.map((line) => ({ ...line }));
  }

  get discount(): number {
    return this._discount;
  }

  get taxRatePercent(): number {
    return this._taxRatePercent;
  }

  get paymentMethod(): PaymentMethod {
    return this._paymentMethod;
  }

  get isEmpty(): boolean {
    return this._lines.length === 0;
  }

  get itemCount(): number {
    return this._lines.length;
  }

  get totalQuantity(): number {
    return this._lines.reduce((sum, line) => sum + line.quantity, 0);
  }

  get checkoutInProgress(): boolean {
    return this._checkoutInProgress;
  }

  // ---- Checkout lock ----

  beginCheckout(): void {
    this.assertOpen();
    this._checkoutInProgress = true;
  }

  // idempotent
  endCheckout(): void {
    this._checkoutInProgress = false;
  }

  // ---- Helpers ----

  private assertOpen(): void {
    if (this._checkoutInProgress) {
      throw new ConflictException(CartErrors.CHECKOUT_IN_PROGRESS);
    }
  }

  private findLine(medicineId: number): CartLine | undefined {
    return this._lines.find((line) => line.medicineId === medicineId);
  }

  private assertQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new BadRequestException({
        ...CartErrors.INVALID_QUANTITY,
        details: { quantity },
      });
    }
  }

  private assertStockFor(medicineId: number, stock: StockSnapshot, requested: number): void {
    if (stock.id !== medicineId) {
      throw new BadRequestException({
        ...CartErrors.STOCK_MISMATCH,
        details: { medicineId, stockMedicineId: stock.id },
      });
    }

    if (stock.quantity < requested) {
      throw new BadRequestException({
        ...CartErrors.INSUFFICIENT_STOCK,
        details: { available: stock.quantity, requested },
      });
    }
  }

  private currentSubtotal(): number {
    return roundMoney(sumMoney(this._lines.map((line) => line.totalPrice)));
  }

  // keeps discount <= subtotal once lines shrink
  private clampDiscount(): void {
    this._discount = Math.min(this._discount, this.currentSubtotal());
  }

  // ---- Mutators ----

  /**
   * Adds `requestedQty` units, merging into the existing line for the same
   * medicine. The merged quantity is checked against `currentStock`.
   */
  addItem(medicineId: number, requestedQty: number, currentStock: StockSnapshot): CartLine {
    this.assertOpen();
    this.assertQuantity(requestedQty);

    const existing = this.findLine(medicineId);

    if (existing) {
      const newQuantity = existing.quantity + requestedQty;
      this.assertStockFor(medicineId, currentStock, newQuantity);

      existing.quantity = newQuantity;
      existing.totalPrice = roundMoney(newQuantity * existing.unitPrice);
      return { ...existing };
    }

    this.assertStockFor(medicineId, currentStock, requestedQty);

    const unitPrice = Number(currentStock.sellingPrice);
    if (!Number.isFinite(unitPrice) || unitPrice < 0) {
      throw new BadRequestException({
        ...CartErrors.INVALID_PRICE,
        details: { medicineId, unitPrice: currentStock.sellingPrice },
      });
    }

    const line: CartLine = {
      medicineId,
      name: currentStock.name,
      batchNo: currentStock.batchNo,
      quantity: requestedQty,
      unitPrice,
      totalPrice: roundMoney(requestedQty * unitPrice),
    };
    this._lines.push(line);

    return { ...line };
  }

  removeItem(medicineId: number): void {
    this.assertOpen();
    const index = this._lines.findIndex((line) => line.medicineId === medicineId);

    if (index === -1) {
      throw new NotFoundException({
        ...CartErrors.LINE_NOT_FOUND,
        details: { medicineId },
      });
    }

    this._lines.splice(index, 1);
    this.clampDiscount();
  }

  /**
   * Sets the line quantity. Zero or less removes the line.
   * Returns the updated line, or null when it was removed.
   */
  updateQuantity(
    medicineId: number,
    newQty: number,
    currentStock: StockSnapshot,
  ): CartLine | null {
    this.assertOpen();
    if (newQty <= 0) {
      this.removeItem(medicineId);
      return null;
    }

    this.assertQuantity(newQty);

    const line = this.findLine(medicineId);
    if (!line) {
      throw new NotFoundException({
        ...CartErrors.LINE_NOT_FOUND,
        details: { medicineId },
      });
    }

    this.assertStockFor(medicineId, currentStock, newQty);

    line.quantity = newQty;
    line.totalPrice = roundMoney(newQty * line.unitPrice);
    this.clampDiscount();

    return { ...line };
  }

  setDiscount(amount: number): void {
    this.assertOpen();
    if (!Number.isFinite(amount) || amount < 0) {
      throw new BadRequestException({
        ...CartErrors.NEGATIVE_DISCOUNT,
        details: { amount },
      });
    }

    const subtotal = this.currentSubtotal();
    if (amount > subtotal) {
      throw new BadRequestException({
        ...CartErrors.DISCOUNT_EXCEEDS_SUBTOTAL,
        details: { amount, subtotal },
      });
    }

    this._discount = amount;
  }

  setTaxRate(percent: number): void {
    this.assertOpen();
    if (!Number.isFinite(percent) || percent < 0 || percent > 100) {
      throw new BadRequestException({
        ...CartErrors.INVALID_TAX_RATE,
        details: { percent },
      });
    }

    this._taxRatePercent = percent;
  }

  setPaymentMethod(method: string): void {
    this.assertOpen();
    if (!isPaymentMethod(method)) {
      throw new BadRequestException({
        ...CartErrors.INVALID_PAYMENT_METHOD,
        details: { method },
      });
    }

    this._paymentMethod = method;
  }

  clear(): void {
    this.assertOpen();
    this._lines.length = 0;
    this._discount = 0;
    this._taxRatePercent = 0;
    this._paymentMethod = DEFAULT_PAYMENT_METHOD;
  }

  // ---- Pricing ----

  /**
   * Rounding order: each line total (already rounded on mutation), the
   * subtotal, the tax, then the grand total.
   */
  totals(): CartTotals {
    const subtotal = this.currentSubtotal();

    const discount = Math.min(this._discount, subtotal);
    const discounted = subtotal - discount;

    const tax = roundMoney(discounted * (this._taxRatePercent / 100));
    const total = roundMoney(discounted + tax);

    return {
      subtotal,
      discount: roundMoney(discount),
      tax,
      total,
    };
  }

  snapshot(): CartSnapshot {
    return {
      lines: this._lines.map((line) => ({ ...line })),
      discount: this._discount,
      taxRatePercent: this._taxRatePercent,
      paymentMethod: this._paymentMethod,
      totals: this.totals(),
    };
  }
}
