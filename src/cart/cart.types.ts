export const PAYMENT_METHODS = ['cash', 'card', 'upi', 'cheque', 'bank_transfer'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const DEFAULT_PAYMENT_METHOD: PaymentMethod = 'cash';

export function isPaymentMethod(value: string): value is PaymentMethod {
  return (PAYMENT_METHODS as readonly string[]).includes(value);
}

/**
 * The part of a medicine record the cart needs. Callers pass the latest
 * copy they have; the cart never reads storage itself.
 */
export interface StockSnapshot {
  id: number;
  name: string;
  batchNo: string | null;
  quantity: number;
  sellingPrice: number;
}

export interface CartLine {
  medicineId: number;
  name: string;
  batchNo: string | null;
  quantity: number;
  // captured when the medicine was first added
  unitPrice: number;
  // always roundMoney(quantity * unitPrice)
  totalPrice: number;
}

export interface CartTotals {
  subtotal: number;
  discount: number;
  tax: number;
  total: number;
}

export interface CartSnapshot {
  lines: CartLine[];
  discount: number;
  taxRatePercent: number;
  paymentMethod: PaymentMethod;
  totals: CartTotals;
}
