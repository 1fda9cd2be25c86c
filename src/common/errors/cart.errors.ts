export const CartErrors = {
  INVALID_QUANTITY: {
    code: 'CART_INVALID_QUANTITY',
    message: 'Quantity must be a positive whole number.',
  },
  INVALID_PRICE: {
    code: 'CART_INVALID_PRICE',
    message: 'Unit price cannot be negative.',
  },
  STOCK_MISMATCH: {
    code: 'CART_STOCK_MISMATCH',
    message: 'Stock snapshot does not belong to the requested medicine.',
  },
  LINE_NOT_FOUND: {
    code: 'CART_LINE_NOT_FOUND',
    message: 'Medicine is not in the cart.',
  },
  INSUFFICIENT_STOCK: {
    code: 'CART_INSUFFICIENT_STOCK',
    message: 'Not enough stock for the requested quantity.',
  },
  NEGATIVE_DISCOUNT: {
    code: 'CART_NEGATIVE_DISCOUNT',
    message: 'Discount cannot be negative.',
  },
  DISCOUNT_EXCEEDS_SUBTOTAL: {
    code: 'CART_DISCOUNT_EXCEEDS_SUBTOTAL',
    message: 'Discount cannot exceed the cart subtotal.',
  },
  INVALID_TAX_RATE: {
    code: 'CART_INVALID_TAX_RATE',
    message: 'Tax rate must be between 0 and 100 percent.',
  },
  INVALID_PAYMENT_METHOD: {
    code: 'CART_INVALID_PAYMENT_METHOD',
    message: 'Payment method must be one of cash, card, upi, cheque, bank_transfer.',
  },
  CHECKOUT_IN_PROGRESS: {
    code: 'CART_CHECKOUT_IN_PROGRESS',
    message: 'The cart is being checked out. Wait for the sale to finish.',
  },
} as const;
