export const SalesErrors = {
  SALE_NOT_FOUND: {
    code: 'SALE_NOT_FOUND',
    message: 'Sale not found.',
  },
  EMPTY_CART: {
    code: 'SALE_EMPTY_CART',
    message: 'Cannot complete a sale with an empty cart.',
  },
  VALIDATION_FAILED: {
    code: 'SALE_VALIDATION_FAILED',
    message: 'Sale validation failed.',
  },
  PERSIST_FAILED: {
    code: 'SALE_PERSIST_FAILED',
    message: 'Sale could not be saved. Nothing was recorded, it is safe to retry.',
  },
  STOCK_ADJUSTMENT_FAILED: {
    code: 'SALE_STOCK_ADJUSTMENT_FAILED',
    message:
      'Sale recorded but inventory may be inconsistent. Stock must be reconciled manually.',
  },
  INVALID_DATE_RANGE: {
    code: 'SALE_INVALID_DATE_RANGE',
    message: 'Start date must not be after end date.',
  },
} as const;
