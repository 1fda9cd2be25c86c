export const MedicineErrors = {
  MEDICINE_NOT_FOUND: {
    code: 'MEDICINE_NOT_FOUND',
    message: 'Medicine not found.',
  },
  BARCODE_TAKEN: {
    code: 'MEDICINE_BARCODE_TAKEN',
    message: 'Another medicine already uses this barcode.',
  },
  SELLING_BELOW_PURCHASE: {
    code: 'MEDICINE_SELLING_BELOW_PURCHASE',
    message: 'Selling price should not be less than purchase price.',
  },
  INVALID_QUANTITY: {
    code: 'MEDICINE_INVALID_QUANTITY',
    message: 'Quantity must be a positive whole number.',
  },
} as const;
