import { ConflictException } from '@nestjs/common';
import { SalesErrors } from '../../common/errors/sale.errors';
import { Sale } from '../sale.entity';

export type StockAdjustmentFailureReason = 'INSUFFICIENT_STOCK' | 'STORAGE_ERROR';

export interface StockAdjustmentFailure {
  saleId: number;
  failedMedicineId: number;
  reason: StockAdjustmentFailureReason;
  // already decremented, in cart order
  adjustedMedicineIds: number[];
  // never attempted
  pendingMedicineIds: number[];
  sale: Sale;
}

/**
 * The sale row exists but stock was only partly decremented.
 * Nothing is rolled back; an operator has to reconcile.
 */
export class StockAdjustmentFailedException extends ConflictException {
  constructor(readonly failure: StockAdjustmentFailure) {
    super({
      ...SalesErrors.STOCK_ADJUSTMENT_FAILED,
      details: failure,
    });
  }

  get sale(): Sale {
    return this.failure.sale;
  }
}
