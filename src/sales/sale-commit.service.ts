import {
  BadRequestException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

import { Sale } from './sale.entity';
import { SaleStore } from './sale.store';
import { SaleCandidate } from './dto/sale-candidate.dto';
import { StockAlertService } from './stock-alert.service';
import {
  StockAdjustmentFailedException,
  StockAdjustmentFailure,
} from './exceptions/stock-adjustment-failed.exception';
import { CartEngine } from '../cart/cart-engine';
import { CartSnapshot } from '../cart/cart.types';
import { MedicineStockRepository } from '../medicine/medicine-stock.repository';
import { SalesErrors } from '../common/errors/sale.errors';
import { todayYMD } from '../common/utils/date';
import { flattenValidationErrors } from '../common/utils/validation';

export enum SaleCommitPhase {
  IDLE = 'IDLE',
  VALIDATING = 'VALIDATING',
  PERSISTING = 'PERSISTING',
  ADJUSTING_STOCK = 'ADJUSTING_STOCK',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

export interface CompleteSaleOptions {
  cashierId?: number | null;
  customerName?: string | null;
  notes?: string | null;
  // YYYY-MM-DD, defaults to today
  date?: string;
}

/**
 * Turns a cart into a recorded sale:
 * VALIDATING -> PERSISTING -> ADJUSTING_STOCK -> DONE, or FAILED.
 *
 * Stock is decremented line by line after the sale row is written, each
 * decrement being one conditional update. There is no transaction spanning
 * the lines: a decrement that fails part-way leaves the sale and the earlier
 * decrements in place and raises StockAdjustmentFailedException. The cart is
 * only cleared on full success.
 *
 * The cart stays locked for checkout from the first phase until the commit
 * settles, so it yields one sale attempt and no edit can land between the
 * snapshot and the clear.
 */
@Injectable()
export class SaleCommitService {
  private readonly logger = new Logger(SaleCommitService.name);

  constructor(
    private readonly saleStore: SaleStore,
    private readonly stockRepo: MedicineStockRepository,
    private readonly stockAlerts: StockAlertService,
  ) {}

  async complete(cart: CartEngine, options: CompleteSaleOptions = {}): Promise<Sale> {
    let phase = SaleCommitPhase.IDLE;
    const enter = (next: SaleCommitPhase) => {
      this.logger.debug(`Sale commit ${phase} -> ${next}`);
      phase = next;
    };

    // second checkout and cart edits fail with 409 until released
    cart.beginCheckout();

    try {
      return await this.run(cart, options, enter);
    } finally {
      cart.endCheckout();
    }
  }

  private async run(
    cart: CartEngine,
    options: CompleteSaleOptions,
    enter: (next: SaleCommitPhase) => void,
  ): Promise<Sale> {
    // ---- 1) Validating ----
    enter(SaleCommitPhase.VALIDATING);

    if (cart.isEmpty) {
      enter(SaleCommitPhase.FAILED);
      throw new BadRequestException(SalesErrors.EMPTY_CART);
    }

    const candidate = this.buildCandidate(cart.snapshot(), options);
    const errors = flattenValidationErrors(validateSync(candidate));

    if (errors.length > 0) {
      enter(SaleCommitPhase.FAILED);
      this.logger.error(`Sale validation failed: ${errors.join('; ')}`);
      throw new BadRequestException({
        ...SalesErrors.VALIDATION_FAILED,
        details: { errors },
      });
    }

    // ---- 2) Persisting ----
    enter(SaleCommitPhase.PERSISTING);

    let sale: Sale;
    try {
      sale = await this.saleStore.save(candidate);
    } catch (error) {
      enter(SaleCommitPhase.FAILED);
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to save sale: ${reason}`,
        error instanceof Error && error.stack ? error.stack : reason,
      );
      throw new ServiceUnavailableException({
        ...SalesErrors.PERSIST_FAILED,
        details: { reason },
      });
    }

    // ---- 3) Adjusting stock ----
    enter(SaleCommitPhase.ADJUSTING_STOCK);

    const adjustedMedicineIds: number[] = [];

    for (const [index, item] of sale.items.entries()) {
      let decremented = false;
      let cause: unknown = undefined;

      try {
        decremented = await this.stockRepo.checkAndDecrement(item.medicineId, item.quantity);
      } catch (error) {
        cause = error;
      }

      if (!decremented) {
        enter(SaleCommitPhase.FAILED);

        const failure: StockAdjustmentFailure = {
          saleId: sale.id,
          failedMedicineId: item.medicineId,
          reason: cause === undefined ? 'INSUFFICIENT_STOCK' : 'STORAGE_ERROR',
          adjustedMedicineIds: [...adjustedMedicineIds],
          pendingMedicineIds: sale.items.slice(index + 1).map((rest) => rest.medicineId),
          sale,
        };

        this.stockAlerts.raiseStockAdjustmentFailure(failure, cause);
        throw new StockAdjustmentFailedException(failure);
      }

      adjustedMedicineIds.push(item.medicineId);
    }

    // ---- 4) Done ----
    enter(SaleCommitPhase.DONE);
    cart.endCheckout();
    cart.clear();

    this.logger.log(
      `Sale completed: id=${sale.id} items=${sale.items.length} total=${sale.total.toFixed(2)} payment=${sale.paymentMethod}`,
    );

    return sale;
  }

  private buildCandidate(snapshot: CartSnapshot, options: CompleteSaleOptions): SaleCandidate {
    const customerName = options.customerName?.trim();
    const notes = options.notes?.trim();

    return plainToInstance(SaleCandidate, {
      date: options.date ?? todayYMD(),
      items: snapshot.lines.map((line) => ({
        medicineId: line.medicineId,
        name: line.name,
        quantity: line.quantity,
        unitPrice: line.unitPrice,
        totalPrice: line.totalPrice,
        batchNo: line.batchNo,
      })),
      subtotal: snapshot.totals.subtotal,
      discount: snapshot.totals.discount,
      tax: snapshot.totals.tax,
      total: snapshot.totals.total,
      paymentMethod: snapshot.paymentMethod,
      cashierId: options.cashierId ?? null,
      customerName: customerName ? customerName : null,
      notes: notes ? notes : null,
    });
  }
}
