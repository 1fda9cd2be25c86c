import { Injectable, Logger } from '@nestjs/common';
import { StockAdjustmentFailure } from './exceptions/stock-adjustment-failed.exception';

export interface StockAlert {
  raisedAt: string;
  saleId: number;
  failedMedicineId: number;
  reason: StockAdjustmentFailure['reason'];
  adjustedMedicineIds: number[];
  pendingMedicineIds: number[];
  cause?: string;
}

const MAX_KEPT_ALERTS = 100;

/**
 * Operator-facing channel for sold-but-not-decremented inventory.
 * Logs under its own context and keeps the latest alerts in memory.
 */
@Injectable()
export class StockAlertService {
  private readonly logger = new Logger('StockConsistencyAlert');
  private readonly alerts: StockAlert[] = [];

  raiseStockAdjustmentFailure(failure: StockAdjustmentFailure, cause?: unknown): StockAlert {
    const alert: StockAlert = {
      raisedAt: new Date().toISOString(),
      saleId: failure.saleId,
      failedMedicineId: failure.failedMedicineId,
      reason: failure.reason,
      adjustedMedicineIds: [...failure.adjustedMedicineIds],
      pendingMedicineIds: [...failure.pendingMedicineIds],
      ...(cause !== undefined
        ? { cause: cause instanceof Error ? cause.message : String(cause) }
        : {}),
    };

    this.alerts.unshift(alert);
    if (this.alerts.length > MAX_KEPT_ALERTS) {
      this.alerts.length = MAX_KEPT_ALERTS;
    }

    const line = [
      `sale=${alert.saleId}`,
      `failedMedicine=${alert.failedMedicineId}`,
      `reason=${alert.reason}`,
      `adjusted=[${alert.adjustedMedicineIds.join(',')}]`,
      `pending=[${alert.pendingMedicineIds.join(',')}]`,
      'SALE RECORDED BUT INVENTORY MAY BE INCONSISTENT',
    ].join(' | ');

    if (cause instanceof Error && cause.stack) {
      this.logger.error(line, cause.stack);
    } else {
      this.logger.error(line);
    }

    return alert;
  }

  recent(): StockAlert[] {
    return this.alerts.map((alert) => ({ ...alert }));
  }
}
