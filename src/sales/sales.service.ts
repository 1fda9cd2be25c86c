import { BadRequestException, Injectable, NotFoundException } from '@nestjs/common';

import { Sale } from './sale.entity';
import { SaleStore } from './sale.store';
import { SaleCommitService } from './sale-commit.service';
import { CompleteSaleDto } from './dto/complete-sale.dto';
import { CartService } from '../cart/cart.service';
import { SalesErrors } from '../common/errors/sale.errors';
import { todayYMD } from '../common/utils/date';

@Injectable()
export class SalesService {
  constructor(
    private readonly saleStore: SaleStore,
    private readonly saleCommit: SaleCommitService,
    private readonly cartService: CartService,
  ) {}

  // ---- Complete the session's cart ----

  async checkout(dto: CompleteSaleDto): Promise<Sale> {
    return this.saleCommit.complete(this.cartService.getCart(), {
      cashierId: dto.cashierId,
      customerName: dto.customerName,
      notes: dto.notes,
    });
  }

  // ---- Queries ----

  async findOne(id: number): Promise<Sale> {
    const sale = await this.saleStore.findById(id);

    if (!sale) {
      throw new NotFoundException({
        ...SalesErrors.SALE_NOT_FOUND,
        details: { saleId: id },
      });
    }

    return sale;
  }

  async listByDateRange(from: string, to: string): Promise<Sale[]> {
    if (from > to) {
      throw new BadRequestException({
        ...SalesErrors.INVALID_DATE_RANGE,
        details: { from, to },
      });
    }

    return this.saleStore.listByDateRange(from, to);
  }

  async listDaily(date?: string): Promise<Sale[]> {
    const day = date ?? todayYMD();
    return this.saleStore.listByDateRange(day, day);
  }

  async listRecent(limit: number): Promise<Sale[]> {
    return this.saleStore.listRecent(limit);
  }
}
