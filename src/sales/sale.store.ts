import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, EntityManager, Repository } from 'typeorm';

import { Sale } from './sale.entity';
import { SaleCandidate } from './dto/sale-candidate.dto';

/**
 * Durable, append-only store of committed sales.
 * Storage errors propagate to the caller untouched.
 */
@Injectable()
export class SaleStore {
  constructor(
    @InjectRepository(Sale)
    private readonly saleRepo: Repository<Sale>,
  ) {}

  private getRepo(manager?: EntityManager): Repository<Sale> {
    return manager ? manager.getRepository(Sale) : this.saleRepo;
  }

  async save(candidate: SaleCandidate, manager?: EntityManager): Promise<Sale> {
    const repo = this.getRepo(manager);

    const sale = repo.create({
      date: candidate.date,
      items: candidate.items.map((item) => ({
        medicineId: item.medicineId,
        name: item.name,
        quantity: item.quantity,
        unitPrice: item.unitPrice,
        totalPrice: item.totalPrice,
        batchNo: item.batchNo ?? null,
      })),
      subtotal: candidate.subtotal,
      discount: candidate.discount,
      tax: candidate.tax,
      total: candidate.total,
      paymentMethod: candidate.paymentMethod,
      cashierId: candidate.cashierId ?? null,
      customerName: candidate.customerName ?? null,
      notes: candidate.notes ?? null,
    });

    return repo.save(sale);
  }

  async findById(id: number, manager?: EntityManager): Promise<Sale | null> {
    return this.getRepo(manager).findOne({ where: { id } });
  }

  /**
   * Inclusive on both ends; newest first.
   */
  async listByDateRange(from: string, to: string, manager?: EntityManager): Promise<Sale[]> {
    return this.getRepo(manager).find({
      where: { date: Between(from, to) },
      order: { date: 'DESC', createdAt: 'DESC', id: 'DESC' },
    });
  }

  async listRecent(limit: number, manager?: EntityManager): Promise<Sale[]> {
    return this.getRepo(manager).find({
      order: { createdAt: 'DESC', id: 'DESC' },
      take: limit,
    });
  }
}
