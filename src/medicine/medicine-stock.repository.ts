import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';

import { Medicine } from './medicine.entity';
import { MedicineErrors } from '../common/errors/medicine.errors';

/**
 * Stock mutations for medicines. Every change is a single conditional
 * UPDATE, so concurrent sales can never push a quantity below zero.
 */
@Injectable()
export class MedicineStockRepository {
  private readonly logger = new Logger(MedicineStockRepository.name);

  constructor(
    @InjectRepository(Medicine)
    private readonly medicineRepo: Repository<Medicine>,
  ) {}

  private getRepo(manager?: EntityManager): Repository<Medicine> {
    return manager ? manager.getRepository(Medicine) : this.medicineRepo;
  }

  private assertPositiveQuantity(quantity: number): void {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new BadRequestException(MedicineErrors.INVALID_QUANTITY);
    }
  }

  /**
   * Decrements stock only if at least `quantity` units are on hand.
   *
   * Resolves `false` when stock is insufficient (or the medicine is gone) at
   * the moment of the update; rejects only on storage errors.
   */
  async checkAndDecrement(
    medicineId: number,
    quantity: number,
    manager?: EntityManager,
  ): Promise<boolean> {
    this.assertPositiveQuantity(quantity);

    const result = await this.getRepo(manager)
      .createQueryBuilder()
      .update(Medicine)
      .set({ quantity: () => 'quantity - :quantity' })
      .where('id = :medicineId', { medicineId })
      .andWhere('quantity >= :quantity', { quantity })
      .execute();

    const decremented = result.affected === 1;

    if (!decremented) {
      this.logger.warn('Conditional stock decrement rejected', {
        medicineId,
        requested: quantity,
      });
    }

    return decremented;
  }

  /**
   * Adds received units. Resolves `false` when the medicine does not exist.
   */
  async increment(
    medicineId: number,
    quantity: number,
    manager?: EntityManager,
  ): Promise<boolean> {
    this.assertPositiveQuantity(quantity);

    const result = await this.getRepo(manager)
      .createQueryBuilder()
      .update(Medicine)
      .set({ quantity: () => 'quantity + :quantity' })
      .where('id = :medicineId', { medicineId })
      .setParameter('quantity', quantity)
      .execute();

    return result.affected === 1;
  }

  async getQuantity(medicineId: number, manager?: EntityManager): Promise<number | null> {
    const medicine = await this.getRepo(manager).findOne({
      where: { id: medicineId },
      select: { id: true, quantity: true },
    });

    return medicine ? Number(medicine.quantity) : null;
  }
}
