import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { CartService } from './cart.service';
import { CartSessionService } from './cart-session.service';
import { Medicine } from '../medicine/medicine.entity';
import { MedicineService } from '../medicine/medicine.service';
import { MedicineStockRepository } from '../medicine/medicine-stock.repository';
import {
  createTestDataSource,
  seedMedicine,
} from '../common/testing/sqlite-data-source';
import { createTestContext, TestContext } from '../common/testing/cls-context';

describe('CartService', () => {
  let dataSource: DataSource;
  let context: TestContext;
  let sessions: CartSessionService;
  let service: CartService;
  let paracetamol: Medicine;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    const medicineRepo = dataSource.getRepository(Medicine);
    const config = new ConfigService({ DEFAULT_TAX_RATE: '5' });

    context = createTestContext();
    sessions = new CartSessionService(config);
    service = new CartService(
      sessions,
      new MedicineService(medicineRepo, new MedicineStockRepository(medicineRepo), config),
      context.appContext,
    );

    paracetamol = await seedMedicine(dataSource, { name: 'Paracetamol 500mg', quantity: 10, sellingPrice: 8 });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('should keep one cart per session id', async () => {
    await context.inSession('till-1', () => service.addItem(paracetamol.id, 2));
    await context.inSession('till-2', () => service.addItem(paracetamol.id, 1));

    const first = await context.inSession('till-1', async () => service.summary());
    const second = await context.inSession('till-2', async () => service.summary());

    expect(first).toMatchObject({ sessionId: 'till-1', itemCount: 1, totalQuantity: 2 });
    expect(second).toMatchObject({ sessionId: 'till-2', itemCount: 1, totalQuantity: 1 });
    expect(sessions.activeSessionCount).toBe(2);
  });

  it('should start new carts with the configured tax rate', async () => {
    await context.inSession('till-1', () => service.addItem(paracetamol.id, 5));

    const summary = await context.inSession('till-1', async () => service.summary());

    expect(summary.taxRatePercent).toBe(5);
    expect(summary.totals).toEqual({ subtotal: 40, discount: 0, tax: 2, total: 42 });
  });

  it('should check quantities against the live stock record', async () => {
    await dataSource.getRepository(Medicine).update(paracetamol.id, { quantity: 3 });

    const attempt = context.inSession('till-1', () => service.addItem(paracetamol.id, 4));

    await expect(attempt).rejects.toBeInstanceOf(BadRequestException);
    await expect(attempt).rejects.toMatchObject({
      response: { code: 'CART_INSUFFICIENT_STOCK', details: { available: 3, requested: 4 } },
    });
  });

  it('should fail with NotFound for an unknown medicine', async () => {
    const attempt = context.inSession('till-1', () => service.addItem(999, 1));

    await expect(attempt).rejects.toBeInstanceOf(NotFoundException);
  });

  it('should remove the line when updating to zero', async () => {
    const result = await context.inSession('till-1', async () => {
      await service.addItem(paracetamol.id, 2);
      return service.updateQuantity(paracetamol.id, 0);
    });

    expect(result).toBeNull();
    const summary = await context.inSession('till-1', async () => service.summary());
    expect(summary.lines).toEqual([]);
  });

  it('should require a session id', async () => {
    const attempt = context.inSession(undefined, async () => service.summary());

    await expect(attempt).rejects.toMatchObject({
      response: { code: 'CONTEXT_SESSION_NOT_FOUND' },
    });
  });

  it('should forget a discarded session', async () => {
    await context.inSession('till-1', () => service.addItem(paracetamol.id, 2));

    const removed = await context.inSession('till-1', async () => service.discardSession());
    const summary = await context.inSession('till-1', async () => service.summary());

    expect(removed).toBe(true);
    expect(summary.itemCount).toBe(0);
  });

  it('should show an empty cart for an unknown session without storing one', async () => {
    const summary = await context.inSession('till-9', async () => service.summary());

    expect(summary).toMatchObject({
      sessionId: 'till-9',
      itemCount: 0,
      lines: [],
      taxRatePercent: 5,
      totals: { subtotal: 0, discount: 0, tax: 0, total: 0 },
    });
    expect(sessions.activeSessionCount).toBe(0);
  });
});
