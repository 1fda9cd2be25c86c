import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { SalesService } from './sales.service';
import { SaleStore } from './sale.store';
import { Sale } from './sale.entity';
import { SaleCommitService } from './sale-commit.service';
import { StockAlertService } from './stock-alert.service';
import { CartService } from '../cart/cart.service';
import { CartSessionService } from '../cart/cart-session.service';
import { Medicine } from '../medicine/medicine.entity';
import { MedicineService } from '../medicine/medicine.service';
import { MedicineStockRepository } from '../medicine/medicine-stock.repository';
import { todayYMD } from '../common/utils/date';
import {
  createTestDataSource,
  seedMedicine,
} from '../common/testing/sqlite-data-source';
import { createTestContext, TestContext } from '../common/testing/cls-context';

describe('SalesService', () => {
  let dataSource: DataSource;
  let context: TestContext;
  let saleStore: SaleStore;
  let cartService: CartService;
  let service: SalesService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    context = createTestContext();

    const medicineRepo = dataSource.getRepository(Medicine);
    const stockRepo = new MedicineStockRepository(medicineRepo);
    const config = new ConfigService({});

    saleStore = new SaleStore(dataSource.getRepository(Sale));
    cartService = new CartService(
      new CartSessionService(config),
      new MedicineService(medicineRepo, stockRepo, config),
      context.appContext,
    );
    service = new SalesService(
      saleStore,
      new SaleCommitService(saleStore, stockRepo, new StockAlertService()),
      cartService,
    );
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  const saveSale = (date: string, total: number) =>
    dataSource.getRepository(Sale).save({
      date,
      items: [{ medicineId: 1, name: 'Aspirin', quantity: 1, unitPrice: total, totalPrice: total, batchNo: null }],
      subtotal: total,
      discount: 0,
      tax: 0,
      total,
      paymentMethod: 'cash',
      cashierId: null,
      customerName: null,
      notes: null,
    });

  it('should complete the session cart', async () => {
    const medicine = await seedMedicine(dataSource, { name: 'Aspirin', quantity: 10, sellingPrice: 2.5 });

    const sale = await context.inSession('till-1', async () => {
      await cartService.addItem(medicine.id, 4);
      return service.checkout({ customerName: 'Walk-in' });
    });

    expect(sale).toMatchObject({ date: todayYMD(), total: 10, customerName: 'Walk-in' });

    const summary = await context.inSession('till-1', async () => cartService.summary());
    expect(summary.itemCount).toBe(0);
    await expect(service.findOne(sale.id)).resolves.toMatchObject({ id: sale.id, total: 10 });
  });

  it('should fail with NotFound for an unknown sale', async () => {
    const attempt = service.findOne(404);

    await expect(attempt).rejects.toBeInstanceOf(NotFoundException);
    await expect(attempt).rejects.toMatchObject({
      response: { code: 'SALE_NOT_FOUND', details: { saleId: 404 } },
    });
  });

  it('should list sales inclusively within a date range, newest first', async () => {
    await saveSale('2026-10-01', 5);
    await saveSale('2026-10-15', 7);
    await saveSale('2026-10-31', 9);
    await saveSale('2026-11-01', 11);

    const sales = await service.listByDateRange('2026-10-01', '2026-10-31');

    expect(sales.map((s) => s.date)).toEqual(['2026-10-31', '2026-10-15', '2026-10-01']);
  });

  it('should reject a range that ends before it starts', async () => {
    const attempt = service.listByDateRange('2026-10-31', '2026-10-01');

    await expect(attempt).rejects.toBeInstanceOf(BadRequestException);
    await expect(attempt).rejects.toMatchObject({
      response: { code: 'SALE_INVALID_DATE_RANGE' },
    });
  });

  it('should list the sales of a single day', async () => {
    await saveSale('2026-10-17', 5);
    await saveSale('2026-10-18', 7);

    const sales = await service.listDaily('2026-10-18');

    expect(sales.map((s) => s.total)).toEqual([7]);
  });

  it('should limit the recent sales', async () => {
    await saveSale('2026-10-16', 1);
    await saveSale('2026-10-17', 2);
    await saveSale('2026-10-18', 3);

    const recent = await service.listRecent(2);

    expect(recent).toHaveLength(2);
  });
});
