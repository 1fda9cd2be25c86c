import {
  BadRequestException,
  ConflictException,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Medicine } from './medicine.entity';
import { MedicineService } from './medicine.service';
import { MedicineStockRepository } from './medicine-stock.repository';
import { CreateMedicineDto } from './dto/create-medicine.dto';
import { ListMedicinesQueryDto } from './dto/list-medicines.dto';
import { addDaysYMD } from '../common/utils/date';
import {
  createTestDataSource,
  seedMedicine,
} from '../common/testing/sqlite-data-source';

function createDto(overrides: Partial<CreateMedicineDto> = {}): CreateMedicineDto {
  return Object.assign(new CreateMedicineDto(), {
    name: 'Paracetamol 500mg',
    category: 'Analgesic',
    batchNo: 'PCM-001',
    expiryDate: '2099-06-30',
    quantity: 50,
    purchasePrice: 1.2,
    sellingPrice: 2.5,
    ...overrides,
  });
}

function listQuery(values: Partial<ListMedicinesQueryDto> = {}): ListMedicinesQueryDto {
  return Object.assign(new ListMedicinesQueryDto(), values);
}

describe('MedicineService', () => {
  let dataSource: DataSource;
  let service: MedicineService;

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    const medicineRepo = dataSource.getRepository(Medicine);
    service = new MedicineService(
      medicineRepo,
      new MedicineStockRepository(medicineRepo),
      new ConfigService({ LOW_STOCK_THRESHOLD: '5', EXPIRY_WARNING_DAYS: '30' }),
    );
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('create', () => {
    it('should store a medicine and find it again by id and barcode', async () => {
      const created = await service.create(createDto({ barcode: 'PCM500A01' }));

      const byId = await service.findById(created.id);
      expect(byId).toMatchObject({
        name: 'Paracetamol 500mg',
        quantity: 50,
        purchasePrice: 1.2,
        sellingPrice: 2.5,
        barcode: 'PCM500A01',
      });

      const byBarcode = await service.findByBarcode(' PCM500A01 ');
      expect(byBarcode.id).toBe(created.id);
    });

    it('should refuse a selling price below the purchase price', async () => {
      await expect(
        service.create(createDto({ purchasePrice: 3, sellingPrice: 2 })),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('should refuse a barcode already in use', async () => {
      const first = await service.create(createDto({ barcode: 'PCM500A01' }));

      const attempt = service.create(createDto({ name: 'Other', barcode: 'PCM500A01' }));

      await expect(attempt).rejects.toBeInstanceOf(ConflictException);
      await expect(attempt).rejects.toMatchObject({
        response: {
          code: 'MEDICINE_BARCODE_TAKEN',
          details: { barcode: 'PCM500A01', medicineId: first.id },
        },
      });
    });
  });

  describe('findById', () => {
    it('should fail with NotFound for an unknown id', async () => {
      const attempt = service.findById(999);

      await expect(attempt).rejects.toBeInstanceOf(NotFoundException);
      await expect(attempt).rejects.toMatchObject({
        response: { code: 'MEDICINE_NOT_FOUND', details: { medicineId: 999 } },
      });
    });
  });

  describe('update and remove', () => {
    it('should allow keeping its own barcode on update', async () => {
      const created = await service.create(createDto({ barcode: 'PCM500A01' }));

      const updated = await service.update(created.id, {
        barcode: 'PCM500A01',
        sellingPrice: 3,
      });

      expect(updated).toMatchObject({ barcode: 'PCM500A01', sellingPrice: 3 });
    });

    it('should check the price relation against stored values', async () => {
      const created = await service.create(createDto());

      await expect(
        service.update(created.id, { sellingPrice: 1 }),
      ).rejects.toMatchObject({ response: { code: 'MEDICINE_SELLING_BELOW_PURCHASE' } });
    });

    it('should delete a medicine', async () => {
      const created = await service.create(createDto());

      await service.remove(created.id);

      await expect(service.findById(created.id)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('receiveStock', () => {
    it('should add to the stock on hand', async () => {
      const created = await service.create(createDto({ quantity: 4 }));

      const received = await service.receiveStock(created.id, 6);

      expect(received.quantity).toBe(10);
    });

    it('should fail with NotFound for an unknown id', async () => {
      await expect(service.receiveStock(999, 1)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('listing', () => {
    beforeEach(async () => {
      await seedMedicine(dataSource, { name: 'Paracetamol 500mg', category: 'Analgesic', quantity: 40, sellingPrice: 2 });
      await seedMedicine(dataSource, { name: 'Amoxicillin 250mg', category: 'Antibiotic', quantity: 0, sellingPrice: 6 });
      await seedMedicine(dataSource, { name: 'Ibuprofen 400mg', category: 'Analgesic', quantity: 3, sellingPrice: 3, barcode: 'IBU400X01' });
    });

    it('should search by name case-insensitively', async () => {
      const page = await service.list(listQuery({ search: 'PARA' }));

      expect(page.data.map((m) => m.name)).toEqual(['Paracetamol 500mg']);
      expect(page.meta).toMatchObject({ total: 1, page: 1, limit: 20, totalPages: 1, hasMore: false });
    });

    it('should search by barcode', async () => {
      const page = await service.list(listQuery({ search: 'ibu400' }));

      expect(page.data.map((m) => m.name)).toEqual(['Ibuprofen 400mg']);
    });

    it('should filter by category and stock, ordered by name', async () => {
      const analgesics = await service.list(listQuery({ category: 'Analgesic' }));
      expect(analgesics.data.map((m) => m.name)).toEqual(['Ibuprofen 400mg', 'Paracetamol 500mg']);

      const inStock = await service.list(listQuery({ inStockOnly: true }));
      expect(inStock.data.map((m) => m.name)).toEqual(['Ibuprofen 400mg', 'Paracetamol 500mg']);
    });

    it('should page results', async () => {
      const page = await service.list(listQuery({ page: 2, limit: 2 }));

      expect(page.data.map((m) => m.name)).toEqual(['Paracetamol 500mg']);
      expect(page.meta).toMatchObject({ total: 3, totalPages: 2, hasMore: false });
    });

    it('should list distinct categories in order', async () => {
      await expect(service.listCategories()).resolves.toEqual(['Analgesic', 'Antibiotic']);
    });

    it('should list low stock using the configured threshold', async () => {
      const low = await service.listLowStock();

      expect(low.map((m) => m.name)).toEqual(['Amoxicillin 250mg', 'Ibuprofen 400mg']);
    });
  });

  describe('expiry', () => {
    it('should separate expired from soon-expiring stock', async () => {
      await seedMedicine(dataSource, { name: 'Expired Syrup', quantity: 5, sellingPrice: 4, expiryDate: addDaysYMD(-3) });
      await seedMedicine(dataSource, { name: 'Ends Today', quantity: 5, sellingPrice: 4, expiryDate: addDaysYMD(0) });
      await seedMedicine(dataSource, { name: 'Next Week', quantity: 5, sellingPrice: 4, expiryDate: addDaysYMD(7) });
      await seedMedicine(dataSource, { name: 'Next Year', quantity: 5, sellingPrice: 4, expiryDate: addDaysYMD(365) });

      const expired = await service.listExpired();
      expect(expired.map((m) => m.name)).toEqual(['Expired Syrup', 'Ends Today']);

      const soon = await service.listExpiringSoon();
      expect(soon.map((m) => m.name)).toEqual(['Next Week']);

      const wider = await service.listExpiringSoon(400);
      expect(wider.map((m) => m.name)).toEqual(['Next Week', 'Next Year']);
    });
  });
});
