import { DataSource } from 'typeorm';
import { Medicine } from '../../medicine/medicine.entity';
import { Sale } from '../../sales/sale.entity';

/**
 * Fresh in-memory database with the application schema, for specs.
 */
export async function createTestDataSource(): Promise<DataSource> {
  const dataSource = new DataSource({
    type: 'better-sqlite3',
    database: ':memory:',
    entities: [Medicine, Sale],
    synchronize: true,
    logging: false,
  });

  return dataSource.initialize();
}

export interface MedicineSeed {
  name: string;
  quantity: number;
  sellingPrice: number;
  purchasePrice?: number;
  category?: string;
  batchNo?: string;
  expiryDate?: string;
  barcode?: string | null;
}

export async function seedMedicine(dataSource: DataSource, seed: MedicineSeed): Promise<Medicine> {
  const repo = dataSource.getRepository(Medicine);

  return repo.save(
    repo.create({
      name: seed.name,
      category: seed.category ?? 'General',
      batchNo: seed.batchNo ?? 'BATCH-001',
      expiryDate: seed.expiryDate ?? '2099-12-31',
      quantity: seed.quantity,
      purchasePrice: seed.purchasePrice ?? 0,
      sellingPrice: seed.sellingPrice,
      barcode: seed.barcode ?? null,
    }),
  );
}
