import { Column, Entity, Index } from 'typeorm';
import { AuditableEntity } from '../common/entity/auditable-base.entity';
import { numericTransformer } from '../common/transformers/numeric.transformer';

@Entity({ name: 'medicines' })
@Index('idx_medicines_name', ['name'])
@Index('idx_medicines_category', ['category'])
export class Medicine extends AuditableEntity {
  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 50 })
  category!: string;

  @Column({ name: 'batch_no', type: 'varchar', length: 50 })
  batchNo!: string;

  // YYYY-MM-DD
  @Column({ name: 'expiry_date', type: 'date' })
  expiryDate!: string;

  /**
   * Never negative. Sales only change it through
   * MedicineStockRepository.checkAndDecrement.
   */
  @Column({ type: 'integer', default: 0 })
  quantity!: number;

  @Column({
    name: 'purchase_price',
    type: 'numeric',
    precision: 10,
    scale: 2,
    default: 0,
    transformer: numericTransformer,
  })
  purchasePrice!: number;

  @Column({
    name: 'selling_price',
    type: 'numeric',
    precision: 10,
    scale: 2,
    default: 0,
    transformer: numericTransformer,
  })
  sellingPrice!: number;

  @Column({ type: 'varchar', length: 20, nullable: true, unique: true })
  barcode!: string | null;
}
