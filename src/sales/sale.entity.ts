import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { numericTransformer } from '../common/transformers/numeric.transformer';
import { PaymentMethod } from '../cart/cart.types';

/**
 * Copy of a cart line taken when the sale was recorded.
 */
export interface SaleItem {
  medicineId: number;
  name: string;
  quantity: number;
  unitPrice: number;
  totalPrice: number;
  batchNo: string | null;
}

const moneyColumn = {
  type: 'numeric',
  precision: 12,
  scale: 2,
  default: 0,
  transformer: numericTransformer,
} as const;

/**
 * Append-only: rows are written once by the sale commit and never updated.
 */
@Entity({ name: 'sales' })
@Index('idx_sales_date', ['date'])
export class Sale {
  @PrimaryGeneratedColumn()
  id!: number;

  // YYYY-MM-DD
  @Column({ type: 'date' })
  date!: string;

  @Column({ type: 'simple-json' })
  items!: SaleItem[];

  @Column(moneyColumn)
  subtotal!: number;

  @Column(moneyColumn)
  discount!: number;

  @Column(moneyColumn)
  tax!: number;

  @Column(moneyColumn)
  total!: number;

  @Column({ name: 'payment_method', type: 'varchar', length: 20, default: 'cash' })
  paymentMethod!: PaymentMethod;

  @Column({ name: 'cashier_id', type: 'integer', nullable: true })
  cashierId!: number | null;

  @Column({ name: 'customer_name', type: 'varchar', length: 100, nullable: true })
  customerName!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;
}
