import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitPharmacySchema1760745600000 implements MigrationInterface {
  name = 'InitPharmacySchema1760745600000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "medicines" (
        "id" SERIAL PRIMARY KEY,
        "name" varchar(100) NOT NULL,
        "category" varchar(50) NOT NULL,
        "batch_no" varchar(50) NOT NULL,
        "expiry_date" date NOT NULL,
        "quantity" integer NOT NULL DEFAULT 0,
        "purchase_price" numeric(10,2) NOT NULL DEFAULT 0,
        "selling_price" numeric(10,2) NOT NULL DEFAULT 0,
        "barcode" varchar(20) UNIQUE,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "CHK_medicines_quantity" CHECK ("quantity" >= 0)
      );
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_medicines_name" ON "medicines" ("name");
    `);
    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_medicines_category" ON "medicines" ("category");
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "sales" (
        "id" SERIAL PRIMARY KEY,
        "date" date NOT NULL,
        "items" text NOT NULL,
        "subtotal" numeric(12,2) NOT NULL DEFAULT 0,
        "discount" numeric(12,2) NOT NULL DEFAULT 0,
        "tax" numeric(12,2) NOT NULL DEFAULT 0,
        "total" numeric(12,2) NOT NULL DEFAULT 0,
        "payment_method" varchar(20) NOT NULL DEFAULT 'cash',
        "cashier_id" integer,
        "customer_name" varchar(100),
        "notes" text,
        "created_at" TIMESTAMP NOT NULL DEFAULT now()
      );
    `);

    await queryRunner.query(`
      CREATE INDEX IF NOT EXISTS "idx_sales_date" ON "sales" ("date");
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_sales_date";`);
    await queryRunner.query(`DROP TABLE IF EXISTS "sales";`);
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_medicines_category";`);
    await queryRunner.query(`DROP INDEX IF EXISTS "idx_medicines_name";`);
    await queryRunner.query(`DROP TABLE IF EXISTS "medicines";`);
  }
}
