import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import {
  And,
  Brackets,
  EntityManager,
  LessThanOrEqual,
  MoreThan,
  Repository,
} from 'typeorm';

import { Medicine } from './medicine.entity';
import { MedicineStockRepository } from './medicine-stock.repository';
import { CreateMedicineDto } from './dto/create-medicine.dto';
import { UpdateMedicineDto } from './dto/update-medicine.dto';
import { ListMedicinesQueryDto } from './dto/list-medicines.dto';
import { MedicineErrors } from '../common/errors/medicine.errors';
import {
  PaginatedResponseDto,
  PaginationMetaDto,
} from '../common/dto/paginated-response.dto';
import { addDaysYMD, todayYMD } from '../common/utils/date';

const DEFAULT_LOW_STOCK_THRESHOLD = 10;
const DEFAULT_EXPIRY_WARNING_DAYS = 30;

@Injectable()
export class MedicineService {
  private readonly logger = new Logger(MedicineService.name);

  constructor(
    @InjectRepository(Medicine)
    private readonly medicineRepo: Repository<Medicine>,
    private readonly stockRepo: MedicineStockRepository,
    private readonly config: ConfigService,
  ) {}

  private getRepo(manager?: EntityManager): Repository<Medicine> {
    return manager ? manager.getRepository(Medicine) : this.medicineRepo;
  }

  private assertPriceRelation(purchasePrice: number, sellingPrice: number): void {
    if (purchasePrice > 0 && sellingPrice > 0 && sellingPrice < purchasePrice) {
      throw new BadRequestException({
        ...MedicineErrors.SELLING_BELOW_PURCHASE,
        details: { purchasePrice, sellingPrice },
      });
    }
  }

  private async assertBarcodeFree(
    barcode: string | null | undefined,
    exceptId: number | undefined,
    manager?: EntityManager,
  ): Promise<void> {
    if (!barcode) {
      return;
    }

    const existing = await this.getRepo(manager).findOne({ where: { barcode } });
    if (existing && existing.id !== exceptId) {
      throw new ConflictException({
        ...MedicineErrors.BARCODE_TAKEN,
        details: { barcode, medicineId: existing.id },
      });
    }
  }

  // ---- Lookup ----

  async findById(id: number, manager?: EntityManager): Promise<Medicine> {
    const medicine = await this.getRepo(manager).findOne({ where: { id } });

    if (!medicine) {
      throw new NotFoundException({
        ...MedicineErrors.MEDICINE_NOT_FOUND,
        details: { medicineId: id },
      });
    }

    return medicine;
  }

  async findByBarcode(barcode: string, manager?: EntityManager): Promise<Medicine> {
    const medicine = await this.getRepo(manager).findOne({
      where: { barcode: barcode.trim() },
    });

    if (!medicine) {
      throw new NotFoundException({
        ...MedicineErrors.MEDICINE_NOT_FOUND,
        details: { barcode },
      });
    }

    return medicine;
  }

  async list(query: ListMedicinesQueryDto): Promise<PaginatedResponseDto<Medicine>> {
    const qb = this.medicineRepo
      .createQueryBuilder('medicine')
      .orderBy('medicine.name', 'ASC')
      .addOrderBy('medicine.id', 'ASC')
      .skip(query.skip)
      .take(query.limit);

    const search = query.search?.trim();
    if (search) {
      const term = `%${search.toLowerCase()}%`;
      qb.andWhere(
        new Brackets((where) => {
          where
            .where('LOWER(medicine.name) LIKE :term', { term })
            .orWhere('LOWER(medicine.category) LIKE :term', { term })
            .orWhere('LOWER(medicine.batchNo) LIKE :term', { term })
            .orWhere('LOWER(medicine.barcode) LIKE :term', { term });
        }),
      );
    }

    if (query.category) {
      qb.andWhere('medicine.category = :category', { category: query.category });
    }

    if (query.inStockOnly) {
      qb.andWhere('medicine.quantity > 0');
    }

    const [medicines, total] = await qb.getManyAndCount();

    return new PaginatedResponseDto(
      medicines,
      new PaginationMetaDto(total, query.page, query.limit),
    );
  }

  async listCategories(): Promise<string[]> {
    const rows = await this.medicineRepo
      .createQueryBuilder('medicine')
      .select('DISTINCT medicine.category', 'category')
      .orderBy('category', 'ASC')
      .getRawMany<{ category: string }>();

    return rows.map((r) => r.category);
  }

  async listLowStock(threshold?: number): Promise<Medicine[]> {
    const limit =
      threshold ??
      Number(this.config.get<string>('LOW_STOCK_THRESHOLD') ?? DEFAULT_LOW_STOCK_THRESHOLD);

    return this.medicineRepo.find({
      where: { quantity: LessThanOrEqual(limit) },
      order: { quantity: 'ASC', name: 'ASC' },
    });
  }

  async listExpiringSoon(days?: number): Promise<Medicine[]> {
    const window =
      days ??
      Number(this.config.get<string>('EXPIRY_WARNING_DAYS') ?? DEFAULT_EXPIRY_WARNING_DAYS);

    return this.medicineRepo.find({
      // not yet expired, expiring within the window
      where: { expiryDate: And(MoreThan(todayYMD()), LessThanOrEqual(addDaysYMD(window))) },
      order: { expiryDate: 'ASC', name: 'ASC' },
    });
  }

  async listExpired(): Promise<Medicine[]> {
    return this.medicineRepo.find({
      where: { expiryDate: LessThanOrEqual(todayYMD()) },
      order: { expiryDate: 'ASC', name: 'ASC' },
    });
  }

  // ---- Inventory add / edit / delete ----

  async create(dto: CreateMedicineDto): Promise<Medicine> {
    this.assertPriceRelation(dto.purchasePrice, dto.sellingPrice);
    await this.assertBarcodeFree(dto.barcode, undefined);

    const medicine = this.medicineRepo.create({
      name: dto.name,
      category: dto.category,
      batchNo: dto.batchNo,
      expiryDate: dto.expiryDate,
      quantity: dto.quantity,
      purchasePrice: dto.purchasePrice,
      sellingPrice: dto.sellingPrice,
      barcode: dto.barcode ? dto.barcode : null,
    });

    const saved = await this.medicineRepo.save(medicine);
    this.logger.log(`Medicine added: id=${saved.id} name="${saved.name}" qty=${saved.quantity}`);

    return saved;
  }

  async update(id: number, dto: UpdateMedicineDto): Promise<Medicine> {
    const medicine = await this.findById(id);

    this.assertPriceRelation(
      dto.purchasePrice ?? medicine.purchasePrice,
      dto.sellingPrice ?? medicine.sellingPrice,
    );

    if (dto.barcode !== undefined) {
      await this.assertBarcodeFree(dto.barcode, id);
    }

    this.medicineRepo.merge(medicine, {
      ...dto,
      ...(dto.barcode !== undefined ? { barcode: dto.barcode ? dto.barcode : null } : {}),
    });

    const saved = await this.medicineRepo.save(medicine);
    this.logger.log(`Medicine updated: id=${saved.id}`);

    return saved;
  }

  async remove(id: number): Promise<void> {
    const medicine = await this.findById(id);
    await this.medicineRepo.remove(medicine);
    this.logger.log(`Medicine deleted: id=${id} name="${medicine.name}"`);
  }

  async receiveStock(id: number, quantity: number): Promise<Medicine> {
    const applied = await this.stockRepo.increment(id, quantity);

    if (!applied) {
      throw new NotFoundException({
        ...MedicineErrors.MEDICINE_NOT_FOUND,
        details: { medicineId: id },
      });
    }

    this.logger.log(`Stock received: id=${id} +${quantity}`);
    return this.findById(id);
  }
}
