import { Injectable, Inject, Logger } from '@nestjs/common';
import { and, desc, eq, isNull, or, sql } from 'drizzle-orm';
import {
  DiscountCodeRepository,
  type DiscountCodeData,
  type CreateDiscountCodeInput,
  type UpdateDiscountCodeInput,
} from '../discount-code.repository';
import { discountCodes } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type DrizzleExecutor } from '@/infrastructure/database/database.module';

@Injectable()
export class DiscountCodeDrizzleStore extends DiscountCodeRepository {
  private readonly logger = new Logger(DiscountCodeDrizzleStore.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: DrizzleExecutor,
  ) {
    super();
  }

  private mapToDiscountCodeData(row: typeof discountCodes.$inferSelect): DiscountCodeData {
    return {
      id: row.id,
      code: row.code,
      description: row.description,
      discountType: row.discountType,
      discountValue: row.discountValue,
      minOrderAmount: row.minOrderAmount,
      maxDiscountAmount: row.maxDiscountAmount,
      active: row.active,
      startsAt: row.startsAt,
      expiresAt: row.expiresAt,
      maxUses: row.maxUses,
      uses: row.uses,
      notes: row.notes,
      createdBy: row.createdBy,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async getByCode(code: string): Promise<DiscountCodeData | null> {
    const result = await this.db
      .select()
      .from(discountCodes)
      .where(eq(discountCodes.code, code))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return this.mapToDiscountCodeData(result[0]);
  }

  async getActiveByCode(code: string): Promise<DiscountCodeData | null> {
    const result = await this.db
      .select()
      .from(discountCodes)
      .where(and(eq(discountCodes.code, code), eq(discountCodes.active, true)))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return this.mapToDiscountCodeData(result[0]);
  }

  async getById(id: string): Promise<DiscountCodeData | null> {
    const result = await this.db
      .select()
      .from(discountCodes)
      .where(eq(discountCodes.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return this.mapToDiscountCodeData(result[0]);
  }

  async list(activeOnly: boolean): Promise<DiscountCodeData[]> {
    const result = await this.db
      .select()
      .from(discountCodes)
      .where(activeOnly ? eq(discountCodes.active, true) : undefined)
      .orderBy(desc(discountCodes.createdAt));

    return result.map((row) => this.mapToDiscountCodeData(row));
  }

  async create(input: CreateDiscountCodeInput): Promise<DiscountCodeData | null> {
    const result = await this.db
      .insert(discountCodes)
      .values({
        code: input.code,
        description: input.description ?? null,
        discountType: input.discountType,
        discountValue: input.discountValue,
        minOrderAmount: input.minOrderAmount ?? null,
        maxDiscountAmount: input.maxDiscountAmount ?? null,
        active: input.active ?? true,
        startsAt: input.startsAt ?? null,
        expiresAt: input.expiresAt ?? null,
        maxUses: input.maxUses ?? null,
        notes: input.notes ?? null,
        createdBy: input.createdBy ?? null,
      })
      .onConflictDoNothing({ target: discountCodes.code })
      .returning();

    if (result.length === 0) {
      return null;
    }

    this.logger.log(`Created discount code ${input.code}`);
    return this.mapToDiscountCodeData(result[0]);
  }

  async update(id: string, input: UpdateDiscountCodeInput): Promise<DiscountCodeData | null> {
    const result = await this.db
      .update(discountCodes)
      .set({ ...input, updatedAt: new Date() })
      .where(eq(discountCodes.id, id))
      .returning();

    if (result.length === 0) {
      return null;
    }

    return this.mapToDiscountCodeData(result[0]);
  }

  async incrementUsesIfAvailable(id: string): Promise<DiscountCodeData | null> {
    const result = await this.db
      .update(discountCodes)
      .set({
        uses: sql`${discountCodes.uses} + 1`,
        updatedAt: new Date(),
      })
      .where(
        and(
          eq(discountCodes.id, id),
          eq(discountCodes.active, true),
          or(isNull(discountCodes.maxUses), sql`${discountCodes.uses} < ${discountCodes.maxUses}`),
        ),
      )
      .returning();

    if (result.length === 0) {
      return null;
    }

    this.logger.log(`Incremented uses for discount code ${id} to ${result[0].uses}`);
    return this.mapToDiscountCodeData(result[0]);
  }
}
