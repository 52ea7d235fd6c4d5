import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import {
  DiscountCodeRepository,
  type DiscountCodeData,
  type CreateDiscountCodeInput,
  type UpdateDiscountCodeInput,
} from '../discount-code.repository';
import { InMemoryStore } from './in-memory-store';

@Injectable()
export class DiscountCodeInMemoryStore extends DiscountCodeRepository {
  readonly rows = new InMemoryStore<DiscountCodeData>();

  async getByCode(code: string): Promise<DiscountCodeData | null> {
    return this.rows.find((row) => row.code === code) ?? null;
  }

  async getActiveByCode(code: string): Promise<DiscountCodeData | null> {
    return this.rows.find((row) => row.code === code && row.active) ?? null;
  }

  async getById(id: string): Promise<DiscountCodeData | null> {
    return this.rows.get(id) ?? null;
  }

  async list(activeOnly: boolean): Promise<DiscountCodeData[]> {
    return this.rows
      .values()
      .filter((row) => !activeOnly || row.active)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async create(input: CreateDiscountCodeInput): Promise<DiscountCodeData | null> {
    if (this.rows.find((row) => row.code === input.code)) {
      return null;
    }

    const now = new Date();
    const row: DiscountCodeData = {
      id: randomUUID(),
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
      uses: 0,
      notes: input.notes ?? null,
      createdBy: input.createdBy ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.id, row);
    return row;
  }

  async update(id: string, input: UpdateDiscountCodeInput): Promise<DiscountCodeData | null> {
    const current = this.rows.get(id);
    if (!current) {
      return null;
    }

    const updated: DiscountCodeData = { ...current, updatedAt: new Date() };
    for (const [key, value] of Object.entries(input)) {
      if (value !== undefined) {
        Object.assign(updated, { [key]: value });
      }
    }
    this.rows.set(id, updated);
    return updated;
  }

  async incrementUsesIfAvailable(id: string): Promise<DiscountCodeData | null> {
    // Read and write happen in the same synchronous turn, so concurrent callers cannot interleave
    const current = this.rows.get(id);
    if (!current || !current.active) {
      return null;
    }
    if (current.maxUses !== null && current.uses >= current.maxUses) {
      return null;
    }

    const updated: DiscountCodeData = { ...current, uses: current.uses + 1, updatedAt: new Date() };
    this.rows.set(id, updated);
    return updated;
  }
}
