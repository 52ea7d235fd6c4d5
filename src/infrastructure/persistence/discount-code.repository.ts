import type { Cents, DiscountType } from '@/domain/types/discount.types';

/**
 * Discount code data structure
 */
export interface DiscountCodeData {
  id: string;
  code: string;
  description: string | null;
  discountType: DiscountType;
  discountValue: number;
  // Bounds, in cents
  minOrderAmount: Cents | null;
  maxDiscountAmount: Cents | null;
  // Validity
  active: boolean;
  startsAt: Date | null;
  expiresAt: Date | null;
  // Limits
  maxUses: number | null;
  uses: number;
  notes: string | null;
  createdBy: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input for creating a discount code; `code` must already be normalized
 */
export interface CreateDiscountCodeInput {
  code: string;
  description?: string | null;
  discountType: DiscountType;
  discountValue: number;
  minOrderAmount?: Cents | null;
  maxDiscountAmount?: Cents | null;
  active?: boolean;
  startsAt?: Date | null;
  expiresAt?: Date | null;
  maxUses?: number | null;
  notes?: string | null;
  createdBy?: string | null;
}

export type UpdateDiscountCodeInput = Partial<Omit<CreateDiscountCodeInput, 'code' | 'createdBy'>>;

/**
 * Abstract repository for discount code operations
 */
export abstract class DiscountCodeRepository {
  abstract getByCode(code: string): Promise<DiscountCodeData | null>;
  abstract getActiveByCode(code: string): Promise<DiscountCodeData | null>;
  abstract getById(id: string): Promise<DiscountCodeData | null>;
  abstract list(activeOnly: boolean): Promise<DiscountCodeData[]>;
  /**
   * Inserts the code, or returns null when a code with the same value already exists.
   */
  abstract create(input: CreateDiscountCodeInput): Promise<DiscountCodeData | null>;
  abstract update(id: string, input: UpdateDiscountCodeInput): Promise<DiscountCodeData | null>;
  /**
   * Compare-and-swap increment: only succeeds while the code is active and below `maxUses`.
   * Returns the updated row, or null when no redemption was recorded.
   */
  abstract incrementUsesIfAvailable(id: string): Promise<DiscountCodeData | null>;
}
