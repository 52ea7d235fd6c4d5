import { z } from 'zod';
import { MAX_AMOUNT_CENTS, MoneyUtil } from '@/domain/utils/money.util';
import type { DiscountCodeData } from '@/infrastructure/persistence/discount-code.repository';
import type { DiscountQuote } from '@/domain/types/discount.types';

/**
 * Decimal amount with up to two places ("45", "45.5", 45.5) converted to cents.
 * Percentages use the same representation: "10.00" is stored as 1000.
 */
export const DecimalAmountSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const cents = MoneyUtil.toCents(value);
  if (cents === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a non-negative amount with at most two decimals' });
    return z.NEVER;
  }
  return cents;
});

const OptionalDateSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value))
  .nullable()
  .optional();

export const PreviewDiscountSchema = z.object({
  code: z.string().trim().min(1),
  amount: DecimalAmountSchema,
});

export const CreateDiscountCodeSchema = z.object({
  code: z.string().trim().min(1).max(50),
  description: z.string().nullable().optional(),
  discountType: z.enum(['percentage', 'fixed']),
  discountValue: DecimalAmountSchema,
  minOrderAmount: DecimalAmountSchema.nullable().optional(),
  maxDiscountAmount: DecimalAmountSchema.nullable().optional(),
  active: z.boolean().optional(),
  startsAt: OptionalDateSchema,
  expiresAt: OptionalDateSchema,
  maxUses: z.number().int().positive().max(MAX_AMOUNT_CENTS).nullable().optional(),
  notes: z.string().nullable().optional(),
  createdBy: z.string().max(100).nullable().optional(),
});

export const UpdateDiscountCodeSchema = CreateDiscountCodeSchema.omit({ code: true, createdBy: true }).partial();

export interface DiscountQuoteResponse {
  code: string;
  discountType: string;
  discountValue: string;
  originalAmount: string;
  discountAmount: string;
  discountedAmount: string;
}

export interface DiscountCodeResponse {
  id: string;
  code: string;
  description: string | null;
  discountType: string;
  discountValue: string;
  minOrderAmount: string | null;
  maxDiscountAmount: string | null;
  active: boolean;
  startsAt: string | null;
  expiresAt: string | null;
  maxUses: number | null;
  uses: number;
  notes: string | null;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

const formatOptional = (cents: number | null): string | null => (cents === null ? null : MoneyUtil.format(cents));

export const toDiscountQuoteResponse = (quote: DiscountQuote): DiscountQuoteResponse => ({
  code: quote.code,
  discountType: quote.discountType,
  discountValue: MoneyUtil.format(quote.discountValue),
  originalAmount: MoneyUtil.format(quote.originalAmount),
  discountAmount: MoneyUtil.format(quote.discountAmount),
  discountedAmount: MoneyUtil.format(quote.discountedAmount),
});

export const toDiscountCodeResponse = (discountCode: DiscountCodeData): DiscountCodeResponse => ({
  id: discountCode.id,
  code: discountCode.code,
  description: discountCode.description,
  discountType: discountCode.discountType,
  discountValue: MoneyUtil.format(discountCode.discountValue),
  minOrderAmount: formatOptional(discountCode.minOrderAmount),
  maxDiscountAmount: formatOptional(discountCode.maxDiscountAmount),
  active: discountCode.active,
  startsAt: discountCode.startsAt?.toISOString() ?? null,
  expiresAt: discountCode.expiresAt?.toISOString() ?? null,
  maxUses: discountCode.maxUses,
  uses: discountCode.uses,
  notes: discountCode.notes,
  createdBy: discountCode.createdBy,
  createdAt: discountCode.createdAt.toISOString(),
  updatedAt: discountCode.updatedAt.toISOString(),
});
