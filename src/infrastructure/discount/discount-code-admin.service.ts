import { Injectable, Logger } from '@nestjs/common';
import {
  DiscountCodeRepository,
  type CreateDiscountCodeInput,
  type DiscountCodeData,
  type UpdateDiscountCodeInput,
} from '@/infrastructure/persistence/discount-code.repository';
import { MAX_PERCENTAGE_HUNDREDTHS } from '@/domain/types/discount.types';
import { DiscountError, normalizeDiscountCode } from './discount-ledger.service';

type DiscountTermsFields = Pick<
  CreateDiscountCodeInput,
  'discountType' | 'discountValue' | 'minOrderAmount' | 'maxDiscountAmount' | 'startsAt' | 'expiresAt' | 'maxUses'
>;

/**
 * Back-office management of discount codes. Deleting only deactivates, so
 * orders that reference a code keep pointing at a row.
 */
@Injectable()
export class DiscountCodeAdminService {
  private readonly logger = new Logger(DiscountCodeAdminService.name);

  constructor(private readonly discountCodeRepository: DiscountCodeRepository) {}

  async create(input: CreateDiscountCodeInput): Promise<DiscountCodeData> {
    const code = normalizeDiscountCode(input.code);
    if (!code) {
      throw new DiscountError('Discount code must not be empty.', 'invalid_discount_terms');
    }
    this.assertTerms(input);

    const existing = await this.discountCodeRepository.getByCode(code);
    if (existing) {
      throw new DiscountError(`Discount code ${code} already exists.`, 'duplicate_code');
    }

    const created = await this.discountCodeRepository.create({ ...input, code });
    if (!created) {
      this.logger.warn(`Discount code ${code} was created concurrently`);
      throw new DiscountError(`Discount code ${code} already exists.`, 'duplicate_code');
    }
    this.logger.log(`Created discount code ${created.code} (${created.discountType} ${created.discountValue})`);
    return created;
  }

  async update(id: string, input: UpdateDiscountCodeInput): Promise<DiscountCodeData> {
    const current = await this.get(id);

    // Validate the terms as they will stand after the update
    this.assertTerms({
      discountType: input.discountType ?? current.discountType,
      discountValue: input.discountValue ?? current.discountValue,
      minOrderAmount: input.minOrderAmount !== undefined ? input.minOrderAmount : current.minOrderAmount,
      maxDiscountAmount: input.maxDiscountAmount !== undefined ? input.maxDiscountAmount : current.maxDiscountAmount,
      startsAt: input.startsAt !== undefined ? input.startsAt : current.startsAt,
      expiresAt: input.expiresAt !== undefined ? input.expiresAt : current.expiresAt,
      maxUses: input.maxUses !== undefined ? input.maxUses : current.maxUses,
    });

    const updated = await this.discountCodeRepository.update(id, input);
    if (!updated) {
      throw new DiscountError('Discount code not found.', 'discount_code_not_found');
    }

    this.logger.log(`Updated discount code ${updated.code}`);
    return updated;
  }

  async get(id: string): Promise<DiscountCodeData> {
    const discountCode = await this.discountCodeRepository.getById(id);
    if (!discountCode) {
      throw new DiscountError('Discount code not found.', 'discount_code_not_found');
    }
    return discountCode;
  }

  list(activeOnly = false): Promise<DiscountCodeData[]> {
    return this.discountCodeRepository.list(activeOnly);
  }

  async deactivate(id: string): Promise<DiscountCodeData> {
    const updated = await this.discountCodeRepository.update(id, { active: false });
    if (!updated) {
      throw new DiscountError('Discount code not found.', 'discount_code_not_found');
    }

    this.logger.log(`Deactivated discount code ${updated.code}`);
    return updated;
  }

  private assertTerms(terms: DiscountTermsFields): void {
    const problem = this.findTermsProblem(terms);
    if (problem) {
      throw new DiscountError(problem, 'invalid_discount_terms');
    }
  }

  private findTermsProblem(terms: DiscountTermsFields): string | null {
    if (!Number.isSafeInteger(terms.discountValue) || terms.discountValue <= 0) {
      return 'Discount value must be greater than zero.';
    }
    if (terms.discountType === 'percentage' && terms.discountValue > MAX_PERCENTAGE_HUNDREDTHS) {
      return 'A percentage discount cannot exceed 100%.';
    }
    if (terms.minOrderAmount != null && (!Number.isSafeInteger(terms.minOrderAmount) || terms.minOrderAmount < 0)) {
      return 'Minimum order amount cannot be negative.';
    }
    if (terms.maxDiscountAmount != null && (!Number.isSafeInteger(terms.maxDiscountAmount) || terms.maxDiscountAmount <= 0)) {
      return 'Maximum discount amount must be greater than zero.';
    }
    if (terms.maxUses != null && (!Number.isSafeInteger(terms.maxUses) || terms.maxUses <= 0)) {
      return 'Maximum uses must be a positive whole number.';
    }
    if (terms.startsAt && terms.expiresAt && terms.startsAt >= terms.expiresAt) {
      return 'Expiry must be later than the start date.';
    }
    return null;
  }
}
