import { HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import type { ZodError } from 'zod';
import { DiscountError, type DiscountErrorCode } from '@/infrastructure/discount/discount-ledger.service';
import { CheckoutError } from '@/infrastructure/checkout/checkout.service';

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: string;
}

const DISCOUNT_ERROR_STATUS: Record<DiscountErrorCode, HttpStatus> = {
  code_not_found: HttpStatus.NOT_FOUND,
  discount_code_not_found: HttpStatus.NOT_FOUND,
  usage_limit_reached: HttpStatus.CONFLICT,
  duplicate_code: HttpStatus.CONFLICT,
  code_not_yet_active: HttpStatus.UNPROCESSABLE_ENTITY,
  code_expired: HttpStatus.UNPROCESSABLE_ENTITY,
  minimum_order_not_met: HttpStatus.UNPROCESSABLE_ENTITY,
  invalid_resulting_amount: HttpStatus.UNPROCESSABLE_ENTITY,
  invalid_amount: HttpStatus.UNPROCESSABLE_ENTITY,
  invalid_discount_terms: HttpStatus.UNPROCESSABLE_ENTITY,
};

export const sendInvalidRequest = (res: Response, error: ZodError): void => {
  const issue = error.issues[0];
  const path = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  res.status(HttpStatus.BAD_REQUEST).json({
    success: false,
    error: `${path}${issue?.message ?? 'Invalid request body'}`,
    code: 'invalid_request',
  } satisfies ApiResponse);
};

/**
 * Writes the response for a domain error. Anything else is rethrown for Nest to answer with 500.
 */
export const sendDomainError = (res: Response, error: unknown): void => {
  if (error instanceof DiscountError) {
    res.status(DISCOUNT_ERROR_STATUS[error.code]).json({
      success: false,
      error: error.message,
      code: error.code,
    } satisfies ApiResponse);
    return;
  }

  if (error instanceof CheckoutError) {
    res.status(HttpStatus.BAD_REQUEST).json({
      success: false,
      error: error.message,
      code: error.code,
    } satisfies ApiResponse);
    return;
  }

  throw error;
};
