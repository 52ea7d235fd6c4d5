import { z } from 'zod';
import { ORDER_ID_PATTERN } from '@/domain/utils/order-id.util';
import type { PaymentOutcome } from '@/domain/types/order.types';

export const REDSYS_SIGNATURE_VERSION = 'HMAC_SHA256_V1';

export const REDSYS_URLS = {
  sandbox: 'https://sis-t.redsys.es:25443/sis/realizarPago',
  production: 'https://sis.redsys.es/sis/realizarPago',
} as const;

/**
 * Ds_Merchant_TransactionType for a standard card authorization
 */
export const REDSYS_AUTHORIZATION_TRANSACTION_TYPE = '0';

/**
 * Ds_Response codes with a dedicated meaning; 0000-0099 are all approvals
 */
export const REDSYS_RESPONSE_CODES: Record<string, string> = {
  '0000': 'Transaction approved',
  '0101': 'Card blocked',
  '0102': 'Card expired',
  '0106': 'Insufficient funds',
  '0125': 'Invalid card number',
  '0129': 'Invalid expiration date',
  '0167': 'Invalid CVC',
  '0184': 'Transaction not allowed for this card',
  '0190': 'Operation denied',
  '0904': 'Merchant not registered',
  '0912': 'Issuer not available',
  '0913': 'Duplicate transmission',
  '9915': 'Payment cancelled by user',
};

export const describeResponseCode = (responseCode: string): string => {
  return REDSYS_RESPONSE_CODES[responseCode.padStart(4, '0')] ?? 'Transaction denied';
};

const APPROVED_RESPONSE_MAX = 99;
const USER_CANCELED_RESPONSE = 9915;

/**
 * Maps a Ds_Response code to the outcome it represents for the order
 */
export const classifyResponseCode = (responseCode: string): PaymentOutcome => {
  const code = Number.parseInt(responseCode, 10);
  if (code >= 0 && code <= APPROVED_RESPONSE_MAX) {
    return 'success';
  }
  if (code === USER_CANCELED_RESPONSE) {
    return 'cancel';
  }
  return 'failure';
};

/**
 * Form fields posted by the gateway to the notification URL
 */
export const RedsysCallbackFormSchema = z.object({
  Ds_SignatureVersion: z.literal(REDSYS_SIGNATURE_VERSION),
  Ds_MerchantParameters: z.string().min(1),
  Ds_Signature: z.string().min(1),
});

/**
 * Decoded Ds_MerchantParameters of a notification. Unknown fields are dropped.
 */
export const RedsysNotificationParametersSchema = z.object({
  Ds_Order: z.string().regex(ORDER_ID_PATTERN),
  Ds_Response: z.string().regex(/^\d{1,4}$/),
  Ds_Amount: z.string().regex(/^\d+$/).optional(),
  Ds_Currency: z.string().regex(/^\d{3}$/).optional(),
  Ds_MerchantCode: z.string().optional(),
  Ds_Terminal: z.string().optional(),
  Ds_TransactionType: z.string().optional(),
  Ds_AuthorisationCode: z.string().optional(),
  Ds_Date: z.string().optional(),
  Ds_Hour: z.string().optional(),
});

export type RedsysNotificationParameters = z.infer<typeof RedsysNotificationParametersSchema>;

/**
 * A notification whose signature has been checked against the merchant secret
 */
export interface VerifiedRedsysNotification {
  parameters: RedsysNotificationParameters;
  rawMerchantParameters: string;
}

export type RedsysNotificationError = 'malformed_callback' | 'invalid_signature';

/**
 * Merchant request parameters (before base64 encoding)
 */
export interface RedsysMerchantRequest {
  DS_MERCHANT_AMOUNT: string;
  DS_MERCHANT_ORDER: string;
  DS_MERCHANT_MERCHANTCODE: string;
  DS_MERCHANT_CURRENCY: string;
  DS_MERCHANT_TRANSACTIONTYPE: typeof REDSYS_AUTHORIZATION_TRANSACTION_TYPE;
  DS_MERCHANT_TERMINAL: string;
  DS_MERCHANT_MERCHANTURL: string;
  DS_MERCHANT_MERCHANTNAME: string;
  DS_MERCHANT_PRODUCTDESCRIPTION: string;
  DS_MERCHANT_CONSUMERLANGUAGE: string;
  DS_MERCHANT_URLOK?: string;
  DS_MERCHANT_URLKO?: string;
}

/**
 * Fields the browser posts to the gateway's payment page
 */
export interface RedsysPaymentForm {
  url: string;
  Ds_SignatureVersion: typeof REDSYS_SIGNATURE_VERSION;
  Ds_MerchantParameters: string;
  Ds_Signature: string;
}
