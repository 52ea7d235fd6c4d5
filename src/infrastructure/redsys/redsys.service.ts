import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService, REDSYS_CURRENCY_CODES } from '@/config/app.config';
import { left, right, type Either } from '@/lib/either';
import type { OrderData } from '@/infrastructure/persistence/order.repository';
import { RedsysSignatureUtil } from './redsys-signature.util';
import {
  REDSYS_AUTHORIZATION_TRANSACTION_TYPE,
  REDSYS_SIGNATURE_VERSION,
  REDSYS_URLS,
  RedsysCallbackFormSchema,
  RedsysNotificationParametersSchema,
  type RedsysMerchantRequest,
  type RedsysNotificationError,
  type RedsysPaymentForm,
  type VerifiedRedsysNotification,
} from './redsys.types';

const PRODUCT_DESCRIPTION_MAX_LENGTH = 125;
const SPANISH_CONSUMER_LANGUAGE = '001';

@Injectable()
export class RedsysService {
  private readonly logger = new Logger(RedsysService.name);

  constructor(private readonly appConfig: AppConfigService) {}

  private getPaymentUrl(): string {
    return REDSYS_URLS[this.appConfig.getRedsysEnvironment()];
  }

  /**
   * Builds the signed form the browser submits to the gateway for a pending order
   */
  createPaymentForm(order: OrderData): RedsysPaymentForm {
    const request: RedsysMerchantRequest = {
      DS_MERCHANT_AMOUNT: String(order.discountedAmount),
      DS_MERCHANT_ORDER: order.orderId,
      DS_MERCHANT_MERCHANTCODE: this.appConfig.getRedsysMerchantCode(),
      DS_MERCHANT_CURRENCY: REDSYS_CURRENCY_CODES[this.appConfig.getRedsysCurrency()],
      DS_MERCHANT_TRANSACTIONTYPE: REDSYS_AUTHORIZATION_TRANSACTION_TYPE,
      DS_MERCHANT_TERMINAL: this.appConfig.getRedsysTerminal(),
      DS_MERCHANT_MERCHANTURL: this.appConfig.getRedsysMerchantUrl(),
      DS_MERCHANT_MERCHANTNAME: this.appConfig.getRedsysMerchantName(),
      DS_MERCHANT_PRODUCTDESCRIPTION: `Order ${order.orderId}`.slice(0, PRODUCT_DESCRIPTION_MAX_LENGTH),
      DS_MERCHANT_CONSUMERLANGUAGE: SPANISH_CONSUMER_LANGUAGE,
    };

    const successUrl = this.appConfig.getCheckoutSuccessUrl();
    if (successUrl) {
      request.DS_MERCHANT_URLOK = successUrl;
    }
    const failureUrl = this.appConfig.getCheckoutFailureUrl();
    if (failureUrl) {
      request.DS_MERCHANT_URLKO = failureUrl;
    }

    const merchantParameters = RedsysSignatureUtil.encodeParameters(request);
    const signature = RedsysSignatureUtil.sign(this.appConfig.getRedsysSecretKey(), order.orderId, merchantParameters);

    this.logger.log(`Prepared payment form for order ${order.orderId}, amount ${order.discountedAmount}`);

    return {
      url: this.getPaymentUrl(),
      Ds_SignatureVersion: REDSYS_SIGNATURE_VERSION,
      Ds_MerchantParameters: merchantParameters,
      Ds_Signature: signature,
    };
  }

  /**
   * Validates the shape of a posted notification, decodes its parameters and
   * checks the signature. Nothing in the result is usable before the signature passes.
   */
  verifyNotification(body: unknown): Either<RedsysNotificationError, VerifiedRedsysNotification> {
    const form = RedsysCallbackFormSchema.safeParse(body);
    if (!form.success) {
      this.logger.warn(`Rejected notification with unexpected form fields: ${form.error.issues.map((i) => i.path.join('.')).join(', ')}`);
      return left('malformed_callback');
    }

    const { Ds_MerchantParameters: rawMerchantParameters, Ds_Signature: signature } = form.data;

    let decoded: unknown;
    try {
      decoded = RedsysSignatureUtil.decodeParameters(rawMerchantParameters);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not decode merchant parameters ${rawMerchantParameters.slice(0, 50)}...: ${errorMessage}`);
      return left('malformed_callback');
    }

    const parameters = RedsysNotificationParametersSchema.safeParse(decoded);
    if (!parameters.success) {
      this.logger.warn(`Merchant parameters do not match the notification schema: ${parameters.error.issues.map((i) => i.path.join('.')).join(', ')}`);
      return left('malformed_callback');
    }

    const isValid = RedsysSignatureUtil.verify(
      this.appConfig.getRedsysSecretKey(),
      parameters.data.Ds_Order,
      rawMerchantParameters,
      signature,
    );
    if (!isValid) {
      this.logger.warn(`Invalid signature on notification for order ${parameters.data.Ds_Order}`);
      return left('invalid_signature');
    }

    return right({ parameters: parameters.data, rawMerchantParameters });
  }
}
