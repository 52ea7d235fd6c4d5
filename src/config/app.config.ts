import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type RedsysEnvironment = 'sandbox' | 'production';

/**
 * Numeric ISO 4217 codes accepted by the gateway
 */
export const REDSYS_CURRENCY_CODES = {
  EUR: '978',
  USD: '840',
  GBP: '826',
} as const;

export type SupportedCurrency = keyof typeof REDSYS_CURRENCY_CODES;

const REDSYS_KEY_LENGTH_BYTES = 24;

/**
 * Validates and exposes application configuration.
 * Required variables are checked once, when the service is constructed.
 */
@Injectable()
export class AppConfigService {
  constructor(private readonly configService: ConfigService) {
    this.validateRequiredConfig();
  }

  private validateRequiredConfig(): void {
    const requiredVars = [
      'REDSYS_SECRET_KEY',
      'REDSYS_MERCHANT_CODE',
      'REDSYS_MERCHANT_URL',
      'ADMIN_API_TOKEN',
    ];

    for (const varName of requiredVars) {
      const value = this.configService.get<string>(varName);
      if (!value) {
        throw new Error(`${varName} is not set`);
      }
    }

    // 3DES key diversification needs exactly 24 key bytes
    const secret = Buffer.from(this.getRedsysSecretKey(), 'base64');
    if (secret.length !== REDSYS_KEY_LENGTH_BYTES) {
      throw new Error(`REDSYS_SECRET_KEY must be a base64-encoded ${REDSYS_KEY_LENGTH_BYTES}-byte key`);
    }

    this.getRedsysEnvironment();
    this.getRedsysCurrency();
  }

  getPort(): number {
    const value = this.configService.get<string>('PORT', '3000');
    return Number.parseInt(value, 10);
  }

  getRedsysEnvironment(): RedsysEnvironment {
    const value = this.configService.get<string>('REDSYS_ENVIRONMENT', 'sandbox');
    if (value !== 'sandbox' && value !== 'production') {
      throw new Error(`REDSYS_ENVIRONMENT must be 'sandbox' or 'production', got '${value}'`);
    }
    return value;
  }

  getRedsysSecretKey(): string {
    const value = this.configService.get<string>('REDSYS_SECRET_KEY');
    if (!value) {
      throw new Error('REDSYS_SECRET_KEY is not set');
    }
    return value;
  }

  getRedsysMerchantCode(): string {
    const value = this.configService.get<string>('REDSYS_MERCHANT_CODE');
    if (!value) {
      throw new Error('REDSYS_MERCHANT_CODE is not set');
    }
    return value;
  }

  getRedsysTerminal(): string {
    return this.configService.get<string>('REDSYS_TERMINAL', '001');
  }

  getRedsysMerchantName(): string {
    return this.configService.get<string>('REDSYS_MERCHANT_NAME', 'TOTAL KEEPERS');
  }

  getRedsysMerchantUrl(): string {
    const value = this.configService.get<string>('REDSYS_MERCHANT_URL');
    if (!value) {
      throw new Error('REDSYS_MERCHANT_URL is not set');
    }
    return value;
  }

  getRedsysCurrency(): SupportedCurrency {
    const value = this.configService.get<string>('REDSYS_CURRENCY', 'EUR');
    if (value !== 'EUR' && value !== 'USD' && value !== 'GBP') {
      throw new Error(`REDSYS_CURRENCY '${value}' is not supported`);
    }
    return value;
  }

  getCheckoutSuccessUrl(): string | undefined {
    return this.configService.get<string>('CHECKOUT_SUCCESS_URL');
  }

  getCheckoutFailureUrl(): string | undefined {
    return this.configService.get<string>('CHECKOUT_FAILURE_URL');
  }

  getAdminApiToken(): string {
    const value = this.configService.get<string>('ADMIN_API_TOKEN');
    if (!value) {
      throw new Error('ADMIN_API_TOKEN is not set');
    }
    return value;
  }
}
