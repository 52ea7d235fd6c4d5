import { createCipheriv, createHmac, timingSafeEqual } from 'node:crypto';

const TRIPLE_DES_BLOCK_BYTES = 8;

/**
 * HMAC_SHA256_V1 signing used by Redsys for both requests and notifications.
 *
 * The HMAC key is diversified per order: the order reference, zero-padded to
 * the 3DES block size, is encrypted with the merchant secret (3DES-CBC, zero
 * IV). The HMAC runs over the base64 merchant parameters exactly as sent.
 */
export class RedsysSignatureUtil {
  static encodeParameters(parameters: object): string {
    return Buffer.from(JSON.stringify(parameters), 'utf8').toString('base64');
  }

  /**
   * Accepts both the standard and the URL-safe base64 alphabets.
   * @throws SyntaxError when the payload is not JSON
   */
  static decodeParameters(merchantParameters: string): unknown {
    return JSON.parse(Buffer.from(merchantParameters, 'base64').toString('utf8'));
  }

  static deriveOrderKey(secretKey: string, order: string): Buffer {
    const key = Buffer.from(secretKey, 'base64');
    const orderBytes = Buffer.from(order, 'utf8');
    const paddingLength = (TRIPLE_DES_BLOCK_BYTES - (orderBytes.length % TRIPLE_DES_BLOCK_BYTES)) % TRIPLE_DES_BLOCK_BYTES;
    const padded = Buffer.concat([orderBytes, Buffer.alloc(paddingLength, 0)]);

    const cipher = createCipheriv('des-ede3-cbc', key, Buffer.alloc(TRIPLE_DES_BLOCK_BYTES, 0));
    cipher.setAutoPadding(false);
    return Buffer.concat([cipher.update(padded), cipher.final()]);
  }

  /**
   * Request signatures use standard base64.
   */
  static sign(secretKey: string, order: string, merchantParameters: string): string {
    return createHmac('sha256', RedsysSignatureUtil.deriveOrderKey(secretKey, order))
      .update(merchantParameters)
      .digest('base64');
  }

  static verify(secretKey: string, order: string, merchantParameters: string, signature: string): boolean {
    const expected = Buffer.from(
      RedsysSignatureUtil.toUrlSafe(RedsysSignatureUtil.sign(secretKey, order, merchantParameters)),
    );
    const received = Buffer.from(RedsysSignatureUtil.toUrlSafe(signature));

    if (expected.length !== received.length) {
      return false;
    }
    return timingSafeEqual(expected, received);
  }

  /**
   * Notifications carry URL-safe signatures
   */
  static toUrlSafe(signature: string): string {
    return signature.replace(/\+/g, '-').replace(/\//g, '_');
  }
}
