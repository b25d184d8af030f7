import * as crypto from 'crypto';
import { logger } from './logger';

export class CryptoUtils {
  /**
   * Checks a Meta `x-hub-signature-256` header (`sha256=<hex>`) against the
   * raw request body.
   */
  static verifySignature(
    appSecret: string,
    requestBody: string,
    signatureHeader?: string
  ): boolean {
    if (!signatureHeader) {
      logger.logError('Webhook signature header missing');
      return false;
    }

    const [scheme, hex, ...rest] = signatureHeader.split('=');
    if (scheme !== 'sha256' || !hex || rest.length > 0) {
      logger.logError('Webhook signature has an invalid format');
      return false;
    }

    const expectedSignature = crypto
      .createHmac('sha256', appSecret)
      .update(requestBody, 'utf8')
      .digest();
    const providedSignature = Buffer.from(hex, 'hex');

    // timingSafeEqual throws on length mismatch
    if (providedSignature.length !== expectedSignature.length) {
      return false;
    }
    return crypto.timingSafeEqual(expectedSignature, providedSignature);
  }
}
