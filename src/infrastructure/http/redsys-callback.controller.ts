import { Controller, Post, Body, Res, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { PaymentReconcilerService } from '@/infrastructure/payment/payment-reconciler.service';

@Controller('payments')
export class RedsysCallbackController {
  private readonly logger = new Logger(RedsysCallbackController.name);

  constructor(private readonly paymentReconciler: PaymentReconcilerService) {}

  /**
   * POST /payments/redsys-callback - Server-to-server notification, posted form-encoded
   */
  @Post('redsys-callback')
  async handleRedsysCallback(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const acknowledgment = await this.paymentReconciler.handleCallback(body);

    if (!acknowledgment.ok) {
      this.logger.warn(`Answered notification with KO (${acknowledgment.error})`);
    }

    res.status(acknowledgment.httpStatus).type('text/plain').send(acknowledgment.body);
  }
}
