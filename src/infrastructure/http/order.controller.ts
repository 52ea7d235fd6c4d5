import { Controller, Get, Post, Param, Body, Res, HttpStatus, Logger, UseGuards } from '@nestjs/common';
import type { Response } from 'express';
import { CheckoutService } from '@/infrastructure/checkout/checkout.service';
import { PaymentReconcilerService } from '@/infrastructure/payment/payment-reconciler.service';
import { AdminTokenGuard } from '@/infrastructure/http/guards/admin-token.guard';
import { OrderIdUtil } from '@/domain/utils/order-id.util';
import { sendDomainError, sendInvalidRequest, type ApiResponse } from './api-response';
import {
  CreateOrderSchema,
  toCheckoutResponse,
  toOrderResponse,
  toPaymentNotificationResponse,
  type CheckoutResponse,
  type OrderResponse,
  type PaymentNotificationResponse,
} from './dto/order.dto';

@Controller('orders')
export class OrderController {
  private readonly logger = new Logger(OrderController.name);

  constructor(
    private readonly checkoutService: CheckoutService,
    private readonly paymentReconciler: PaymentReconcilerService,
  ) {}

  /**
   * POST /orders - Create a pending order and the signed form that pays for it
   */
  @Post()
  async createOrder(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const parsed = CreateOrderSchema.safeParse(body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const result = await this.checkoutService.createOrder(parsed.data);
      res.status(HttpStatus.CREATED).json({
        success: true,
        data: toCheckoutResponse(result),
      } satisfies ApiResponse<CheckoutResponse>);
    } catch (error) {
      sendDomainError(res, error);
    }
  }

  /**
   * GET /orders/:orderId - Payment status of an order
   */
  @Get(':orderId')
  async getOrder(@Param('orderId') orderId: string, @Res() res: Response): Promise<void> {
    const order = OrderIdUtil.isValid(orderId) ? await this.checkoutService.getOrder(orderId) : null;

    if (!order) {
      this.logger.warn(`Status requested for unknown order ${orderId}`);
      this.sendOrderNotFound(res);
      return;
    }

    res.status(HttpStatus.OK).json({
      success: true,
      data: toOrderResponse(order),
    } satisfies ApiResponse<OrderResponse>);
  }

  /**
   * GET /orders/:orderId/notifications - Gateway notifications recorded for an order (admin)
   */
  @Get(':orderId/notifications')
  @UseGuards(AdminTokenGuard)
  async listNotifications(@Param('orderId') orderId: string, @Res() res: Response): Promise<void> {
    const order = OrderIdUtil.isValid(orderId) ? await this.checkoutService.getOrder(orderId) : null;
    if (!order) {
      this.sendOrderNotFound(res);
      return;
    }

    const notifications = await this.paymentReconciler.listNotifications(order.orderId);
    res.status(HttpStatus.OK).json({
      success: true,
      data: notifications.map(toPaymentNotificationResponse),
    } satisfies ApiResponse<PaymentNotificationResponse[]>);
  }

  private sendOrderNotFound(res: Response): void {
    res.status(HttpStatus.NOT_FOUND).json({
      success: false,
      error: 'Order not found',
      code: 'order_not_found',
    } satisfies ApiResponse);
  }
}
