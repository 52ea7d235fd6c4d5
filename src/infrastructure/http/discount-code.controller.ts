import {
  Controller,
  Get,
  Put,
  Post,
  Delete,
  Param,
  Query,
  Body,
  Res,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import { DiscountLedgerService } from '@/infrastructure/discount/discount-ledger.service';
import { DiscountCodeAdminService } from '@/infrastructure/discount/discount-code-admin.service';
import { AdminTokenGuard } from '@/infrastructure/http/guards/admin-token.guard';
import { sendDomainError, sendInvalidRequest, type ApiResponse } from './api-response';
import {
  CreateDiscountCodeSchema,
  PreviewDiscountSchema,
  UpdateDiscountCodeSchema,
  toDiscountCodeResponse,
  toDiscountQuoteResponse,
  type DiscountCodeResponse,
  type DiscountQuoteResponse,
} from './dto/discount-code.dto';

@Controller('discount-codes')
export class DiscountCodeController {
  constructor(
    private readonly discountLedger: DiscountLedgerService,
    private readonly discountCodeAdmin: DiscountCodeAdminService,
  ) {}

  /**
   * POST /discount-codes/preview - Quote a code against an amount without redeeming it
   */
  @Post('preview')
  async preview(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const parsed = PreviewDiscountSchema.safeParse(body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const quote = await this.discountLedger.preview(parsed.data.code, parsed.data.amount);
      res.status(HttpStatus.OK).json({
        success: true,
        data: toDiscountQuoteResponse(quote),
      } satisfies ApiResponse<DiscountQuoteResponse>);
    } catch (error) {
      sendDomainError(res, error);
    }
  }

  /**
   * GET /discount-codes?activeOnly=true - List codes, newest first
   */
  @Get()
  @UseGuards(AdminTokenGuard)
  async list(@Query('activeOnly') activeOnly: string | undefined): Promise<ApiResponse<DiscountCodeResponse[]>> {
    const discountCodes = await this.discountCodeAdmin.list(activeOnly === 'true');
    return {
      success: true,
      data: discountCodes.map(toDiscountCodeResponse),
    };
  }

  @Get(':id')
  @UseGuards(AdminTokenGuard)
  async get(@Param('id') id: string, @Res() res: Response): Promise<void> {
    try {
      const discountCode = await this.discountCodeAdmin.get(id);
      res.status(HttpStatus.OK).json({
        success: true,
        data: toDiscountCodeResponse(discountCode),
      } satisfies ApiResponse<DiscountCodeResponse>);
    } catch (error) {
      sendDomainError(res, error);
    }
  }

  @Post()
  @UseGuards(AdminTokenGuard)
  async create(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const parsed = CreateDiscountCodeSchema.safeParse(body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const discountCode = await this.discountCodeAdmin.create(parsed.data);
      res.status(HttpStatus.CREATED).json({
        success: true,
        data: toDiscountCodeResponse(discountCode),
      } satisfies ApiResponse<DiscountCodeResponse>);
    } catch (error) {
      sendDomainError(res, error);
    }
  }

  @Put(':id')
  @UseGuards(AdminTokenGuard)
  async update(@Param('id') id: string, @Body() body: unknown, @Res() res: Response): Promise<void> {
    const parsed = UpdateDiscountCodeSchema.safeParse(body);
    if (!parsed.success) {
      sendInvalidRequest(res, parsed.error);
      return;
    }

    try {
      const discountCode = await this.discountCodeAdmin.update(id, parsed.data);
      res.status(HttpStatus.OK).json({
        success: true,
        data: toDiscountCodeResponse(discountCode),
      } satisfies ApiResponse<DiscountCodeResponse>);
    } catch (error) {
      sendDomainError(res, error);
    }
  }

  /**
   * DELETE /discount-codes/:id - Deactivates; redeemed codes stay referenced by their orders
   */
  @Delete(':id')
  @UseGuards(AdminTokenGuard)
  async deactivate(@Param('id') id: string, @Res() res: Response): Promise<void> {
    try {
      const discountCode = await this.discountCodeAdmin.deactivate(id);
      res.status(HttpStatus.OK).json({
        success: true,
        data: toDiscountCodeResponse(discountCode),
      } satisfies ApiResponse<DiscountCodeResponse>);
    } catch (error) {
      sendDomainError(res, error);
    }
  }
}
