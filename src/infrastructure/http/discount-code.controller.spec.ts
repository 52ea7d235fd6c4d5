import { Test, type TestingModule } from '@nestjs/testing';
import { DiscountCodeController } from './discount-code.controller';
import { AppConfigService } from '@/config/app.config';
import { DiscountLedgerService } from '@/infrastructure/discount/discount-ledger.service';
import { DiscountCodeAdminService } from '@/infrastructure/discount/discount-code-admin.service';
import { DiscountCalculatorService } from '@/domain/services/discount-calculator.service';
import { DiscountCodeRepository } from '@/infrastructure/persistence/discount-code.repository';
import { DiscountCodeInMemoryStore } from '@/infrastructure/persistence/in-memory/discount-code-in-memory-store';
import { createTestAppConfig } from '@/testing/redsys.fixtures';
import { FakeResponse } from '@/testing/http.fixtures';

describe('DiscountCodeController', () => {
  let controller: DiscountCodeController;
  let discountCodes: DiscountCodeInMemoryStore;
  let ledger: DiscountLedgerService;
  let res: FakeResponse;

  beforeEach(async () => {
    discountCodes = new DiscountCodeInMemoryStore();
    res = new FakeResponse();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [DiscountCodeController],
      providers: [
        DiscountLedgerService,
        DiscountCodeAdminService,
        DiscountCalculatorService,
        { provide: DiscountCodeRepository, useValue: discountCodes },
        { provide: AppConfigService, useValue: createTestAppConfig() },
      ],
    }).compile();

    controller = module.get<DiscountCodeController>(DiscountCodeController);
    ledger = module.get<DiscountLedgerService>(DiscountLedgerService);
  });

  describe('POST /discount-codes/preview', () => {
    beforeEach(async () => {
      await discountCodes.create({ code: 'CODE10', discountType: 'percentage', discountValue: 1000 });
    });

    it('returns the quote with decimal amounts', async () => {
      await controller.preview({ code: 'code10', amount: '100.00' }, res.asResponse());

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          code: 'CODE10',
          discountType: 'percentage',
          discountValue: '10.00',
          originalAmount: '100.00',
          discountAmount: '10.00',
          discountedAmount: '90.00',
        },
      });
    });

    it('answers 400 for a body without an amount', async () => {
      await controller.preview({ code: 'CODE10' }, res.asResponse());

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: 'invalid_request' });
    });

    it('answers 404 for an unknown code', async () => {
      await controller.preview({ code: 'NOPE', amount: 100 }, res.asResponse());

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ success: false, error: 'Invalid discount code.', code: 'code_not_found' });
    });

    it('answers 422 for a zero amount', async () => {
      await controller.preview({ code: 'CODE10', amount: '0' }, res.asResponse());

      expect(res.statusCode).toBe(422);
      expect(res.body).toMatchObject({ code: 'invalid_amount' });
    });

    it('lets unexpected failures through', async () => {
      jest.spyOn(ledger, 'preview').mockRejectedValueOnce(new Error('connection lost'));

      await expect(controller.preview({ code: 'CODE10', amount: '10' }, res.asResponse())).rejects.toThrow('connection lost');
    });
  });

  describe('administration', () => {
    const createBody = {
      code: 'winter20',
      discountType: 'percentage',
      discountValue: '20',
      minOrderAmount: '30.00',
      maxUses: 100,
      expiresAt: '2030-01-31T23:59:59Z',
    };

    it('creates a code from decimal input', async () => {
      await controller.create(createBody, res.asResponse());

      expect(res.statusCode).toBe(201);
      expect(res.body).toMatchObject({
        success: true,
        data: {
          code: 'WINTER20',
          discountValue: '20.00',
          minOrderAmount: '30.00',
          maxDiscountAmount: null,
          maxUses: 100,
          uses: 0,
          expiresAt: '2030-01-31T23:59:59.000Z',
        },
      });
      expect((await discountCodes.getByCode('WINTER20'))?.discountValue).toBe(2000);
    });

    it('answers 409 for a duplicate code', async () => {
      await controller.create(createBody, new FakeResponse().asResponse());
      await controller.create({ ...createBody, code: 'WINTER20' }, res.asResponse());

      expect(res.statusCode).toBe(409);
      expect(res.body).toMatchObject({ code: 'duplicate_code' });
    });

    it('answers 400 for an unknown discount type', async () => {
      await controller.create({ ...createBody, discountType: 'bogo' }, res.asResponse());

      expect(res.statusCode).toBe(400);
    });

    it('answers 422 for terms that cannot apply', async () => {
      await controller.create({ ...createBody, discountValue: '150' }, res.asResponse());

      expect(res.statusCode).toBe(422);
      expect(res.body).toMatchObject({ code: 'invalid_discount_terms' });
    });

    it('lists, updates and deactivates codes', async () => {
      const created = await discountCodes.create({ code: 'AUTUMN', discountType: 'fixed', discountValue: 500 });
      if (!created) {
        throw new Error('AUTUMN was not seeded');
      }

      await controller.update(created.id, { maxDiscountAmount: '4.00' }, res.asResponse());
      expect(res.body).toMatchObject({ data: { maxDiscountAmount: '4.00' } });

      const deactivated = new FakeResponse();
      await controller.deactivate(created.id, deactivated.asResponse());
      expect(deactivated.body).toMatchObject({ data: { active: false } });

      await expect(controller.list('true')).resolves.toEqual({ success: true, data: [] });
      const all = await controller.list(undefined);
      expect(all.data?.map((c) => c.code)).toEqual(['AUTUMN']);
    });

    it('answers 404 for an unknown id', async () => {
      await controller.get('missing-id', res.asResponse());

      expect(res.statusCode).toBe(404);
      expect(res.body).toMatchObject({ code: 'discount_code_not_found' });
    });
  });
});
