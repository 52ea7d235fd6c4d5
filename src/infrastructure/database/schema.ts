import {
  pgTable,
  text,
  integer,
  boolean,
  serial,
  timestamp,
  uuid,
  varchar,
  index,
} from 'drizzle-orm/pg-core';
import type { DiscountType } from '../../domain/types/discount.types';
import type { OrderStatus, PaymentOutcome } from '../../domain/types/order.types';

/**
 * Discount codes - amounts in cents, percentages in hundredths of a percent
 */
export const discountCodes = pgTable(
  'discount_codes',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    code: varchar('code', { length: 50 }).notNull().unique(),
    description: varchar('description', { length: 200 }),
    discountType: text('discount_type').$type<DiscountType>().notNull().default('percentage'),
    discountValue: integer('discount_value').notNull(),
    minOrderAmount: integer('min_order_amount'),
    maxDiscountAmount: integer('max_discount_amount'),
    active: boolean('active').notNull().default(true),
    startsAt: timestamp('starts_at', { withTimezone: true }),
    expiresAt: timestamp('expires_at', { withTimezone: true }),
    maxUses: integer('max_uses'),
    uses: integer('uses').notNull().default(0),
    notes: text('notes'),
    createdBy: text('created_by'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    activeIdx: index('discount_codes_active_idx').on(table.active),
  }),
);

/**
 * Orders - created pending at checkout, settled once by a verified gateway notification
 */
export const orders = pgTable(
  'orders',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    orderId: varchar('order_id', { length: 12 }).notNull().unique(),
    totalAmount: integer('total_amount').notNull(),
    discountedAmount: integer('discounted_amount').notNull(),
    discountCode: varchar('discount_code', { length: 50 }),
    currency: varchar('currency', { length: 3 }).notNull(),
    customerEmail: text('customer_email'),
    status: text('status').$type<OrderStatus>().notNull().default('pending'),
    gatewayResponseCode: varchar('gateway_response_code', { length: 4 }),
    gatewayAuthorisationCode: text('gateway_authorisation_code'),
    settledAt: timestamp('settled_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    statusIdx: index('orders_status_idx').on(table.status),
  }),
);

/**
 * Payment notifications - audit log of verified gateway callbacks
 */
export const paymentNotifications = pgTable(
  'payment_notifications',
  {
    id: serial('id').primaryKey(),
    orderId: varchar('order_id', { length: 12 }),
    responseCode: varchar('response_code', { length: 4 }),
    rawParameters: text('raw_parameters').notNull(),
    outcome: text('outcome').$type<PaymentOutcome>(),
    processedAt: timestamp('processed_at', { withTimezone: true }),
    processingError: text('processing_error'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    orderIdIdx: index('payment_notifications_order_id_idx').on(table.orderId),
  }),
);
