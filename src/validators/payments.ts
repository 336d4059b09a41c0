// src/validators/payments.ts
import { z } from "zod";
import { PAYMENT_METHOD_TYPES, PAYMENT_TYPES } from "../db/schema";
import { Id, Money, PositiveMoney } from "./common";

export const PaymentCreate = z.object({
  bookingId: Id,
  paymentType: z.enum(PAYMENT_TYPES).default("booking_payment"),
  amount: PositiveMoney,
  paymentMethodId: Id.optional(),
  description: z.string().max(500).optional(),
  cardLastFour: z.string().regex(/^\d{4}$/).optional(),
  cardType: z.string().max(20).optional(),
  gatewayTransactionId: z.string().max(100).optional(),
});

/** Without an amount the whole remaining balance is refunded. */
export const PaymentRefund = z.object({
  amount: PositiveMoney.optional(),
  reason: z.string().max(1000).optional(),
});

export const PaymentMethodCreate = z.object({
  name: z.string().min(1).max(100),
  methodType: z.enum(PAYMENT_METHOD_TYPES),
  processingFeePercentage: z.coerce.number().min(0).max(100).optional(),
  processingFeeFixed: Money.optional(),
  isActive: z.boolean().optional(),
});
