// src/domain/payment-lifecycle.ts
import type { BookingPaymentStatus, Payment, PaymentStatus } from "../db/schema";
import { InvalidTransitionError, ValidationError } from "../errors";

export type PaymentAction = "process" | "complete" | "fail" | "cancel";

export const PAYMENT_TRANSITIONS: Record<PaymentAction, { from: readonly PaymentStatus[]; to: PaymentStatus }> = {
  process: { from: ["pending"], to: "processing" },
  complete: { from: ["processing"], to: "completed" },
  fail: { from: ["pending", "processing"], to: "failed" },
  cancel: { from: ["pending", "processing"], to: "cancelled" },
};

export function transitionPayment(
  payment: Pick<Payment, "status">,
  action: PaymentAction,
  now: Date,
): Partial<Payment> {
  const rule = PAYMENT_TRANSITIONS[action];
  if (!rule.from.includes(payment.status)) {
    throw new InvalidTransitionError("payment", payment.status, action);
  }
  const patch: Partial<Payment> = { status: rule.to, updatedAt: now };
  if (action === "process" || action === "complete") patch.paymentDate = now;
  return patch;
}

export function isRefundable(p: Pick<Payment, "status" | "refundAmount" | "amount">) {
  return p.status === "completed" && p.refundAmount < p.amount;
}

/**
 * Refund `amount` cents of a completed payment. The running refund total never
 * exceeds the payment amount; reaching it exactly marks the payment refunded.
 */
export function refundPayment(
  payment: Pick<Payment, "status" | "refundAmount" | "amount">,
  amount: number,
  now: Date,
  reason?: string,
): Partial<Payment> {
  if (payment.status !== "completed") {
    throw new InvalidTransitionError("payment", payment.status, "refund");
  }
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError("refund amount must be positive", { amount: ["must be greater than 0"] });
  }
  const refunded = payment.refundAmount + amount;
  if (refunded > payment.amount) {
    throw new ValidationError("refund exceeds the refundable balance", {
      amount: [`at most ${payment.amount - payment.refundAmount} cents can be refunded`],
    });
  }
  return {
    status: refunded === payment.amount ? "refunded" : "partially_refunded",
    refundAmount: refunded,
    refundDate: now,
    refundReason: reason ?? null,
    updatedAt: now,
  };
}

const SETTLED: readonly PaymentStatus[] = ["completed", "partially_refunded", "refunded"];

/** Money kept from a payment: completed amount less refunds. */
export function netPaid(p: Pick<Payment, "status" | "amount" | "refundAmount">) {
  return SETTLED.includes(p.status) ? p.amount - p.refundAmount : 0;
}

/** Booking payment status rolled up from its booking payments. */
export function derivePaymentStatus(
  totalAmount: number,
  bookingPayments: Pick<Payment, "status" | "amount" | "refundAmount" | "paymentType">[],
): BookingPaymentStatus {
  const relevant = bookingPayments.filter((p) => p.paymentType === "booking_payment");
  const net = relevant.reduce((sum, p) => sum + netPaid(p), 0);
  const settled = relevant.filter((p) => SETTLED.includes(p.status));

  if (net >= totalAmount && net > 0) return "paid";
  if (net > 0) return "partial";
  if (settled.length > 0) return "refunded";
  if (relevant.length > 0 && relevant.every((p) => p.status === "failed")) return "failed";
  return "pending";
}

/** Processing fee charged by a payment method on `amount` cents. */
export function processingFee(
  method: { processingFeePercentage: number; processingFeeFixed: number } | undefined,
  amount: number,
) {
  if (!method) return 0;
  return Math.round((amount * method.processingFeePercentage) / 100) + method.processingFeeFixed;
}
