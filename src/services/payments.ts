// src/services/payments.ts
import type { Payment, PaymentMethod } from "../db/schema";
import { receiptLineItems } from "../domain/billing";
import { insertWithUniqueIdentifier } from "../domain/identifiers";
import { PAYMENT_TRANSITIONS, processingFee, refundPayment, transitionPayment } from "../domain/payment-lifecycle";
import type { PaymentAction } from "../domain/payment-lifecycle";
import { ConflictError, InvalidTransitionError, NotFoundError, UniqueViolationError, ValidationError } from "../errors";
import { audit, logger } from "../logger";
import { UNIQUE } from "../store/constraints";
import { newId } from "../utils/id";
import { syncPaymentStatus } from "./bookings";
import { assertOwnerOrStaff, assertStaff, identifiers, isStaff } from "./context";
import type { Actor, ServiceContext } from "./context";
import { notify } from "./notifications";

export type PaymentRequest = Pick<Payment, "bookingId" | "paymentType" | "amount">
  & Partial<Pick<Payment, "paymentMethodId" | "description" | "cardLastFour" | "cardType" | "gatewayTransactionId">>;

export type PaymentMethodInput = Pick<PaymentMethod, "name" | "methodType">
  & Partial<Pick<PaymentMethod, "processingFeePercentage" | "processingFeeFixed" | "isActive">>;

export class PaymentService {
  constructor(private readonly ctx: ServiceContext) {}

  async create(actor: Actor, input: PaymentRequest) {
    const { store } = this.ctx;
    if (!Number.isInteger(input.amount) || input.amount <= 0) {
      throw new ValidationError("amount must be positive", { amount: ["must be greater than 0"] });
    }
    const booking = await store.bookings.findById(input.bookingId);
    if (!booking) throw new NotFoundError("booking");
    assertOwnerOrStaff(actor, booking.customerId);
    if (booking.status === "cancelled") throw new ConflictError("booking_cancelled");

    let method: PaymentMethod | undefined;
    if (input.paymentMethodId) {
      method = await store.paymentMethods.findById(input.paymentMethodId);
      if (!method || !method.isActive) throw new NotFoundError("payment_method");
    }

    const now = this.ctx.clock();
    const ids = identifiers(this.ctx);
    const payment = await insertWithUniqueIdentifier(
      UNIQUE.transactionId,
      () => ids.transactionId(),
      (transactionId) => store.payments.insert({
        id: newId(),
        transactionId,
        bookingId: booking.id,
        customerId: booking.customerId,
        paymentType: input.paymentType,
        paymentMethodId: method?.id ?? null,
        amount: input.amount,
        currency: this.ctx.config.currency,
        status: "pending",
        paymentDate: null,
        gatewayTransactionId: input.gatewayTransactionId ?? null,
        gatewayResponse: null,
        gatewayFee: processingFee(method, input.amount),
        cardLastFour: input.cardLastFour ?? null,
        cardType: input.cardType ?? null,
        receiptNumber: null,
        invoiceNumber: null,
        refundAmount: 0,
        refundDate: null,
        refundReason: null,
        refundedBy: null,
        description: input.description ?? null,
        processedBy: isStaff(actor) ? actor.id : null,
        createdAt: now,
        updatedAt: now,
      }),
    );
    logger.info({ paymentId: payment.id, transactionId: payment.transactionId, bookingId: booking.id }, "payment created");
    return payment;
  }

  async get(actor: Actor, id: string) {
    const payment = await this.payment(id);
    assertOwnerOrStaff(actor, payment.customerId);
    return payment;
  }

  async listForBooking(actor: Actor, bookingId: string) {
    const booking = await this.ctx.store.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError("booking");
    assertOwnerOrStaff(actor, booking.customerId);
    return this.ctx.store.payments.listForBooking(bookingId);
  }

  /** Staff move a payment along; completing it issues its receipt. */
  async transition(actor: Actor, id: string, action: PaymentAction) {
    assertStaff(actor);
    const current = await this.payment(id);
    const patch = transitionPayment(current, action, this.ctx.clock());
    patch.processedBy = actor.id;
    const payment = await this.ctx.store.payments.transition(id, PAYMENT_TRANSITIONS[action].from, patch);
    if (!payment) {
      const latest = await this.ctx.store.payments.findById(id);
      throw new InvalidTransitionError("payment", latest?.status ?? current.status, action);
    }
    await syncPaymentStatus(this.ctx.store, payment.bookingId);

    if (action !== "complete") return { payment, receipt: null };
    const receipt = await this.issueReceipt(payment.id);
    await notify(this.ctx.notifier, {
      kind: "payment_completed",
      userId: payment.customerId,
      subject: `Payment ${payment.transactionId} received`,
      data: { paymentId: payment.id, receiptNumber: receipt.receiptNumber },
    });
    return { payment: { ...payment, receiptNumber: receipt.receiptNumber }, receipt };
  }

  /** Refunds `amount` cents, or whatever remains refundable when omitted. */
  async refund(actor: Actor, id: string, amount?: number, reason?: string) {
    assertStaff(actor);
    const current = await this.payment(id);
    const now = this.ctx.clock();
    const patch = refundPayment(current, amount ?? current.amount - current.refundAmount, now, reason);
    patch.refundedBy = actor.id;
    const payment = await this.ctx.store.payments.transition(id, ["completed"], patch);
    if (!payment) {
      const latest = await this.ctx.store.payments.findById(id);
      throw new InvalidTransitionError("payment", latest?.status ?? current.status, "refund");
    }
    await syncPaymentStatus(this.ctx.store, payment.bookingId);
    audit("payment.refunded", { paymentId: id, by: actor.id, amount: payment.refundAmount, reason });
    await notify(this.ctx.notifier, {
      kind: "payment_refunded",
      userId: payment.customerId,
      subject: `Refund on payment ${payment.transactionId}`,
      data: { paymentId: id, refundAmount: payment.refundAmount },
    });
    return payment;
  }

  /** One receipt per payment: asking again returns the receipt already issued. */
  async issueReceipt(paymentId: string, actor?: Actor) {
    const { store } = this.ctx;
    const payment = await this.payment(paymentId);
    if (actor) assertOwnerOrStaff(actor, payment.customerId);
    const existing = await store.receipts.findByPaymentId(paymentId);
    if (existing) return existing;
    if (payment.status !== "completed") throw new ConflictError("payment_not_completed");

    const booking = await store.bookings.findById(payment.bookingId);
    const method = payment.paymentMethodId ? await store.paymentMethods.findById(payment.paymentMethodId) : undefined;
    const receiptNumber = await identifiers(this.ctx).receiptNumber();
    try {
      const receipt = await store.receipts.insert({
        id: newId(),
        receiptNumber,
        paymentId,
        customerId: payment.customerId,
        issueDate: this.ctx.clock(),
        amount: payment.amount,
        currency: payment.currency,
        paymentMethodUsed: method?.name ?? "Unspecified",
        lineItems: receiptLineItems(payment, booking?.bookingReference ?? payment.transactionId),
        notes: null,
      });
      await store.payments.update(paymentId, { receiptNumber });
      return receipt;
    } catch (err) {
      // a concurrent request issued it first
      if (err instanceof UniqueViolationError && err.constraint === UNIQUE.receiptPayment) {
        const issued = await store.receipts.findByPaymentId(paymentId);
        if (issued) return issued;
      }
      throw err;
    }
  }

  methods(activeOnly = true) {
    return this.ctx.store.paymentMethods.list(activeOnly);
  }

  createMethod(actor: Actor, input: PaymentMethodInput) {
    assertStaff(actor);
    return this.ctx.store.paymentMethods.insert({
      id: newId(),
      name: input.name,
      methodType: input.methodType,
      processingFeePercentage: input.processingFeePercentage ?? 0,
      processingFeeFixed: input.processingFeeFixed ?? 0,
      isActive: input.isActive ?? true,
    });
  }

  private async payment(id: string) {
    const payment = await this.ctx.store.payments.findById(id);
    if (!payment) throw new NotFoundError("payment");
    return payment;
  }
}
