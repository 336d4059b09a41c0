// src/domain/billing.ts
import type {
  Booking, BookingAddOn, BookingAddOnAssignment, BookingAdditionalDriver, Invoice, InvoiceStatus, LineItem, Payment,
} from "../db/schema";
import { InvalidTransitionError, ValidationError } from "../errors";
import { addDays, isoDate } from "../utils/dates";
import { netPaid } from "./payment-lifecycle";

const PAYMENT_TYPE_LABELS: Record<Payment["paymentType"], string> = {
  booking_payment: "Booking payment",
  security_deposit: "Security deposit",
  additional_charges: "Additional charges",
  penalty: "Penalty",
};

export type AddonLineSource = BookingAddOnAssignment & { addon: Pick<BookingAddOn, "name"> };

export function bookingLineItems(
  booking: Booking,
  addons: AddonLineSource[],
  drivers: Pick<BookingAdditionalDriver, "additionalFee">[],
): LineItem[] {
  const items: LineItem[] = [
    {
      description: `Vehicle rental (${booking.totalDays} day${booking.totalDays === 1 ? "" : "s"})`,
      quantity: booking.totalDays,
      unitPrice: booking.dailyRate,
      total: booking.subtotal,
    },
  ];
  for (const a of addons) {
    items.push({ description: a.addon.name, quantity: a.quantity, unitPrice: a.unitPrice, total: a.totalPrice });
  }
  const driverFees = drivers.filter((d) => d.additionalFee > 0);
  if (driverFees.length > 0) {
    const total = driverFees.reduce((s, d) => s + d.additionalFee, 0);
    items.push({ description: "Additional drivers", quantity: driverFees.length, unitPrice: Math.round(total / driverFees.length), total });
  }
  if (booking.insuranceCost > 0) {
    items.push({
      description: `Insurance${booking.insuranceType ? ` (${booking.insuranceType})` : ""}`,
      quantity: 1,
      unitPrice: booking.insuranceCost,
      total: booking.insuranceCost,
    });
  }
  const listed = items.reduce((s, i) => s + i.total, 0) - booking.subtotal - booking.insuranceCost;
  const otherFees = booking.additionalFees - listed;
  if (otherFees > 0) {
    items.push({ description: "Other fees", quantity: 1, unitPrice: otherFees, total: otherFees });
  }
  return items;
}

export type InvoiceDraft = Pick<
  Invoice,
  "issueDate" | "dueDate" | "status" | "subtotal" | "taxRate" | "taxAmount" | "discountAmount" | "totalAmount" | "paidAmount" | "lineItems"
>;

export function draftInvoice(
  booking: Booking,
  lineItems: LineItem[],
  bookingPayments: Pick<Payment, "status" | "amount" | "refundAmount" | "paymentType">[],
  opts: { taxRate: number; dueDays: number; now: Date },
): InvoiceDraft {
  const paid = bookingPayments
    .filter((p) => p.paymentType === "booking_payment")
    .reduce((s, p) => s + netPaid(p), 0);
  const paidAmount = Math.min(paid, booking.totalAmount);
  return {
    issueDate: isoDate(opts.now),
    dueDate: isoDate(addDays(opts.now, opts.dueDays)),
    status: paidAmount >= booking.totalAmount ? "paid" : "draft",
    subtotal: booking.subtotal + booking.additionalFees + booking.insuranceCost,
    taxRate: opts.taxRate,
    taxAmount: booking.taxAmount,
    discountAmount: booking.discountAmount,
    totalAmount: booking.totalAmount,
    paidAmount,
    lineItems,
  };
}

export function balanceDue(inv: Pick<Invoice, "totalAmount" | "paidAmount">) {
  return inv.totalAmount - inv.paidAmount;
}

/** The invoice as returned to clients, with its outstanding balance. */
export function withBalance(inv: Invoice) {
  return { ...inv, balanceDue: balanceDue(inv) };
}

export function isInvoiceOverdue(inv: Pick<Invoice, "dueDate" | "status">, now: Date) {
  return inv.dueDate < isoDate(now) && inv.status !== "paid" && inv.status !== "cancelled";
}

export type InvoiceAction = "send" | "mark_paid" | "mark_overdue" | "cancel";

export const INVOICE_TRANSITIONS: Record<InvoiceAction, { from: readonly InvoiceStatus[]; to: InvoiceStatus }> = {
  send: { from: ["draft"], to: "sent" },
  mark_paid: { from: ["draft", "sent", "overdue"], to: "paid" },
  mark_overdue: { from: ["draft", "sent"], to: "overdue" },
  cancel: { from: ["draft", "sent", "overdue"], to: "cancelled" },
};

export function transitionInvoice(
  inv: Pick<Invoice, "status" | "dueDate">,
  action: InvoiceAction,
  now: Date,
): Partial<Invoice> {
  const rule = INVOICE_TRANSITIONS[action];
  if (!rule.from.includes(inv.status)) {
    throw new InvalidTransitionError("invoice", inv.status, action);
  }
  if (action === "mark_overdue" && !isInvoiceOverdue(inv, now)) {
    throw new InvalidTransitionError("invoice", inv.status, action);
  }
  const patch: Partial<Invoice> = { status: rule.to, updatedAt: now };
  if (action === "send") patch.sentDate = now;
  return patch;
}

/** Apply a payment against an invoice; the balance may reach zero but never go below it. */
export function applyInvoicePayment(
  inv: Pick<Invoice, "status" | "totalAmount" | "paidAmount">,
  amount: number,
  now: Date,
): Partial<Invoice> {
  if (inv.status === "paid" || inv.status === "cancelled") {
    throw new InvalidTransitionError("invoice", inv.status, "record_payment");
  }
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new ValidationError("payment amount must be positive", { amount: ["must be greater than 0"] });
  }
  const due = balanceDue(inv);
  if (amount > due) {
    throw new ValidationError("payment exceeds the balance due", { amount: [`balance due is ${due} cents`] });
  }
  const paidAmount = inv.paidAmount + amount;
  return {
    paidAmount,
    status: paidAmount === inv.totalAmount ? "paid" : inv.status,
    updatedAt: now,
  };
}

export function receiptLineItems(payment: Pick<Payment, "paymentType" | "amount" | "description">, bookingReference: string): LineItem[] {
  return [
    {
      description: payment.description ?? `${PAYMENT_TYPE_LABELS[payment.paymentType]} for ${bookingReference}`,
      quantity: 1,
      unitPrice: payment.amount,
      total: payment.amount,
    },
  ];
}
