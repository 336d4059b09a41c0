// tests/unit/billing.test.ts
import { describe, expect, it } from "@jest/globals";
import {
  applyInvoicePayment, balanceDue, bookingLineItems, draftInvoice, isInvoiceOverdue, receiptLineItems, transitionInvoice,
} from "../../src/domain/billing";
import { InvalidTransitionError, ValidationError } from "../../src/errors";
import { NOW, bookingRow, paymentRow } from "../support/fixtures";

describe("bookingLineItems", () => {
  it("lists the rental, add-ons, driver fees and insurance", () => {
    const booking = bookingRow({ additionalFees: 8500, insuranceCost: 10000, insuranceType: "full" });
    const gps = {
      id: "a1", bookingId: booking.id, addonId: "gps", quantity: 2, unitPrice: 3000, totalPrice: 6000,
      notes: null, addedAt: NOW, addon: { name: "GPS" },
    };
    const items = bookingLineItems(booking, [gps], [{ additionalFee: 2500 }, { additionalFee: 0 }]);
    expect(items).toEqual([
      { description: "Vehicle rental (3 days)", quantity: 3, unitPrice: 50000, total: 150000 },
      { description: "GPS", quantity: 2, unitPrice: 3000, total: 6000 },
      { description: "Additional drivers", quantity: 1, unitPrice: 2500, total: 2500 },
      { description: "Insurance (full)", quantity: 1, unitPrice: 10000, total: 10000 },
    ]);
  });

  it("adds a line for fees not covered by add-ons or drivers", () => {
    const items = bookingLineItems(bookingRow({ totalDays: 1, subtotal: 50000, additionalFees: 1200 }), [], []);
    expect(items).toEqual([
      { description: "Vehicle rental (1 day)", quantity: 1, unitPrice: 50000, total: 50000 },
      { description: "Other fees", quantity: 1, unitPrice: 1200, total: 1200 },
    ]);
  });
});

describe("draftInvoice", () => {
  const opts = { taxRate: 15, dueDays: 14, now: NOW };

  it("starts as a draft credited with booking payments only", () => {
    const draft = draftInvoice(
      bookingRow(),
      [],
      [
        paymentRow({ status: "completed", amount: 50000 }),
        paymentRow({ status: "completed", amount: 10000, paymentType: "security_deposit" }),
      ],
      opts,
    );
    expect(draft).toEqual({
      issueDate: "2026-11-01",
      dueDate: "2026-11-15",
      status: "draft",
      subtotal: 150000,
      taxRate: 15,
      taxAmount: 22500,
      discountAmount: 0,
      totalAmount: 172500,
      paidAmount: 50000,
      lineItems: [],
    });
  });

  it("is born paid when the booking is already settled, never over-credited", () => {
    const draft = draftInvoice(bookingRow(), [], [paymentRow({ status: "completed", amount: 200000 })], opts);
    expect(draft.status).toBe("paid");
    expect(draft.paidAmount).toBe(172500);
    expect(balanceDue(draft)).toBe(0);
  });
});

describe("invoice transitions", () => {
  it("stamps the sent date", () => {
    expect(transitionInvoice({ status: "draft", dueDate: "2026-11-15" }, "send", NOW)).toEqual({
      status: "sent",
      updatedAt: NOW,
      sentDate: NOW,
    });
  });

  it("marks overdue only once the due date has passed", () => {
    expect(isInvoiceOverdue({ status: "sent", dueDate: "2026-10-31" }, NOW)).toBe(true);
    expect(transitionInvoice({ status: "sent", dueDate: "2026-10-31" }, "mark_overdue", NOW).status).toBe("overdue");
    expect(() => transitionInvoice({ status: "sent", dueDate: "2026-11-01" }, "mark_overdue", NOW))
      .toThrow(InvalidTransitionError);
  });

  it("cannot cancel a paid invoice", () => {
    expect(() => transitionInvoice({ status: "paid", dueDate: "2026-11-15" }, "cancel", NOW)).toThrow(InvalidTransitionError);
  });
});

describe("applyInvoicePayment", () => {
  const invoice = { status: "sent" as const, totalAmount: 172500, paidAmount: 50000 };

  it("accumulates partial payments", () => {
    expect(applyInvoicePayment(invoice, 1000, NOW)).toEqual({ paidAmount: 51000, status: "sent", updatedAt: NOW });
  });

  it("marks the invoice paid when the balance reaches zero", () => {
    expect(applyInvoicePayment(invoice, 122500, NOW)).toEqual({ paidAmount: 172500, status: "paid", updatedAt: NOW });
  });

  it("rejects overpayment and payments on closed invoices", () => {
    expect(() => applyInvoicePayment(invoice, 122501, NOW)).toThrow(ValidationError);
    expect(() => applyInvoicePayment({ ...invoice, status: "paid" }, 1, NOW)).toThrow(InvalidTransitionError);
  });
});

describe("receiptLineItems", () => {
  it("describes the payment against its booking", () => {
    expect(receiptLineItems(paymentRow(), "BK2611011234")).toEqual([
      { description: "Booking payment for BK2611011234", quantity: 1, unitPrice: 10000, total: 10000 },
    ]);
  });
});
