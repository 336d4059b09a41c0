// src/services/invoices.ts
import { applyInvoicePayment, bookingLineItems, draftInvoice, INVOICE_TRANSITIONS, transitionInvoice } from "../domain/billing";
import type { InvoiceAction } from "../domain/billing";
import { ConflictError, InvalidTransitionError, NotFoundError } from "../errors";
import { logger } from "../logger";
import type { Patch } from "../store/types";
import type { Invoice } from "../db/schema";
import { newId } from "../utils/id";
import { assertOwnerOrStaff, assertStaff, identifiers } from "./context";
import type { Actor, ServiceContext } from "./context";
import { notify } from "./notifications";

export class InvoiceService {
  constructor(private readonly ctx: ServiceContext) {}

  /** Bills a booking as it stands: rental, add-ons, drivers and insurance, less what is already paid. */
  async create(actor: Actor, bookingId: string, notes?: string) {
    assertStaff(actor);
    const { store } = this.ctx;
    const booking = await store.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError("booking");
    if (booking.status === "cancelled") throw new ConflictError("booking_cancelled");

    const now = this.ctx.clock();
    const lineItems = bookingLineItems(
      booking,
      await store.addons.listAssignments(bookingId),
      await store.drivers.listForBooking(bookingId),
    );
    const draft = draftInvoice(booking, lineItems, await store.payments.listForBooking(bookingId), {
      taxRate: this.ctx.config.taxRate,
      dueDays: this.ctx.config.invoiceDueDays,
      now,
    });
    const invoice = await store.invoices.insert({
      ...draft,
      id: newId(),
      invoiceNumber: await identifiers(this.ctx).invoiceNumber(),
      bookingId,
      customerId: booking.customerId,
      currency: this.ctx.config.currency,
      notes: notes ?? null,
      sentDate: null,
      sentToEmail: null,
      createdBy: actor.id,
      createdAt: now,
      updatedAt: now,
    });
    logger.info({ invoiceId: invoice.id, invoiceNumber: invoice.invoiceNumber, bookingId }, "invoice created");
    return invoice;
  }

  async get(actor: Actor, id: string) {
    const invoice = await this.invoice(id);
    assertOwnerOrStaff(actor, invoice.customerId);
    return invoice;
  }

  async listForBooking(actor: Actor, bookingId: string) {
    const booking = await this.ctx.store.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError("booking");
    assertOwnerOrStaff(actor, booking.customerId);
    return this.ctx.store.invoices.listForBooking(bookingId);
  }

  async send(actor: Actor, id: string, email?: string) {
    assertStaff(actor);
    const current = await this.invoice(id);
    const customer = await this.ctx.store.users.findById(current.customerId);
    const invoice = await this.apply(current, "send", { sentToEmail: email ?? customer?.email ?? null });
    await notify(this.ctx.notifier, {
      kind: "invoice_sent",
      userId: invoice.customerId,
      subject: `Invoice ${invoice.invoiceNumber}`,
      data: { invoiceId: id, to: invoice.sentToEmail },
    });
    return invoice;
  }

  async cancel(actor: Actor, id: string) {
    assertStaff(actor);
    return this.apply(await this.invoice(id), "cancel");
  }

  async markOverdue(actor: Actor, id: string) {
    assertStaff(actor);
    return this.apply(await this.invoice(id), "mark_overdue");
  }

  /** Records `amount` cents against the balance; the balance never goes negative. */
  async recordPayment(actor: Actor, id: string, amount: number) {
    assertStaff(actor);
    const current = await this.invoice(id);
    const patch = applyInvoicePayment(current, amount, this.ctx.clock());
    const invoice = await this.ctx.store.invoices.transition(id, [current.status], patch, current.paidAmount);
    // lost a race with another payment or status change; the caller may retry against fresh state
    if (!invoice) throw new ConflictError("invoice_changed", "invoice was modified concurrently");
    return invoice;
  }

  private async apply(current: Invoice, action: InvoiceAction, extra: Patch<Invoice> = {}) {
    const patch = { ...transitionInvoice(current, action, this.ctx.clock()), ...extra };
    const invoice = await this.ctx.store.invoices.transition(current.id, INVOICE_TRANSITIONS[action].from, patch);
    if (!invoice) {
      const latest = await this.ctx.store.invoices.findById(current.id);
      throw new InvalidTransitionError("invoice", latest?.status ?? current.status, action);
    }
    return invoice;
  }

  private async invoice(id: string) {
    const invoice = await this.ctx.store.invoices.findById(id);
    if (!invoice) throw new NotFoundError("invoice");
    return invoice;
  }
}
