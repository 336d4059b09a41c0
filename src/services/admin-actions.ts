// src/services/admin-actions.ts
import type { Payment } from "../db/schema";
import { BOOKING_TRANSITIONS } from "../domain/booking-lifecycle";
import { PAYMENT_TRANSITIONS } from "../domain/payment-lifecycle";
import { AppError, ForbiddenError, NotFoundError } from "../errors";
import { audit, logger } from "../logger";
import type { Patch } from "../store/types";
import { isoDate } from "../utils/dates";
import type { BookingService } from "./bookings";
import { syncPaymentStatus } from "./bookings";
import type { Actor, ServiceContext } from "./context";
import type { PaymentService } from "./payments";

type Command = (ids: string[], actor: Actor) => Promise<number>;

/**
 * Staff bulk operations, keyed "entity.action". Every command is guarded:
 * rows not in a state the action applies to are left alone and not counted.
 */
export class AdminActions {
  private readonly commands: Map<string, Command>;

  constructor(
    private readonly ctx: ServiceContext,
    bookings: BookingService,
    payments: PaymentService,
  ) {
    const { store } = ctx;
    const now = () => ctx.clock();

    this.commands = new Map<string, Command>([
      // ── bookings ──
      ["bookings.confirm", (ids) => store.bookings.bulkTransition(ids, BOOKING_TRANSITIONS.confirm.from, {
        status: "confirmed", confirmedAt: now(), confirmationSent: true, updatedAt: now(),
      })],
      ["bookings.start", this.perRow((id, actor) => bookings.start(actor, id))],
      ["bookings.complete", this.perRow((id, actor) => bookings.complete(actor, id))],
      ["bookings.cancel", (ids) => store.bookings.bulkTransition(ids, BOOKING_TRANSITIONS.cancel.from, {
        status: "cancelled", cancelledAt: now(), cancellationReason: "Cancelled by staff", updatedAt: now(),
      })],

      // ── payments ──
      ["payments.process", (ids, actor) => this.bulkPayments(ids, PAYMENT_TRANSITIONS.process.from, {
        status: "processing", paymentDate: now(), processedBy: actor.id, updatedAt: now(),
      })],
      ["payments.mark_failed", (ids, actor) => this.bulkPayments(ids, PAYMENT_TRANSITIONS.fail.from, {
        status: "failed", processedBy: actor.id, updatedAt: now(),
      })],
      // full refund of whatever remains, through the same checks as a single refund
      ["payments.refund", this.perRow((id, actor) => payments.refund(actor, id, undefined, "Bulk refund"))],

      // ── invoices ──
      ["invoices.mark_paid", (ids) => store.invoices.bulkUpdate(ids, { statusNotIn: ["paid", "cancelled"] }, {
        status: "paid", updatedAt: now(),
      })],
      ["invoices.mark_overdue", (ids) => store.invoices.bulkUpdate(ids, { statusIn: ["draft", "sent"], dueBefore: isoDate(now()) }, {
        status: "overdue", updatedAt: now(),
      })],

      // ── vehicles ──
      ["vehicles.mark_available", (ids) => store.vehicles.bulkUpdate(ids, { status: "available", updatedAt: now() })],
      ["vehicles.mark_maintenance", (ids) => store.vehicles.bulkUpdate(ids, { status: "maintenance", updatedAt: now() })],
      ["vehicles.feature", (ids) => store.vehicles.bulkUpdate(ids, { isFeatured: true, updatedAt: now() })],
      ["vehicles.unfeature", (ids) => store.vehicles.bulkUpdate(ids, { isFeatured: false, updatedAt: now() })],

      // ── reviews ──
      ["reviews.verify", (ids) => store.reviews.bulkUpdate(ids, { isVerified: true })],
      ["reviews.approve", (ids) => store.reviews.bulkUpdate(ids, { isApproved: true })],
      ["reviews.unapprove", (ids) => store.reviews.bulkUpdate(ids, { isApproved: false })],
      ["reviews.feature", (ids) => store.reviews.bulkUpdate(ids, { isFeatured: true })],

      // ── payment methods ──
      ["payment_methods.activate", (ids) => store.paymentMethods.bulkUpdate(ids, { isActive: true })],
      ["payment_methods.deactivate", (ids) => store.paymentMethods.bulkUpdate(ids, { isActive: false })],
    ]);
  }

  /** Available actions grouped by entity. */
  catalogue() {
    const grouped: Record<string, string[]> = {};
    for (const key of this.commands.keys()) {
      const [entity, action] = key.split(".");
      (grouped[entity] ??= []).push(action);
    }
    return grouped;
  }

  async run(actor: Actor, entity: string, action: string, ids: string[]) {
    if (actor.role !== "manager" && actor.role !== "admin") throw new ForbiddenError("managers only");
    const command = this.commands.get(`${entity}.${action}`);
    if (!command) throw new NotFoundError("admin_action");
    const updated = await command([...new Set(ids)], actor);
    audit(`admin.${entity}.${action}`, { by: actor.id, requested: ids.length, updated });
    return { updated };
  }

  private perRow(work: (id: string, actor: Actor) => Promise<unknown>): Command {
    return async (ids, actor) => {
      let updated = 0;
      for (const id of ids) {
        try {
          await work(id, actor);
          updated++;
        } catch (err) {
          if (!(err instanceof AppError) || err.status >= 500) throw err;
          logger.info({ id, code: err.code }, "admin action skipped row");
        }
      }
      return updated;
    };
  }

  private async bulkPayments(ids: string[], from: readonly Payment["status"][], patch: Patch<Payment>) {
    const { store } = this.ctx;
    const rows = await Promise.all(ids.map((id) => store.payments.findById(id)));
    const updated = await store.payments.bulkTransition(ids, from, patch);
    const bookingIds = new Set(rows.flatMap((p) => (p ? [p.bookingId] : [])));
    for (const bookingId of bookingIds) await syncPaymentStatus(store, bookingId);
    return updated;
  }
}
