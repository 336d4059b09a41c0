// src/store/drizzle/billing.ts
import { and, asc, eq, inArray, lt, notInArray, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Db } from "../../db/drizzle";
import { documentSequences, invoices, paymentMethods, payments, receipts } from "../../db/schema";
import type {
  InvoiceRepository, PaymentMethodRepository, PaymentRepository, ReceiptRepository, SequenceRepository,
} from "../types";
import { first, guarded } from "./unique";

export function paymentMethodRepository(db: Db): PaymentMethodRepository {
  return {
    async insert(row) {
      const [created] = await db.insert(paymentMethods).values(row).returning();
      return created;
    },
    async findById(id) {
      return first(await db.select().from(paymentMethods).where(eq(paymentMethods.id, id)));
    },
    async list(activeOnly = false) {
      return db.select().from(paymentMethods)
        .where(activeOnly ? eq(paymentMethods.isActive, true) : undefined)
        .orderBy(asc(paymentMethods.name));
    },
    async bulkUpdate(ids, patch) {
      if (ids.length === 0) return 0;
      const rows = await db.update(paymentMethods).set(patch)
        .where(inArray(paymentMethods.id, ids))
        .returning({ id: paymentMethods.id });
      return rows.length;
    },
  };
}

export function paymentRepository(db: Db): PaymentRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(payments).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(payments).where(eq(payments.id, id)));
    },
    async listForBooking(bookingId) {
      return db.select().from(payments).where(eq(payments.bookingId, bookingId)).orderBy(asc(payments.createdAt));
    },
    async update(id, patch) {
      return first(await db.update(payments).set(patch).where(eq(payments.id, id)).returning());
    },
    async transition(id, from, patch) {
      return first(
        await db.update(payments).set(patch)
          .where(and(eq(payments.id, id), inArray(payments.status, [...from])))
          .returning(),
      );
    },
    async bulkTransition(ids, from, patch) {
      if (ids.length === 0) return 0;
      const rows = await db.update(payments).set(patch)
        .where(and(inArray(payments.id, ids), inArray(payments.status, [...from])))
        .returning({ id: payments.id });
      return rows.length;
    },
  };
}

export function invoiceRepository(db: Db): InvoiceRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(invoices).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(invoices).where(eq(invoices.id, id)));
    },
    async listForBooking(bookingId) {
      return db.select().from(invoices).where(eq(invoices.bookingId, bookingId)).orderBy(asc(invoices.createdAt));
    },
    async transition(id, from, patch, paidAmount) {
      const where: SQL[] = [eq(invoices.id, id), inArray(invoices.status, [...from])];
      if (paidAmount !== undefined) where.push(eq(invoices.paidAmount, paidAmount));
      return first(await db.update(invoices).set(patch).where(and(...where)).returning());
    },
    async bulkUpdate(ids, filter, patch) {
      if (ids.length === 0) return 0;
      const where: SQL[] = [inArray(invoices.id, ids)];
      if (filter.statusIn) where.push(inArray(invoices.status, [...filter.statusIn]));
      if (filter.statusNotIn) where.push(notInArray(invoices.status, [...filter.statusNotIn]));
      if (filter.dueBefore) where.push(lt(invoices.dueDate, filter.dueBefore));
      const rows = await db.update(invoices).set(patch).where(and(...where)).returning({ id: invoices.id });
      return rows.length;
    },
  };
}

export function receiptRepository(db: Db): ReceiptRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(receipts).values(row).returning());
      return created;
    },
    async findByPaymentId(paymentId) {
      return first(await db.select().from(receipts).where(eq(receipts.paymentId, paymentId)));
    },
  };
}

// INSERT ... ON CONFLICT DO UPDATE serialises concurrent callers on the scope row.
export function sequenceRepository(db: Db): SequenceRepository {
  return {
    async next(scope) {
      const [row] = await db.insert(documentSequences)
        .values({ scope, lastValue: 1 })
        .onConflictDoUpdate({
          target: documentSequences.scope,
          set: { lastValue: sql`${documentSequences.lastValue} + 1` },
        })
        .returning({ value: documentSequences.lastValue });
      return row.value;
    },
  };
}
