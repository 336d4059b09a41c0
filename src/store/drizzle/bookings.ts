// src/store/drizzle/bookings.ts
import { and, asc, count, desc, eq, gt, inArray, lt, ne } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Db } from "../../db/drizzle";
import { bookingAddOnAssignments, bookingAddOns, bookingAdditionalDrivers, bookings } from "../../db/schema";
import type { AddOnRepository, AdditionalDriverRepository, BookingRepository } from "../types";
import { first, guarded } from "./unique";

export function bookingRepository(db: Db): BookingRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(bookings).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(bookings).where(eq(bookings.id, id)));
    },
    async findByReference(reference) {
      return first(await db.select().from(bookings).where(eq(bookings.bookingReference, reference)));
    },
    async list(filter = {}) {
      const where: SQL[] = [];
      if (filter.customerId) where.push(eq(bookings.customerId, filter.customerId));
      if (filter.vehicleId) where.push(eq(bookings.vehicleId, filter.vehicleId));
      if (filter.status) where.push(eq(bookings.status, filter.status));
      return db.select().from(bookings).where(and(...where)).orderBy(desc(bookings.createdAt));
    },
    async hasOverlap(vehicleId, start, end, statuses) {
      const rows = await db.select({ id: bookings.id }).from(bookings)
        .where(and(
          eq(bookings.vehicleId, vehicleId),
          inArray(bookings.status, [...statuses]),
          lt(bookings.pickupDate, end),
          gt(bookings.returnDate, start),
        ))
        .limit(1);
      return rows.length > 0;
    },
    async update(id, patch) {
      return first(await db.update(bookings).set(patch).where(eq(bookings.id, id)).returning());
    },
    async transition(id, from, patch) {
      return first(
        await db.update(bookings).set(patch)
          .where(and(eq(bookings.id, id), inArray(bookings.status, [...from])))
          .returning(),
      );
    },
    async bulkTransition(ids, from, patch) {
      if (ids.length === 0) return 0;
      const rows = await db.update(bookings).set(patch)
        .where(and(inArray(bookings.id, ids), inArray(bookings.status, [...from])))
        .returning({ id: bookings.id });
      return rows.length;
    },
    async countWithPromotion(customerId, code) {
      const [row] = await db.select({ n: count() }).from(bookings)
        .where(and(eq(bookings.customerId, customerId), eq(bookings.promotionCode, code), ne(bookings.status, "cancelled")));
      return row?.n ?? 0;
    },
  };
}

export function additionalDriverRepository(db: Db): AdditionalDriverRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(bookingAdditionalDrivers).values(row).returning());
      return created;
    },
    async listForBooking(bookingId) {
      return db.select().from(bookingAdditionalDrivers).where(eq(bookingAdditionalDrivers.bookingId, bookingId));
    },
  };
}

export function addOnRepository(db: Db): AddOnRepository {
  return {
    async insert(row) {
      const [created] = await db.insert(bookingAddOns).values(row).returning();
      return created;
    },
    async findById(id) {
      return first(await db.select().from(bookingAddOns).where(eq(bookingAddOns.id, id)));
    },
    async list(activeOnly = false) {
      return db.select().from(bookingAddOns)
        .where(activeOnly ? eq(bookingAddOns.isActive, true) : undefined)
        .orderBy(asc(bookingAddOns.name));
    },
    async assign(row) {
      const [created] = await guarded(db.insert(bookingAddOnAssignments).values(row).returning());
      return created;
    },
    async listAssignments(bookingId) {
      const rows = await db
        .select({ assignment: bookingAddOnAssignments, addon: bookingAddOns })
        .from(bookingAddOnAssignments)
        .innerJoin(bookingAddOns, eq(bookingAddOns.id, bookingAddOnAssignments.addonId))
        .where(eq(bookingAddOnAssignments.bookingId, bookingId));
      return rows.map((r) => ({ ...r.assignment, addon: r.addon }));
    },
    async updateAssignment(id, patch) {
      return first(await db.update(bookingAddOnAssignments).set(patch).where(eq(bookingAddOnAssignments.id, id)).returning());
    },
  };
}
