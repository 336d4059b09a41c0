// src/store/drizzle/relations.ts
import { and, desc, eq, inArray, isNull, lt, or, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Db } from "../../db/drizzle";
import { issueReports, penalties, promotions, reviews } from "../../db/schema";
import type { IssueRepository, PenaltyRepository, PromotionRepository, ReviewRepository } from "../types";
import { first, guarded } from "./unique";

export function reviewRepository(db: Db): ReviewRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(reviews).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(reviews).where(eq(reviews.id, id)));
    },
    async findByBooking(bookingId) {
      return first(await db.select().from(reviews).where(eq(reviews.bookingId, bookingId)));
    },
    async listForVehicle(vehicleId, approvedOnly) {
      const where: SQL[] = [eq(reviews.vehicleId, vehicleId)];
      if (approvedOnly) where.push(eq(reviews.isApproved, true));
      return db.select().from(reviews).where(and(...where)).orderBy(desc(reviews.createdAt));
    },
    async update(id, patch) {
      return first(await db.update(reviews).set(patch).where(eq(reviews.id, id)).returning());
    },
    async bulkUpdate(ids, patch) {
      if (ids.length === 0) return 0;
      const rows = await db.update(reviews).set(patch).where(inArray(reviews.id, ids)).returning({ id: reviews.id });
      return rows.length;
    },
  };
}

export function promotionRepository(db: Db): PromotionRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(promotions).values(row).returning());
      return created;
    },
    async findByCode(code) {
      return first(await db.select().from(promotions).where(eq(promotions.code, code)));
    },
    async list(publicOnly) {
      return db.select().from(promotions)
        .where(publicOnly ? and(eq(promotions.isPublic, true), eq(promotions.isActive, true)) : undefined)
        .orderBy(desc(promotions.createdAt));
    },
    async claimUsage(id) {
      const rows = await db.update(promotions)
        .set({ usageCount: sql`${promotions.usageCount} + 1` })
        .where(and(
          eq(promotions.id, id),
          or(isNull(promotions.usageLimit), lt(promotions.usageCount, promotions.usageLimit)),
        ))
        .returning({ id: promotions.id });
      return rows.length > 0;
    },
  };
}

export function issueRepository(db: Db): IssueRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(issueReports).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(issueReports).where(eq(issueReports.id, id)));
    },
    async list(filter = {}) {
      const where: SQL[] = [];
      if (filter.customerId) where.push(eq(issueReports.customerId, filter.customerId));
      if (filter.status) where.push(eq(issueReports.status, filter.status));
      if (filter.assignedTo) where.push(eq(issueReports.assignedTo, filter.assignedTo));
      return db.select().from(issueReports).where(and(...where)).orderBy(desc(issueReports.createdAt));
    },
    async update(id, patch) {
      return first(await db.update(issueReports).set(patch).where(eq(issueReports.id, id)).returning());
    },
    async transition(id, from, patch) {
      return first(
        await db.update(issueReports).set(patch)
          .where(and(eq(issueReports.id, id), inArray(issueReports.status, [...from])))
          .returning(),
      );
    },
  };
}

export function penaltyRepository(db: Db): PenaltyRepository {
  return {
    async insert(row) {
      const [created] = await db.insert(penalties).values(row).returning();
      return created;
    },
    async findById(id) {
      return first(await db.select().from(penalties).where(eq(penalties.id, id)));
    },
    async listForBooking(bookingId) {
      return db.select().from(penalties).where(eq(penalties.bookingId, bookingId)).orderBy(desc(penalties.createdAt));
    },
    async listForCustomer(customerId) {
      return db.select().from(penalties).where(eq(penalties.customerId, customerId)).orderBy(desc(penalties.createdAt));
    },
    async transition(id, from, patch) {
      return first(
        await db.update(penalties).set(patch)
          .where(and(eq(penalties.id, id), inArray(penalties.status, [...from])))
          .returning(),
      );
    },
  };
}
