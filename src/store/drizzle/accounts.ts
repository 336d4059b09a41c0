// src/store/drizzle/accounts.ts
import { and, eq, lt, or, sql } from "drizzle-orm";
import type { Db } from "../../db/drizzle";
import { revokedTokens, userPreferences, userSessions, users } from "../../db/schema";
import type { PreferenceRepository, RevokedTokenRepository, SessionRepository, UserRepository } from "../types";
import { first, guarded } from "./unique";

export function userRepository(db: Db): UserRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(users).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(users).where(eq(users.id, id)));
    },
    async findByUsername(username) {
      return first(await db.select().from(users).where(eq(users.username, username)));
    },
    async findByEmail(email) {
      return first(await db.select().from(users).where(eq(users.email, email)));
    },
    async findByLogin(login) {
      return first(await db.select().from(users).where(or(eq(users.username, login), eq(users.email, login))).limit(1));
    },
    async update(id, patch) {
      return first(await guarded(db.update(users).set(patch).where(eq(users.id, id)).returning()));
    },
    async addLoyaltyPoints(id, points) {
      return first(
        await db.update(users)
          .set({ loyaltyPoints: sql`${users.loyaltyPoints} + ${points}`, updatedAt: new Date() })
          .where(eq(users.id, id))
          .returning(),
      );
    },
  };
}

export function sessionRepository(db: Db): SessionRepository {
  return {
    async insert(row) {
      const [created] = await db.insert(userSessions).values(row).returning();
      return created;
    },
    async findByUserAgent(userId, userAgent) {
      return first(
        await db.select().from(userSessions)
          .where(and(eq(userSessions.userId, userId), eq(userSessions.userAgent, userAgent)))
          .limit(1),
      );
    },
    async update(id, patch) {
      return first(await db.update(userSessions).set(patch).where(eq(userSessions.id, id)).returning());
    },
    async listForUser(userId) {
      return db.select().from(userSessions).where(eq(userSessions.userId, userId));
    },
    async deactivateAll(userId) {
      const rows = await db.update(userSessions)
        .set({ isActive: false })
        .where(and(eq(userSessions.userId, userId), eq(userSessions.isActive, true)))
        .returning({ id: userSessions.id });
      return rows.length;
    },
  };
}

export function preferenceRepository(db: Db): PreferenceRepository {
  return {
    async insert(row) {
      const [created] = await db.insert(userPreferences).values(row).returning();
      return created;
    },
    async findByUser(userId) {
      return first(await db.select().from(userPreferences).where(eq(userPreferences.userId, userId)));
    },
    async update(userId, patch) {
      return first(await db.update(userPreferences).set(patch).where(eq(userPreferences.userId, userId)).returning());
    },
  };
}

export function revokedTokenRepository(db: Db): RevokedTokenRepository {
  return {
    async revoke(jti, expiresAt) {
      await db.delete(revokedTokens).where(lt(revokedTokens.expiresAt, sql`now()`));
      const inserted = await db
        .insert(revokedTokens)
        .values({ jti, expiresAt })
        .onConflictDoNothing()
        .returning({ jti: revokedTokens.jti });
      return inserted.length > 0;
    },
  };
}
