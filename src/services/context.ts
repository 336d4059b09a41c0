// src/services/context.ts
import type { UserType } from "../db/schema";
import { IdentifierGenerator } from "../domain/identifiers";
import type { Clock, Random } from "../domain/identifiers";
import type { ReturnRates } from "../domain/penalties";
import { toCents } from "../domain/money";
import { ENV } from "../env";
import type { AppEnv } from "../env";
import { ForbiddenError } from "../errors";
import type { Store } from "../store/types";
import type { Notifier } from "./notifications";

export type AuthConfig = {
  accessSecret: string;
  refreshSecret: string;
  accessTtlSeconds: number;
  refreshTtlSeconds: number;
  bcryptRounds: number;
};

export type ServiceConfig = {
  currency: string;
  taxRate: number;
  invoiceDueDays: number;
  loyaltyPointsPerUnit: number;
  returnRates: ReturnRates;
  auth: AuthConfig;
};

export function configFromEnv(env: AppEnv = ENV): ServiceConfig {
  return {
    currency: env.DEFAULT_CURRENCY,
    taxRate: env.TAX_RATE,
    invoiceDueDays: env.INVOICE_DUE_DAYS,
    loyaltyPointsPerUnit: env.LOYALTY_POINTS_PER_UNIT,
    returnRates: {
      includedKmPerDay: env.INCLUDED_KM_PER_DAY,
      extraKmRate: toCents(env.EXTRA_KM_RATE),
      fuelChargePerTank: toCents(env.FUEL_CHARGE_PER_TANK),
    },
    auth: {
      accessSecret: env.JWT_SECRET,
      refreshSecret: env.JWT_REFRESH_SECRET,
      accessTtlSeconds: env.JWT_ACCESS_TTL_SECONDS,
      refreshTtlSeconds: env.JWT_REFRESH_TTL_SECONDS,
      bcryptRounds: env.BCRYPT_ROUNDS,
    },
  };
}

export type ServiceContext = {
  store: Store;
  clock: Clock;
  random: Random;
  config: ServiceConfig;
  notifier: Notifier;
};

/** Identifier generator bound to `store`, which may be a transaction. */
export function identifiers(ctx: ServiceContext, store: Store = ctx.store) {
  return new IdentifierGenerator(store.sequences, ctx.clock, ctx.random);
}

/** The authenticated caller. */
export type Actor = { id: string; role: UserType };

const STAFF_ROLES: readonly UserType[] = ["staff", "manager", "admin"];

export function isStaff(actor: Actor) {
  return STAFF_ROLES.includes(actor.role);
}

export function assertOwnerOrStaff(actor: Actor, ownerId: string) {
  if (actor.id !== ownerId && !isStaff(actor)) throw new ForbiddenError();
}

export function assertStaff(actor: Actor) {
  if (!isStaff(actor)) throw new ForbiddenError("staff only");
}
