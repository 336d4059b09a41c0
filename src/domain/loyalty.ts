// src/domain/loyalty.ts
import type { LoyaltyTier } from "../db/schema";
import { percentOf } from "./money";

export const LOYALTY_PROGRAM: readonly { tier: LoyaltyTier; minPoints: number; discountPercent: number }[] = [
  { tier: "bronze", minPoints: 0, discountPercent: 0 },
  { tier: "silver", minPoints: 1000, discountPercent: 5 },
  { tier: "gold", minPoints: 5000, discountPercent: 10 },
  { tier: "platinum", minPoints: 10000, discountPercent: 15 },
];

export function tierFor(points: number): LoyaltyTier {
  let tier: LoyaltyTier = "bronze";
  for (const level of LOYALTY_PROGRAM) {
    if (points >= level.minPoints) tier = level.tier;
  }
  return tier;
}

export function tierDiscount(tier: LoyaltyTier, subtotal: number) {
  const level = LOYALTY_PROGRAM.find((l) => l.tier === tier);
  return level ? percentOf(subtotal, level.discountPercent) : 0;
}

/** Points for a completed rental: whole currency units spent times the earn rate. */
export function pointsEarned(totalAmountCents: number, pointsPerUnit: number) {
  return Math.max(0, Math.floor((totalAmountCents / 100) * pointsPerUnit));
}
