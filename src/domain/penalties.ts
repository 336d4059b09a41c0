// src/domain/penalties.ts
import type { Booking, Penalty, PenaltyStatus, PenaltyType } from "../db/schema";
import { InvalidTransitionError } from "../errors";
import { DAY_MS } from "../utils/dates";

export type ReturnRates = {
  includedKmPerDay: number;
  extraKmRate: number; // cents per km
  fuelChargePerTank: number; // cents per full tank
};

export type AssessedCharge = { penaltyType: PenaltyType; description: string; amount: number };

/**
 * Charges implied by how a rental came back: late return, missing fuel and
 * kilometres beyond the included allowance.
 */
export function assessReturn(
  b: Pick<Booking, "returnDate" | "actualReturnDate" | "dailyRate" | "totalDays" | "pickupMileage" | "returnMileage" | "pickupFuelLevel" | "returnFuelLevel">,
  rates: ReturnRates,
): AssessedCharge[] {
  const charges: AssessedCharge[] = [];

  if (b.actualReturnDate && b.actualReturnDate.getTime() > b.returnDate.getTime()) {
    const lateDays = Math.ceil((b.actualReturnDate.getTime() - b.returnDate.getTime()) / DAY_MS);
    charges.push({
      penaltyType: "late_return",
      description: `Returned ${lateDays} day${lateDays === 1 ? "" : "s"} late`,
      amount: lateDays * b.dailyRate,
    });
  }

  if (b.pickupFuelLevel !== null && b.returnFuelLevel !== null && b.returnFuelLevel < b.pickupFuelLevel) {
    const eighths = b.pickupFuelLevel - b.returnFuelLevel;
    charges.push({
      penaltyType: "fuel_shortage",
      description: `Fuel returned ${eighths}/8 tank short`,
      amount: Math.round((eighths * rates.fuelChargePerTank) / 8),
    });
  }

  if (b.pickupMileage !== null && b.returnMileage !== null) {
    const driven = b.returnMileage - b.pickupMileage;
    const over = driven - rates.includedKmPerDay * b.totalDays;
    if (over > 0) {
      charges.push({
        penaltyType: "mileage_overage",
        description: `${over} km over the ${rates.includedKmPerDay * b.totalDays} km allowance`,
        amount: over * rates.extraKmRate,
      });
    }
  }

  return charges.filter((c) => c.amount > 0);
}

export type PenaltyAction = "dispute" | "approve" | "pay" | "waive";

export const PENALTY_TRANSITIONS: Record<PenaltyAction, { from: readonly PenaltyStatus[]; to: PenaltyStatus }> = {
  dispute: { from: ["pending"], to: "disputed" },
  approve: { from: ["pending", "disputed"], to: "approved" },
  pay: { from: ["approved"], to: "paid" },
  waive: { from: ["pending", "disputed", "approved"], to: "waived" },
};

export function transitionPenalty(
  p: Pick<Penalty, "status">,
  action: PenaltyAction,
  now: Date,
  detail: { reason?: string; resolution?: string; actorId?: string } = {},
): Partial<Penalty> {
  const rule = PENALTY_TRANSITIONS[action];
  if (!rule.from.includes(p.status)) {
    throw new InvalidTransitionError("penalty", p.status, action);
  }
  const patch: Partial<Penalty> = { status: rule.to, updatedAt: now };
  if (action === "dispute") {
    patch.isDisputed = true;
    patch.disputeReason = detail.reason ?? null;
    patch.disputeDate = now;
  }
  if (action === "approve") patch.approvedBy = detail.actorId ?? null;
  if (p.status === "disputed" && detail.resolution) patch.disputeResolution = detail.resolution;
  return patch;
}
