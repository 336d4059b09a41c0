// tests/unit/penalties.test.ts
import { describe, expect, it } from "@jest/globals";
import { assessReturn, transitionPenalty } from "../../src/domain/penalties";
import { InvalidTransitionError } from "../../src/errors";
import { NOW, bookingRow } from "../support/fixtures";

const rates = { includedKmPerDay: 200, extraKmRate: 250, fuelChargePerTank: 120000 };

describe("assessReturn", () => {
  it("charges late days, missing fuel and extra kilometres", () => {
    const booking = bookingRow({
      actualReturnDate: new Date("2026-11-06T12:00:00Z"),
      pickupMileage: 12000,
      returnMileage: 12800,
      pickupFuelLevel: 8,
      returnFuelLevel: 6,
    });
    expect(assessReturn(booking, rates)).toEqual([
      { penaltyType: "late_return", description: "Returned 2 days late", amount: 100000 },
      { penaltyType: "fuel_shortage", description: "Fuel returned 2/8 tank short", amount: 30000 },
      { penaltyType: "mileage_overage", description: "200 km over the 600 km allowance", amount: 50000 },
    ]);
  });

  it("charges nothing for an on-time, full-tank return within the allowance", () => {
    const booking = bookingRow({
      actualReturnDate: new Date("2026-11-05T09:00:00Z"),
      pickupMileage: 12000,
      returnMileage: 12600,
      pickupFuelLevel: 6,
      returnFuelLevel: 7,
    });
    expect(assessReturn(booking, rates)).toEqual([]);
  });

  it("skips checks without readings", () => {
    expect(assessReturn(bookingRow({ actualReturnDate: new Date("2026-11-05T10:00:00Z") }), rates)).toEqual([]);
  });
});

describe("transitionPenalty", () => {
  it("records a dispute", () => {
    expect(transitionPenalty({ status: "pending" }, "dispute", NOW, { reason: "fuel was full" })).toEqual({
      status: "disputed",
      updatedAt: NOW,
      isDisputed: true,
      disputeReason: "fuel was full",
      disputeDate: NOW,
    });
  });

  it("resolves a dispute by approval", () => {
    expect(transitionPenalty({ status: "disputed" }, "approve", NOW, { actorId: "staff-1", resolution: "upheld" })).toEqual({
      status: "approved",
      updatedAt: NOW,
      approvedBy: "staff-1",
      disputeResolution: "upheld",
    });
  });

  it("only collects approved penalties", () => {
    expect(() => transitionPenalty({ status: "pending" }, "pay", NOW)).toThrow(InvalidTransitionError);
    expect(transitionPenalty({ status: "approved" }, "pay", NOW)).toEqual({ status: "paid", updatedAt: NOW });
  });

  it("waives anything not yet paid", () => {
    expect(transitionPenalty({ status: "approved" }, "waive", NOW).status).toBe("waived");
    expect(() => transitionPenalty({ status: "paid" }, "waive", NOW)).toThrow(InvalidTransitionError);
  });
});
