// tests/unit/pricing.test.ts
import { describe, expect, it } from "@jest/globals";
import { basisPointsOf, fromCents, percentOf, toCents } from "../../src/domain/money";
import { addonUnitPrice, priceRental, quotedRates, totalDays } from "../../src/domain/pricing";

const at = (iso: string) => new Date(iso);

describe("money", () => {
  it("converts major units to cents and back", () => {
    expect(toCents(100.5)).toBe(10050);
    expect(toCents(0.1 + 0.2)).toBe(30);
    expect(fromCents(12345)).toBe(123.45);
  });

  it("rounds percentages to the nearest cent", () => {
    expect(basisPointsOf(333, 1500)).toBe(50);
    expect(percentOf(1000, 12.5)).toBe(125);
  });
});

describe("totalDays", () => {
  it("counts whole days and bills at least one", () => {
    expect(totalDays(at("2026-11-01T10:00:00Z"), at("2026-11-04T10:00:00Z"))).toBe(3);
    expect(totalDays(at("2026-11-01T10:00:00Z"), at("2026-11-02T16:00:00Z"))).toBe(1);
    expect(totalDays(at("2026-11-01T10:00:00Z"), at("2026-11-01T20:00:00Z"))).toBe(1);
    expect(totalDays(at("2026-11-01T10:00:00Z"), at("2026-11-04T09:00:00Z"))).toBe(2);
  });
});

describe("addonUnitPrice", () => {
  it("prices by pricing type", () => {
    expect(addonUnitPrice("per_day", 2000, 3, 150000)).toBe(6000);
    expect(addonUnitPrice("per_booking", 2000, 3, 150000)).toBe(2000);
    // 1000 basis points = 10% of the subtotal
    expect(addonUnitPrice("percentage", 1000, 3, 150000)).toBe(15000);
  });
});

describe("priceRental", () => {
  it("charges the plain day rate when there is no tax, fee or discount", () => {
    const breakdown = priceRental({
      dailyRate: 10000,
      pickupDate: at("2026-11-01T10:00:00Z"),
      returnDate: at("2026-11-04T10:00:00Z"),
      taxRate: 0,
    });
    expect(breakdown).toEqual({
      totalDays: 3,
      subtotal: 30000,
      addonTotal: 0,
      additionalFees: 0,
      insuranceCost: 0,
      discountAmount: 0,
      taxAmount: 0,
      totalAmount: 30000,
    });
  });

  it("adds fees and insurance, subtracts the discount and taxes the rest", () => {
    const breakdown = priceRental({
      dailyRate: 50000,
      pickupDate: at("2026-11-01T10:00:00Z"),
      returnDate: at("2026-11-04T10:00:00Z"),
      taxRate: 15,
      discountAmount: 5000,
      insuranceCost: 10000,
      extraFees: 2500,
      addons: [{ unitPrice: 3000, quantity: 2 }],
    });
    expect(breakdown).toEqual({
      totalDays: 3,
      subtotal: 150000,
      addonTotal: 6000,
      additionalFees: 8500,
      insuranceCost: 10000,
      discountAmount: 5000,
      taxAmount: 24525,
      totalAmount: 188025,
    });
  });

  it("prices a bare rental", () => {
    const breakdown = priceRental({
      dailyRate: 50000,
      pickupDate: at("2026-11-02T10:00:00Z"),
      returnDate: at("2026-11-05T10:00:00Z"),
      taxRate: 15,
    });
    expect(breakdown.taxAmount).toBe(22500);
    expect(breakdown.totalAmount).toBe(172500);
  });
});

describe("quotedRates", () => {
  it("derives missing weekly and monthly rates from the daily rate", () => {
    expect(quotedRates({ dailyRate: 10001, weeklyRate: null, monthlyRate: null })).toEqual({
      daily: 10001,
      weekly: 65007,
      monthly: 250025,
    });
    expect(quotedRates({ dailyRate: 10000, weeklyRate: 60000, monthlyRate: 200000 })).toEqual({
      daily: 10000,
      weekly: 60000,
      monthly: 200000,
    });
  });
});
