// src/domain/pricing.ts
import type { AddonPricingType } from "../db/schema";
import { DAY_MS } from "../utils/dates";
import { basisPointsOf, percentOf } from "./money";

// All amounts are integer cents.

/** Whole days between pickup and return; anything under 24h still bills one day. */
export function totalDays(pickup: Date, returnAt: Date) {
  return Math.max(1, Math.floor((returnAt.getTime() - pickup.getTime()) / DAY_MS));
}

/**
 * Unit price of an add-on for this rental. Percentage add-ons store their
 * rate in basis points and are charged against the rental subtotal.
 */
export function addonUnitPrice(pricingType: AddonPricingType, price: number, days: number, subtotal: number) {
  switch (pricingType) {
    case "per_day":
      return price * days;
    case "per_booking":
      return price;
    case "percentage":
      return basisPointsOf(subtotal, price);
  }
}

export type AddonLine = { unitPrice: number; quantity: number };

export type PricingInput = {
  dailyRate: number;
  pickupDate: Date;
  returnDate: Date;
  taxRate: number; // percent
  discountAmount?: number;
  insuranceCost?: number;
  /** flat fees not tied to an add-on, e.g. additional driver fees */
  extraFees?: number;
  addons?: AddonLine[];
};

export type PricingBreakdown = {
  totalDays: number;
  subtotal: number;
  addonTotal: number;
  additionalFees: number;
  insuranceCost: number;
  discountAmount: number;
  taxAmount: number;
  totalAmount: number;
};

export function priceRental(input: PricingInput): PricingBreakdown {
  const days = totalDays(input.pickupDate, input.returnDate);
  const subtotal = input.dailyRate * days;
  const addonTotal = (input.addons ?? []).reduce((sum, a) => sum + a.unitPrice * a.quantity, 0);
  const additionalFees = addonTotal + (input.extraFees ?? 0);
  const insuranceCost = input.insuranceCost ?? 0;
  const discountAmount = input.discountAmount ?? 0;

  const taxable = Math.max(0, subtotal + additionalFees + insuranceCost - discountAmount);
  const taxAmount = percentOf(taxable, input.taxRate);

  return {
    totalDays: days,
    subtotal,
    addonTotal,
    additionalFees,
    insuranceCost,
    discountAmount,
    taxAmount,
    totalAmount: subtotal + taxAmount + additionalFees + insuranceCost - discountAmount,
  };
}

export type QuotedRates = { daily: number; weekly: number; monthly: number };

/** Weekly and monthly fall back to 6.5 and 25 days of the daily rate. */
export function quotedRates(v: { dailyRate: number; weeklyRate: number | null; monthlyRate: number | null }): QuotedRates {
  return {
    daily: v.dailyRate,
    weekly: v.weeklyRate ?? Math.round(v.dailyRate * 6.5),
    monthly: v.monthlyRate ?? v.dailyRate * 25,
  };
}
