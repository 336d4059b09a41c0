// src/serializers.ts
import { fromCents } from "./domain/money";

// integer cents in storage, decimal major units on the wire
const MONEY_FIELDS = new Set([
  "dailyRate", "weeklyRate", "monthlyRate", "daily", "weekly", "monthly", "securityDeposit",
  "subtotal", "taxAmount", "discountAmount", "additionalFees", "insuranceCost", "totalAmount", "addonTotal",
  "amount", "gatewayFee", "refundAmount", "paidAmount", "balanceDue", "unitPrice", "total", "totalPrice",
  "additionalFee", "additionalCost", "estimatedCost", "actualCost", "processingFeeFixed",
  "maxDiscountAmount", "minBookingAmount", "discount", "totalSpent", "loyaltyDiscount", "promotionDiscount",
]);

const FUEL_FIELDS = new Set(["pickupFuelLevel", "returnFuelLevel"]);

const HIDDEN_FIELDS = new Set(["passwordHash"]);

function field(key: string, value: unknown, owner: object): unknown {
  if (typeof value === "number") {
    if (MONEY_FIELDS.has(key)) return fromCents(value);
    if (FUEL_FIELDS.has(key)) return `${value}/8`;
    // add-on price: basis points for percentage pricing, cents otherwise
    if (key === "price" && "pricingType" in owner) return fromCents(value);
    if (key === "discountValue" && "discountType" in owner && owner.discountType === "fixed_amount") return fromCents(value);
  }
  return toWire(value);
}

/** Shape a domain value for a JSON response. */
export function toWire(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(toWire);
  if (value === null || typeof value !== "object" || value instanceof Date) return value;
  const out: Record<string, unknown> = {};
  for (const [key, v] of Object.entries(value)) {
    if (HIDDEN_FIELDS.has(key)) continue;
    out[key] = field(key, v, value);
  }
  return out;
}
