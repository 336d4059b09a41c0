// src/validators/bookings.ts
import { z } from "zod";
import { ADDON_PRICING_TYPES, ADDON_TYPES, BOOKING_STATUSES } from "../db/schema";
import { Id, Money } from "./common";

const AddonRequest = z.object({
  addonId: Id,
  quantity: z.coerce.number().int().min(1).max(10).default(1),
});

const QuoteFields = z.object({
  vehicleId: Id,
  pickupDate: z.coerce.date(),
  returnDate: z.coerce.date(),
  insuranceType: z.string().max(50).optional(),
  insuranceCost: Money.optional(),
  addons: z.array(AddonRequest).max(20).default([]),
  promotionCode: z.string().min(1).max(50).optional(),
});

type DateRange = { pickupDate: Date; returnDate: Date };

function returnAfterPickup(v: DateRange, ctx: z.RefinementCtx) {
  if (v.returnDate.getTime() <= v.pickupDate.getTime()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["returnDate"], message: "returnDate must be after pickupDate" });
  }
}

export const BookingQuote = QuoteFields.superRefine(returnAfterPickup);

export const BookingCreate = QuoteFields.extend({
  pickupLocation: z.string().min(1).max(200),
  returnLocation: z.string().min(1).max(200),
  specialRequests: z.string().max(1000).optional(),
  customerNotes: z.string().max(1000).optional(),
  customerId: Id.optional(),
}).superRefine(returnAfterPickup);

export const BookingListQuery = z.object({
  status: z.enum(BOOKING_STATUSES).optional(),
  vehicleId: Id.optional(),
  customerId: Id.optional(),
});

export const BookingCancel = z.object({ reason: z.string().max(1000).optional() });

export const BookingAddonAdd = AddonRequest;

export const BookingDriverAdd = z.object({
  driverId: Id,
  additionalFee: Money.default(0),
});

/** `price` is major units, or a percent of the subtotal for percentage pricing; stored as cents / basis points. */
export const AddonCreate = z.object({
  name: z.string().min(1).max(100),
  addonType: z.enum(ADDON_TYPES),
  description: z.string().max(1000).nullable().optional(),
  pricingType: z.enum(ADDON_PRICING_TYPES).default("per_day"),
  price: Money,
  isActive: z.boolean().optional(),
}).superRefine((v, ctx) => {
  if (v.pricingType === "percentage" && v.price > 10_000) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["price"], message: "percentage cannot exceed 100" });
  }
});

export type BookingQuoteInput = z.infer<typeof BookingQuote>;
export type BookingCreateInput = z.infer<typeof BookingCreate>;
