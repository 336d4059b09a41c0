// src/validators/promotions.ts
import { z } from "zod";
import { DISCOUNT_TYPES } from "../db/schema";
import { toCents } from "../domain/money";
import { Id, PositiveMoney } from "./common";

/**
 * `discountValue` is read by type: a percent, an amount in major units
 * (stored as cents), or a number of free days.
 */
export const PromotionCreate = z.object({
  name: z.string().min(1).max(200),
  code: z.string().regex(/^[A-Za-z0-9_-]{3,50}$/, "3-50 letters, digits, '-' or '_'"),
  description: z.string().max(2000).optional(),
  discountType: z.enum(DISCOUNT_TYPES),
  discountValue: z.coerce.number().positive(),
  maxDiscountAmount: PositiveMoney.optional(),
  startDate: z.coerce.date(),
  endDate: z.coerce.date(),
  usageLimit: z.coerce.number().int().positive().optional(),
  perCustomerLimit: z.coerce.number().int().positive().optional(),
  minBookingAmount: PositiveMoney.optional(),
  minRentalDays: z.coerce.number().int().positive().optional(),
  applicableCategoryIds: z.array(Id).optional(),
  isActive: z.boolean().optional(),
  isPublic: z.boolean().optional(),
}).superRefine((v, ctx) => {
  if (v.discountType === "percentage" && v.discountValue > 100) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["discountValue"], message: "percentage cannot exceed 100" });
  }
  if (v.discountType === "free_days" && !Number.isInteger(v.discountValue)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["discountValue"], message: "free days must be a whole number" });
  }
}).transform((v) => ({
  ...v,
  discountValue: v.discountType === "fixed_amount" ? toCents(v.discountValue) : v.discountValue,
}));

export const PromotionCheck = z.object({
  code: z.string().min(1).max(50),
  vehicleId: Id,
  pickupDate: z.coerce.date(),
  returnDate: z.coerce.date(),
}).refine((v) => v.returnDate.getTime() > v.pickupDate.getTime(), {
  message: "returnDate must be after pickupDate",
  path: ["returnDate"],
});
