// src/domain/promotions.ts
import type { Promotion } from "../db/schema";
import { percentOf } from "./money";

export type PromotionContext = {
  now: Date;
  subtotal: number; // cents
  dailyRate: number; // cents
  totalDays: number;
  categoryId: string | null;
  customerUses: number;
};

export type PromotionRejection =
  | "promotion_inactive"
  | "promotion_expired"
  | "promotion_exhausted"
  | "promotion_min_amount"
  | "promotion_min_days"
  | "promotion_category"
  | "promotion_customer_limit";

export type PromotionResult = { ok: true; discount: number } | { ok: false; reason: PromotionRejection };

function rawDiscount(p: Pick<Promotion, "discountType" | "discountValue">, ctx: Pick<PromotionContext, "subtotal" | "dailyRate" | "totalDays">) {
  switch (p.discountType) {
    case "percentage":
      return percentOf(ctx.subtotal, p.discountValue);
    case "fixed_amount":
      return Math.round(p.discountValue);
    case "free_days":
      return ctx.dailyRate * Math.min(Math.floor(p.discountValue), ctx.totalDays);
  }
}

/** Discount in cents, capped by the promotion maximum and by the subtotal. */
export function promotionDiscount(
  p: Pick<Promotion, "discountType" | "discountValue" | "maxDiscountAmount">,
  ctx: Pick<PromotionContext, "subtotal" | "dailyRate" | "totalDays">,
) {
  let discount = rawDiscount(p, ctx);
  if (p.maxDiscountAmount !== null) discount = Math.min(discount, p.maxDiscountAmount);
  return Math.min(discount, ctx.subtotal);
}

export function evaluatePromotion(p: Promotion, ctx: PromotionContext): PromotionResult {
  if (!p.isActive) return { ok: false, reason: "promotion_inactive" };
  const t = ctx.now.getTime();
  if (t < p.startDate.getTime() || t > p.endDate.getTime()) return { ok: false, reason: "promotion_expired" };
  if (p.usageLimit !== null && p.usageCount >= p.usageLimit) return { ok: false, reason: "promotion_exhausted" };
  if (ctx.customerUses >= p.perCustomerLimit) return { ok: false, reason: "promotion_customer_limit" };
  if (p.minBookingAmount !== null && ctx.subtotal < p.minBookingAmount) return { ok: false, reason: "promotion_min_amount" };
  if (p.minRentalDays !== null && ctx.totalDays < p.minRentalDays) return { ok: false, reason: "promotion_min_days" };
  if (p.applicableCategoryIds.length > 0 && (ctx.categoryId === null || !p.applicableCategoryIds.includes(ctx.categoryId))) {
    return { ok: false, reason: "promotion_category" };
  }
  return { ok: true, discount: promotionDiscount(p, ctx) };
}
