// tests/unit/promotions.test.ts
import { describe, expect, it } from "@jest/globals";
import { evaluatePromotion } from "../../src/domain/promotions";
import type { PromotionContext, PromotionRejection } from "../../src/domain/promotions";
import type { Promotion } from "../../src/db/schema";
import { NOW, promotionRow } from "../support/fixtures";

const ctx: PromotionContext = {
  now: NOW,
  subtotal: 150000,
  dailyRate: 50000,
  totalDays: 3,
  categoryId: null,
  customerUses: 0,
};

describe("evaluatePromotion", () => {
  it("computes each discount type", () => {
    expect(evaluatePromotion(promotionRow(), ctx)).toEqual({ ok: true, discount: 15000 });
    expect(evaluatePromotion(promotionRow({ discountType: "fixed_amount", discountValue: 20000 }), ctx))
      .toEqual({ ok: true, discount: 20000 });
    expect(evaluatePromotion(promotionRow({ discountType: "free_days", discountValue: 2 }), ctx))
      .toEqual({ ok: true, discount: 100000 });
  });

  it("caps the discount at the maximum and at the subtotal", () => {
    expect(evaluatePromotion(promotionRow({ maxDiscountAmount: 10000 }), ctx)).toEqual({ ok: true, discount: 10000 });
    expect(evaluatePromotion(promotionRow({ discountType: "fixed_amount", discountValue: 200000 }), ctx))
      .toEqual({ ok: true, discount: 150000 });
    expect(evaluatePromotion(promotionRow({ discountType: "free_days", discountValue: 5 }), ctx))
      .toEqual({ ok: true, discount: 150000 });
  });

  const rejections: [Partial<Promotion>, PromotionContext, PromotionRejection][] = [
    [{ isActive: false }, ctx, "promotion_inactive"],
    [{ startDate: new Date("2026-11-02T00:00:00Z") }, ctx, "promotion_expired"],
    [{ endDate: new Date("2026-10-31T00:00:00Z") }, ctx, "promotion_expired"],
    [{ usageLimit: 5, usageCount: 5 }, ctx, "promotion_exhausted"],
    [{}, { ...ctx, customerUses: 1 }, "promotion_customer_limit"],
    [{ minBookingAmount: 200000 }, ctx, "promotion_min_amount"],
    [{ minRentalDays: 5 }, ctx, "promotion_min_days"],
    [{ applicableCategoryIds: ["cat-suv"] }, ctx, "promotion_category"],
  ];

  it.each(rejections)("rejects %j", (overrides, context, reason) => {
    expect(evaluatePromotion(promotionRow(overrides), context)).toEqual({ ok: false, reason });
  });

  it("accepts a vehicle in an applicable category", () => {
    const result = evaluatePromotion(promotionRow({ applicableCategoryIds: ["cat-suv"] }), { ...ctx, categoryId: "cat-suv" });
    expect(result).toEqual({ ok: true, discount: 15000 });
  });
});
