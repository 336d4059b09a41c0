// src/services/promotions.ts
import type { Promotion } from "../db/schema";
import { evaluatePromotion } from "../domain/promotions";
import type { PromotionContext } from "../domain/promotions";
import { totalDays } from "../domain/pricing";
import { ConflictError, NotFoundError, ValidationError } from "../errors";
import { UNIQUE } from "../store/constraints";
import type { Store } from "../store/types";
import { newId } from "../utils/id";
import type { Actor, ServiceContext } from "./context";
import { mapUnique } from "./unique";

export type PromotionInput = Pick<Promotion, "name" | "code" | "discountType" | "discountValue" | "startDate" | "endDate">
  & Partial<Pick<
    Promotion,
    | "description" | "maxDiscountAmount" | "usageLimit" | "perCustomerLimit" | "minBookingAmount"
    | "minRentalDays" | "applicableCategoryIds" | "isActive" | "isPublic"
  >>;

export type PromotionCheck = { vehicleId: string; pickupDate: Date; returnDate: Date };

/**
 * Look up `code` and evaluate it for a customer's rental. Rejections surface
 * as ConflictError carrying the rejection code.
 */
export async function resolvePromotion(
  store: Store,
  code: string,
  customerId: string,
  ctx: Omit<PromotionContext, "customerUses">,
) {
  const promotion = await store.promotions.findByCode(code.toUpperCase());
  if (!promotion) throw new NotFoundError("promotion");
  const customerUses = await store.bookings.countWithPromotion(customerId, promotion.code);
  const result = evaluatePromotion(promotion, { ...ctx, customerUses });
  if (!result.ok) throw new ConflictError(result.reason);
  return { promotion, discount: result.discount };
}

export class PromotionService {
  constructor(private readonly ctx: ServiceContext) {}

  async create(actor: Actor, input: PromotionInput) {
    if (input.endDate.getTime() <= input.startDate.getTime()) {
      throw new ValidationError("end date must be after start date", { endDate: ["must be after startDate"] });
    }
    return mapUnique(
      this.ctx.store.promotions.insert({
        id: newId(),
        name: input.name,
        code: input.code.toUpperCase(),
        description: input.description ?? null,
        discountType: input.discountType,
        discountValue: input.discountValue,
        maxDiscountAmount: input.maxDiscountAmount ?? null,
        startDate: input.startDate,
        endDate: input.endDate,
        usageLimit: input.usageLimit ?? null,
        usageCount: 0,
        perCustomerLimit: input.perCustomerLimit ?? 1,
        minBookingAmount: input.minBookingAmount ?? null,
        minRentalDays: input.minRentalDays ?? null,
        applicableCategoryIds: input.applicableCategoryIds ?? [],
        isActive: input.isActive ?? true,
        isPublic: input.isPublic ?? true,
        createdBy: actor.id,
        createdAt: this.ctx.clock(),
      }),
      { [UNIQUE.promotionCode]: "promotion_code_taken" },
    );
  }

  /** Public listing hides private codes and anything outside its validity window. */
  async list(publicOnly: boolean) {
    const rows = await this.ctx.store.promotions.list(publicOnly);
    if (!publicOnly) return rows;
    const t = this.ctx.clock().getTime();
    return rows.filter((p) => p.startDate.getTime() <= t && t <= p.endDate.getTime());
  }

  /** Discount `code` would give the customer on this rental. */
  async check(customerId: string, code: string, input: PromotionCheck) {
    const vehicle = await this.ctx.store.vehicles.findById(input.vehicleId);
    if (!vehicle) throw new NotFoundError("vehicle");
    const days = totalDays(input.pickupDate, input.returnDate);
    const { promotion, discount } = await resolvePromotion(this.ctx.store, code, customerId, {
      now: this.ctx.clock(),
      subtotal: vehicle.dailyRate * days,
      dailyRate: vehicle.dailyRate,
      totalDays: days,
      categoryId: vehicle.categoryId,
    });
    return { code: promotion.code, discountType: promotion.discountType, discount };
  }
}
