// src/services/reviews.ts
import type { Review } from "../db/schema";
import { ConflictError, ForbiddenError, NotFoundError } from "../errors";
import { UNIQUE } from "../store/constraints";
import { newId } from "../utils/id";
import { assertStaff } from "./context";
import type { Actor, ServiceContext } from "./context";
import { mapUnique } from "./unique";

export type ReviewInput = Pick<Review, "bookingId" | "overallRating" | "comment">
  & Partial<Pick<Review, "vehicleConditionRating" | "serviceRating" | "valueForMoneyRating" | "title" | "pros" | "cons">>;

export class ReviewService {
  constructor(private readonly ctx: ServiceContext) {}

  /** Only the customer of a completed, review-eligible booking may review it, once. */
  async create(actor: Actor, input: ReviewInput) {
    const booking = await this.ctx.store.bookings.findById(input.bookingId);
    if (!booking) throw new NotFoundError("booking");
    if (booking.customerId !== actor.id) throw new ForbiddenError("only the booking customer can review it");
    if (booking.status !== "completed" || !booking.reviewEligible) throw new ConflictError("booking_not_reviewable");

    return mapUnique(
      this.ctx.store.reviews.insert({
        id: newId(),
        customerId: actor.id,
        bookingId: booking.id,
        vehicleId: booking.vehicleId,
        overallRating: input.overallRating,
        vehicleConditionRating: input.vehicleConditionRating ?? null,
        serviceRating: input.serviceRating ?? null,
        valueForMoneyRating: input.valueForMoneyRating ?? null,
        title: input.title ?? null,
        comment: input.comment,
        pros: input.pros ?? null,
        cons: input.cons ?? null,
        isVerified: false,
        isApproved: false,
        isFeatured: false,
        companyResponse: null,
        responseDate: null,
        respondedBy: null,
        createdAt: this.ctx.clock(),
      }),
      { [UNIQUE.reviewBooking]: "already_reviewed" },
    );
  }

  /** Approved reviews of a vehicle and their average overall rating. */
  async forVehicle(vehicleId: string) {
    const reviews = await this.ctx.store.reviews.listForVehicle(vehicleId, true);
    const total = reviews.reduce((sum, r) => sum + r.overallRating, 0);
    return {
      vehicleId,
      count: reviews.length,
      averageRating: reviews.length > 0 ? Math.round((total / reviews.length) * 10) / 10 : null,
      reviews,
    };
  }

  async respond(actor: Actor, id: string, response: string) {
    assertStaff(actor);
    const review = await this.ctx.store.reviews.update(id, {
      companyResponse: response,
      responseDate: this.ctx.clock(),
      respondedBy: actor.id,
    });
    if (!review) throw new NotFoundError("review");
    return review;
  }
}
