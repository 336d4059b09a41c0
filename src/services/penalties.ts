// src/services/penalties.ts
import type { Penalty } from "../db/schema";
import { PENALTY_TRANSITIONS, transitionPenalty } from "../domain/penalties";
import type { PenaltyAction } from "../domain/penalties";
import { ForbiddenError, InvalidTransitionError, NotFoundError, ValidationError } from "../errors";
import { audit } from "../logger";
import { newId } from "../utils/id";
import { assertOwnerOrStaff, assertStaff, isStaff } from "./context";
import type { Actor, ServiceContext } from "./context";

export type PenaltyInput = Pick<Penalty, "bookingId" | "penaltyType" | "description" | "amount">;

export class PenaltyService {
  constructor(private readonly ctx: ServiceContext) {}

  async assess(actor: Actor, input: PenaltyInput) {
    assertStaff(actor);
    if (!Number.isInteger(input.amount) || input.amount <= 0) {
      throw new ValidationError("amount must be positive", { amount: ["must be greater than 0"] });
    }
    const booking = await this.ctx.store.bookings.findById(input.bookingId);
    if (!booking) throw new NotFoundError("booking");
    const now = this.ctx.clock();
    return this.ctx.store.penalties.insert({
      id: newId(),
      bookingId: booking.id,
      customerId: booking.customerId,
      penaltyType: input.penaltyType,
      description: input.description,
      amount: input.amount,
      status: "pending",
      isDisputed: false,
      disputeReason: null,
      disputeDate: null,
      disputeResolution: null,
      assessedBy: actor.id,
      approvedBy: null,
      createdAt: now,
      updatedAt: now,
    });
  }

  async get(actor: Actor, id: string) {
    const penalty = await this.penalty(id);
    assertOwnerOrStaff(actor, penalty.customerId);
    return penalty;
  }

  async listForBooking(actor: Actor, bookingId: string) {
    const booking = await this.ctx.store.bookings.findById(bookingId);
    if (!booking) throw new NotFoundError("booking");
    assertOwnerOrStaff(actor, booking.customerId);
    return this.ctx.store.penalties.listForBooking(bookingId);
  }

  listMine(actor: Actor) {
    return this.ctx.store.penalties.listForCustomer(actor.id);
  }

  /** Customers dispute their own penalties; every other action is staff work. */
  async transition(actor: Actor, id: string, action: PenaltyAction, detail: { reason?: string; resolution?: string } = {}) {
    const current = await this.penalty(id);
    if (action === "dispute") {
      if (current.customerId !== actor.id) throw new ForbiddenError("only the customer can dispute a penalty");
      if (!detail.reason) throw new ValidationError("a reason is required", { reason: ["is required to dispute"] });
    } else if (!isStaff(actor)) {
      throw new ForbiddenError("staff only");
    }
    const patch = transitionPenalty(current, action, this.ctx.clock(), { ...detail, actorId: actor.id });
    const penalty = await this.ctx.store.penalties.transition(id, PENALTY_TRANSITIONS[action].from, patch);
    if (!penalty) {
      const latest = await this.ctx.store.penalties.findById(id);
      throw new InvalidTransitionError("penalty", latest?.status ?? current.status, action);
    }
    if (action === "waive") audit("penalty.waived", { penaltyId: id, by: actor.id, amount: penalty.amount });
    return penalty;
  }

  private async penalty(id: string) {
    const penalty = await this.ctx.store.penalties.findById(id);
    if (!penalty) throw new NotFoundError("penalty");
    return penalty;
  }
}
