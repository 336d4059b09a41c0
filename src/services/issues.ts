// src/services/issues.ts
import type { IssueReport } from "../db/schema";
import { insertWithUniqueIdentifier } from "../domain/identifiers";
import { ISSUE_TRANSITIONS, transitionIssue } from "../domain/issues";
import type { IssueAction } from "../domain/issues";
import { ConflictError, ForbiddenError, InvalidTransitionError, NotFoundError, ValidationError } from "../errors";
import { logger } from "../logger";
import { UNIQUE } from "../store/constraints";
import type { IssueFilter } from "../store/types";
import { newId } from "../utils/id";
import { assertOwnerOrStaff, assertStaff, identifiers, isStaff } from "./context";
import type { Actor, ServiceContext } from "./context";

export type IssueInput = Pick<IssueReport, "issueType" | "subject" | "description">
  & Partial<Pick<IssueReport, "priority" | "location" | "bookingId" | "vehicleId">>;

export type FeedbackInput = { satisfaction: number; feedback?: string };

export class IssueService {
  constructor(private readonly ctx: ServiceContext) {}

  /** A report against a booking inherits the booking's vehicle. */
  async report(actor: Actor, input: IssueInput) {
    const { store } = this.ctx;
    let vehicleId = input.vehicleId ?? null;
    if (input.bookingId) {
      const booking = await store.bookings.findById(input.bookingId);
      if (!booking) throw new NotFoundError("booking");
      assertOwnerOrStaff(actor, booking.customerId);
      vehicleId = booking.vehicleId;
    }
    const now = this.ctx.clock();
    const ids = identifiers(this.ctx);
    const issue = await insertWithUniqueIdentifier(
      UNIQUE.ticketNumber,
      () => ids.ticketNumber(),
      (ticketNumber) => store.issues.insert({
        id: newId(),
        ticketNumber,
        customerId: actor.id,
        bookingId: input.bookingId ?? null,
        vehicleId,
        issueType: input.issueType,
        priority: input.priority ?? "medium",
        status: "open",
        subject: input.subject,
        description: input.description,
        location: input.location ?? null,
        assignedTo: null,
        resolution: null,
        resolutionDate: null,
        resolvedBy: null,
        customerSatisfaction: null,
        customerFeedback: null,
        createdAt: now,
        updatedAt: now,
      }),
    );
    logger.info({ issueId: issue.id, ticket: issue.ticketNumber, priority: issue.priority }, "issue reported");
    return issue;
  }

  list(actor: Actor, filter: IssueFilter = {}) {
    return this.ctx.store.issues.list(isStaff(actor) ? filter : { ...filter, customerId: actor.id });
  }

  async get(actor: Actor, id: string) {
    const issue = await this.issue(id);
    assertOwnerOrStaff(actor, issue.customerId);
    return issue;
  }

  async assign(actor: Actor, id: string, staffId: string) {
    assertStaff(actor);
    const assignee = await this.ctx.store.users.findById(staffId);
    if (!assignee) throw new NotFoundError("user");
    if (assignee.userType === "customer") {
      throw new ValidationError("issues can only be assigned to staff", { assignedTo: ["must be a staff member"] });
    }
    await this.issue(id);
    const issue = await this.ctx.store.issues.update(id, { assignedTo: staffId, updatedAt: this.ctx.clock() });
    if (!issue) throw new NotFoundError("issue");
    return issue;
  }

  async transition(actor: Actor, id: string, action: IssueAction, resolution?: string) {
    assertStaff(actor);
    const current = await this.issue(id);
    if (action === "resolve" && !resolution) {
      throw new ValidationError("a resolution is required", { resolution: ["is required to resolve an issue"] });
    }
    const patch = transitionIssue(current, action, this.ctx.clock(), { actorId: actor.id, resolution });
    const issue = await this.ctx.store.issues.transition(id, ISSUE_TRANSITIONS[action].from, patch);
    if (!issue) {
      const latest = await this.ctx.store.issues.findById(id);
      throw new InvalidTransitionError("issue", latest?.status ?? current.status, action);
    }
    return issue;
  }

  /** The reporting customer rates how a resolved issue was handled. */
  async feedback(actor: Actor, id: string, input: FeedbackInput) {
    const current = await this.issue(id);
    if (current.customerId !== actor.id) throw new ForbiddenError("only the reporter can leave feedback");
    if (current.status !== "resolved" && current.status !== "closed") throw new ConflictError("issue_not_resolved");
    const issue = await this.ctx.store.issues.update(id, {
      customerSatisfaction: input.satisfaction,
      customerFeedback: input.feedback ?? null,
      updatedAt: this.ctx.clock(),
    });
    if (!issue) throw new NotFoundError("issue");
    return issue;
  }

  private async issue(id: string) {
    const issue = await this.ctx.store.issues.findById(id);
    if (!issue) throw new NotFoundError("issue");
    return issue;
  }
}
