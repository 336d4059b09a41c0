// src/domain/issues.ts
import type { IssueReport, IssueStatus } from "../db/schema";
import { InvalidTransitionError } from "../errors";

export type IssueAction = "start" | "resolve" | "close" | "escalate";

export const ISSUE_TRANSITIONS: Record<IssueAction, { from: readonly IssueStatus[]; to: IssueStatus }> = {
  start: { from: ["open", "escalated"], to: "in_progress" },
  resolve: { from: ["open", "in_progress", "escalated"], to: "resolved" },
  close: { from: ["resolved"], to: "closed" },
  escalate: { from: ["open", "in_progress", "resolved"], to: "escalated" },
};

export function transitionIssue(
  issue: Pick<IssueReport, "status">,
  action: IssueAction,
  now: Date,
  detail: { actorId?: string; resolution?: string } = {},
): Partial<IssueReport> {
  const rule = ISSUE_TRANSITIONS[action];
  if (!rule.from.includes(issue.status)) {
    throw new InvalidTransitionError("issue", issue.status, action);
  }
  const patch: Partial<IssueReport> = { status: rule.to, updatedAt: now };
  if (action === "start" && detail.actorId) patch.assignedTo = detail.actorId;
  if (action === "resolve") {
    patch.resolution = detail.resolution ?? null;
    patch.resolutionDate = now;
    patch.resolvedBy = detail.actorId ?? null;
  }
  return patch;
}
