// tests/unit/issues.test.ts
import { describe, expect, it } from "@jest/globals";
import { transitionIssue } from "../../src/domain/issues";
import { InvalidTransitionError } from "../../src/errors";
import { NOW } from "../support/fixtures";

describe("transitionIssue", () => {
  it("assigns the staff member who starts work", () => {
    expect(transitionIssue({ status: "open" }, "start", NOW, { actorId: "staff-1" })).toEqual({
      status: "in_progress",
      updatedAt: NOW,
      assignedTo: "staff-1",
    });
  });

  it("stamps the resolution", () => {
    expect(transitionIssue({ status: "in_progress" }, "resolve", NOW, { actorId: "staff-1", resolution: "replaced tyre" })).toEqual({
      status: "resolved",
      updatedAt: NOW,
      resolution: "replaced tyre",
      resolutionDate: NOW,
      resolvedBy: "staff-1",
    });
  });

  it("escalates anything not closed and resumes escalated work", () => {
    expect(transitionIssue({ status: "resolved" }, "escalate", NOW).status).toBe("escalated");
    expect(transitionIssue({ status: "escalated" }, "start", NOW).status).toBe("in_progress");
    expect(() => transitionIssue({ status: "closed" }, "escalate", NOW)).toThrow(InvalidTransitionError);
  });

  it("closes only resolved issues", () => {
    expect(() => transitionIssue({ status: "open" }, "close", NOW)).toThrow(InvalidTransitionError);
    expect(transitionIssue({ status: "resolved" }, "close", NOW)).toEqual({ status: "closed", updatedAt: NOW });
  });
});
