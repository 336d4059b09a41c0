// src/validators/issues.ts
import { z } from "zod";
import { ISSUE_PRIORITIES, ISSUE_STATUSES, ISSUE_TYPES } from "../db/schema";
import { Id } from "./common";

export const IssueCreate = z.object({
  issueType: z.enum(ISSUE_TYPES),
  priority: z.enum(ISSUE_PRIORITIES).optional(),
  subject: z.string().min(3).max(200),
  description: z.string().min(1).max(5000),
  location: z.string().max(200).optional(),
  bookingId: Id.optional(),
  vehicleId: Id.optional(),
});

export const IssueListQuery = z.object({
  status: z.enum(ISSUE_STATUSES).optional(),
  assignedTo: Id.optional(),
});

export const IssueAssign = z.object({ staffId: Id });

export const IssueResolve = z.object({ resolution: z.string().min(1).max(5000) });

export const IssueFeedback = z.object({
  satisfaction: z.coerce.number().int().min(1).max(5),
  feedback: z.string().max(2000).optional(),
});
