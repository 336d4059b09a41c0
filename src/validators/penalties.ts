// src/validators/penalties.ts
import { z } from "zod";
import { PENALTY_TYPES } from "../db/schema";
import { Id, PositiveMoney } from "./common";

export const PenaltyCreate = z.object({
  bookingId: Id,
  penaltyType: z.enum(PENALTY_TYPES),
  description: z.string().min(1).max(2000),
  amount: PositiveMoney,
});

export const PenaltyDispute = z.object({ reason: z.string().min(1).max(2000) });

export const PenaltyResolve = z.object({ resolution: z.string().max(2000).optional() });
