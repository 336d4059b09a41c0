// src/validators/reviews.ts
import { z } from "zod";
import { Id } from "./common";

const Rating = z.coerce.number().int().min(1).max(5);

export const ReviewCreate = z.object({
  bookingId: Id,
  overallRating: Rating,
  vehicleConditionRating: Rating.optional(),
  serviceRating: Rating.optional(),
  valueForMoneyRating: Rating.optional(),
  title: z.string().max(200).optional(),
  comment: z.string().min(1).max(5000),
  pros: z.string().max(2000).optional(),
  cons: z.string().max(2000).optional(),
});

export const ReviewRespond = z.object({ response: z.string().min(1).max(5000) });
