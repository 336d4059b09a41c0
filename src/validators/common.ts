// src/validators/common.ts
import { z } from "zod";
import { toCents } from "../domain/money";

/** Decimal major units in, integer cents out. */
export const Money = z.coerce.number().nonnegative().max(10_000_000).transform(toCents);
export const PositiveMoney = z.coerce.number().positive().max(10_000_000).transform(toCents);

export const Id = z.string().min(10).max(26);
export const IsoDate = z.string().date();

export const BoolQuery = z.enum(["true", "false"]).transform((v) => v === "true");
