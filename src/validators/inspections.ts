// src/validators/inspections.ts
import { z } from "zod";

export const FuelLevel = z.string().regex(/^([0-8])\/8$/, "fuel must be like '7/8','4/8' etc");

/** "5/8" -> 5 */
export const FuelEighths = FuelLevel.transform((v) => Number(v.split("/")[0]));

// odometer and tank readings taken when a vehicle is handed over or returned
export const HandoverInput = z.object({
  odoKm: z.coerce.number().int().nonnegative().optional(),
  fuelLevel: FuelEighths.optional(),
  notes: z.string().max(1000).optional(),
}).transform((v) => ({ mileage: v.odoKm, fuelLevel: v.fuelLevel, notes: v.notes }));

export type HandoverInputType = z.infer<typeof HandoverInput>;
