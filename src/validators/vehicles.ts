// src/validators/vehicles.ts
import { z } from "zod";
import {
  FUEL_TYPES, IMAGE_TYPES, MAINTENANCE_TYPES, SAFETY_EQUIPMENT_STATUSES, SAFETY_EQUIPMENT_TYPES,
  TRANSMISSIONS, VEHICLE_CONDITIONS, VEHICLE_STATUSES,
} from "../db/schema";
import { BoolQuery, Id, IsoDate, Money, PositiveMoney } from "./common";

const VehicleFields = z.object({
  categoryId: Id.nullable(),
  make: z.string().min(1).max(50),
  model: z.string().min(1).max(100),
  year: z.coerce.number().int().min(1990).max(new Date().getFullYear() + 1),
  color: z.string().max(50).nullable(),
  licensePlate: z.string().min(2).max(20).transform((p) => p.toUpperCase()),
  vinNumber: z.string().length(17).transform((v) => v.toUpperCase()).nullable(),
  fuelType: z.enum(FUEL_TYPES),
  transmission: z.enum(TRANSMISSIONS),
  seatingCapacity: z.coerce.number().int().min(1).max(50),
  doors: z.coerce.number().int().min(2).max(6),
  status: z.enum(VEHICLE_STATUSES),
  condition: z.enum(VEHICLE_CONDITIONS),
  currentMileage: z.coerce.number().int().nonnegative(),
  lastServiceMileage: z.coerce.number().int().nonnegative().nullable(),
  dailyRate: PositiveMoney,
  weeklyRate: PositiveMoney.nullable(),
  monthlyRate: PositiveMoney.nullable(),
  securityDeposit: Money,
  currentLocation: z.string().max(200).nullable(),
  isFeatured: z.boolean(),
  isActive: z.boolean(),
  notes: z.string().max(2000).nullable(),
});

export const VehicleCreate = VehicleFields.partial().required({
  make: true, model: true, year: true, licensePlate: true, dailyRate: true,
});

export const VehicleUpdate = VehicleFields.partial().strict();

export const VehicleListQuery = z.object({
  status: z.enum(VEHICLE_STATUSES).optional(),
  categoryId: Id.optional(),
  featured: BoolQuery.optional(),
  maxDailyRate: PositiveMoney.optional(),
});

export const CategoryCreate = z.object({
  name: z.string().min(1).max(50),
  description: z.string().max(1000).nullable().optional(),
  sortOrder: z.coerce.number().int().optional(),
  isActive: z.boolean().optional(),
});

export const FeatureCreate = z.object({
  name: z.string().min(1).max(100),
  category: z.string().max(50).nullable().optional(),
  isPremium: z.boolean().optional(),
  additionalCost: Money.optional(),
  isActive: z.boolean().optional(),
});

export const FeatureAssign = z.object({
  featureId: Id,
  notes: z.string().max(500).optional(),
});

export const ImageCreate = z.object({
  url: z.string().url(),
  imageType: z.enum(IMAGE_TYPES).optional(),
  caption: z.string().max(200).nullable().optional(),
  isPrimary: z.boolean().optional(),
  sortOrder: z.coerce.number().int().optional(),
});

export const MaintenanceCreate = z.object({
  maintenanceType: z.enum(MAINTENANCE_TYPES),
  description: z.string().min(1).max(2000),
  scheduledDate: z.coerce.date(),
  serviceProvider: z.string().max(200).nullable().optional(),
  estimatedCost: Money.nullable().optional(),
  notes: z.string().max(2000).nullable().optional(),
});

export const MaintenanceComplete = z.object({
  actualCost: Money.nullable().optional(),
  mileageAtService: z.coerce.number().int().nonnegative().optional(),
  notes: z.string().max(2000).nullable().optional(),
});

export const EquipmentCreate = z.object({
  equipmentType: z.enum(SAFETY_EQUIPMENT_TYPES),
  status: z.enum(SAFETY_EQUIPMENT_STATUSES).optional(),
  serialNumber: z.string().max(50).nullable().optional(),
  expiryDate: IsoDate.nullable().optional(),
  nextInspectionDue: IsoDate.nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
});

export const EquipmentInspect = z.object({
  status: z.enum(SAFETY_EQUIPMENT_STATUSES),
  nextInspectionDue: IsoDate.nullable().optional(),
  notes: z.string().max(1000).nullable().optional(),
});
