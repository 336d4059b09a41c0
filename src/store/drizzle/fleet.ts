// src/store/drizzle/fleet.ts
import { and, asc, eq, inArray, lte } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { Db } from "../../db/drizzle";
import {
  maintenanceRecords, safetyEquipment, vehicleCategories, vehicleFeatureAssignments, vehicleFeatures, vehicleImages, vehicles,
} from "../../db/schema";
import type {
  CategoryRepository, FeatureRepository, ImageRepository, MaintenanceRepository, SafetyEquipmentRepository, VehicleRepository,
} from "../types";
import { first, guarded } from "./unique";

export function categoryRepository(db: Db): CategoryRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(vehicleCategories).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(vehicleCategories).where(eq(vehicleCategories.id, id)));
    },
    async list() {
      return db.select().from(vehicleCategories).orderBy(asc(vehicleCategories.sortOrder), asc(vehicleCategories.name));
    },
  };
}

export function vehicleRepository(db: Db): VehicleRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(vehicles).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(vehicles).where(eq(vehicles.id, id)));
    },
    async list(filter = {}) {
      const where: SQL[] = [];
      if (filter.status) where.push(eq(vehicles.status, filter.status));
      if (filter.categoryId) where.push(eq(vehicles.categoryId, filter.categoryId));
      if (filter.featured !== undefined) where.push(eq(vehicles.isFeatured, filter.featured));
      if (filter.activeOnly) where.push(eq(vehicles.isActive, true));
      if (filter.maxDailyRate !== undefined) where.push(lte(vehicles.dailyRate, filter.maxDailyRate));
      return db.select().from(vehicles).where(and(...where)).orderBy(asc(vehicles.make), asc(vehicles.model));
    },
    async update(id, patch) {
      return first(await guarded(db.update(vehicles).set(patch).where(eq(vehicles.id, id)).returning()));
    },
    async bulkUpdate(ids, patch) {
      if (ids.length === 0) return 0;
      const rows = await db.update(vehicles).set(patch).where(inArray(vehicles.id, ids)).returning({ id: vehicles.id });
      return rows.length;
    },
  };
}

export function featureRepository(db: Db): FeatureRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(vehicleFeatures).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(vehicleFeatures).where(eq(vehicleFeatures.id, id)));
    },
    async list() {
      return db.select().from(vehicleFeatures).orderBy(asc(vehicleFeatures.name));
    },
    async assign(row) {
      const [created] = await guarded(db.insert(vehicleFeatureAssignments).values(row).returning());
      return created;
    },
    async listForVehicle(vehicleId) {
      const rows = await db
        .select({ assignment: vehicleFeatureAssignments, feature: vehicleFeatures })
        .from(vehicleFeatureAssignments)
        .innerJoin(vehicleFeatures, eq(vehicleFeatures.id, vehicleFeatureAssignments.featureId))
        .where(eq(vehicleFeatureAssignments.vehicleId, vehicleId));
      return rows.map((r) => ({ ...r.assignment, feature: r.feature }));
    },
  };
}

export function imageRepository(db: Db): ImageRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(vehicleImages).values(row).returning());
      return created;
    },
    async listForVehicle(vehicleId) {
      return db.select().from(vehicleImages)
        .where(eq(vehicleImages.vehicleId, vehicleId))
        .orderBy(asc(vehicleImages.sortOrder), asc(vehicleImages.createdAt));
    },
    async clearPrimary(vehicleId) {
      await db.update(vehicleImages)
        .set({ isPrimary: false })
        .where(and(eq(vehicleImages.vehicleId, vehicleId), eq(vehicleImages.isPrimary, true)));
    },
  };
}

export function maintenanceRepository(db: Db): MaintenanceRepository {
  return {
    async insert(row) {
      const [created] = await db.insert(maintenanceRecords).values(row).returning();
      return created;
    },
    async findById(id) {
      return first(await db.select().from(maintenanceRecords).where(eq(maintenanceRecords.id, id)));
    },
    async listForVehicle(vehicleId) {
      return db.select().from(maintenanceRecords)
        .where(eq(maintenanceRecords.vehicleId, vehicleId))
        .orderBy(asc(maintenanceRecords.scheduledDate));
    },
    async update(id, patch) {
      return first(await db.update(maintenanceRecords).set(patch).where(eq(maintenanceRecords.id, id)).returning());
    },
  };
}

export function safetyEquipmentRepository(db: Db): SafetyEquipmentRepository {
  return {
    async insert(row) {
      const [created] = await guarded(db.insert(safetyEquipment).values(row).returning());
      return created;
    },
    async findById(id) {
      return first(await db.select().from(safetyEquipment).where(eq(safetyEquipment.id, id)));
    },
    async listForVehicle(vehicleId) {
      return db.select().from(safetyEquipment).where(eq(safetyEquipment.vehicleId, vehicleId));
    },
    async update(id, patch) {
      return first(await db.update(safetyEquipment).set(patch).where(eq(safetyEquipment.id, id)).returning());
    },
  };
}
