// src/services/vehicles.ts
import type {
  MaintenanceRecord, SafetyEquipment, Vehicle, VehicleCategory, VehicleFeature, VehicleImage,
} from "../db/schema";
import { quotedRates } from "../domain/pricing";
import { ConflictError, InvalidTransitionError, NotFoundError } from "../errors";
import { UNIQUE } from "../store/constraints";
import type { Patch, VehicleFilter } from "../store/types";
import { isoDate } from "../utils/dates";
import { newId } from "../utils/id";
import type { Actor, ServiceContext } from "./context";
import { mapUnique } from "./unique";

type VehicleRequired = "make" | "model" | "year" | "licensePlate" | "dailyRate";
export type VehicleInput = Pick<Vehicle, VehicleRequired>
  & Partial<Omit<Vehicle, VehicleRequired | "id" | "createdBy" | "createdAt" | "updatedAt">>;
export type VehicleUpdate = Partial<Omit<Vehicle, "id" | "createdBy" | "createdAt" | "updatedAt">>;
export type CategoryInput = Pick<VehicleCategory, "name"> & Partial<Omit<VehicleCategory, "id" | "name">>;
export type FeatureInput = Pick<VehicleFeature, "name"> & Partial<Omit<VehicleFeature, "id" | "name">>;
export type ImageInput = Pick<VehicleImage, "url"> & Partial<Pick<VehicleImage, "imageType" | "caption" | "isPrimary" | "sortOrder">>;
export type MaintenanceInput = Pick<MaintenanceRecord, "maintenanceType" | "description" | "scheduledDate">
  & Partial<Pick<MaintenanceRecord, "serviceProvider" | "estimatedCost" | "notes">>;
export type MaintenanceCompletion = Partial<Pick<MaintenanceRecord, "actualCost" | "mileageAtService" | "notes">>;
export type EquipmentInput = Pick<SafetyEquipment, "equipmentType">
  & Partial<Pick<SafetyEquipment, "status" | "serialNumber" | "expiryDate" | "nextInspectionDue" | "notes">>;
export type InspectionInput = Pick<SafetyEquipment, "status"> & Partial<Pick<SafetyEquipment, "nextInspectionDue" | "notes">>;

const VEHICLE_CONFLICTS = { [UNIQUE.licensePlate]: "license_plate_taken", [UNIQUE.vin]: "vin_taken" };

export class VehicleService {
  constructor(private readonly ctx: ServiceContext) {}

  list(filter: VehicleFilter = {}) {
    return this.ctx.store.vehicles.list(filter);
  }

  async get(id: string) {
    const vehicle = await this.ctx.store.vehicles.findById(id);
    if (!vehicle) throw new NotFoundError("vehicle");
    return vehicle;
  }

  /** Vehicle with its features, images and safety equipment. */
  async detail(id: string) {
    const vehicle = await this.get(id);
    const { store } = this.ctx;
    return {
      ...vehicle,
      rates: quotedRates(vehicle),
      features: await store.features.listForVehicle(id),
      images: await store.images.listForVehicle(id),
      safetyEquipment: await store.safetyEquipment.listForVehicle(id),
    };
  }

  async create(actor: Actor, input: VehicleInput) {
    if (input.categoryId) await this.category(input.categoryId);
    const now = this.ctx.clock();
    return mapUnique(
      this.ctx.store.vehicles.insert({
        id: newId(),
        categoryId: input.categoryId ?? null,
        make: input.make,
        model: input.model,
        year: input.year,
        color: input.color ?? null,
        licensePlate: input.licensePlate,
        vinNumber: input.vinNumber ?? null,
        fuelType: input.fuelType ?? "petrol",
        transmission: input.transmission ?? "manual",
        seatingCapacity: input.seatingCapacity ?? 5,
        doors: input.doors ?? 4,
        status: input.status ?? "available",
        condition: input.condition ?? "good",
        currentMileage: input.currentMileage ?? 0,
        lastServiceMileage: input.lastServiceMileage ?? null,
        dailyRate: input.dailyRate,
        weeklyRate: input.weeklyRate ?? null,
        monthlyRate: input.monthlyRate ?? null,
        securityDeposit: input.securityDeposit ?? 0,
        currentLocation: input.currentLocation ?? null,
        isFeatured: input.isFeatured ?? false,
        isActive: input.isActive ?? true,
        notes: input.notes ?? null,
        createdBy: actor.id,
        createdAt: now,
        updatedAt: now,
      }),
      VEHICLE_CONFLICTS,
    );
  }

  async update(id: string, input: VehicleUpdate) {
    if (input.categoryId) await this.category(input.categoryId);
    const vehicle = await mapUnique(
      this.ctx.store.vehicles.update(id, { ...input, updatedAt: this.ctx.clock() }),
      VEHICLE_CONFLICTS,
    );
    if (!vehicle) throw new NotFoundError("vehicle");
    return vehicle;
  }

  async rates(id: string) {
    return quotedRates(await this.get(id));
  }

  categories() {
    return this.ctx.store.categories.list();
  }

  createCategory(input: CategoryInput) {
    return mapUnique(
      this.ctx.store.categories.insert({
        id: newId(),
        name: input.name,
        description: input.description ?? null,
        sortOrder: input.sortOrder ?? 0,
        isActive: input.isActive ?? true,
      }),
      { [UNIQUE.categoryName]: "category_exists" },
    );
  }

  features() {
    return this.ctx.store.features.list();
  }

  createFeature(input: FeatureInput) {
    return mapUnique(
      this.ctx.store.features.insert({
        id: newId(),
        name: input.name,
        category: input.category ?? null,
        isPremium: input.isPremium ?? false,
        additionalCost: input.additionalCost ?? 0,
        isActive: input.isActive ?? true,
      }),
      { [UNIQUE.featureName]: "feature_exists" },
    );
  }

  async assignFeature(vehicleId: string, featureId: string, notes?: string) {
    await this.get(vehicleId);
    const feature = await this.ctx.store.features.findById(featureId);
    if (!feature) throw new NotFoundError("feature");
    const assignment = await mapUnique(
      this.ctx.store.features.assign({
        id: newId(),
        vehicleId,
        featureId,
        isWorking: true,
        notes: notes ?? null,
        assignedAt: this.ctx.clock(),
      }),
      { [UNIQUE.vehicleFeature]: "feature_already_assigned" },
    );
    return { ...assignment, feature };
  }

  /** A primary image demotes whichever image was primary before it. */
  async addImage(actor: Actor, vehicleId: string, input: ImageInput) {
    await this.get(vehicleId);
    const isPrimary = input.isPrimary ?? false;
    const work = this.ctx.store.transaction(async (store) => {
      if (isPrimary) await store.images.clearPrimary(vehicleId);
      return store.images.insert({
        id: newId(),
        vehicleId,
        url: input.url,
        imageType: input.imageType ?? "exterior",
        caption: input.caption ?? null,
        isPrimary,
        sortOrder: input.sortOrder ?? 0,
        uploadedBy: actor.id,
        createdAt: this.ctx.clock(),
      });
    });
    // a concurrent primary upload committed first
    return mapUnique(work, { [UNIQUE.primaryImage]: "primary_image_conflict" });
  }

  async maintenance(vehicleId: string) {
    await this.get(vehicleId);
    return this.ctx.store.maintenance.listForVehicle(vehicleId);
  }

  async scheduleMaintenance(actor: Actor, vehicleId: string, input: MaintenanceInput) {
    await this.get(vehicleId);
    const now = this.ctx.clock();
    return this.ctx.store.maintenance.insert({
      id: newId(),
      vehicleId,
      maintenanceType: input.maintenanceType,
      description: input.description,
      scheduledDate: input.scheduledDate,
      completedDate: null,
      status: "scheduled",
      serviceProvider: input.serviceProvider ?? null,
      mileageAtService: null,
      estimatedCost: input.estimatedCost ?? null,
      actualCost: null,
      notes: input.notes ?? null,
      createdBy: actor.id,
      createdAt: now,
      updatedAt: now,
    });
  }

  /** Work starting takes the vehicle out of the rentable fleet. */
  async startMaintenance(recordId: string) {
    const record = await this.maintenanceRecord(recordId);
    if (record.status !== "scheduled") throw new InvalidTransitionError("maintenance", record.status, "start");
    const now = this.ctx.clock();
    const vehicle = await this.get(record.vehicleId);
    if (vehicle.status === "rented") throw new ConflictError("vehicle_rented");
    await this.ctx.store.vehicles.update(record.vehicleId, { status: "maintenance", updatedAt: now });
    return this.saveMaintenance(recordId, { status: "in_progress", updatedAt: now });
  }

  async completeMaintenance(recordId: string, input: MaintenanceCompletion = {}) {
    const record = await this.maintenanceRecord(recordId);
    if (record.status !== "scheduled" && record.status !== "in_progress") {
      throw new InvalidTransitionError("maintenance", record.status, "complete");
    }
    const now = this.ctx.clock();
    const vehicle = await this.get(record.vehicleId);
    const mileage = input.mileageAtService ?? vehicle.currentMileage;
    await this.ctx.store.vehicles.update(vehicle.id, {
      status: vehicle.status === "maintenance" ? "available" : vehicle.status,
      lastServiceMileage: mileage,
      currentMileage: Math.max(vehicle.currentMileage, mileage),
      updatedAt: now,
    });
    return this.saveMaintenance(recordId, {
      status: "completed",
      completedDate: now,
      mileageAtService: mileage,
      actualCost: input.actualCost ?? record.actualCost,
      notes: input.notes ?? record.notes,
      updatedAt: now,
    });
  }

  async safetyEquipment(vehicleId: string) {
    await this.get(vehicleId);
    return this.ctx.store.safetyEquipment.listForVehicle(vehicleId);
  }

  async recordEquipment(vehicleId: string, input: EquipmentInput) {
    await this.get(vehicleId);
    return mapUnique(
      this.ctx.store.safetyEquipment.insert({
        id: newId(),
        vehicleId,
        equipmentType: input.equipmentType,
        status: input.status ?? "present",
        serialNumber: input.serialNumber ?? null,
        expiryDate: input.expiryDate ?? null,
        lastInspectionDate: null,
        nextInspectionDue: input.nextInspectionDue ?? null,
        notes: input.notes ?? null,
        updatedAt: this.ctx.clock(),
      }),
      { [UNIQUE.vehicleEquipment]: "equipment_already_recorded" },
    );
  }

  async inspectEquipment(equipmentId: string, input: InspectionInput) {
    const now = this.ctx.clock();
    const patch: Patch<SafetyEquipment> = { status: input.status, lastInspectionDate: isoDate(now), updatedAt: now };
    if (input.nextInspectionDue !== undefined) patch.nextInspectionDue = input.nextInspectionDue;
    if (input.notes !== undefined) patch.notes = input.notes;
    const updated = await this.ctx.store.safetyEquipment.update(equipmentId, patch);
    if (!updated) throw new NotFoundError("equipment");
    return updated;
  }

  private async category(id: string) {
    const category = await this.ctx.store.categories.findById(id);
    if (!category) throw new NotFoundError("category");
    return category;
  }

  private async maintenanceRecord(id: string) {
    const record = await this.ctx.store.maintenance.findById(id);
    if (!record) throw new NotFoundError("maintenance");
    return record;
  }

  private async saveMaintenance(id: string, patch: Patch<MaintenanceRecord>) {
    const updated = await this.ctx.store.maintenance.update(id, patch);
    if (!updated) throw new NotFoundError("maintenance");
    return updated;
  }
}
