// src/routes/vehicles.ts
import { Router } from "express";
import { actorOf, requireAuth, requireStaff } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import {
  CategoryCreate, EquipmentCreate, EquipmentInspect, FeatureAssign, FeatureCreate, ImageCreate,
  MaintenanceComplete, MaintenanceCreate, VehicleCreate, VehicleListQuery, VehicleUpdate,
} from "../validators/vehicles";

export function vehiclesRouter({ auth, vehicles }: Services) {
  const router = Router();
  const staff = [requireAuth(auth), requireStaff];

  // ── GET /api/vehicles ───────────────────────────────────────────────────────
  router.get("/", async (req, res, next) => {
    try {
      const filter = VehicleListQuery.parse(req.query);
      res.json(toWire(await vehicles.list({ ...filter, activeOnly: true })));
    } catch (e) { next(e); }
  });

  // ── categories & feature catalogue ──────────────────────────────────────────
  router.get("/categories", async (_req, res, next) => {
    try {
      res.json(await vehicles.categories());
    } catch (e) { next(e); }
  });

  router.post("/categories", ...staff, async (req, res, next) => {
    try {
      const input = CategoryCreate.parse(req.body ?? {});
      res.status(201).json(await vehicles.createCategory(input));
    } catch (e) { next(e); }
  });

  router.get("/features", async (_req, res, next) => {
    try {
      res.json(toWire(await vehicles.features()));
    } catch (e) { next(e); }
  });

  router.post("/features", ...staff, async (req, res, next) => {
    try {
      const input = FeatureCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await vehicles.createFeature(input)));
    } catch (e) { next(e); }
  });

  // ── maintenance records by id ───────────────────────────────────────────────
  router.post("/maintenance/:recordId/start", ...staff, async (req, res, next) => {
    try {
      res.json(toWire(await vehicles.startMaintenance(req.params.recordId)));
    } catch (e) { next(e); }
  });

  router.post("/maintenance/:recordId/complete", ...staff, async (req, res, next) => {
    try {
      const input = MaintenanceComplete.parse(req.body ?? {});
      res.json(toWire(await vehicles.completeMaintenance(req.params.recordId, input)));
    } catch (e) { next(e); }
  });

  // ── POST /api/vehicles/safety-equipment/:equipmentId/inspect ────────────────
  router.post("/safety-equipment/:equipmentId/inspect", ...staff, async (req, res, next) => {
    try {
      const input = EquipmentInspect.parse(req.body ?? {});
      res.json(await vehicles.inspectEquipment(req.params.equipmentId, input));
    } catch (e) { next(e); }
  });

  // ── POST /api/vehicles ──────────────────────────────────────────────────────
  router.post("/", ...staff, async (req, res, next) => {
    try {
      const input = VehicleCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await vehicles.create(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── GET/PATCH /api/vehicles/:id ─────────────────────────────────────────────
  router.get("/:id", async (req, res, next) => {
    try {
      res.json(toWire(await vehicles.detail(req.params.id)));
    } catch (e) { next(e); }
  });

  router.patch("/:id", ...staff, async (req, res, next) => {
    try {
      const input = VehicleUpdate.parse(req.body ?? {});
      res.json(toWire(await vehicles.update(req.params.id, input)));
    } catch (e) { next(e); }
  });

  // ── GET /api/vehicles/:id/rates ─────────────────────────────────────────────
  router.get("/:id/rates", async (req, res, next) => {
    try {
      res.json(toWire(await vehicles.rates(req.params.id)));
    } catch (e) { next(e); }
  });

  router.post("/:id/features", ...staff, async (req, res, next) => {
    try {
      const { featureId, notes } = FeatureAssign.parse(req.body ?? {});
      res.status(201).json(await vehicles.assignFeature(req.params.id, featureId, notes));
    } catch (e) { next(e); }
  });

  router.post("/:id/images", ...staff, async (req, res, next) => {
    try {
      const input = ImageCreate.parse(req.body ?? {});
      res.status(201).json(await vehicles.addImage(actorOf(req), req.params.id, input));
    } catch (e) { next(e); }
  });

  router.get("/:id/maintenance", ...staff, async (req, res, next) => {
    try {
      res.json(toWire(await vehicles.maintenance(req.params.id)));
    } catch (e) { next(e); }
  });

  router.post("/:id/maintenance", ...staff, async (req, res, next) => {
    try {
      const input = MaintenanceCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await vehicles.scheduleMaintenance(actorOf(req), req.params.id, input)));
    } catch (e) { next(e); }
  });

  router.get("/:id/safety-equipment", async (req, res, next) => {
    try {
      res.json(await vehicles.safetyEquipment(req.params.id));
    } catch (e) { next(e); }
  });

  router.post("/:id/safety-equipment", ...staff, async (req, res, next) => {
    try {
      const input = EquipmentCreate.parse(req.body ?? {});
      res.status(201).json(await vehicles.recordEquipment(req.params.id, input));
    } catch (e) { next(e); }
  });

  return router;
}
