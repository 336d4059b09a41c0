// src/routes/bookings.ts
import { Router } from "express";
import { actorOf, requireAuth, requireStaff } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import {
  AddonCreate, BookingAddonAdd, BookingCancel, BookingCreate, BookingDriverAdd, BookingListQuery, BookingQuote,
} from "../validators/bookings";
import { HandoverInput } from "../validators/inspections";

export function bookingsRouter({ auth, bookings }: Services) {
  const router = Router();
  router.use(requireAuth(auth));

  // ── POST /api/bookings/quote ────────────────────────────────────────────────
  router.post("/quote", async (req, res, next) => {
    try {
      const input = BookingQuote.parse(req.body ?? {});
      res.json(toWire(await bookings.quote(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── add-on catalogue ────────────────────────────────────────────────────────
  router.get("/addons", async (_req, res, next) => {
    try {
      res.json(toWire(await bookings.addonCatalogue()));
    } catch (e) { next(e); }
  });

  router.post("/addons", requireStaff, async (req, res, next) => {
    try {
      const input = AddonCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await bookings.createAddon(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── POST /api/bookings ──────────────────────────────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const input = BookingCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await bookings.create(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── GET /api/bookings ───────────────────────────────────────────────────────
  router.get("/", async (req, res, next) => {
    try {
      const filter = BookingListQuery.parse(req.query);
      res.json(toWire(await bookings.list(actorOf(req), filter)));
    } catch (e) { next(e); }
  });

  // ── GET /api/bookings/by-reference/:ref ─────────────────────────────────────
  router.get("/by-reference/:ref", async (req, res, next) => {
    try {
      res.json(toWire(await bookings.byReference(actorOf(req), req.params.ref)));
    } catch (e) { next(e); }
  });

  // ── GET /api/bookings/:id ───────────────────────────────────────────────────
  router.get("/:id", async (req, res, next) => {
    try {
      res.json(toWire(await bookings.detail(actorOf(req), req.params.id)));
    } catch (e) { next(e); }
  });

  // ── lifecycle ───────────────────────────────────────────────────────────────
  router.post("/:id/confirm", async (req, res, next) => {
    try {
      res.json(toWire(await bookings.confirm(actorOf(req), req.params.id)));
    } catch (e) { next(e); }
  });

  // odometer + fuel at handover
  router.post("/:id/start", async (req, res, next) => {
    try {
      const reading = HandoverInput.parse(req.body ?? {});
      res.json(toWire(await bookings.start(actorOf(req), req.params.id, reading)));
    } catch (e) { next(e); }
  });

  router.post("/:id/complete", async (req, res, next) => {
    try {
      const reading = HandoverInput.parse(req.body ?? {});
      res.json(toWire(await bookings.complete(actorOf(req), req.params.id, reading)));
    } catch (e) { next(e); }
  });

  router.post("/:id/cancel", async (req, res, next) => {
    try {
      const { reason } = BookingCancel.parse(req.body ?? {});
      res.json(toWire(await bookings.cancel(actorOf(req), req.params.id, reason)));
    } catch (e) { next(e); }
  });

  router.post("/:id/no-show", async (req, res, next) => {
    try {
      res.json(toWire(await bookings.noShow(actorOf(req), req.params.id)));
    } catch (e) { next(e); }
  });

  // ── extras & repricing ──────────────────────────────────────────────────────
  router.post("/:id/addons", async (req, res, next) => {
    try {
      const input = BookingAddonAdd.parse(req.body ?? {});
      res.status(201).json(toWire(await bookings.addAddon(actorOf(req), req.params.id, input)));
    } catch (e) { next(e); }
  });

  router.post("/:id/drivers", async (req, res, next) => {
    try {
      const { driverId, additionalFee } = BookingDriverAdd.parse(req.body ?? {});
      res.status(201).json(toWire(await bookings.addDriver(actorOf(req), req.params.id, driverId, additionalFee)));
    } catch (e) { next(e); }
  });

  router.post("/:id/recalculate", async (req, res, next) => {
    try {
      res.json(toWire(await bookings.recalculate(actorOf(req), req.params.id)));
    } catch (e) { next(e); }
  });

  return router;
}
