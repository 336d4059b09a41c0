// src/routes/penalties.ts
import { Router } from "express";
import { actorOf, requireAuth } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import { PenaltyCreate, PenaltyDispute, PenaltyResolve } from "../validators/penalties";

export function penaltiesRouter({ auth, penalties }: Services) {
  const router = Router();
  router.use(requireAuth(auth));

  // ── POST /api/penalties ─────────────────────────────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const input = PenaltyCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await penalties.assess(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  router.get("/mine", async (req, res, next) => {
    try {
      res.json(toWire(await penalties.listMine(actorOf(req))));
    } catch (e) { next(e); }
  });

  router.get("/booking/:bookingId", async (req, res, next) => {
    try {
      res.json(toWire(await penalties.listForBooking(actorOf(req), req.params.bookingId)));
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      res.json(toWire(await penalties.get(actorOf(req), req.params.id)));
    } catch (e) { next(e); }
  });

  router.post("/:id/dispute", async (req, res, next) => {
    try {
      const { reason } = PenaltyDispute.parse(req.body ?? {});
      res.json(toWire(await penalties.transition(actorOf(req), req.params.id, "dispute", { reason })));
    } catch (e) { next(e); }
  });

  router.post("/:id/approve", async (req, res, next) => {
    try {
      const { resolution } = PenaltyResolve.parse(req.body ?? {});
      res.json(toWire(await penalties.transition(actorOf(req), req.params.id, "approve", { resolution })));
    } catch (e) { next(e); }
  });

  router.post("/:id/pay", async (req, res, next) => {
    try {
      res.json(toWire(await penalties.transition(actorOf(req), req.params.id, "pay")));
    } catch (e) { next(e); }
  });

  router.post("/:id/waive", async (req, res, next) => {
    try {
      const { resolution } = PenaltyResolve.parse(req.body ?? {});
      res.json(toWire(await penalties.transition(actorOf(req), req.params.id, "waive", { resolution })));
    } catch (e) { next(e); }
  });

  return router;
}
