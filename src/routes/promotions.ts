// src/routes/promotions.ts
import { Router } from "express";
import { actorOf, requireAuth, requireStaff } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import { PromotionCheck, PromotionCreate } from "../validators/promotions";

export function promotionsRouter({ auth, promotions }: Services) {
  const router = Router();
  const authed = requireAuth(auth);

  // ── GET /api/promotions (public codes in their window) ──────────────────────
  router.get("/", async (_req, res, next) => {
    try {
      res.json(toWire(await promotions.list(true)));
    } catch (e) { next(e); }
  });

  router.get("/all", authed, requireStaff, async (_req, res, next) => {
    try {
      res.json(toWire(await promotions.list(false)));
    } catch (e) { next(e); }
  });

  router.post("/", authed, requireStaff, async (req, res, next) => {
    try {
      const input = PromotionCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await promotions.create(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── POST /api/promotions/check ──────────────────────────────────────────────
  router.post("/check", authed, async (req, res, next) => {
    try {
      const { code, ...rental } = PromotionCheck.parse(req.body ?? {});
      res.json(toWire(await promotions.check(actorOf(req).id, code, rental)));
    } catch (e) { next(e); }
  });

  return router;
}
