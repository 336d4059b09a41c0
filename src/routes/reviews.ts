// src/routes/reviews.ts
import { Router } from "express";
import { actorOf, requireAuth } from "../middleware/auth";
import type { Services } from "../services";
import { ReviewCreate, ReviewRespond } from "../validators/reviews";

export function reviewsRouter({ auth, reviews }: Services) {
  const router = Router();
  const authed = requireAuth(auth);

  // ── GET /api/reviews/vehicle/:vehicleId (public) ────────────────────────────
  router.get("/vehicle/:vehicleId", async (req, res, next) => {
    try {
      res.json(await reviews.forVehicle(req.params.vehicleId));
    } catch (e) { next(e); }
  });

  router.post("/", authed, async (req, res, next) => {
    try {
      const input = ReviewCreate.parse(req.body ?? {});
      res.status(201).json(await reviews.create(actorOf(req), input));
    } catch (e) { next(e); }
  });

  router.post("/:id/respond", authed, async (req, res, next) => {
    try {
      const { response } = ReviewRespond.parse(req.body ?? {});
      res.json(await reviews.respond(actorOf(req), req.params.id, response));
    } catch (e) { next(e); }
  });

  return router;
}
