// src/routes/admin.ts
import { Router } from "express";
import { actorOf, requireAuth, requireRole } from "../middleware/auth";
import type { Services } from "../services";
import { AdminActionInput } from "../validators/admin";

export function adminRouter({ auth, admin }: Services) {
  const router = Router();
  router.use(requireAuth(auth), requireRole("manager", "admin"));

  router.get("/actions", (_req, res) => {
    res.json(admin.catalogue());
  });

  // ── POST /api/admin/actions/:entity/:action ─────────────────────────────────
  router.post("/actions/:entity/:action", async (req, res, next) => {
    try {
      const { ids } = AdminActionInput.parse(req.body ?? {});
      res.json(await admin.run(actorOf(req), req.params.entity, req.params.action, ids));
    } catch (e) { next(e); }
  });

  return router;
}
