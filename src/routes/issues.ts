// src/routes/issues.ts
import { Router } from "express";
import type { IssueAction } from "../domain/issues";
import { actorOf, requireAuth } from "../middleware/auth";
import type { Services } from "../services";
import { IssueAssign, IssueCreate, IssueFeedback, IssueListQuery, IssueResolve } from "../validators/issues";

const PLAIN_ACTIONS: readonly IssueAction[] = ["start", "close", "escalate"];

export function issuesRouter({ auth, issues }: Services) {
  const router = Router();
  router.use(requireAuth(auth));

  // ── POST /api/issues ────────────────────────────────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const input = IssueCreate.parse(req.body ?? {});
      res.status(201).json(await issues.report(actorOf(req), input));
    } catch (e) { next(e); }
  });

  router.get("/", async (req, res, next) => {
    try {
      const filter = IssueListQuery.parse(req.query);
      res.json(await issues.list(actorOf(req), filter));
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      res.json(await issues.get(actorOf(req), req.params.id));
    } catch (e) { next(e); }
  });

  router.post("/:id/assign", async (req, res, next) => {
    try {
      const { staffId } = IssueAssign.parse(req.body ?? {});
      res.json(await issues.assign(actorOf(req), req.params.id, staffId));
    } catch (e) { next(e); }
  });

  for (const action of PLAIN_ACTIONS) {
    router.post(`/:id/${action}`, async (req, res, next) => {
      try {
        res.json(await issues.transition(actorOf(req), req.params.id, action));
      } catch (e) { next(e); }
    });
  }

  router.post("/:id/resolve", async (req, res, next) => {
    try {
      const { resolution } = IssueResolve.parse(req.body ?? {});
      res.json(await issues.transition(actorOf(req), req.params.id, "resolve", resolution));
    } catch (e) { next(e); }
  });

  router.post("/:id/feedback", async (req, res, next) => {
    try {
      const input = IssueFeedback.parse(req.body ?? {});
      res.json(await issues.feedback(actorOf(req), req.params.id, input));
    } catch (e) { next(e); }
  });

  return router;
}
