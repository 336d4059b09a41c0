// src/routes/payments.ts
import { Router } from "express";
import type { PaymentAction } from "../domain/payment-lifecycle";
import { actorOf, requireAuth, requireStaff } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import { PaymentCreate, PaymentMethodCreate, PaymentRefund } from "../validators/payments";

const ACTIONS: readonly PaymentAction[] = ["process", "complete", "fail", "cancel"];

export function paymentsRouter({ auth, payments }: Services) {
  const router = Router();
  router.use(requireAuth(auth));

  // ── payment methods ─────────────────────────────────────────────────────────
  router.get("/methods", async (_req, res, next) => {
    try {
      res.json(toWire(await payments.methods()));
    } catch (e) { next(e); }
  });

  router.post("/methods", requireStaff, async (req, res, next) => {
    try {
      const input = PaymentMethodCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await payments.createMethod(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── POST /api/payments ──────────────────────────────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const input = PaymentCreate.parse(req.body ?? {});
      res.status(201).json(toWire(await payments.create(actorOf(req), input)));
    } catch (e) { next(e); }
  });

  // ── GET /api/payments/booking/:bookingId ────────────────────────────────────
  router.get("/booking/:bookingId", async (req, res, next) => {
    try {
      res.json(toWire(await payments.listForBooking(actorOf(req), req.params.bookingId)));
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      res.json(toWire(await payments.get(actorOf(req), req.params.id)));
    } catch (e) { next(e); }
  });

  // ── POST /api/payments/:id/{process|complete|fail|cancel} ──────────────────
  for (const action of ACTIONS) {
    router.post(`/:id/${action}`, async (req, res, next) => {
      try {
        res.json(toWire(await payments.transition(actorOf(req), req.params.id, action)));
      } catch (e) { next(e); }
    });
  }

  router.post("/:id/refund", async (req, res, next) => {
    try {
      const { amount, reason } = PaymentRefund.parse(req.body ?? {});
      res.json(toWire(await payments.refund(actorOf(req), req.params.id, amount, reason)));
    } catch (e) { next(e); }
  });

  // ── POST /api/payments/:id/receipt ──────────────────────────────────────────
  router.post("/:id/receipt", async (req, res, next) => {
    try {
      res.json(toWire(await payments.issueReceipt(req.params.id, actorOf(req))));
    } catch (e) { next(e); }
  });

  return router;
}
