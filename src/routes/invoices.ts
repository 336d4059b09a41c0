// src/routes/invoices.ts
import { Router } from "express";
import { withBalance } from "../domain/billing";
import { actorOf, requireAuth } from "../middleware/auth";
import { toWire } from "../serializers";
import type { Services } from "../services";
import { InvoiceCreate, InvoicePayment, InvoiceSend } from "../validators/invoices";

export function invoicesRouter({ auth, invoices }: Services) {
  const router = Router();
  router.use(requireAuth(auth));

  // ── POST /api/invoices ──────────────────────────────────────────────────────
  router.post("/", async (req, res, next) => {
    try {
      const { bookingId, notes } = InvoiceCreate.parse(req.body ?? {});
      res.status(201).json(toWire(withBalance(await invoices.create(actorOf(req), bookingId, notes))));
    } catch (e) { next(e); }
  });

  router.get("/booking/:bookingId", async (req, res, next) => {
    try {
      res.json(toWire((await invoices.listForBooking(actorOf(req), req.params.bookingId)).map(withBalance)));
    } catch (e) { next(e); }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      res.json(toWire(withBalance(await invoices.get(actorOf(req), req.params.id))));
    } catch (e) { next(e); }
  });

  router.post("/:id/send", async (req, res, next) => {
    try {
      const { email } = InvoiceSend.parse(req.body ?? {});
      res.json(toWire(withBalance(await invoices.send(actorOf(req), req.params.id, email))));
    } catch (e) { next(e); }
  });

  // ── POST /api/invoices/:id/payments ─────────────────────────────────────────
  router.post("/:id/payments", async (req, res, next) => {
    try {
      const { amount } = InvoicePayment.parse(req.body ?? {});
      res.json(toWire(withBalance(await invoices.recordPayment(actorOf(req), req.params.id, amount))));
    } catch (e) { next(e); }
  });

  router.post("/:id/cancel", async (req, res, next) => {
    try {
      res.json(toWire(withBalance(await invoices.cancel(actorOf(req), req.params.id))));
    } catch (e) { next(e); }
  });

  router.post("/:id/mark-overdue", async (req, res, next) => {
    try {
      res.json(toWire(withBalance(await invoices.markOverdue(actorOf(req), req.params.id))));
    } catch (e) { next(e); }
  });

  return router;
}
