// src/validators/invoices.ts
import { z } from "zod";
import { Id, PositiveMoney } from "./common";

export const InvoiceCreate = z.object({
  bookingId: Id,
  notes: z.string().max(2000).optional(),
});

export const InvoiceSend = z.object({ email: z.string().email().optional() });

export const InvoicePayment = z.object({ amount: PositiveMoney });
