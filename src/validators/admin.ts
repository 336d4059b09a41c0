// src/validators/admin.ts
import { z } from "zod";
import { Id } from "./common";

export const AdminActionInput = z.object({
  ids: z.array(Id).min(1).max(500),
});
