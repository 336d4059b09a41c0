// src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import { ENV } from "./env";
import { errorHandler, notFound } from "./middleware/errors";
import { adminRouter } from "./routes/admin";
import { authRouter } from "./routes/auth";
import { bookingsRouter } from "./routes/bookings";
import { health } from "./routes/health";
import { invoicesRouter } from "./routes/invoices";
import { issuesRouter } from "./routes/issues";
import { paymentsRouter } from "./routes/payments";
import { penaltiesRouter } from "./routes/penalties";
import { promotionsRouter } from "./routes/promotions";
import { reviewsRouter } from "./routes/reviews";
import { vehiclesRouter } from "./routes/vehicles";
import type { Services } from "./services";

export function createApp(services: Services) {
  const app = express();
  app.use(helmet());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: "5mb" }));
  if (ENV.NODE_ENV !== "test") app.use(morgan("dev"));

  app.use("/health", health);
  app.use("/api/auth", authRouter(services));
  app.use("/api/vehicles", vehiclesRouter(services));
  app.use("/api/bookings", bookingsRouter(services));
  app.use("/api/payments", paymentsRouter(services));
  app.use("/api/invoices", invoicesRouter(services));
  app.use("/api/reviews", reviewsRouter(services));
  app.use("/api/promotions", promotionsRouter(services));
  app.use("/api/issues", issuesRouter(services));
  app.use("/api/penalties", penaltiesRouter(services));
  app.use("/api/admin", adminRouter(services));

  app.use(notFound);
  app.use(errorHandler);
  return app;
}
