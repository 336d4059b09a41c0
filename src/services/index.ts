// src/services/index.ts
import type { Clock, Random } from "../domain/identifiers";
import type { Store } from "../store/types";
import { AdminActions } from "./admin-actions";
import { AuthService } from "./auth";
import { BookingService } from "./bookings";
import { configFromEnv } from "./context";
import type { ServiceConfig, ServiceContext } from "./context";
import { InvoiceService } from "./invoices";
import { IssueService } from "./issues";
import { LoggingNotifier } from "./notifications";
import type { Notifier } from "./notifications";
import { PaymentService } from "./payments";
import { PenaltyService } from "./penalties";
import { PromotionService } from "./promotions";
import { ReviewService } from "./reviews";
import { VehicleService } from "./vehicles";

export type ServiceDeps = {
  store: Store;
  clock?: Clock;
  random?: Random;
  config?: ServiceConfig;
  notifier?: Notifier;
};

export function createServices(deps: ServiceDeps) {
  const ctx: ServiceContext = {
    store: deps.store,
    clock: deps.clock ?? (() => new Date()),
    random: deps.random ?? Math.random,
    config: deps.config ?? configFromEnv(),
    notifier: deps.notifier ?? new LoggingNotifier(),
  };
  const bookings = new BookingService(ctx);
  const payments = new PaymentService(ctx);
  return {
    auth: new AuthService(ctx),
    vehicles: new VehicleService(ctx),
    bookings,
    payments,
    invoices: new InvoiceService(ctx),
    reviews: new ReviewService(ctx),
    promotions: new PromotionService(ctx),
    issues: new IssueService(ctx),
    penalties: new PenaltyService(ctx),
    admin: new AdminActions(ctx, bookings, payments),
  };
}

export type Services = ReturnType<typeof createServices>;
export type { Actor } from "./context";
