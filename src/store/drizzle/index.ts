// src/store/drizzle/index.ts
import type { Db } from "../../db/drizzle";
import type { Store } from "../types";
import { preferenceRepository, revokedTokenRepository, sessionRepository, userRepository } from "./accounts";
import { addOnRepository, additionalDriverRepository, bookingRepository } from "./bookings";
import { invoiceRepository, paymentMethodRepository, paymentRepository, receiptRepository, sequenceRepository } from "./billing";
import {
  categoryRepository, featureRepository, imageRepository, maintenanceRepository, safetyEquipmentRepository, vehicleRepository,
} from "./fleet";
import { issueRepository, penaltyRepository, promotionRepository, reviewRepository } from "./relations";

export function createDrizzleStore(db: Db): Store {
  return {
    users: userRepository(db),
    sessions: sessionRepository(db),
    preferences: preferenceRepository(db),
    revokedTokens: revokedTokenRepository(db),
    categories: categoryRepository(db),
    vehicles: vehicleRepository(db),
    features: featureRepository(db),
    images: imageRepository(db),
    maintenance: maintenanceRepository(db),
    safetyEquipment: safetyEquipmentRepository(db),
    bookings: bookingRepository(db),
    drivers: additionalDriverRepository(db),
    addons: addOnRepository(db),
    paymentMethods: paymentMethodRepository(db),
    payments: paymentRepository(db),
    invoices: invoiceRepository(db),
    receipts: receiptRepository(db),
    sequences: sequenceRepository(db),
    reviews: reviewRepository(db),
    promotions: promotionRepository(db),
    issues: issueRepository(db),
    penalties: penaltyRepository(db),
    transaction: (fn) => db.transaction((tx) => fn(createDrizzleStore(tx))),
  };
}
