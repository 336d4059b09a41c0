// src/db/schema.ts
import { sql } from "drizzle-orm";
import {
  pgTable, varchar, integer, timestamp, boolean, text, jsonb, date, doublePrecision, unique, uniqueIndex, index
} from "drizzle-orm/pg-core";

// Money columns are integer minor units (cents). Fuel levels are eighths of a tank (0..8).

export const USER_TYPES = ["customer", "staff", "manager", "admin"] as const;
export const VERIFICATION_LEVELS = ["unverified", "pending", "verified"] as const;
export const VEHICLE_STATUSES = ["available", "rented", "maintenance", "repair", "retired", "sold"] as const;
export const VEHICLE_CONDITIONS = ["excellent", "good", "fair", "poor"] as const;
export const FUEL_TYPES = ["petrol", "diesel", "hybrid", "electric", "lpg"] as const;
export const TRANSMISSIONS = ["manual", "automatic", "cvt"] as const;
export const IMAGE_TYPES = ["exterior", "interior", "engine", "trunk", "damage", "other"] as const;
export const MAINTENANCE_TYPES = [
  "routine", "repair", "inspection", "cleaning", "tire_change", "oil_change", "brake_service", "other",
] as const;
export const MAINTENANCE_STATUSES = ["scheduled", "in_progress", "completed", "cancelled"] as const;
export const SAFETY_EQUIPMENT_TYPES = [
  "fire_extinguisher", "first_aid_kit", "warning_triangle", "spare_tire",
  "jack", "jumper_cables", "emergency_kit", "reflective_vest",
] as const;
export const SAFETY_EQUIPMENT_STATUSES = ["present", "missing", "damaged", "expired"] as const;
export const BOOKING_STATUSES = ["pending", "confirmed", "active", "completed", "cancelled", "no_show"] as const;
export const BOOKING_PAYMENT_STATUSES = ["pending", "partial", "paid", "refunded", "failed"] as const;
export const ADDON_TYPES = [
  "gps", "child_seat", "additional_driver", "wifi", "ski_rack", "bike_rack",
  "roadside_assistance", "fuel_service", "cleaning", "delivery", "other",
] as const;
export const ADDON_PRICING_TYPES = ["per_day", "per_booking", "percentage"] as const;
export const PAYMENT_METHOD_TYPES = [
  "credit_card", "debit_card", "bank_transfer", "paypal", "cash", "check", "mobile_payment", "cryptocurrency",
] as const;
export const PAYMENT_TYPES = ["booking_payment", "security_deposit", "additional_charges", "penalty"] as const;
export const PAYMENT_STATUSES = [
  "pending", "processing", "completed", "failed", "cancelled", "refunded", "partially_refunded",
] as const;
export const INVOICE_STATUSES = ["draft", "sent", "paid", "overdue", "cancelled"] as const;
export const DISCOUNT_TYPES = ["percentage", "fixed_amount", "free_days"] as const;
export const ISSUE_TYPES = [
  "vehicle_problem", "service_complaint", "billing_issue", "booking_problem", "accident_report", "breakdown", "other",
] as const;
export const ISSUE_PRIORITIES = ["low", "medium", "high", "urgent"] as const;
export const ISSUE_STATUSES = ["open", "in_progress", "resolved", "closed", "escalated"] as const;
export const PENALTY_TYPES = [
  "late_return", "fuel_shortage", "damage", "cleaning_fee", "smoking_fee",
  "mileage_overage", "traffic_violation", "lost_key", "other",
] as const;
export const PENALTY_STATUSES = ["pending", "disputed", "approved", "paid", "waived"] as const;
export const LOYALTY_TIERS = ["bronze", "silver", "gold", "platinum"] as const;

// ── Accounts ─────────────────────────────────────────────────────────────────
export const users = pgTable("users", {
  id: varchar("id", { length: 26 }).primaryKey(),
  username: varchar("username", { length: 150 }).notNull().unique(),
  email: varchar("email", { length: 254 }).notNull().unique(),
  passwordHash: varchar("password_hash", { length: 100 }).notNull(),
  firstName: varchar("first_name", { length: 150 }).default("").notNull(),
  lastName: varchar("last_name", { length: 150 }).default("").notNull(),
  userType: varchar("user_type", { length: 20, enum: USER_TYPES }).default("customer").notNull(),
  phoneNumber: varchar("phone_number", { length: 17 }),
  dateOfBirth: date("date_of_birth"),
  addressLine1: varchar("address_line_1", { length: 255 }),
  addressLine2: varchar("address_line_2", { length: 255 }),
  city: varchar("city", { length: 100 }),
  postalCode: varchar("postal_code", { length: 20 }),
  country: varchar("country", { length: 100 }).default("Malawi"),
  driversLicenseNumber: varchar("drivers_license_number", { length: 50 }).unique(),
  licenseExpiryDate: date("license_expiry_date"),
  isActive: boolean("is_active").default(true).notNull(),
  isVerified: boolean("is_verified").default(false).notNull(),
  verificationLevel: varchar("verification_level", { length: 20, enum: VERIFICATION_LEVELS }).default("unverified").notNull(),
  verificationDate: timestamp("verification_date"),
  isSuspended: boolean("is_suspended").default(false).notNull(),
  suspensionReason: text("suspension_reason"),
  loyaltyPoints: integer("loyalty_points").default(0).notNull(),
  loyaltyTier: varchar("loyalty_tier", { length: 20, enum: LOYALTY_TIERS }).default("bronze").notNull(),
  lastLogin: timestamp("last_login"),
  lastLoginIp: varchar("last_login_ip", { length: 45 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  userTypeIdx: index("users_user_type_idx").on(t.userType),
}));

export const userSessions = pgTable("user_sessions", {
  id: varchar("id", { length: 26 }).primaryKey(),
  userId: varchar("user_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  ipAddress: varchar("ip_address", { length: 45 }),
  userAgent: text("user_agent"),
  deviceType: varchar("device_type", { length: 50 }),
  isActive: boolean("is_active").default(true).notNull(),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  lastActivity: timestamp("last_activity").defaultNow().notNull(),
}, (t) => ({
  userActiveIdx: index("user_sessions_user_active_idx").on(t.userId, t.isActive),
}));

export const userPreferences = pgTable("user_preferences", {
  userId: varchar("user_id", { length: 26 }).primaryKey().references(() => users.id, { onDelete: "cascade" }),
  emailNotifications: boolean("email_notifications").default(true).notNull(),
  smsNotifications: boolean("sms_notifications").default(false).notNull(),
  pushNotifications: boolean("push_notifications").default(true).notNull(),
  marketingEmails: boolean("marketing_emails").default(false).notNull(),
  autoInsurance: boolean("auto_insurance").default(true).notNull(),
  preferredFuelPolicy: varchar("preferred_fuel_policy", { length: 20 }).default("full_to_full").notNull(),
  currency: varchar("currency", { length: 3 }).default("ZAR").notNull(),
  language: varchar("language", { length: 10 }).default("en").notNull(),
  dateFormat: varchar("date_format", { length: 20 }).default("DD/MM/YYYY").notNull(),
  timeFormat: varchar("time_format", { length: 10 }).default("24h").notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// refresh tokens blacklisted at logout / rotation
export const revokedTokens = pgTable("revoked_tokens", {
  jti: varchar("jti", { length: 26 }).primaryKey(),
  expiresAt: timestamp("expires_at").notNull(),
});

// ── Fleet ────────────────────────────────────────────────────────────────────
export const vehicleCategories = pgTable("vehicle_categories", {
  id: varchar("id", { length: 26 }).primaryKey(),
  name: varchar("name", { length: 50 }).notNull().unique(),
  description: text("description"),
  sortOrder: integer("sort_order").default(0).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
});

export const vehicles = pgTable("vehicles", {
  id: varchar("id", { length: 26 }).primaryKey(),
  categoryId: varchar("category_id", { length: 26 }).references(() => vehicleCategories.id, { onDelete: "set null" }),
  make: varchar("make", { length: 50 }).notNull(),
  model: varchar("model", { length: 100 }).notNull(),
  year: integer("year").notNull(),
  color: varchar("color", { length: 50 }),
  licensePlate: varchar("license_plate", { length: 20 }).notNull().unique(),
  vinNumber: varchar("vin_number", { length: 17 }).unique(),
  fuelType: varchar("fuel_type", { length: 20, enum: FUEL_TYPES }).default("petrol").notNull(),
  transmission: varchar("transmission", { length: 20, enum: TRANSMISSIONS }).default("manual").notNull(),
  seatingCapacity: integer("seating_capacity").default(5).notNull(),
  doors: integer("doors").default(4).notNull(),
  status: varchar("status", { length: 20, enum: VEHICLE_STATUSES }).default("available").notNull(),
  condition: varchar("condition", { length: 20, enum: VEHICLE_CONDITIONS }).default("good").notNull(),
  currentMileage: integer("current_mileage").default(0).notNull(),
  lastServiceMileage: integer("last_service_mileage"),
  dailyRate: integer("daily_rate").notNull(),
  weeklyRate: integer("weekly_rate"),
  monthlyRate: integer("monthly_rate"),
  securityDeposit: integer("security_deposit").default(0).notNull(),
  currentLocation: varchar("current_location", { length: 200 }),
  isFeatured: boolean("is_featured").default(false).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  notes: text("notes"),
  createdBy: varchar("created_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  statusIdx: index("vehicles_status_idx").on(t.status),
  dailyRateIdx: index("vehicles_daily_rate_idx").on(t.dailyRate),
}));

export const vehicleFeatures = pgTable("vehicle_features", {
  id: varchar("id", { length: 26 }).primaryKey(),
  name: varchar("name", { length: 100 }).notNull().unique(),
  category: varchar("category", { length: 50 }),
  isPremium: boolean("is_premium").default(false).notNull(),
  additionalCost: integer("additional_cost").default(0).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
});

export const vehicleFeatureAssignments = pgTable("vehicle_feature_assignments", {
  id: varchar("id", { length: 26 }).primaryKey(),
  vehicleId: varchar("vehicle_id", { length: 26 }).notNull().references(() => vehicles.id, { onDelete: "cascade" }),
  featureId: varchar("feature_id", { length: 26 }).notNull().references(() => vehicleFeatures.id, { onDelete: "cascade" }),
  isWorking: boolean("is_working").default(true).notNull(),
  notes: text("notes"),
  assignedAt: timestamp("assigned_at").defaultNow().notNull(),
}, (t) => ({
  vehicleFeature: unique("vehicle_feature_assignments_vehicle_feature").on(t.vehicleId, t.featureId),
}));

export const vehicleImages = pgTable("vehicle_images", {
  id: varchar("id", { length: 26 }).primaryKey(),
  vehicleId: varchar("vehicle_id", { length: 26 }).notNull().references(() => vehicles.id, { onDelete: "cascade" }),
  url: text("url").notNull(),
  imageType: varchar("image_type", { length: 20, enum: IMAGE_TYPES }).default("exterior").notNull(),
  caption: varchar("caption", { length: 200 }),
  isPrimary: boolean("is_primary").default(false).notNull(),
  sortOrder: integer("sort_order").default(0).notNull(),
  uploadedBy: varchar("uploaded_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (t) => ({
  // at most one primary image per vehicle
  onePrimary: uniqueIndex("vehicle_images_one_primary").on(t.vehicleId).where(sql`${t.isPrimary}`),
}));

export const maintenanceRecords = pgTable("vehicle_maintenance_records", {
  id: varchar("id", { length: 26 }).primaryKey(),
  vehicleId: varchar("vehicle_id", { length: 26 }).notNull().references(() => vehicles.id, { onDelete: "cascade" }),
  maintenanceType: varchar("maintenance_type", { length: 20, enum: MAINTENANCE_TYPES }).notNull(),
  description: text("description").notNull(),
  scheduledDate: timestamp("scheduled_date").notNull(),
  completedDate: timestamp("completed_date"),
  status: varchar("status", { length: 20, enum: MAINTENANCE_STATUSES }).default("scheduled").notNull(),
  serviceProvider: varchar("service_provider", { length: 200 }),
  mileageAtService: integer("mileage_at_service"),
  estimatedCost: integer("estimated_cost"),
  actualCost: integer("actual_cost"),
  notes: text("notes"),
  createdBy: varchar("created_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  vehicleStatusIdx: index("maintenance_vehicle_status_idx").on(t.vehicleId, t.status),
}));

export const safetyEquipment = pgTable("vehicle_safety_equipment", {
  id: varchar("id", { length: 26 }).primaryKey(),
  vehicleId: varchar("vehicle_id", { length: 26 }).notNull().references(() => vehicles.id, { onDelete: "cascade" }),
  equipmentType: varchar("equipment_type", { length: 30, enum: SAFETY_EQUIPMENT_TYPES }).notNull(),
  status: varchar("status", { length: 20, enum: SAFETY_EQUIPMENT_STATUSES }).default("present").notNull(),
  serialNumber: varchar("serial_number", { length: 50 }),
  expiryDate: date("expiry_date"),
  lastInspectionDate: date("last_inspection_date"),
  nextInspectionDue: date("next_inspection_due"),
  notes: text("notes"),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  vehicleEquipment: unique("vehicle_safety_equipment_vehicle_type").on(t.vehicleId, t.equipmentType),
}));

// ── Bookings ─────────────────────────────────────────────────────────────────
export const bookings = pgTable("bookings", {
  id: varchar("id", { length: 26 }).primaryKey(),
  bookingReference: varchar("booking_reference", { length: 20 }).notNull().unique(),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  vehicleId: varchar("vehicle_id", { length: 26 }).notNull().references(() => vehicles.id, { onDelete: "cascade" }),
  pickupDate: timestamp("pickup_date").notNull(),
  returnDate: timestamp("return_date").notNull(),
  actualPickupDate: timestamp("actual_pickup_date"),
  actualReturnDate: timestamp("actual_return_date"),
  pickupLocation: varchar("pickup_location", { length: 200 }).notNull(),
  returnLocation: varchar("return_location", { length: 200 }).notNull(),
  status: varchar("status", { length: 20, enum: BOOKING_STATUSES }).default("pending").notNull(),
  paymentStatus: varchar("payment_status", { length: 20, enum: BOOKING_PAYMENT_STATUSES }).default("pending").notNull(),
  dailyRate: integer("daily_rate").notNull(),
  totalDays: integer("total_days").notNull(),
  subtotal: integer("subtotal").notNull(),
  taxAmount: integer("tax_amount").default(0).notNull(),
  discountAmount: integer("discount_amount").default(0).notNull(),
  additionalFees: integer("additional_fees").default(0).notNull(),
  securityDeposit: integer("security_deposit").default(0).notNull(),
  insuranceSelected: boolean("insurance_selected").default(false).notNull(),
  insuranceType: varchar("insurance_type", { length: 50 }),
  insuranceCost: integer("insurance_cost").default(0).notNull(),
  totalAmount: integer("total_amount").notNull(),
  pickupMileage: integer("pickup_mileage"),
  returnMileage: integer("return_mileage"),
  pickupFuelLevel: integer("pickup_fuel_level"),
  returnFuelLevel: integer("return_fuel_level"),
  specialRequests: text("special_requests"),
  customerNotes: text("customer_notes"),
  staffNotes: text("staff_notes"),
  loyaltyPointsUsed: integer("loyalty_points_used").default(0).notNull(),
  loyaltyPointsEarned: integer("loyalty_points_earned").default(0).notNull(),
  promotionCode: varchar("promotion_code", { length: 50 }),
  confirmationSent: boolean("confirmation_sent").default(false).notNull(),
  reviewEligible: boolean("review_eligible").default(false).notNull(),
  assignedStaffId: varchar("assigned_staff_id", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  pickupStaffId: varchar("pickup_staff_id", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  returnStaffId: varchar("return_staff_id", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
  confirmedAt: timestamp("confirmed_at"),
  cancelledAt: timestamp("cancelled_at"),
  cancellationReason: text("cancellation_reason"),
}, (t) => ({
  customerStatusIdx: index("bookings_customer_status_idx").on(t.customerId, t.status),
  vehiclePickupIdx: index("bookings_vehicle_pickup_idx").on(t.vehicleId, t.pickupDate),
}));

export const bookingAdditionalDrivers = pgTable("booking_additional_drivers", {
  id: varchar("id", { length: 26 }).primaryKey(),
  bookingId: varchar("booking_id", { length: 26 }).notNull().references(() => bookings.id, { onDelete: "cascade" }),
  driverId: varchar("driver_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  additionalFee: integer("additional_fee").default(0).notNull(),
  isApproved: boolean("is_approved").default(false).notNull(),
  addedAt: timestamp("added_at").defaultNow().notNull(),
}, (t) => ({
  bookingDriver: unique("booking_additional_drivers_booking_driver").on(t.bookingId, t.driverId),
}));

export const bookingAddOns = pgTable("booking_addons", {
  id: varchar("id", { length: 26 }).primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  addonType: varchar("addon_type", { length: 30, enum: ADDON_TYPES }).notNull(),
  description: text("description"),
  pricingType: varchar("pricing_type", { length: 20, enum: ADDON_PRICING_TYPES }).default("per_day").notNull(),
  // cents, or hundredths of a percent for pricingType = percentage
  price: integer("price").notNull(),
  isActive: boolean("is_active").default(true).notNull(),
});

export const bookingAddOnAssignments = pgTable("booking_addon_assignments", {
  id: varchar("id", { length: 26 }).primaryKey(),
  bookingId: varchar("booking_id", { length: 26 }).notNull().references(() => bookings.id, { onDelete: "cascade" }),
  addonId: varchar("addon_id", { length: 26 }).notNull().references(() => bookingAddOns.id, { onDelete: "cascade" }),
  quantity: integer("quantity").default(1).notNull(),
  unitPrice: integer("unit_price").notNull(),
  totalPrice: integer("total_price").notNull(),
  notes: text("notes"),
  addedAt: timestamp("added_at").defaultNow().notNull(),
}, (t) => ({
  bookingAddon: unique("booking_addon_assignments_booking_addon").on(t.bookingId, t.addonId),
}));

// ── Payments & billing ───────────────────────────────────────────────────────
export const paymentMethods = pgTable("payment_methods", {
  id: varchar("id", { length: 26 }).primaryKey(),
  name: varchar("name", { length: 100 }).notNull(),
  methodType: varchar("method_type", { length: 20, enum: PAYMENT_METHOD_TYPES }).notNull(),
  processingFeePercentage: doublePrecision("processing_fee_percentage").default(0).notNull(),
  processingFeeFixed: integer("processing_fee_fixed").default(0).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
});

export const payments = pgTable("payments", {
  id: varchar("id", { length: 26 }).primaryKey(),
  transactionId: varchar("transaction_id", { length: 50 }).notNull().unique(),
  bookingId: varchar("booking_id", { length: 26 }).notNull().references(() => bookings.id, { onDelete: "cascade" }),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  paymentType: varchar("payment_type", { length: 30, enum: PAYMENT_TYPES }).notNull(),
  paymentMethodId: varchar("payment_method_id", { length: 26 }).references(() => paymentMethods.id, { onDelete: "set null" }),
  amount: integer("amount").notNull(),
  currency: varchar("currency", { length: 3 }).default("ZAR").notNull(),
  status: varchar("status", { length: 20, enum: PAYMENT_STATUSES }).default("pending").notNull(),
  paymentDate: timestamp("payment_date"),
  gatewayTransactionId: varchar("gateway_transaction_id", { length: 100 }),
  gatewayResponse: jsonb("gateway_response").$type<Record<string, unknown>>(),
  gatewayFee: integer("gateway_fee").default(0).notNull(),
  cardLastFour: varchar("card_last_four", { length: 4 }),
  cardType: varchar("card_type", { length: 20 }),
  receiptNumber: varchar("receipt_number", { length: 50 }),
  invoiceNumber: varchar("invoice_number", { length: 50 }),
  refundAmount: integer("refund_amount").default(0).notNull(),
  refundDate: timestamp("refund_date"),
  refundReason: text("refund_reason"),
  refundedBy: varchar("refunded_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  description: text("description"),
  processedBy: varchar("processed_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  bookingStatusIdx: index("payments_booking_status_idx").on(t.bookingId, t.status),
}));

export type LineItem = {
  description: string;
  quantity: number;
  unitPrice: number; // cents
  total: number; // cents
};

export const invoices = pgTable("invoices", {
  id: varchar("id", { length: 26 }).primaryKey(),
  invoiceNumber: varchar("invoice_number", { length: 50 }).notNull().unique(),
  bookingId: varchar("booking_id", { length: 26 }).notNull().references(() => bookings.id, { onDelete: "cascade" }),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  issueDate: date("issue_date").notNull(),
  dueDate: date("due_date").notNull(),
  status: varchar("status", { length: 20, enum: INVOICE_STATUSES }).default("draft").notNull(),
  currency: varchar("currency", { length: 3 }).default("ZAR").notNull(),
  subtotal: integer("subtotal").notNull(),
  taxRate: doublePrecision("tax_rate").default(15).notNull(),
  taxAmount: integer("tax_amount").notNull(),
  discountAmount: integer("discount_amount").default(0).notNull(),
  totalAmount: integer("total_amount").notNull(),
  paidAmount: integer("paid_amount").default(0).notNull(),
  lineItems: jsonb("line_items").$type<LineItem[]>().default([]).notNull(),
  notes: text("notes"),
  sentDate: timestamp("sent_date"),
  sentToEmail: varchar("sent_to_email", { length: 254 }),
  createdBy: varchar("created_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  dueStatusIdx: index("invoices_due_status_idx").on(t.dueDate, t.status),
}));

export const receipts = pgTable("receipts", {
  id: varchar("id", { length: 26 }).primaryKey(),
  receiptNumber: varchar("receipt_number", { length: 50 }).notNull().unique(),
  paymentId: varchar("payment_id", { length: 26 }).notNull().unique().references(() => payments.id, { onDelete: "cascade" }),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  issueDate: timestamp("issue_date").notNull(),
  amount: integer("amount").notNull(),
  currency: varchar("currency", { length: 3 }).default("ZAR").notNull(),
  paymentMethodUsed: varchar("payment_method_used", { length: 100 }).notNull(),
  lineItems: jsonb("line_items").$type<LineItem[]>().default([]).notNull(),
  notes: text("notes"),
});

// atomic counters for sequential document numbers, keyed by scope e.g. INV2026, RCP261018
export const documentSequences = pgTable("document_sequences", {
  scope: varchar("scope", { length: 20 }).primaryKey(),
  lastValue: integer("last_value").default(0).notNull(),
});

// ── Customer relations ───────────────────────────────────────────────────────
export const reviews = pgTable("reviews", {
  id: varchar("id", { length: 26 }).primaryKey(),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  bookingId: varchar("booking_id", { length: 26 }).notNull().unique().references(() => bookings.id, { onDelete: "cascade" }),
  vehicleId: varchar("vehicle_id", { length: 26 }).notNull().references(() => vehicles.id, { onDelete: "cascade" }),
  overallRating: integer("overall_rating").notNull(),
  vehicleConditionRating: integer("vehicle_condition_rating"),
  serviceRating: integer("service_rating"),
  valueForMoneyRating: integer("value_for_money_rating"),
  title: varchar("title", { length: 200 }),
  comment: text("comment").notNull(),
  pros: text("pros"),
  cons: text("cons"),
  isVerified: boolean("is_verified").default(false).notNull(),
  isApproved: boolean("is_approved").default(false).notNull(),
  isFeatured: boolean("is_featured").default(false).notNull(),
  companyResponse: text("company_response"),
  responseDate: timestamp("response_date"),
  respondedBy: varchar("responded_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (t) => ({
  vehicleApprovedIdx: index("reviews_vehicle_approved_idx").on(t.vehicleId, t.isApproved),
}));

export const promotions = pgTable("promotions", {
  id: varchar("id", { length: 26 }).primaryKey(),
  name: varchar("name", { length: 200 }).notNull(),
  code: varchar("code", { length: 50 }).notNull().unique(),
  description: text("description"),
  discountType: varchar("discount_type", { length: 20, enum: DISCOUNT_TYPES }).notNull(),
  // cents for fixed_amount, percent for percentage, days for free_days
  discountValue: doublePrecision("discount_value").notNull(),
  maxDiscountAmount: integer("max_discount_amount"),
  startDate: timestamp("start_date").notNull(),
  endDate: timestamp("end_date").notNull(),
  usageLimit: integer("usage_limit"),
  usageCount: integer("usage_count").default(0).notNull(),
  perCustomerLimit: integer("per_customer_limit").default(1).notNull(),
  minBookingAmount: integer("min_booking_amount"),
  minRentalDays: integer("min_rental_days"),
  applicableCategoryIds: jsonb("applicable_category_ids").$type<string[]>().default([]).notNull(),
  isActive: boolean("is_active").default(true).notNull(),
  isPublic: boolean("is_public").default(true).notNull(),
  createdBy: varchar("created_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

export const issueReports = pgTable("issue_reports", {
  id: varchar("id", { length: 26 }).primaryKey(),
  ticketNumber: varchar("ticket_number", { length: 20 }).notNull().unique(),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  bookingId: varchar("booking_id", { length: 26 }).references(() => bookings.id, { onDelete: "set null" }),
  vehicleId: varchar("vehicle_id", { length: 26 }).references(() => vehicles.id, { onDelete: "set null" }),
  issueType: varchar("issue_type", { length: 30, enum: ISSUE_TYPES }).notNull(),
  priority: varchar("priority", { length: 20, enum: ISSUE_PRIORITIES }).default("medium").notNull(),
  status: varchar("status", { length: 20, enum: ISSUE_STATUSES }).default("open").notNull(),
  subject: varchar("subject", { length: 200 }).notNull(),
  description: text("description").notNull(),
  location: varchar("location", { length: 200 }),
  assignedTo: varchar("assigned_to", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  resolution: text("resolution"),
  resolutionDate: timestamp("resolution_date"),
  resolvedBy: varchar("resolved_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  customerSatisfaction: integer("customer_satisfaction"),
  customerFeedback: text("customer_feedback"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  statusPriorityIdx: index("issue_reports_status_priority_idx").on(t.status, t.priority),
}));

export const penalties = pgTable("penalties", {
  id: varchar("id", { length: 26 }).primaryKey(),
  bookingId: varchar("booking_id", { length: 26 }).notNull().references(() => bookings.id, { onDelete: "cascade" }),
  customerId: varchar("customer_id", { length: 26 }).notNull().references(() => users.id, { onDelete: "cascade" }),
  penaltyType: varchar("penalty_type", { length: 30, enum: PENALTY_TYPES }).notNull(),
  description: text("description").notNull(),
  amount: integer("amount").notNull(),
  status: varchar("status", { length: 20, enum: PENALTY_STATUSES }).default("pending").notNull(),
  isDisputed: boolean("is_disputed").default(false).notNull(),
  disputeReason: text("dispute_reason"),
  disputeDate: timestamp("dispute_date"),
  disputeResolution: text("dispute_resolution"),
  assessedBy: varchar("assessed_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  approvedBy: varchar("approved_by", { length: 26 }).references(() => users.id, { onDelete: "set null" }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (t) => ({
  bookingStatusIdx: index("penalties_booking_status_idx").on(t.bookingId, t.status),
}));

// ── Row types ────────────────────────────────────────────────────────────────
export type UserType = (typeof USER_TYPES)[number];
export type VehicleStatus = (typeof VEHICLE_STATUSES)[number];
export type BookingStatus = (typeof BOOKING_STATUSES)[number];
export type BookingPaymentStatus = (typeof BOOKING_PAYMENT_STATUSES)[number];
export type AddonPricingType = (typeof ADDON_PRICING_TYPES)[number];
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];
export type DiscountType = (typeof DISCOUNT_TYPES)[number];
export type IssueStatus = (typeof ISSUE_STATUSES)[number];
export type PenaltyStatus = (typeof PENALTY_STATUSES)[number];
export type PenaltyType = (typeof PENALTY_TYPES)[number];
export type MaintenanceStatus = (typeof MAINTENANCE_STATUSES)[number];
export type LoyaltyTier = (typeof LOYALTY_TIERS)[number];

export type User = typeof users.$inferSelect;
export type UserSession = typeof userSessions.$inferSelect;
export type UserPreference = typeof userPreferences.$inferSelect;
export type VehicleCategory = typeof vehicleCategories.$inferSelect;
export type Vehicle = typeof vehicles.$inferSelect;
export type VehicleFeature = typeof vehicleFeatures.$inferSelect;
export type VehicleFeatureAssignment = typeof vehicleFeatureAssignments.$inferSelect;
export type VehicleImage = typeof vehicleImages.$inferSelect;
export type MaintenanceRecord = typeof maintenanceRecords.$inferSelect;
export type SafetyEquipment = typeof safetyEquipment.$inferSelect;
export type Booking = typeof bookings.$inferSelect;
export type BookingAdditionalDriver = typeof bookingAdditionalDrivers.$inferSelect;
export type BookingAddOn = typeof bookingAddOns.$inferSelect;
export type BookingAddOnAssignment = typeof bookingAddOnAssignments.$inferSelect;
export type PaymentMethod = typeof paymentMethods.$inferSelect;
export type Payment = typeof payments.$inferSelect;
export type Invoice = typeof invoices.$inferSelect;
export type Receipt = typeof receipts.$inferSelect;
export type Review = typeof reviews.$inferSelect;
export type Promotion = typeof promotions.$inferSelect;
export type IssueReport = typeof issueReports.$inferSelect;
export type Penalty = typeof penalties.$inferSelect;
