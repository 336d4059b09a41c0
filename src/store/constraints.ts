// src/store/constraints.ts
// Unique constraint names as Postgres reports them for src/db/schema.ts.

export const UNIQUE = {
  username: "users_username_unique",
  email: "users_email_unique",
  driversLicense: "users_drivers_license_number_unique",
  categoryName: "vehicle_categories_name_unique",
  licensePlate: "vehicles_license_plate_unique",
  vin: "vehicles_vin_number_unique",
  featureName: "vehicle_features_name_unique",
  vehicleFeature: "vehicle_feature_assignments_vehicle_feature",
  primaryImage: "vehicle_images_one_primary",
  vehicleEquipment: "vehicle_safety_equipment_vehicle_type",
  bookingReference: "bookings_booking_reference_unique",
  bookingDriver: "booking_additional_drivers_booking_driver",
  bookingAddon: "booking_addon_assignments_booking_addon",
  transactionId: "payments_transaction_id_unique",
  invoiceNumber: "invoices_invoice_number_unique",
  receiptNumber: "receipts_receipt_number_unique",
  receiptPayment: "receipts_payment_id_unique",
  reviewBooking: "reviews_booking_id_unique",
  promotionCode: "promotions_code_unique",
  ticketNumber: "issue_reports_ticket_number_unique",
} as const;

export type UniqueConstraint = (typeof UNIQUE)[keyof typeof UNIQUE];
