// tests/support/fixtures.ts
import type { Booking, Payment, Promotion, User, Vehicle } from "../../src/db/schema";

export const NOW = new Date("2026-11-01T08:00:00Z");

export function userRow(overrides: Partial<User> = {}): User {
  return {
    id: "01USERCUSTOMER000000000000",
    username: "thandi",
    email: "thandi@example.com",
    passwordHash: "not-a-real-hash",
    firstName: "Thandi",
    lastName: "Banda",
    userType: "customer",
    phoneNumber: null,
    dateOfBirth: null,
    addressLine1: null,
    addressLine2: null,
    city: null,
    postalCode: null,
    country: "Malawi",
    driversLicenseNumber: null,
    licenseExpiryDate: null,
    isActive: true,
    isVerified: false,
    verificationLevel: "unverified",
    verificationDate: null,
    isSuspended: false,
    suspensionReason: null,
    loyaltyPoints: 0,
    loyaltyTier: "bronze",
    lastLogin: null,
    lastLoginIp: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function vehicleRow(overrides: Partial<Vehicle> = {}): Vehicle {
  return {
    id: "01VEHICLE00000000000000000",
    categoryId: null,
    make: "Toyota",
    model: "Corolla",
    year: 2024,
    color: "white",
    licensePlate: "BT 1234",
    vinNumber: null,
    fuelType: "petrol",
    transmission: "automatic",
    seatingCapacity: 5,
    doors: 4,
    status: "available",
    condition: "good",
    currentMileage: 12000,
    lastServiceMileage: null,
    dailyRate: 50000,
    weeklyRate: null,
    monthlyRate: null,
    securityDeposit: 100000,
    currentLocation: "Airport",
    isFeatured: false,
    isActive: true,
    notes: null,
    createdBy: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function bookingRow(overrides: Partial<Booking> = {}): Booking {
  return {
    id: "01BOOKING00000000000000000",
    bookingReference: "BK2611011234",
    customerId: "01USERCUSTOMER000000000000",
    vehicleId: "01VEHICLE00000000000000000",
    pickupDate: new Date("2026-11-02T10:00:00Z"),
    returnDate: new Date("2026-11-05T10:00:00Z"),
    actualPickupDate: null,
    actualReturnDate: null,
    pickupLocation: "Airport",
    returnLocation: "Airport",
    status: "pending",
    paymentStatus: "pending",
    dailyRate: 50000,
    totalDays: 3,
    subtotal: 150000,
    taxAmount: 22500,
    discountAmount: 0,
    additionalFees: 0,
    securityDeposit: 100000,
    insuranceSelected: false,
    insuranceType: null,
    insuranceCost: 0,
    totalAmount: 172500,
    pickupMileage: null,
    returnMileage: null,
    pickupFuelLevel: null,
    returnFuelLevel: null,
    specialRequests: null,
    customerNotes: null,
    staffNotes: null,
    loyaltyPointsUsed: 0,
    loyaltyPointsEarned: 0,
    promotionCode: null,
    confirmationSent: false,
    reviewEligible: false,
    assignedStaffId: null,
    pickupStaffId: null,
    returnStaffId: null,
    createdAt: NOW,
    updatedAt: NOW,
    confirmedAt: null,
    cancelledAt: null,
    cancellationReason: null,
    ...overrides,
  };
}

export function paymentRow(overrides: Partial<Payment> = {}): Payment {
  return {
    id: "01PAYMENT00000000000000000",
    transactionId: "TXN26110108001234",
    bookingId: "01BOOKING00000000000000000",
    customerId: "01USERCUSTOMER000000000000",
    paymentType: "booking_payment",
    paymentMethodId: null,
    amount: 10000,
    currency: "ZAR",
    status: "pending",
    paymentDate: null,
    gatewayTransactionId: null,
    gatewayResponse: null,
    gatewayFee: 0,
    cardLastFour: null,
    cardType: null,
    receiptNumber: null,
    invoiceNumber: null,
    refundAmount: 0,
    refundDate: null,
    refundReason: null,
    refundedBy: null,
    description: null,
    processedBy: null,
    createdAt: NOW,
    updatedAt: NOW,
    ...overrides,
  };
}

export function promotionRow(overrides: Partial<Promotion> = {}): Promotion {
  return {
    id: "01PROMOTION000000000000000",
    name: "Spring sale",
    code: "SPRING10",
    description: null,
    discountType: "percentage",
    discountValue: 10,
    maxDiscountAmount: null,
    startDate: new Date("2026-10-01T00:00:00Z"),
    endDate: new Date("2026-12-31T23:59:59Z"),
    usageLimit: null,
    usageCount: 0,
    perCustomerLimit: 1,
    minBookingAmount: null,
    minRentalDays: null,
    applicableCategoryIds: [],
    isActive: true,
    isPublic: true,
    createdBy: null,
    createdAt: NOW,
    ...overrides,
  };
}
