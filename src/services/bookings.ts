// src/services/bookings.ts
import type { Booking, BookingAddOn, Penalty, Promotion, User, Vehicle } from "../db/schema";
import { BLOCKING_BOOKING_STATUSES, BOOKING_TRANSITIONS, transitionBooking } from "../domain/booking-lifecycle";
import type { HandoverReading, TransitionInput } from "../domain/booking-lifecycle";
import { insertWithUniqueIdentifier } from "../domain/identifiers";
import { tierDiscount } from "../domain/loyalty";
import { derivePaymentStatus } from "../domain/payment-lifecycle";
import { assessReturn } from "../domain/penalties";
import { addonUnitPrice, priceRental, quotedRates, totalDays } from "../domain/pricing";
import type { AddonLine } from "../domain/pricing";
import {
  ConflictError, ForbiddenError, InvalidTransitionError, NotFoundError, UnavailableError, ValidationError,
} from "../errors";
import { audit, logger } from "../logger";
import { UNIQUE } from "../store/constraints";
import type { BookingFilter, Store } from "../store/types";
import { newId } from "../utils/id";
import { assertOwnerOrStaff, assertStaff, identifiers, isStaff } from "./context";
import type { Actor, ServiceContext } from "./context";
import { awardLoyaltyPoints } from "./loyalty";
import { notify } from "./notifications";
import { resolvePromotion } from "./promotions";
import { mapUnique } from "./unique";

export type AddonRequest = { addonId: string; quantity: number };

export type QuoteRequest = {
  vehicleId: string;
  pickupDate: Date;
  returnDate: Date;
  insuranceType?: string;
  insuranceCost?: number;
  addons?: AddonRequest[];
  promotionCode?: string;
};

export type BookingRequest = QuoteRequest & {
  pickupLocation: string;
  returnLocation: string;
  specialRequests?: string;
  customerNotes?: string;
  /** staff may book on a customer's behalf */
  customerId?: string;
};

export type AddonCatalogueInput = Pick<BookingAddOn, "name" | "addonType" | "price">
  & Partial<Pick<BookingAddOn, "description" | "pricingType" | "isActive">>;

type PricedAddon = { addon: BookingAddOn; quantity: number; unitPrice: number; totalPrice: number };

// bookings whose pricing inputs may still change
const EDITABLE: readonly Booking["status"][] = ["pending", "confirmed"];

/** Re-derive the booking's payment status from its booking payments. */
export async function syncPaymentStatus(store: Store, bookingId: string) {
  const booking = await store.bookings.findById(bookingId);
  if (!booking) return undefined;
  const paymentStatus = derivePaymentStatus(booking.totalAmount, await store.payments.listForBooking(bookingId));
  if (paymentStatus === booking.paymentStatus) return booking;
  return store.bookings.update(bookingId, { paymentStatus });
}

export class BookingService {
  constructor(private readonly ctx: ServiceContext) {}

  async quote(actor: Actor, input: QuoteRequest) {
    const { store } = this.ctx;
    const vehicle = await this.vehicle(store, input.vehicleId);
    const customer = await store.users.findById(actor.id);
    const priced = await this.price(store, customer, vehicle, input);
    return {
      vehicleId: vehicle.id,
      pickupDate: input.pickupDate,
      returnDate: input.returnDate,
      available: await this.isFree(store, vehicle, input.pickupDate, input.returnDate),
      rates: quotedRates(vehicle),
      ...priced.breakdown,
      securityDeposit: vehicle.securityDeposit,
      promotionCode: priced.promotion?.code ?? null,
      addons: priced.addons.map((a) => ({ addonId: a.addon.id, name: a.addon.name, quantity: a.quantity, unitPrice: a.unitPrice, totalPrice: a.totalPrice })),
      currency: this.ctx.config.currency,
    };
  }

  async create(actor: Actor, input: BookingRequest) {
    const customerId = input.customerId && isStaff(actor) ? input.customerId : actor.id;
    const now = this.ctx.clock();
    if (input.pickupDate.getTime() < now.getTime()) {
      throw new ValidationError("pickup date is in the past", { pickupDate: ["must not be in the past"] });
    }

    const booking = await this.ctx.store.transaction(async (store) => {
      const customer = await store.users.findById(customerId);
      if (!customer) throw new NotFoundError("user");
      if (!customer.isActive || customer.isSuspended) throw new ForbiddenError("account cannot book");
      const vehicle = await this.vehicle(store, input.vehicleId);
      if (!(await this.isFree(store, vehicle, input.pickupDate, input.returnDate))) {
        throw new UnavailableError("vehicle_unavailable", "vehicle is not available for these dates");
      }

      const priced = await this.price(store, customer, vehicle, input);
      const b = priced.breakdown;
      const ids = identifiers(this.ctx, store);
      const created = await insertWithUniqueIdentifier(
        UNIQUE.bookingReference,
        () => ids.bookingReference(),
        // savepoint per attempt: a collision must not abort the enclosing transaction
        (bookingReference) => store.transaction((tx) => tx.bookings.insert({
          id: newId(),
          bookingReference,
          customerId,
          vehicleId: vehicle.id,
          pickupDate: input.pickupDate,
          returnDate: input.returnDate,
          actualPickupDate: null,
          actualReturnDate: null,
          pickupLocation: input.pickupLocation,
          returnLocation: input.returnLocation,
          status: "pending",
          paymentStatus: "pending",
          dailyRate: vehicle.dailyRate,
          totalDays: b.totalDays,
          subtotal: b.subtotal,
          taxAmount: b.taxAmount,
          discountAmount: b.discountAmount,
          additionalFees: b.additionalFees,
          securityDeposit: vehicle.securityDeposit,
          insuranceSelected: b.insuranceCost > 0 || Boolean(input.insuranceType),
          insuranceType: input.insuranceType ?? null,
          insuranceCost: b.insuranceCost,
          totalAmount: b.totalAmount,
          pickupMileage: null,
          returnMileage: null,
          pickupFuelLevel: null,
          returnFuelLevel: null,
          specialRequests: input.specialRequests ?? null,
          customerNotes: input.customerNotes ?? null,
          staffNotes: null,
          loyaltyPointsUsed: 0,
          loyaltyPointsEarned: 0,
          promotionCode: priced.promotion?.code ?? null,
          confirmationSent: false,
          reviewEligible: false,
          assignedStaffId: null,
          pickupStaffId: null,
          returnStaffId: null,
          createdAt: now,
          updatedAt: now,
          confirmedAt: null,
          cancelledAt: null,
          cancellationReason: null,
        })),
      );

      for (const line of priced.addons) {
        await store.addons.assign({
          id: newId(),
          bookingId: created.id,
          addonId: line.addon.id,
          quantity: line.quantity,
          unitPrice: line.unitPrice,
          totalPrice: line.totalPrice,
          notes: null,
          addedAt: now,
        });
      }
      if (priced.promotion && !(await store.promotions.claimUsage(priced.promotion.id))) {
        throw new ConflictError("promotion_exhausted");
      }
      return created;
    });

    logger.info({ bookingId: booking.id, reference: booking.bookingReference }, "booking created");
    return booking;
  }

  async get(actor: Actor, id: string) {
    const booking = await this.booking(this.ctx.store, id);
    assertOwnerOrStaff(actor, booking.customerId);
    return booking;
  }

  async detail(actor: Actor, id: string) {
    const booking = await this.get(actor, id);
    const { store } = this.ctx;
    return {
      ...booking,
      addons: await store.addons.listAssignments(id),
      additionalDrivers: await store.drivers.listForBooking(id),
      payments: await store.payments.listForBooking(id),
      penalties: await store.penalties.listForBooking(id),
    };
  }

  async byReference(actor: Actor, reference: string) {
    const booking = await this.ctx.store.bookings.findByReference(reference.toUpperCase());
    if (!booking) throw new NotFoundError("booking");
    assertOwnerOrStaff(actor, booking.customerId);
    return booking;
  }

  /** Customers only ever see their own bookings. */
  list(actor: Actor, filter: BookingFilter = {}) {
    return this.ctx.store.bookings.list(isStaff(actor) ? filter : { ...filter, customerId: actor.id });
  }

  async confirm(actor: Actor, id: string) {
    assertStaff(actor);
    const booking = await this.transition(this.ctx.store, id, { action: "confirm" });
    await notify(this.ctx.notifier, {
      kind: "booking_confirmed",
      userId: booking.customerId,
      subject: `Booking ${booking.bookingReference} confirmed`,
      data: { bookingId: booking.id },
    });
    return booking;
  }

  /** Hands the vehicle over; the odometer defaults to the vehicle's recorded mileage. */
  async start(actor: Actor, id: string, reading: HandoverReading = {}) {
    assertStaff(actor);
    return this.ctx.store.transaction(async (store) => {
      const current = await this.booking(store, id);
      const vehicle = await this.vehicle(store, current.vehicleId);
      const booking = await this.transition(store, id, {
        action: "start",
        reading: { ...reading, mileage: reading.mileage ?? vehicle.currentMileage, staffId: actor.id },
      });
      await store.vehicles.update(vehicle.id, { status: "rented", updatedAt: this.ctx.clock() });
      return booking;
    });
  }

  /**
   * Takes the vehicle back: frees it with the new odometer reading, assesses
   * return penalties and credits loyalty points.
   */
  async complete(actor: Actor, id: string, reading: HandoverReading = {}) {
    assertStaff(actor);
    const now = this.ctx.clock();
    const result = await this.ctx.store.transaction(async (store) => {
      const current = await this.booking(store, id);
      const vehicle = await this.vehicle(store, current.vehicleId);
      const returned = await this.transition(store, id, {
        action: "complete",
        reading: { ...reading, staffId: actor.id },
      });
      await store.vehicles.update(vehicle.id, {
        status: "available",
        currentMileage: Math.max(vehicle.currentMileage, returned.returnMileage ?? 0),
        currentLocation: returned.returnLocation,
        updatedAt: now,
      });

      const penalties: Penalty[] = [];
      for (const charge of assessReturn(returned, this.ctx.config.returnRates)) {
        penalties.push(await store.penalties.insert({
          id: newId(),
          bookingId: returned.id,
          customerId: returned.customerId,
          penaltyType: charge.penaltyType,
          description: charge.description,
          amount: charge.amount,
          status: "pending",
          isDisputed: false,
          disputeReason: null,
          disputeDate: null,
          disputeResolution: null,
          assessedBy: actor.id,
          approvedBy: null,
          createdAt: now,
          updatedAt: now,
        }));
      }

      const points = await awardLoyaltyPoints(store, returned.customerId, returned.totalAmount, this.ctx.config.loyaltyPointsPerUnit);
      const booking = (await store.bookings.update(id, { loyaltyPointsEarned: points })) ?? returned;
      return { booking, penalties };
    });

    await notify(this.ctx.notifier, {
      kind: "booking_completed",
      userId: result.booking.customerId,
      subject: `Booking ${result.booking.bookingReference} completed`,
      data: { bookingId: id, penalties: result.penalties.length, pointsEarned: result.booking.loyaltyPointsEarned },
    });
    return result;
  }

  async cancel(actor: Actor, id: string, reason?: string) {
    const current = await this.booking(this.ctx.store, id);
    assertOwnerOrStaff(actor, current.customerId);
    const booking = await this.transition(this.ctx.store, id, { action: "cancel", reason });
    if (isStaff(actor)) audit("booking.cancelled", { bookingId: id, by: actor.id, reason });
    await notify(this.ctx.notifier, {
      kind: "booking_cancelled",
      userId: booking.customerId,
      subject: `Booking ${booking.bookingReference} cancelled`,
      data: { bookingId: id },
    });
    return booking;
  }

  async noShow(actor: Actor, id: string) {
    assertStaff(actor);
    return this.transition(this.ctx.store, id, { action: "no_show" });
  }

  async addAddon(actor: Actor, id: string, request: AddonRequest) {
    return this.ctx.store.transaction(async (store) => {
      const booking = await this.editable(store, actor, id, "add_addon");
      const addon = await store.addons.findById(request.addonId);
      if (!addon || !addon.isActive) throw new NotFoundError("addon");
      const unitPrice = addonUnitPrice(addon.pricingType, addon.price, booking.totalDays, booking.subtotal);
      await mapUnique(
        store.addons.assign({
          id: newId(),
          bookingId: id,
          addonId: addon.id,
          quantity: request.quantity,
          unitPrice,
          totalPrice: unitPrice * request.quantity,
          notes: null,
          addedAt: this.ctx.clock(),
        }),
        { [UNIQUE.bookingAddon]: "addon_already_added" },
      );
      return this.reprice(store, booking);
    });
  }

  async addDriver(actor: Actor, id: string, driverId: string, additionalFee = 0) {
    return this.ctx.store.transaction(async (store) => {
      const booking = await this.editable(store, actor, id, "add_driver");
      if (driverId === booking.customerId) {
        throw new ValidationError("the customer is already the main driver", { driverId: ["must not be the booking customer"] });
      }
      const driver = await store.users.findById(driverId);
      if (!driver) throw new NotFoundError("driver");
      await mapUnique(
        store.drivers.insert({
          id: newId(),
          bookingId: id,
          driverId,
          additionalFee,
          isApproved: isStaff(actor),
          addedAt: this.ctx.clock(),
        }),
        { [UNIQUE.bookingDriver]: "driver_already_added" },
      );
      return this.reprice(store, booking);
    });
  }

  async recalculate(actor: Actor, id: string) {
    return this.ctx.store.transaction(async (store) => {
      const booking = await this.editable(store, actor, id, "recalculate");
      return this.reprice(store, booking);
    });
  }

  addonCatalogue(activeOnly = true) {
    return this.ctx.store.addons.list(activeOnly);
  }

  createAddon(actor: Actor, input: AddonCatalogueInput) {
    assertStaff(actor);
    return this.ctx.store.addons.insert({
      id: newId(),
      name: input.name,
      addonType: input.addonType,
      description: input.description ?? null,
      pricingType: input.pricingType ?? "per_day",
      price: input.price,
      isActive: input.isActive ?? true,
    });
  }

  private async transition(store: Store, id: string, input: TransitionInput) {
    const booking = await this.booking(store, id);
    const patch = transitionBooking(booking, input, this.ctx.clock());
    const updated = await store.bookings.transition(id, BOOKING_TRANSITIONS[input.action].from, patch);
    if (!updated) {
      // another request moved it first
      const latest = await store.bookings.findById(id);
      throw new InvalidTransitionError("booking", latest?.status ?? booking.status, input.action);
    }
    logger.info({ bookingId: id, from: booking.status, to: updated.status }, "booking transition");
    return updated;
  }

  /**
   * Recompute every derived amount from the stored pricing inputs and
   * persist them together.
   */
  private async reprice(store: Store, booking: Booking) {
    const days = totalDays(booking.pickupDate, booking.returnDate);
    const subtotal = booking.dailyRate * days;
    const lines: AddonLine[] = [];
    for (const a of await store.addons.listAssignments(booking.id)) {
      const unitPrice = addonUnitPrice(a.addon.pricingType, a.addon.price, days, subtotal);
      const totalPrice = unitPrice * a.quantity;
      if (unitPrice !== a.unitPrice || totalPrice !== a.totalPrice) {
        await store.addons.updateAssignment(a.id, { unitPrice, totalPrice });
      }
      lines.push({ unitPrice, quantity: a.quantity });
    }
    const driverFees = (await store.drivers.listForBooking(booking.id)).reduce((sum, d) => sum + d.additionalFee, 0);

    const b = priceRental({
      dailyRate: booking.dailyRate,
      pickupDate: booking.pickupDate,
      returnDate: booking.returnDate,
      taxRate: this.ctx.config.taxRate,
      discountAmount: Math.min(booking.discountAmount, subtotal),
      insuranceCost: booking.insuranceCost,
      extraFees: driverFees,
      addons: lines,
    });
    const payments = await store.payments.listForBooking(booking.id);
    const updated = await store.bookings.update(booking.id, {
      totalDays: b.totalDays,
      subtotal: b.subtotal,
      additionalFees: b.additionalFees,
      discountAmount: b.discountAmount,
      taxAmount: b.taxAmount,
      totalAmount: b.totalAmount,
      paymentStatus: derivePaymentStatus(b.totalAmount, payments),
      updatedAt: this.ctx.clock(),
    });
    if (!updated) throw new NotFoundError("booking");
    return updated;
  }

  private async price(store: Store, customer: User | undefined, vehicle: Vehicle, input: QuoteRequest) {
    const days = totalDays(input.pickupDate, input.returnDate);
    const subtotal = vehicle.dailyRate * days;

    const addons: PricedAddon[] = [];
    for (const request of input.addons ?? []) {
      const addon = await store.addons.findById(request.addonId);
      if (!addon || !addon.isActive) throw new NotFoundError("addon");
      const unitPrice = addonUnitPrice(addon.pricingType, addon.price, days, subtotal);
      addons.push({ addon, quantity: request.quantity, unitPrice, totalPrice: unitPrice * request.quantity });
    }

    let promotion: Promotion | undefined;
    let promotionDiscount = 0;
    if (input.promotionCode && customer) {
      const resolved = await resolvePromotion(store, input.promotionCode, customer.id, {
        now: this.ctx.clock(),
        subtotal,
        dailyRate: vehicle.dailyRate,
        totalDays: days,
        categoryId: vehicle.categoryId,
      });
      promotion = resolved.promotion;
      promotionDiscount = resolved.discount;
    }
    const loyaltyDiscount = customer ? tierDiscount(customer.loyaltyTier, subtotal) : 0;

    const breakdown = priceRental({
      dailyRate: vehicle.dailyRate,
      pickupDate: input.pickupDate,
      returnDate: input.returnDate,
      taxRate: this.ctx.config.taxRate,
      discountAmount: Math.min(subtotal, loyaltyDiscount + promotionDiscount),
      insuranceCost: input.insuranceCost ?? 0,
      addons: addons.map((a) => ({ unitPrice: a.unitPrice, quantity: a.quantity })),
    });
    return { breakdown, addons, promotion, loyaltyDiscount, promotionDiscount };
  }

  private async isFree(store: Store, vehicle: Vehicle, start: Date, end: Date) {
    if (vehicle.status !== "available" || !vehicle.isActive) return false;
    return !(await store.bookings.hasOverlap(vehicle.id, start, end, BLOCKING_BOOKING_STATUSES));
  }

  private async editable(store: Store, actor: Actor, id: string, action: string) {
    const booking = await this.booking(store, id);
    assertOwnerOrStaff(actor, booking.customerId);
    if (!EDITABLE.includes(booking.status)) throw new InvalidTransitionError("booking", booking.status, action);
    return booking;
  }

  private async booking(store: Store, id: string) {
    const booking = await store.bookings.findById(id);
    if (!booking) throw new NotFoundError("booking");
    return booking;
  }

  private async vehicle(store: Store, id: string) {
    const vehicle = await store.vehicles.findById(id);
    if (!vehicle) throw new NotFoundError("vehicle");
    return vehicle;
  }
}
