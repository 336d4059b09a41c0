// src/domain/booking-lifecycle.ts
import type { Booking, BookingStatus } from "../db/schema";
import { InvalidTransitionError } from "../errors";

export type BookingAction = "confirm" | "start" | "complete" | "cancel" | "no_show";

export const BOOKING_TRANSITIONS: Record<BookingAction, { from: readonly BookingStatus[]; to: BookingStatus }> = {
  confirm: { from: ["pending"], to: "confirmed" },
  start: { from: ["confirmed"], to: "active" },
  complete: { from: ["active"], to: "completed" },
  cancel: { from: ["pending", "confirmed"], to: "cancelled" },
  no_show: { from: ["confirmed"], to: "no_show" },
};

export const TERMINAL_BOOKING_STATUSES: readonly BookingStatus[] = ["completed", "cancelled", "no_show"];

// statuses that hold the vehicle for their date range
export const BLOCKING_BOOKING_STATUSES: readonly BookingStatus[] = ["pending", "confirmed", "active"];

export function isTerminal(status: BookingStatus) {
  return TERMINAL_BOOKING_STATUSES.includes(status);
}

export function canCancel(b: Pick<Booking, "status" | "pickupDate">, now: Date) {
  return BOOKING_TRANSITIONS.cancel.from.includes(b.status) && b.pickupDate.getTime() > now.getTime();
}

export function isOverdue(b: Pick<Booking, "status" | "returnDate">, now: Date) {
  return b.status === "active" && b.returnDate.getTime() < now.getTime();
}

export type HandoverReading = { mileage?: number; fuelLevel?: number; staffId?: string; notes?: string };

export type TransitionInput =
  | { action: "confirm" }
  | { action: "start"; reading?: HandoverReading }
  | { action: "complete"; reading?: HandoverReading }
  | { action: "cancel"; reason?: string }
  | { action: "no_show" };

function handoverNotes(reading: HandoverReading | undefined): Partial<Booking> {
  return reading?.notes ? { staffNotes: reading.notes } : {};
}

/**
 * Validate a status change and return the fields it stamps. Persisting the
 * patch is the caller's job, conditioned on the row still being in one of
 * `BOOKING_TRANSITIONS[action].from`.
 */
export function transitionBooking(
  booking: Pick<Booking, "status" | "pickupDate">,
  input: TransitionInput,
  now: Date,
): Partial<Booking> {
  const rule = BOOKING_TRANSITIONS[input.action];
  if (!rule.from.includes(booking.status)) {
    throw new InvalidTransitionError("booking", booking.status, input.action);
  }

  switch (input.action) {
    case "confirm":
      return { status: rule.to, confirmedAt: now, confirmationSent: true, updatedAt: now };
    case "start":
      return {
        status: rule.to,
        actualPickupDate: now,
        pickupMileage: input.reading?.mileage ?? null,
        pickupFuelLevel: input.reading?.fuelLevel ?? null,
        pickupStaffId: input.reading?.staffId ?? null,
        ...handoverNotes(input.reading),
        updatedAt: now,
      };
    case "complete":
      return {
        status: rule.to,
        actualReturnDate: now,
        returnMileage: input.reading?.mileage ?? null,
        returnFuelLevel: input.reading?.fuelLevel ?? null,
        returnStaffId: input.reading?.staffId ?? null,
        ...handoverNotes(input.reading),
        reviewEligible: true,
        updatedAt: now,
      };
    case "cancel":
      if (booking.pickupDate.getTime() <= now.getTime()) {
        throw new InvalidTransitionError("booking", booking.status, "cancel");
      }
      return { status: rule.to, cancelledAt: now, cancellationReason: input.reason ?? null, updatedAt: now };
    case "no_show":
      return { status: rule.to, updatedAt: now };
  }
}
