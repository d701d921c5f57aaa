import { v4 as uuidv4 } from "uuid";
import type { BookingConfirmation, JsonValue, ServiceType } from "@wayfarer/types";

/**
 * Simulated booking. Produces a confirmation record only; nothing is
 * reserved or charged.
 */
export function createMockBooking(
  serviceType: ServiceType,
  optionIndex: number,
  item: JsonValue,
  now: Date = new Date()
): BookingConfirmation {
  return {
    confirmationNumber: `WF-${uuidv4().replace(/-/g, "").slice(0, 8).toUpperCase()}`,
    serviceType,
    optionIndex,
    item,
    status: "mock_confirmed",
    createdAt: now.toISOString(),
  };
}

export function formatBookingConfirmation(booking: BookingConfirmation): string {
  return [
    `Booking confirmed (simulation, no real reservation was made).`,
    `Confirmation number: ${booking.confirmationNumber}`,
    `Service: ${booking.serviceType}, option ${booking.optionIndex}`,
  ].join("\n");
}

/** BookingConfirmation as a plain JSON object for storage. */
export function bookingToJson(booking: BookingConfirmation): { [key: string]: JsonValue } {
  return {
    confirmation_number: booking.confirmationNumber,
    service_type: booking.serviceType,
    option_index: booking.optionIndex,
    item: booking.item,
    status: booking.status,
    created_at: booking.createdAt,
  };
}
