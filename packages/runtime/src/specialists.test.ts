import { describe, it, expect } from "vitest";
import { buildSearchQuery, normalizeServiceType, resolveSpecialist } from "./specialists.js";
import { enhanceQuery, formatSearchDocuments } from "./search-provider.js";
import { createMockBooking, formatBookingConfirmation, bookingToJson } from "./booking.js";

describe("dispatch table", () => {
  it("should route each raw service type to one specialist", () => {
    expect(resolveSpecialist("flight")?.agentName).toBe("flight_specialist");
    expect(resolveSpecialist("Hotel ")?.agentName).toBe("hotel_specialist");
    expect(resolveSpecialist("train")).toMatchObject({ agentName: "transport_specialist", collection: "trains" });
    expect(resolveSpecialist("bus")).toMatchObject({ agentName: "transport_specialist", collection: "buses" });
    expect(resolveSpecialist("attractions")?.serviceType).toBe("attractions");
  });

  it("should not route unknown or missing service types", () => {
    expect(resolveSpecialist("weather")).toBeNull();
    expect(resolveSpecialist(null)).toBeNull();
    expect(resolveSpecialist("")).toBeNull();
  });

  it("should normalise booking service names", () => {
    expect(normalizeServiceType("flights")).toBe("flight");
    expect(normalizeServiceType("buses")).toBe("transport");
    expect(normalizeServiceType("train")).toBe("transport");
    expect(normalizeServiceType("transport")).toBe("transport");
    expect(normalizeServiceType("cruise")).toBeNull();
  });
});

describe("buildSearchQuery", () => {
  it("should build a route query for flights", () => {
    const flight = resolveSpecialist("flight");
    if (!flight) throw new Error("flight specialist missing");
    expect(buildSearchQuery(flight, { origin: "Mumbai", destination: "Delhi", date: "tomorrow" }, null)).toBe(
      "flights from Mumbai to Delhi tomorrow"
    );
  });

  it("should build a place query for attractions without a date", () => {
    const attractions = resolveSpecialist("attractions");
    if (!attractions) throw new Error("attractions specialist missing");
    expect(buildSearchQuery(attractions, { destination: "Jaipur", date: "Friday" }, null)).toBe(
      "attractions in Jaipur"
    );
  });

  it("should fall back to the translation when no entity is usable", () => {
    const hotel = resolveSpecialist("hotel");
    if (!hotel) throw new Error("hotel specialist missing");
    expect(buildSearchQuery(hotel, { destination: null }, "cheap hotel near the beach")).toBe(
      "cheap hotel near the beach"
    );
  });
});

describe("search helpers", () => {
  it("should enhance flight and train queries that lack a price", () => {
    expect(enhanceQuery("flights from Pune to Goa")).toBe("flights from Pune to Goa price schedule ticket table");
    expect(enhanceQuery("train price Pune to Goa")).toBe("train price Pune to Goa");
    expect(enhanceQuery("hotels in Goa")).toBe("hotels in Goa");
  });

  it("should format documents as numbered options", () => {
    const text = formatSearchDocuments([
      { title: "Fares", url: "https://example.test/a", summary: "Cheap fares", text: "Row 1\n\nRow 2" },
    ]);
    expect(text).toBe(
      [
        "=== OPTION 1 ===",
        "SOURCE: Fares",
        "LINK: https://example.test/a",
        "SUMMARY: Cheap fares",
        "PAGE CONTENT:",
        "Row 1\nRow 2",
      ].join("\n")
    );
    expect(formatSearchDocuments([])).toBe("No results found.");
  });
});

describe("mock booking", () => {
  it("should produce a confirmation without reserving anything", () => {
    const booking = createMockBooking("flight", 2, { airline: "SpiceJet" }, new Date("2026-03-01T10:00:00.000Z"));

    expect(booking.confirmationNumber).toMatch(/^WF-[0-9A-F]{8}$/);
    expect(booking).toMatchObject({
      serviceType: "flight",
      optionIndex: 2,
      item: { airline: "SpiceJet" },
      status: "mock_confirmed",
      createdAt: "2026-03-01T10:00:00.000Z",
    });
    expect(formatBookingConfirmation(booking)).toBe(
      [
        "Booking confirmed (simulation, no real reservation was made).",
        `Confirmation number: ${booking.confirmationNumber}`,
        "Service: flight, option 2",
      ].join("\n")
    );
    expect(bookingToJson(booking)).toEqual({
      confirmation_number: booking.confirmationNumber,
      service_type: "flight",
      option_index: 2,
      item: { airline: "SpiceJet" },
      status: "mock_confirmed",
      created_at: "2026-03-01T10:00:00.000Z",
    });
  });
});
