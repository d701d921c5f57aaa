import type { ResultCollectionKey } from "@wayfarer/memory";
import type { EntityMap, JsonValue, ServiceType } from "@wayfarer/types";

export interface Specialist {
  readonly agentName: string;
  readonly taskName: string;
  readonly serviceType: ServiceType;
  /** Key the specialist's JSON output stores its results under. */
  readonly collection: ResultCollectionKey;
  readonly role: string;
  /** One illustrative result item, shown to the model. */
  readonly example: Record<string, string>;
}

const FLIGHT: Specialist = {
  agentName: "flight_specialist",
  taskName: "task_flight_search",
  serviceType: "flight",
  collection: "flights",
  role: "flight search specialist",
  example: {
    airline: "IndiGo",
    flight_number: "6E-123",
    departure: "06:00",
    arrival: "08:30",
    duration: "2h 30m",
    price: "₹3,500",
    stops: "Non-stop",
  },
};

const HOTEL: Specialist = {
  agentName: "hotel_specialist",
  taskName: "task_hotel_search",
  serviceType: "hotel",
  collection: "hotels",
  role: "hotel search specialist",
  example: {
    name: "Harbour View Hotel",
    rating: "4.5/5",
    price_per_night: "₹5,000",
    location: "Near the waterfront",
  },
};

const TRAIN: Specialist = {
  agentName: "transport_specialist",
  taskName: "task_transport_search",
  serviceType: "transport",
  collection: "trains",
  role: "train and bus search specialist",
  example: {
    name: "Rajdhani Express",
    number: "12952",
    departure: "16:55",
    arrival: "08:35",
    duration: "15h 40m",
    price: "₹1,685",
  },
};

const BUS: Specialist = {
  ...TRAIN,
  collection: "buses",
  example: {
    operator: "City Coaches",
    type: "AC Sleeper",
    departure: "21:00",
    arrival: "06:30",
    price: "₹900",
  },
};

const ATTRACTIONS: Specialist = {
  agentName: "attractions_specialist",
  taskName: "task_attractions_search",
  serviceType: "attractions",
  collection: "attractions",
  role: "local attractions specialist",
  example: {
    name: "Old Fort",
    type: "Historical Monument",
    description: "Hilltop fort with city views",
    rating: "4.5/5",
    entry_fee: "Free",
  },
};

/** Raw service type reported by language analysis, mapped to the step that serves it. */
export const DISPATCH_TABLE: Readonly<Record<string, Specialist>> = {
  flight: FLIGHT,
  hotel: HOTEL,
  train: TRAIN,
  bus: BUS,
  attractions: ATTRACTIONS,
};

export function resolveSpecialist(serviceType: string | null | undefined): Specialist | null {
  if (!serviceType) return null;
  return DISPATCH_TABLE[serviceType.trim().toLowerCase()] ?? null;
}

/**
 * Canonical service type for a booking request. Accepts raw analysis
 * values ("train"), collection names ("trains") and canonical tags.
 */
export function normalizeServiceType(value: string): ServiceType | null {
  const key = value.trim().toLowerCase();
  const direct = resolveSpecialist(key) ?? resolveSpecialist(key.replace(/e?s$/, ""));
  if (direct) return direct.serviceType;
  return key === "transport" ? "transport" : null;
}

function text(value: JsonValue | undefined): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

/** Search query built from extracted entities, falling back to the translation. */
export function buildSearchQuery(
  specialist: Specialist,
  entities: EntityMap,
  translation: string | null
): string {
  const origin = text(entities.origin);
  const destination = text(entities.destination);
  const date = text(entities.date);

  const parts: string[] = [specialist.collection];
  if (specialist.serviceType === "hotel" || specialist.serviceType === "attractions") {
    if (destination) parts.push("in", destination);
  } else {
    if (origin) parts.push("from", origin);
    if (destination) parts.push("to", destination);
  }
  if (date && specialist.serviceType !== "attractions") parts.push(date);

  if (parts.length === 1 && translation) return translation;
  return parts.join(" ");
}
