import { z } from "zod";
import type {
  AgentOutputRecord,
  EntityMap,
  JsonObject,
  JsonValue,
  LanguageInfo,
  ServiceType,
  Timestamp,
} from "@wayfarer/types";

/**
 * Stored payloads come from JSON.parse, so nested values are already JSON.
 * Only the top level is checked; values are passed through by reference.
 */
const jsonArray = z.custom<JsonValue[]>((v) => Array.isArray(v));
const jsonMapping = z.custom<JsonObject>(
  (v) => typeof v === "object" && v !== null && !Array.isArray(v)
);

/**
 * Result collections recognised in specialist output, in priority order.
 * Trains and buses both map to `transport`.
 */
export const RESULT_COLLECTIONS = [
  ["flights", "flight"],
  ["hotels", "hotel"],
  ["trains", "transport"],
  ["buses", "transport"],
  ["attractions", "attractions"],
] as const satisfies ReadonlyArray<readonly [string, ServiceType]>;

export type ResultCollectionKey = (typeof RESULT_COLLECTIONS)[number][0];

const collection = jsonArray.optional().catch(undefined);

const SearchPayloadSchema = z.object({
  flights: collection,
  hotels: collection,
  trains: collection,
  buses: collection,
  attractions: collection,
});

const LanguagePayloadSchema = z.object({
  detected_language: z.string().nullish().catch(null),
  language_name: z.string().nullish().catch(null),
  entities: jsonMapping.optional().catch(undefined),
});

export interface SearchFacet {
  readonly collection: ResultCollectionKey;
  readonly serviceType: ServiceType;
  readonly results: JsonValue[];
}

/**
 * Closed set of shapes a stored agent output can take.
 * A language payload may also carry a result collection.
 */
export type DecodedOutput =
  | {
      readonly tag: "language";
      readonly timestamp: Timestamp;
      readonly language: LanguageInfo;
      /** Absent when the payload had no `entities` mapping. */
      readonly entities?: EntityMap;
      readonly search?: SearchFacet;
    }
  | { readonly tag: "search"; readonly timestamp: Timestamp; readonly search: SearchFacet }
  | { readonly tag: "opaque"; readonly timestamp: Timestamp };

/** Agents whose names mention language or detection report language and entities. */
export function isLanguageAgent(agentName: string): boolean {
  const name = agentName.toLowerCase();
  return name.includes("language") || name.includes("detection");
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode one stored output. Text outputs and json payloads that are not
 * mappings are opaque: kept verbatim by the caller, never mined.
 */
export function decodeAgentOutput(output: AgentOutputRecord): DecodedOutput {
  const { timestamp } = output;
  if (output.kind !== "json" || !isJsonObject(output.data)) {
    return { tag: "opaque", timestamp };
  }

  const data = output.data;
  const search = decodeSearchFacet(data);

  if (isLanguageAgent(output.agentName)) {
    const parsed = LanguagePayloadSchema.parse(data);
    return {
      tag: "language",
      timestamp,
      language: {
        detectedLanguage: parsed.detected_language ?? null,
        languageName: parsed.language_name ?? null,
      },
      entities: parsed.entities,
      search,
    };
  }

  return search ? { tag: "search", timestamp, search } : { tag: "opaque", timestamp };
}

/** First collection, in priority order, holding at least one result. */
export function decodeSearchFacet(data: JsonObject): SearchFacet | undefined {
  const parsed = SearchPayloadSchema.parse(data);
  for (const [key, serviceType] of RESULT_COLLECTIONS) {
    const results = parsed[key];
    if (results && results.length > 0) {
      return { collection: key, serviceType, results };
    }
  }
  return undefined;
}
