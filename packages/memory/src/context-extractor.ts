import type {
  AgentOutputRecord,
  DerivedViews,
  EntityMap,
  LanguageInfo,
  SearchResultSet,
} from "@wayfarer/types";
import { decodeAgentOutput } from "./payload-decoder.js";

/**
 * Fold stored agent outputs, oldest first, into the derived views.
 *
 * Language and entities are last-write-wins; search results accumulate.
 * Pure: the same rows always yield the same views.
 */
export function extractContext(outputs: ReadonlyArray<AgentOutputRecord>): DerivedViews {
  let language: LanguageInfo | null = null;
  let entities: EntityMap = {};
  const searchResults: SearchResultSet[] = [];

  for (const output of outputs) {
    const decoded = decodeAgentOutput(output);
    switch (decoded.tag) {
      case "language":
        language = decoded.language;
        if (decoded.entities) entities = decoded.entities;
        if (decoded.search) {
          searchResults.push({
            serviceType: decoded.search.serviceType,
            results: decoded.search.results,
            timestamp: decoded.timestamp,
          });
        }
        break;
      case "search":
        searchResults.push({
          serviceType: decoded.search.serviceType,
          results: decoded.search.results,
          timestamp: decoded.timestamp,
        });
        break;
      case "opaque":
        break;
    }
  }

  return { language, entities, searchResults };
}
