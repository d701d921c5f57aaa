export {
  TravelMemoryManager,
  openMemoryManager,
  DEFAULT_MAX_CONTEXT_MESSAGES,
  DEFAULT_RETENTION_DAYS,
} from "./memory-manager.js";
export type { TravelMemoryManagerOptions, MemoryConfig } from "./memory-manager.js";
export { extractContext } from "./context-extractor.js";
export {
  decodeAgentOutput,
  decodeSearchFacet,
  isLanguageAgent,
  isJsonObject,
  RESULT_COLLECTIONS,
} from "./payload-decoder.js";
export type { DecodedOutput, SearchFacet, ResultCollectionKey } from "./payload-decoder.js";
