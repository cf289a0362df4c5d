// Main exports
export { ingestExchange, deriveSourceFile, originKeyOf, UNKNOWN_SOURCE_FILE } from "./ingest.js";
export {
  DiscoveryStore,
  createDiscoveredUrl,
  discoveryKey,
  toSnapshotRow,
  UNKNOWN_ORIGIN,
} from "./discovery-store.js";

// Types
export type {
  CapturedExchange,
  DiscoveredUrl,
  ExtractionSettings,
  IngestOptions,
  IngestResult,
  LogLevel,
  RequestContext,
  Scheme,
  SnapshotRow,
} from "./types.js";
export { DEFAULT_EXTRACTION_SETTINGS } from "./types.js";
export type { HostActions, HostActionTarget, HostRequest, ForwardResult } from "./host-actions.js";

// Utilities (for advanced usage)
export { isJsLike } from "./classifier.js";
export { extractCandidates } from "./extractor.js";
export { resolveCandidate, buildBaseUrl } from "./resolver.js";
export { isUriReference, splitUri } from "./uri.js";
export type { UriParts } from "./uri.js";
export { buildGetRequest, forwardToHost, joinRowUrl, repeaterLabel } from "./host-actions.js";
export { log, setLogCallback, runWithLogCallback } from "./logger.js";
export type { LogCallback } from "./logger.js";
