export type LogLevel = "debug" | "info" | "warn" | "error";

export type Scheme = "http" | "https";

/**
 * Where a scanned response came from. Built per response from its originating
 * request and dropped once the response has been ingested.
 */
export interface RequestContext {
  scheme: Scheme;
  host: string;
  port: number;
  /** Full request path, including any query string. */
  path: string;
}

/** A resolved URL together with the script it was found in. */
export interface DiscoveredUrl {
  readonly url: string;
  readonly sourceFile: string;
}

export interface SnapshotRow {
  /** `scheme://host`, or "unknown" when the stored URL does not parse. */
  host: string;
  /** Path plus `?query`, or the raw URL when it does not parse. */
  path: string;
  sourceFile: string;
  url: string;
}

/** One intercepted response, as handed over by the interception host. */
export interface CapturedExchange {
  body: string;
  contentType?: string;
  /** Full URL of the originating request, when there is one. */
  requestUrl?: string;
  context?: RequestContext;
}

export interface IngestOptions {
  greedy: boolean;
}

export interface IngestResult {
  /** False when the classifier rejected the response. */
  scanned: boolean;
  sourceFile: string;
  candidates: number;
  resolved: number;
  /** Entries that were new to the store. */
  inserted: number;
}

export interface ExtractionSettings {
  greedy: boolean;
  searchFilter: string;
}

export const DEFAULT_EXTRACTION_SETTINGS: ExtractionSettings = {
  greedy: true,
  searchFilter: "",
};
