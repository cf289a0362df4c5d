import type { DiscoveredUrl, SnapshotRow } from "./types.js";
import { splitUri } from "./uri.js";

export const UNKNOWN_ORIGIN = "unknown";

export function createDiscoveredUrl(url: string, sourceFile: string): DiscoveredUrl {
  return Object.freeze({ url, sourceFile });
}

/** Structural identity of an entry: equal url and sourceFile give equal keys. */
export function discoveryKey(entry: DiscoveredUrl): string {
  return JSON.stringify([entry.url, entry.sourceFile]);
}

export function compareDiscoveries(a: DiscoveredUrl, b: DiscoveredUrl): number {
  if (a.url !== b.url) {
    return a.url < b.url ? -1 : 1;
  }
  if (a.sourceFile !== b.sourceFile) {
    return a.sourceFile < b.sourceFile ? -1 : 1;
  }
  return 0;
}

/** Split a stored URL into the host and path columns shown to the user, as written. */
export function toSnapshotRow(entry: DiscoveredUrl): SnapshotRow {
  const parts = splitUri(entry.url);
  if (!parts) {
    return { host: UNKNOWN_ORIGIN, path: entry.url, sourceFile: entry.sourceFile, url: entry.url };
  }

  const scheme = parts.scheme ? `${parts.scheme}://` : "";
  return {
    host: `${scheme}${parts.host ?? UNKNOWN_ORIGIN}`,
    path: parts.query === undefined ? parts.path : `${parts.path}?${parts.query}`,
    sourceFile: entry.sourceFile,
    url: entry.url,
  };
}

function matchesFilter(row: SnapshotRow, needle: string): boolean {
  const haystack = `${row.url} ${row.sourceFile} ${row.host} ${row.path}`.toLowerCase();
  return haystack.includes(needle);
}

/**
 * Discovered URLs grouped by origin key, each origin holding its own keyed set.
 *
 * Every operation runs to completion on the event loop, so an insert touches
 * only its origin's collection and `clear()` swaps in a fresh mapping; a reader
 * iterating the previous one keeps seeing the pre-clear state.
 */
export class DiscoveryStore {
  private byOrigin = new Map<string, Map<string, DiscoveredUrl>>();

  /** Returns false when an equal entry was already stored for the origin. */
  insert(origin: string, entry: DiscoveredUrl): boolean {
    let entries = this.byOrigin.get(origin);
    if (!entries) {
      entries = new Map();
      this.byOrigin.set(origin, entries);
    }

    const key = discoveryKey(entry);
    if (entries.has(key)) {
      return false;
    }
    entries.set(key, createDiscoveredUrl(entry.url, entry.sourceFile));
    return true;
  }

  clear(): void {
    this.byOrigin = new Map();
  }

  size(): number {
    let total = 0;
    for (const entries of this.byOrigin.values()) {
      total += entries.size;
    }
    return total;
  }

  origins(): string[] {
    return Array.from(this.byOrigin.keys());
  }

  entries(origin: string): DiscoveredUrl[] {
    return Array.from(this.byOrigin.get(origin)?.values() ?? []);
  }

  /**
   * Flatten every entry into display rows, sorted by url then sourceFile, keeping
   * rows where url, sourceFile, host or path contain `filter` (case-insensitive).
   */
  snapshot(filter = ""): SnapshotRow[] {
    const all: DiscoveredUrl[] = [];
    for (const entries of this.byOrigin.values()) {
      all.push(...entries.values());
    }
    all.sort(compareDiscoveries);

    const needle = filter.toLowerCase();
    const rows = all.map(toSnapshotRow);
    return needle ? rows.filter((row) => matchesFilter(row, needle)) : rows;
  }
}
