import { DEFAULT_EXTRACTION_SETTINGS, type ExtractionSettings } from "@script-scout/engine";

/**
 * The greedy toggle and search filter driven by the display. Readers get a
 * copy, so a value read at the start of an ingest stays put for that ingest.
 */
export class SettingsStore {
  private current: ExtractionSettings;

  constructor(initial: Partial<ExtractionSettings> = {}) {
    this.current = { ...DEFAULT_EXTRACTION_SETTINGS };
    this.update(initial);
  }

  get(): ExtractionSettings {
    return { ...this.current };
  }

  update(patch: Partial<ExtractionSettings>): ExtractionSettings {
    const next = { ...this.current };
    if (patch.greedy !== undefined) {
      next.greedy = patch.greedy;
    }
    if (patch.searchFilter !== undefined) {
      next.searchFilter = patch.searchFilter.toLowerCase();
    }
    this.current = next;
    return this.get();
  }
}
