import { normalizeUrl } from "../core/normalize";
import type { ScrapedRecord } from "../domain/models";

export function normalizeRecordUrl(url: string): string {
  return normalizeUrl(url);
}

function preferred(current: ScrapedRecord, candidate: ScrapedRecord): ScrapedRecord {
  if (candidate.completedStage !== current.completedStage) {
    return candidate.completedStage > current.completedStage ? candidate : current;
  }
  // equal stage: earliest scrape wins, then earliest discovery (current)
  return candidate.scrapedAt < current.scrapedAt ? candidate : current;
}

/**
 * One record per normalized URL, in first-discovery order. The deepest
 * record wins a collision.
 */
export function mergeRecords(records: readonly ScrapedRecord[]): ScrapedRecord[] {
  const byUrl = new Map<string, ScrapedRecord>();

  for (const record of records) {
    const key = normalizeRecordUrl(record.url);
    const current = byUrl.get(key);
    byUrl.set(key, current ? preferred(current, record) : record);
  }

  return [...byUrl.values()];
}
