import { InvalidMappingError } from "../errors.js";
import type { BuildRecord, Dataset, FootprintRecord, RankedCount } from "../types.js";

/** Image type to deployment footprint. Unlisted image types map to themselves. */
export type FootprintMap = Readonly<Record<string, string>>;

export function toFootprint(imageType: string, map: FootprintMap) {
  return Object.hasOwn(map, imageType) ? map[imageType] : imageType;
}

/**
 * Rejects tables where a footprint is itself a key pointing elsewhere; applying
 * such a table twice would not give the same result as applying it once.
 */
export function validateFootprintMap(map: FootprintMap): FootprintMap {
  for (const [imageType, footprint] of Object.entries(map)) {
    if (Object.hasOwn(map, footprint) && map[footprint] !== footprint) {
      throw new InvalidMappingError(
        `Footprint "${footprint}" (from "${imageType}") is mapped again to "${map[footprint]}"`
      );
    }
  }
  return map;
}

export function applyFootprints(records: Dataset, map: FootprintMap): FootprintRecord[] {
  return records.map(({ imageType, ...rest }) => ({
    ...rest,
    footprint: toFootprint(imageType, map)
  }));
}

/** Frequency table, most frequent first, ties by key. */
export function countBy<T>(items: readonly T[], select: (item: T) => string): RankedCount[] {
  const counts = new Map<string, number>();
  for (const item of items) {
    const key = select(item);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return Array.from(counts, ([key, count]) => ({ key, count })).sort(
    (a, b) => b.count - a.count || a.key.localeCompare(b.key)
  );
}

export function footprintCounts(records: Dataset, map: FootprintMap) {
  return countBy(applyFootprints(records, map), (record) => record.footprint);
}

export function imageTypeCounts(records: Dataset) {
  return countBy(records, (record: BuildRecord) => record.imageType);
}
