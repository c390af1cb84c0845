/**
 * Itinerary catalog: which CSV files make up which dashboard tab, what they
 * are called, and in which order the tabs appear.
 *
 * Pure functions of a file list and the config metadata; no I/O.
 */

import { describeSchedule } from './schedule.js';
import type { ItineraryMetadata } from './types.js';

/**
 * Travel direction encoded in a data file name.
 */
export type Direction = 'to' | 'from';

/**
 * Itinerary id of the unsuffixed `to.csv` / `from.csv` pair.
 */
export const DEFAULT_ITINERARY_ID = 'default';

export interface DataFileName {
  fileName: string;
  direction: Direction | undefined;
  itineraryId: string;
}

export interface ItineraryFile {
  fileName: string;
  direction: Direction | undefined;
  /** Chart title, e.g. "1 Main St → 99 Office Rd" or "Outbound" */
  title: string;
}

export interface Itinerary {
  id: string;
  name: string;
  /** Collector schedule captions, when the config declares any */
  description: string | undefined;
  metadata: ItineraryMetadata | undefined;
  files: ItineraryFile[];
}

/**
 * Config metadata looked up by itinerary id and by output file name.
 */
export interface MetadataIndex {
  byId: ReadonlyMap<string, ItineraryMetadata>;
  byOutputFile: ReadonlyMap<string, ItineraryMetadata>;
}

/**
 * Sort key of a tab: declared itineraries first by numeric id (then by id text),
 * undeclared ones after by file name.
 */
export type ItinerarySortKey = readonly [rank: 0 | 1, numericId: number, text: string];

const DIRECTION_FILE_PATTERN = /^(to|from)(?:-(.+))?\.csv$/i;
const CSV_FILE_PATTERN = /^(.+)\.csv$/i;

function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1];
}

/**
 * Reads direction and itinerary id off a data file name.
 *
 * - `to.csv`, `from.csv` → the default itinerary
 * - `to-{id}.csv`, `from-{id}.csv` → itinerary `{id}`
 * - any other `{stem}.csv` → itinerary `{stem}`, no direction
 *
 * @returns undefined for names that are not CSV files
 */
export function parseDataFileName(fileName: string): DataFileName | undefined {
  const directional = DIRECTION_FILE_PATTERN.exec(fileName);
  if (directional) {
    const direction = directional[1].toLowerCase() === 'to' ? 'to' : 'from';
    return { fileName, direction, itineraryId: directional[2] ?? DEFAULT_ITINERARY_ID };
  }

  const plain = CSV_FILE_PATTERN.exec(fileName);
  if (plain) {
    return { fileName, direction: undefined, itineraryId: plain[1] };
  }

  return undefined;
}

export function indexMetadata(itineraries: readonly ItineraryMetadata[]): MetadataIndex {
  return {
    byId: new Map(itineraries.map((i) => [i.id, i])),
    byOutputFile: new Map(itineraries.map((i) => [baseName(i.outputFile), i])),
  };
}

export const EMPTY_METADATA_INDEX: MetadataIndex = indexMetadata([]);

/**
 * Output file names declared in the config, so that files the collector has
 * not written yet still get a tab.
 */
export function declaredFileNames(itineraries: readonly ItineraryMetadata[]): string[] {
  return itineraries.map((i) => baseName(i.outputFile));
}

export function itinerarySortKey(
  itinerary: Pick<Itinerary, 'id' | 'metadata' | 'files'>,
): ItinerarySortKey {
  if (itinerary.metadata) {
    const numericId = /^\d+$/.test(itinerary.id) ? Number(itinerary.id) : Number.POSITIVE_INFINITY;
    return [0, numericId, itinerary.id];
  }
  return [1, 0, itinerary.files[0]?.fileName ?? itinerary.id];
}

function compareValues(a: number | string, b: number | string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function compareSortKeys(a: ItinerarySortKey, b: ItinerarySortKey): number {
  for (let i = 0; i < a.length; i++) {
    const order = compareValues(a[i], b[i]);
    if (order !== 0) {
      return order;
    }
  }
  return 0;
}

function directionRank(direction: Direction | undefined): number {
  return direction === 'to' ? 0 : direction === 'from' ? 1 : 2;
}

function fileTitle(
  file: DataFileName,
  metadata: ItineraryMetadata | undefined,
  declaredByName: boolean,
): string {
  if (metadata) {
    return file.direction === 'from' && !declaredByName
      ? `${metadata.to} → ${metadata.from}`
      : `${metadata.from} → ${metadata.to}`;
  }
  switch (file.direction) {
    case 'to':
      return 'Outbound';
    case 'from':
      return 'Return';
    case undefined:
      return file.fileName.replace(CSV_FILE_PATTERN, '$1');
    default: {
      const _exhaustive: never = file.direction;
      throw new Error(`Unknown direction: ${String(_exhaustive)}`);
    }
  }
}

function itineraryName(id: string, metadata: ItineraryMetadata | undefined): string {
  if (metadata) {
    return metadata.name;
  }
  return id === DEFAULT_ITINERARY_ID ? 'Commute' : `Itinerary ${id}`;
}

/**
 * Groups data files into ordered itinerary tabs.
 *
 * A file takes the metadata of the itinerary whose output_file is its name,
 * else of the itinerary whose id matches the id in its name. Duplicate and
 * non-CSV names are ignored.
 */
export function buildItineraries(
  fileNames: readonly string[],
  index: MetadataIndex = EMPTY_METADATA_INDEX,
): Itinerary[] {
  const groups = new Map<string, Itinerary>();

  for (const fileName of new Set(fileNames)) {
    const parsed = parseDataFileName(fileName);
    if (!parsed) {
      continue;
    }

    const declared = index.byOutputFile.get(fileName);
    const metadata = declared ?? index.byId.get(parsed.itineraryId);
    const id = metadata?.id ?? parsed.itineraryId;

    let itinerary = groups.get(id);
    if (!itinerary) {
      itinerary = {
        id,
        name: itineraryName(id, metadata),
        description:
          metadata && metadata.schedules.length > 0
            ? metadata.schedules.map(describeSchedule).join('; ')
            : undefined,
        metadata,
        files: [],
      };
      groups.set(id, itinerary);
    }

    itinerary.files.push({
      fileName,
      direction: parsed.direction,
      title: fileTitle(parsed, metadata, declared !== undefined),
    });
  }

  const itineraries = [...groups.values()];
  for (const itinerary of itineraries) {
    itinerary.files.sort(
      (a, b) =>
        directionRank(a.direction) - directionRank(b.direction) ||
        compareValues(a.fileName, b.fileName),
    );
  }

  return itineraries.sort((a, b) => compareSortKeys(itinerarySortKey(a), itinerarySortKey(b)));
}
