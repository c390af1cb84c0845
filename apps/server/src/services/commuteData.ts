import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import {
  aggregateByTime,
  aggregateByWeekdayAndTime,
  buildItineraries,
  declaredFileNames,
  filterByWeekdays,
  FileNotFoundError,
  indexMetadata,
  isNodeError,
  loadDashboardConfig,
  loadSamplesSafely,
  type ChartPanel,
  type Itinerary,
  type ItineraryCharts,
  type ItineraryFile,
  type ItinerarySummary,
  type LoadOptions,
  type WeekdayNumber,
} from '@commute-dashboard/core';

export interface CommuteDataServiceOptions {
  dataDir: string;
  configPath: string;
  loadOptions: LoadOptions;
}

export function toSummary(itinerary: Itinerary): ItinerarySummary {
  return {
    id: itinerary.id,
    name: itinerary.name,
    description: itinerary.description,
    files: itinerary.files.map(({ fileName, direction, title }) => ({ fileName, direction, title })),
  };
}

/**
 * Reads the data directory and config on every call and turns them into
 * chart data. Nothing is cached between requests: each call reflects the
 * current file contents.
 */
export class CommuteDataService {
  constructor(private readonly options: CommuteDataServiceOptions) {}

  /**
   * Itinerary tabs in display order: CSV files found in the data directory
   * plus the output files the config declares.
   */
  async listItineraries(): Promise<Itinerary[]> {
    const config = await loadDashboardConfig(this.options.configPath);
    const metadata = config?.itineraries ?? [];
    const fileNames = [...(await this.listDataFiles()), ...declaredFileNames(metadata)];
    return buildItineraries(fileNames, indexMetadata(metadata));
  }

  /**
   * Charts of every file of one itinerary. A file that is missing or
   * malformed yields an empty panel with a warning; the other files are
   * unaffected.
   *
   * @param weekdays - Weekdays to include; empty for all
   * @returns undefined if no itinerary has this id
   */
  async getItineraryCharts(
    id: string,
    weekdays: WeekdayNumber[] = [],
  ): Promise<ItineraryCharts | undefined> {
    const itinerary = (await this.listItineraries()).find((i) => i.id === id);
    if (!itinerary) {
      return undefined;
    }

    const panels = await Promise.all(itinerary.files.map((file) => this.loadPanel(file, weekdays)));
    return { itinerary: toSummary(itinerary), weekdays, panels };
  }

  private async listDataFiles(): Promise<string[]> {
    try {
      const entries = await readdir(this.options.dataDir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.csv'))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        console.warn(`[CommuteDataService] Data directory ${this.options.dataDir} does not exist`);
        return [];
      }
      throw error;
    }
  }

  private async loadPanel(file: ItineraryFile, weekdays: WeekdayNumber[]): Promise<ChartPanel> {
    const path = join(this.options.dataDir, file.fileName);
    const { samples, error } = await loadSamplesSafely({ kind: 'file', path }, this.options.loadOptions);
    const selected = filterByWeekdays(samples, weekdays);

    const panel: ChartPanel = {
      fileName: file.fileName,
      direction: file.direction,
      title: file.title,
      sampleCount: selected.length,
      byTime: aggregateByTime(selected),
      byWeekday: aggregateByWeekdayAndTime(selected),
    };

    if (error) {
      console.warn(`[CommuteDataService] ${error.message}`);
      panel.warning =
        error instanceof FileNotFoundError
          ? { kind: 'not-found', message: `Data file ${file.fileName} not found` }
          : { kind: 'unavailable', message: `Cannot read ${file.fileName}: ${error.reason}` };
    }

    return panel;
  }
}
