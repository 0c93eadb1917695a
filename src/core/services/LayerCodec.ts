/**
 * File codec contract for layers and tables.
 *
 * @module
 */

import type { FeatureCollection } from "geojson";

export const LayerFormat = {
  GEOJSON: "GeoJSON",
} as const;

export type LayerFormat = (typeof LayerFormat)[keyof typeof LayerFormat];

/**
 * What a codec returns for a layer file. The core stores it in a GeoLayer
 * without looking inside.
 */
export interface LayerHandle {
  readonly features: FeatureCollection;
  readonly crs: string;
}

export interface TableData {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, string>>[];
}

export interface DelimitedOptions {
  readonly delimiter: string;
  /** Lines starting with this text are skipped when reading */
  readonly comment?: string;
}

export interface LayerCodec {
  readLayer(filePath: string): Promise<LayerHandle>;
  writeLayer(
    features: FeatureCollection,
    filePath: string,
    format: LayerFormat,
    crs: string,
  ): Promise<void>;
  readTable(filePath: string, options: DelimitedOptions): Promise<TableData>;
  writeTable(table: TableData, filePath: string, options: DelimitedOptions): Promise<void>;
}
