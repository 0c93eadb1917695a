/**
 * GeoJSON and delimited-text codec.
 *
 * Layers are read and validated with zod. Features without geometry are
 * dropped on read. The legacy `crs` member is honored on read and written
 * for any CRS other than EPSG:4326. Tables go through papaparse.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import Papa from "papaparse";
import { z } from "zod";
import type { Feature, FeatureCollection } from "geojson";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { DEFAULT_CRS } from "../model/GeoLayer.js";
import { normalizeCrsCode } from "./Crs.js";
import {
  LayerFormat,
  type DelimitedOptions,
  type LayerCodec,
  type LayerHandle,
  type TableData,
} from "./LayerCodec.js";

// =============================================================================
// Zod Schemas
// =============================================================================

const PositionSchema = z.array(z.number()).min(2);
const LineSchema = z.array(PositionSchema);
const RingsSchema = z.array(LineSchema);

const GeometrySchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Point"), coordinates: PositionSchema }),
  z.object({ type: z.literal("MultiPoint"), coordinates: LineSchema }),
  z.object({ type: z.literal("LineString"), coordinates: LineSchema }),
  z.object({ type: z.literal("MultiLineString"), coordinates: RingsSchema }),
  z.object({ type: z.literal("Polygon"), coordinates: RingsSchema }),
  z.object({ type: z.literal("MultiPolygon"), coordinates: z.array(RingsSchema) }),
]);

const FeatureSchema = z.object({
  type: z.literal("Feature"),
  id: z.union([z.string(), z.number()]).optional(),
  geometry: GeometrySchema.nullable(),
  properties: z.record(z.string(), z.unknown()).nullable().optional(),
});

const FeatureCollectionSchema = z.object({
  type: z.literal("FeatureCollection"),
  crs: z
    .object({
      type: z.literal("name"),
      properties: z.object({ name: z.string() }),
    })
    .optional(),
  features: z.array(FeatureSchema),
});

type ParsedFeature = z.infer<typeof FeatureSchema>;

// =============================================================================
// Helpers
// =============================================================================

function toCause(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function toFeatures(parsed: readonly ParsedFeature[]): Feature[] {
  return parsed.flatMap((f): Feature[] =>
    f.geometry
      ? [{ type: "Feature", id: f.id, geometry: f.geometry, properties: f.properties ?? {} }]
      : [],
  );
}

async function readText(filePath: string, code: string, what: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    const cause = toCause(error);
    throw new WorkflowError(
      `Failed to read ${what} file`,
      code,
      { path: filePath, reason: cause.message },
      undefined,
      `Could not read ${filePath}. ${cause.message}`,
      cause,
    );
  }
}

async function writeText(filePath: string, content: string, code: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf8");
  } catch (error) {
    const cause = toCause(error);
    throw new WorkflowError(
      `Failed to write ${filePath}`,
      code,
      { path: filePath, reason: cause.message },
      undefined,
      undefined,
      cause,
    );
  }
}

// =============================================================================
// GeoJsonLayerCodec
// =============================================================================

export class GeoJsonLayerCodec implements LayerCodec {
  async readLayer(filePath: string): Promise<LayerHandle> {
    const content = await readText(filePath, ErrorCode.LAYER_READ_FAILED, "GeoJSON");

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      const cause = toCause(error);
      throw new WorkflowError(
        "Invalid JSON in GeoJSON file",
        ErrorCode.LAYER_READ_FAILED,
        { path: filePath, reason: cause.message },
        undefined,
        `Check the JSON syntax in ${filePath}.`,
        cause,
      );
    }

    const result = FeatureCollectionSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${fieldPath}: ${issue.message}`;
      });
      throw new WorkflowError(
        "File is not a GeoJSON FeatureCollection",
        ErrorCode.LAYER_READ_FAILED,
        { path: filePath, issues },
        undefined,
        `Fix ${path.basename(filePath)}: ${issues.slice(0, 3).join("; ")}`,
      );
    }

    const features: FeatureCollection = {
      type: "FeatureCollection",
      features: toFeatures(result.data.features),
    };
    const crs = result.data.crs
      ? normalizeCrsCode(result.data.crs.properties.name)
      : DEFAULT_CRS;

    return { features, crs };
  }

  async writeLayer(
    features: FeatureCollection,
    filePath: string,
    format: LayerFormat,
    crs: string,
  ): Promise<void> {
    if (format !== LayerFormat.GEOJSON) {
      throw new WorkflowError(`Unsupported layer format "${format}"`, ErrorCode.LAYER_WRITE_FAILED, {
        format,
      });
    }
    const document =
      normalizeCrsCode(crs) === DEFAULT_CRS
        ? features
        : { ...features, crs: { type: "name", properties: { name: normalizeCrsCode(crs) } } };
    await writeText(filePath, JSON.stringify(document, null, 2) + "\n", ErrorCode.LAYER_WRITE_FAILED);
  }

  async readTable(filePath: string, options: DelimitedOptions): Promise<TableData> {
    const content = await readText(filePath, ErrorCode.TABLE_READ_FAILED, "table");
    const result = Papa.parse<Record<string, string>>(content, {
      header: true,
      delimiter: options.delimiter,
      comments: options.comment ?? false,
      skipEmptyLines: true,
    });

    if (result.errors.length > 0) {
      const first = result.errors[0];
      throw new WorkflowError(
        `Failed to parse table: ${first.message}`,
        ErrorCode.TABLE_READ_FAILED,
        { path: filePath, row: first.row, errors: result.errors.length },
        undefined,
        `Check the delimiter and quoting in ${filePath}.`,
      );
    }

    return { columns: result.meta.fields ?? [], rows: result.data };
  }

  async writeTable(table: TableData, filePath: string, options: DelimitedOptions): Promise<void> {
    const csv = Papa.unparse(
      {
        fields: [...table.columns],
        data: table.rows.map((row) => table.columns.map((column) => row[column] ?? "")),
      },
      { delimiter: options.delimiter, newline: "\n" },
    );
    await writeText(filePath, csv + "\n", ErrorCode.TABLE_WRITE_FAILED);
  }
}
