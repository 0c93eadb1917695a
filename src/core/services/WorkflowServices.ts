import { ArchiveExtractor, type ArchiveService } from "./ArchiveService.js";
import { UndiciDownloader, type DownloadService } from "./DownloadService.js";
import { GeoJsonLayerCodec } from "./GeoJsonLayerCodec.js";
import type { GeometryEngine } from "./GeometryEngine.js";
import type { LayerCodec } from "./LayerCodec.js";
import { ExecaProgramRunner, type ProgramRunner } from "./ProgramRunner.js";
import { TurfGeometryEngine } from "./TurfGeometryEngine.js";

/**
 * External collaborators commands delegate their effects to.
 */
export interface WorkflowServices {
  readonly geometry: GeometryEngine;
  readonly codec: LayerCodec;
  readonly archives: ArchiveService;
  readonly downloads: DownloadService;
  readonly programs: ProgramRunner;
}

export function createDefaultServices(overrides: Partial<WorkflowServices> = {}): WorkflowServices {
  return {
    geometry: overrides.geometry ?? new TurfGeometryEngine(),
    codec: overrides.codec ?? new GeoJsonLayerCodec(),
    archives: overrides.archives ?? new ArchiveExtractor(),
    downloads: overrides.downloads ?? new UndiciDownloader(),
    programs: overrides.programs ?? new ExecaProgramRunner(),
  };
}
