/**
 * WriteGeoLayerToGeoJSON(): writes a GeoLayer to a GeoJSON file.
 *
 * @module
 */

import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { LayerFormat } from "../../services/LayerCodec.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class WriteGeoLayerToGeoJSONCommand extends AbstractCommand {
  readonly name = "WriteGeoLayerToGeoJSON";
  readonly description = "Write a GeoLayer to a GeoJSON file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "GeoLayerID", description: "GeoLayer to write", required: true },
    { name: "OutputFile", description: "GeoJSON file to write", required: true },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("GeoLayerID");
    const outputFile = resolvePath(context, this.params.string("OutputFile"));

    const ready = this.checkAll(context, [
      { kind: "idExists", parameter: "GeoLayerID", registry: "geoLayers", id },
      { kind: "parentFolderExists", parameter: "OutputFile", path: outputFile },
    ]);
    const layer = context.geoLayers.get(id);
    if (!ready || !layer) {
      return;
    }

    const written = await this.runEffect(
      `Unable to write GeoLayer (${id}) to GeoJSON file (${outputFile}).`,
      () => context.services.codec.writeLayer(layer.features, outputFile, LayerFormat.GEOJSON, layer.crs),
    );
    if (written) {
      context.outputFiles.push(outputFile);
    }
  }
}
