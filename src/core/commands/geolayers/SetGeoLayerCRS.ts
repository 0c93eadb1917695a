/**
 * SetGeoLayerCRS(): reprojects a GeoLayer to another coordinate
 * reference system.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { CollisionPolicy } from "../../registry/CollisionPolicy.js";
import { normalizeCrsCode } from "../../services/Crs.js";
import { requireLayerOutput } from "../../services/GeometryEngine.js";
import { AbstractCommand } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class SetGeoLayerCRSCommand extends AbstractCommand {
  readonly name = "SetGeoLayerCRS";
  readonly description = "Reproject a GeoLayer";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "GeoLayerID", description: "GeoLayer to reproject", required: true },
    { name: "CRS", description: "Target CRS code, e.g. EPSG:26913", required: true },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("GeoLayerID");
    const crs = this.params.string("CRS");

    const ready = this.checkAll(context, [
      { kind: "idExists", parameter: "GeoLayerID", registry: "geoLayers", id },
      { kind: "crsCodeValid", parameter: "CRS", value: crs },
    ]);
    const layer = context.geoLayers.get(id);
    if (!ready || !layer) {
      return;
    }

    const target = normalizeCrsCode(crs);
    if (normalizeCrsCode(layer.crs) === target) {
      return;
    }

    await this.runEffect(`Unable to set the CRS of GeoLayer (${id}) to ${target}.`, async () => {
      const outputs = await context.services.geometry.runAlgorithm("reproject", {
        INPUT: layer.features,
        SOURCE_CRS: layer.crs,
        TARGET_CRS: target,
      });
      // Updates the layer in place
      context.geoLayers.register(
        id,
        { ...layer, crs: target, features: requireLayerOutput(outputs, "OUTPUT", "reproject") },
        CollisionPolicy.REPLACE,
      );
    });
  }
}
