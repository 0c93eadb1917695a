/**
 * ClipGeoLayer(): clips a GeoLayer to the polygons of another.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { GeometryKind } from "../../model/GeoLayer.js";
import { requireLayerOutput } from "../../services/GeometryEngine.js";
import { AbstractCommand, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec } from "../CommandParameters.js";

export class ClipGeoLayerCommand extends AbstractCommand {
  readonly name = "ClipGeoLayer";
  readonly description = "Clip a GeoLayer by the polygons of another GeoLayer";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "InputGeoLayerID", description: "GeoLayer to clip", required: true },
    { name: "ClippingGeoLayerID", description: "Polygon GeoLayer used as the mask", required: true },
    {
      name: "OutputGeoLayerID",
      description: "ID of the result (default: <input>_clippedBy_<clipping>)",
    },
    collisionPolicySpec("IfGeoLayerIDExists"),
  ];

  protected override async discoverOutputs(): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "geoLayers", id: this.outputId() }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const inputId = this.params.string("InputGeoLayerID");
    const clippingId = this.params.string("ClippingGeoLayerID");
    const outputId = this.outputId();

    const ready = this.checkAll(context, [
      { kind: "idExists", parameter: "InputGeoLayerID", registry: "geoLayers", id: inputId },
      { kind: "idExists", parameter: "ClippingGeoLayerID", registry: "geoLayers", id: clippingId },
      context.geoLayers.exists(clippingId) && {
        kind: "geometryKind",
        parameter: "ClippingGeoLayerID",
        id: clippingId,
        allowed: [GeometryKind.POLYGON],
      },
      context.geoLayers.exists(inputId) &&
        context.geoLayers.exists(clippingId) && {
          kind: "matchingCrs",
          parameter: "InputGeoLayerID",
          id: inputId,
          otherParameter: "ClippingGeoLayerID",
          otherId: clippingId,
        },
      {
        kind: "outputIdAvailable",
        parameter: "OutputGeoLayerID",
        registry: "geoLayers",
        id: outputId,
        policy: this.params.policy("IfGeoLayerIDExists"),
      },
    ]);
    const input = context.geoLayers.get(inputId);
    const clipping = context.geoLayers.get(clippingId);
    if (!ready || !input || !clipping) {
      return;
    }

    await this.runEffect(`Unable to clip GeoLayer (${inputId}) by (${clippingId}).`, async () => {
      const outputs = await context.services.geometry.runAlgorithm("clip", {
        INPUT: input.features,
        OVERLAY: clipping.features,
      });
      this.registerOutput(
        context.geoLayers,
        outputId,
        {
          id: outputId,
          name: outputId,
          description: `${inputId} clipped by ${clippingId}`,
          crs: input.crs,
          features: requireLayerOutput(outputs, "OUTPUT", "clip"),
          sourcePath: "",
        },
        this.params.policy("IfGeoLayerIDExists"),
      );
    });
  }

  private outputId(): string {
    return (
      this.params.optionalString("OutputGeoLayerID") ??
      `${this.params.string("InputGeoLayerID")}_clippedBy_${this.params.string("ClippingGeoLayerID")}`
    );
  }
}
