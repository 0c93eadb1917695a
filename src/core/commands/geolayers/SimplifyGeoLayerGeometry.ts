/**
 * SimplifyGeoLayerGeometry(): simplifies line and polygon geometry.
 *
 * Without SimplifiedGeoLayerID the GeoLayer is simplified in place.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { GeometryKind } from "../../model/GeoLayer.js";
import { CollisionPolicy } from "../../registry/CollisionPolicy.js";
import { requireLayerOutput } from "../../services/GeometryEngine.js";
import { AbstractCommand, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec, type ParameterValues } from "../CommandParameters.js";

const NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export class SimplifyGeoLayerGeometryCommand extends AbstractCommand {
  readonly name = "SimplifyGeoLayerGeometry";
  readonly description = "Simplify the geometry of a line or polygon GeoLayer";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "GeoLayerID", description: "GeoLayer to simplify", required: true },
    { name: "Tolerance", description: "Distance tolerance in layer units", required: true },
    {
      name: "HighQuality",
      description: "Use the slower, more accurate algorithm",
      type: "boolean",
      defaultValue: "False",
    },
    { name: "SimplifiedGeoLayerID", description: "ID of the result (default: GeoLayerID)" },
    collisionPolicySpec("IfGeoLayerIDExists"),
  ];

  protected override checkParameters(params: ParameterValues): void {
    const tolerance = params.string("Tolerance");
    if (!NUMBER.test(tolerance.trim()) || Number(tolerance) <= 0) {
      this.initFailure(
        `The Tolerance (${tolerance}) is not a positive number.`,
        "Specify a positive number for Tolerance.",
      );
    }
  }

  protected override async discoverOutputs(): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "geoLayers", id: this.outputId() }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("GeoLayerID");
    const outputId = this.outputId();

    const ready = this.checkAll(context, [
      { kind: "idExists", parameter: "GeoLayerID", registry: "geoLayers", id },
      context.geoLayers.exists(id) && {
        kind: "geometryKind",
        parameter: "GeoLayerID",
        id,
        allowed: [GeometryKind.LINE, GeometryKind.POLYGON],
      },
      outputId !== id && {
        kind: "outputIdAvailable",
        parameter: "SimplifiedGeoLayerID",
        registry: "geoLayers",
        id: outputId,
        policy: this.params.policy("IfGeoLayerIDExists"),
      },
    ]);
    const layer = context.geoLayers.get(id);
    if (!ready || !layer) {
      return;
    }

    await this.runEffect(`Unable to simplify GeoLayer (${id}).`, async () => {
      const outputs = await context.services.geometry.runAlgorithm("simplify", {
        INPUT: layer.features,
        TOLERANCE: Number(this.params.string("Tolerance")),
        HIGH_QUALITY: this.params.boolean("HighQuality"),
      });
      this.registerOutput(
        context.geoLayers,
        outputId,
        {
          ...layer,
          id: outputId,
          name: outputId === id ? layer.name : outputId,
          sourcePath: outputId === id ? layer.sourcePath : "",
          features: requireLayerOutput(outputs, "OUTPUT", "simplify"),
        },
        // Simplifying in place always replaces the input
        outputId === id ? CollisionPolicy.REPLACE : this.params.policy("IfGeoLayerIDExists"),
      );
    });
  }

  private outputId(): string {
    return this.params.optionalString("SimplifiedGeoLayerID") ?? this.params.string("GeoLayerID");
  }
}
