/**
 * MergeGeoLayers(): combines the features of several GeoLayers into one.
 *
 * Inputs are copied into temporary GeoLayers first so the engine never
 * sees a registered layer; the copies are removed when the merge ends,
 * whether or not it succeeded. Temporary IDs never reuse an ID already in
 * the registry.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { copyGeoLayer, geometryKindOf, type GeoLayer } from "../../model/GeoLayer.js";
import { CollisionPolicy } from "../../registry/CollisionPolicy.js";
import type { IdentifierRegistry } from "../../registry/IdentifierRegistry.js";
import { requireLayerOutput } from "../../services/GeometryEngine.js";
import { AbstractCommand, type CheckRequest, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec, type ParameterValues } from "../CommandParameters.js";

const TEMPORARY_PREFIX = "__merge_";

/**
 * `base`, or `base_1`, `base_2`, ... when taken or reserved for the output.
 */
function unusedId(registry: IdentifierRegistry<GeoLayer>, base: string, outputId: string): string {
  let candidate = base;
  for (let suffix = 1; registry.exists(candidate) || candidate === outputId; suffix++) {
    candidate = `${base}_${suffix}`;
  }
  return candidate;
}

export class MergeGeoLayersCommand extends AbstractCommand {
  readonly name = "MergeGeoLayers";
  readonly description = "Merge GeoLayers with the same geometry and CRS";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "GeoLayerIDs", description: "GeoLayers to merge", type: "list", required: true },
    { name: "OutputGeoLayerID", description: "ID of the merged GeoLayer", required: true },
    collisionPolicySpec("IfGeoLayerIDExists"),
  ];

  protected override checkParameters(params: ParameterValues): void {
    if (params.list("GeoLayerIDs").length < 2) {
      this.initFailure("GeoLayerIDs must list at least two GeoLayers.", "Specify two or more GeoLayerIDs.");
    }
  }

  protected override async discoverOutputs(): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "geoLayers", id: this.params.string("OutputGeoLayerID") }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const ids = this.params.list("GeoLayerIDs");
    const outputId = this.params.string("OutputGeoLayerID");
    const [firstId] = ids;
    const first = context.geoLayers.get(firstId);

    const requests: (CheckRequest | false)[] = ids.map((id): CheckRequest => ({
      kind: "idExists",
      parameter: "GeoLayerIDs",
      registry: "geoLayers",
      id,
    }));
    if (first) {
      for (const id of ids.slice(1)) {
        if (!context.geoLayers.exists(id)) continue;
        requests.push(
          { kind: "geometryKind", parameter: "GeoLayerIDs", id, allowed: [geometryKindOf(first)] },
          { kind: "matchingCrs", parameter: "GeoLayerIDs", id, otherParameter: "GeoLayerIDs", otherId: firstId },
        );
      }
    }
    requests.push({
      kind: "outputIdAvailable",
      parameter: "OutputGeoLayerID",
      registry: "geoLayers",
      id: outputId,
      policy: this.params.policy("IfGeoLayerIDExists"),
    });

    if (!this.checkAll(context, requests) || !first) {
      return;
    }

    const temporary: GeoLayer[] = [];
    try {
      for (const [index, id] of ids.entries()) {
        const layer = context.geoLayers.get(id);
        if (!layer) continue;
        const copy = copyGeoLayer(layer, unusedId(context.geoLayers, `${TEMPORARY_PREFIX}${index}`, outputId));
        context.geoLayers.register(copy.id, copy, CollisionPolicy.FAIL);
        temporary.push(copy);
      }

      await this.runEffect(`Unable to merge GeoLayers (${ids.join(", ")}).`, async () => {
        const outputs = await context.services.geometry.runAlgorithm("merge", {
          INPUTS: temporary.map((layer) => layer.features),
        });
        this.registerOutput(
          context.geoLayers,
          outputId,
          {
            id: outputId,
            name: outputId,
            description: `Merge of ${ids.join(", ")}`,
            crs: first.crs,
            features: requireLayerOutput(outputs, "OUTPUT", "merge"),
            sourcePath: "",
          },
          this.params.policy("IfGeoLayerIDExists"),
        );
      });
    } finally {
      for (const layer of temporary) {
        context.geoLayers.remove(layer.id);
      }
    }
  }
}
