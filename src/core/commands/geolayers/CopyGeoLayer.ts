/**
 * CopyGeoLayer(): registers a deep copy of a GeoLayer under a new ID.
 *
 * @module
 */

import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { copyGeoLayer } from "../../model/GeoLayer.js";
import { AbstractCommand, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec } from "../CommandParameters.js";

export class CopyGeoLayerCommand extends AbstractCommand {
  readonly name = "CopyGeoLayer";
  readonly description = "Copy a GeoLayer";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "GeoLayerID", description: "GeoLayer to copy", required: true },
    { name: "CopiedGeoLayerID", description: "ID of the copy (default: <GeoLayerID>_copy)" },
    collisionPolicySpec("IfGeoLayerIDExists"),
  ];

  protected override async discoverOutputs(): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "geoLayers", id: this.copiedId() }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("GeoLayerID");
    const copiedId = this.copiedId();

    const ready = this.checkAll(context, [
      { kind: "idExists", parameter: "GeoLayerID", registry: "geoLayers", id },
      {
        kind: "outputIdAvailable",
        parameter: "CopiedGeoLayerID",
        registry: "geoLayers",
        id: copiedId,
        policy: this.params.policy("IfGeoLayerIDExists"),
      },
    ]);
    const layer = context.geoLayers.get(id);
    if (!ready || !layer) {
      return;
    }

    this.registerOutput(
      context.geoLayers,
      copiedId,
      copyGeoLayer(layer, copiedId),
      this.params.policy("IfGeoLayerIDExists"),
    );
  }

  private copiedId(): string {
    return this.params.optionalString("CopiedGeoLayerID") ?? `${this.params.string("GeoLayerID")}_copy`;
  }
}
