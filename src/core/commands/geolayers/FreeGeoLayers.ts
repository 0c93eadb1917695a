/**
 * FreeGeoLayers(): removes GeoLayers from the workflow.
 *
 * @module
 */

import { FailResponse } from "../../checks/CheckDispatcher.js";
import type { WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand, type CheckRequest } from "../AbstractCommand.js";
import type { ParameterSpec } from "../CommandParameters.js";

export class FreeGeoLayersCommand extends AbstractCommand {
  readonly name = "FreeGeoLayers";
  readonly description = "Remove GeoLayers";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "GeoLayerIDs", description: "GeoLayers to remove, or * for all", type: "list", required: true },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const requested = this.params.list("GeoLayerIDs");
    const ids = requested.includes("*") ? context.geoLayers.ids() : requested;

    // Missing IDs are reported but do not stop the others from being freed
    this.checkAll(
      context,
      ids.map((id): CheckRequest => ({
        check: { kind: "idExists", parameter: "GeoLayerIDs", registry: "geoLayers", id },
        response: FailResponse.WARN,
      })),
    );

    for (const id of ids) {
      context.geoLayers.remove(id);
    }
  }
}
