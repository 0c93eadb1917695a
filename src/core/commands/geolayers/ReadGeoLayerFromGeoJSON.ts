/**
 * ReadGeoLayerFromGeoJSON(): reads a GeoJSON file into a GeoLayer.
 *
 * @module
 */

import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { formatPathTemplate } from "../../properties/PathFormatter.js";
import { AbstractCommand, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec } from "../CommandParameters.js";

export class ReadGeoLayerFromGeoJSONCommand extends AbstractCommand {
  readonly name = "ReadGeoLayerFromGeoJSON";
  readonly description = "Read a GeoLayer from a GeoJSON file";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "InputFile", description: "GeoJSON file to read", required: true },
    { name: "GeoLayerID", description: "ID of the new GeoLayer (formatter codes allowed)", defaultValue: "%f" },
    { name: "Name", description: "GeoLayer name (default: GeoLayerID)" },
    { name: "Description", description: "GeoLayer description", defaultValue: "" },
    collisionPolicySpec("IfGeoLayerIDExists"),
  ];

  protected override async discoverOutputs(context: WorkflowContext): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "geoLayers", id: this.geoLayerId(context) }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const inputFile = resolvePath(context, this.params.string("InputFile"));
    const id = this.geoLayerId(context);

    const ready = this.checkAll(context, [
      { kind: "fileExists", parameter: "InputFile", path: inputFile },
      {
        kind: "outputIdAvailable",
        parameter: "GeoLayerID",
        registry: "geoLayers",
        id,
        policy: this.params.policy("IfGeoLayerIDExists"),
      },
    ]);
    if (!ready) {
      return;
    }

    await this.runEffect(`Unable to read GeoLayer from GeoJSON file (${inputFile}).`, async () => {
      const handle = await context.services.codec.readLayer(inputFile);
      this.registerOutput(
        context.geoLayers,
        id,
        {
          id,
          name: this.params.optionalString("Name") ?? id,
          description: this.params.optionalString("Description") ?? "",
          crs: handle.crs,
          features: handle.features,
          sourcePath: inputFile,
        },
        this.params.policy("IfGeoLayerIDExists"),
      );
    });
  }

  private geoLayerId(context: WorkflowContext): string {
    const inputFile = resolvePath(context, this.params.string("InputFile"));
    return formatPathTemplate(this.params.string("GeoLayerID"), inputFile);
  }
}
