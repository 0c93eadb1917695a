/**
 * OpenDataStore() / CloseDataStore(): register and release a folder that
 * later commands refer to by ID.
 *
 * @module
 */

import { FailResponse } from "../../checks/CheckDispatcher.js";
import { resolvePath, type WorkflowContext } from "../../context/WorkflowContext.js";
import { AbstractCommand, type DiscoveredOutput } from "../AbstractCommand.js";
import { collisionPolicySpec, type ParameterSpec } from "../CommandParameters.js";

export class OpenDataStoreCommand extends AbstractCommand {
  readonly name = "OpenDataStore";
  readonly description = "Open a folder data store";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "DataStoreID", description: "ID of the data store", required: true },
    { name: "Folder", description: "Folder holding the data", required: true },
    { name: "Name", description: "Data store name (default: DataStoreID)" },
    { name: "Description", description: "Data store description", defaultValue: "" },
    collisionPolicySpec("IfDataStoreIDExists"),
  ];

  protected override async discoverOutputs(): Promise<readonly DiscoveredOutput[]> {
    return [{ registry: "dataStores", id: this.params.string("DataStoreID") }];
  }

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("DataStoreID");
    const folder = resolvePath(context, this.params.string("Folder"));

    const ready = this.checkAll(context, [
      { kind: "folderExists", parameter: "Folder", path: folder },
      {
        kind: "outputIdAvailable",
        parameter: "DataStoreID",
        registry: "dataStores",
        id,
        policy: this.params.policy("IfDataStoreIDExists"),
      },
    ]);
    if (!ready) {
      return;
    }

    this.registerOutput(
      context.dataStores,
      id,
      {
        id,
        name: this.params.optionalString("Name") ?? id,
        location: folder,
        description: this.params.optionalString("Description") ?? "",
      },
      this.params.policy("IfDataStoreIDExists"),
    );
  }
}

export class CloseDataStoreCommand extends AbstractCommand {
  readonly name = "CloseDataStore";
  readonly description = "Close a data store";
  readonly parameterSpecs: readonly ParameterSpec[] = [
    { name: "DataStoreID", description: "Data store to close", required: true },
  ];

  protected async execute(context: WorkflowContext): Promise<void> {
    const id = this.params.string("DataStoreID");
    this.checkAll(context, [
      {
        check: { kind: "idExists", parameter: "DataStoreID", registry: "dataStores", id },
        response: FailResponse.WARN,
      },
    ]);
    context.dataStores.remove(id);
  }
}
