/**
 * Named connection to an external data source.
 */
export interface DataStore {
  readonly id: string;
  readonly name: string;
  /** Folder, file or connection string */
  readonly location: string;
  readonly description: string;
}
