/**
 * In-memory table read from a delimited file.
 */
export interface Table {
  readonly id: string;
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, string>>[];
  readonly sourcePath: string;
}
