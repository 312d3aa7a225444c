import { OutputTable } from "../types";

export interface TableSink {
  readonly extension: string;
  /** Writes `table` as `<outputDir>/<baseName>.<extension>` and returns that path. */
  write(baseName: string, table: OutputTable): Promise<string>;
}
