import { AppConfig } from "../config";
import { CsvSink } from "./csvSink";
import { TableSink } from "./types";
import { XlsxSink } from "./xlsxSink";

export function createSink(config: AppConfig): TableSink {
  switch (config.outputFormat) {
    case "xlsx":
      return new XlsxSink(config.outputDir, config.sheetName);
    case "csv":
      return new CsvSink(config.outputDir, config.sheetName);
    default:
      throw new Error(`Unsupported output format: ${String(config.outputFormat)}`);
  }
}

export * from "./types";
export { CsvSink } from "./csvSink";
export { XlsxSink } from "./xlsxSink";
