export type OutputFormat = "xlsx" | "csv";

export interface ConversionLimits {
  /** Reject before the full parse when the estimated `<upc>` count is above this. */
  maxLeafRecords: number;
  /** The estimator stops scanning once its count passes this value. */
  estimateEarlyExit: number;
  /** Largest row count a single worksheet can hold. */
  maxSheetRows: number;
}

export interface AppConfig extends ConversionLimits {
  inputDir: string;
  outputDir: string;
  projectRoot: string;
  skipLogFile: string;
  outputFormat: OutputFormat;
  sheetName: string;
}

export type ConfigOverrides = Partial<AppConfig>;
