import * as XLSX from "xlsx";
import { BaseSink } from "./baseSink";

export class CsvSink extends BaseSink {
  readonly extension = "csv";

  protected render(workbook: XLSX.WorkBook): string {
    const sheet = workbook.Sheets[this.sheetName];
    if (sheet === undefined) {
      throw new Error(`Worksheet not found: ${this.sheetName}`);
    }
    return `${XLSX.utils.sheet_to_csv(sheet, { blankrows: true })}\n`;
  }
}
