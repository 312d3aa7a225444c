import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { OutputTable } from "../types";
import { TableSink } from "./types";

export abstract class BaseSink implements TableSink {
  abstract readonly extension: string;
  protected readonly outputDir: string;
  protected readonly sheetName: string;

  constructor(outputDir: string, sheetName: string) {
    this.outputDir = path.resolve(outputDir);
    this.sheetName = sheetName;
  }

  async write(baseName: string, table: OutputTable): Promise<string> {
    const location = path.join(this.outputDir, `${baseName}.${this.extension}`);
    await fs.promises.mkdir(this.outputDir, { recursive: true });
    await fs.promises.writeFile(location, this.render(this.toWorkbook(table)));
    return location;
  }

  protected abstract render(workbook: XLSX.WorkBook): Buffer | string;

  protected toWorkbook(table: OutputTable): XLSX.WorkBook {
    const matrix: string[][] = [table.columns, ...table.rows.map((row) => table.columns.map((column) => row[column]))];
    const sheet = XLSX.utils.aoa_to_sheet(matrix);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, this.sheetName);
    return workbook;
  }
}
