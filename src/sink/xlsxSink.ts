import * as XLSX from "xlsx";
import { BaseSink } from "./baseSink";

export class XlsxSink extends BaseSink {
  readonly extension = "xlsx";

  protected render(workbook: XLSX.WorkBook): Buffer {
    const data: unknown = XLSX.write(workbook, { type: "buffer", bookType: "xlsx", compression: true });
    if (!Buffer.isBuffer(data)) {
      throw new Error("xlsx writer did not return a buffer");
    }
    return data;
  }
}
