export const CANONICAL_COLUMNS = [
  "Manufacturer_Code",
  "Manufacturer_Desc",
  "Product_Code",
  "Product_Desc",
  "Product_Mode",
  "Trial_or_Revenue",
  "Modality",
  "Product_Type",
  "Quantity",
  "Quantity_Unit",
  "UPC_ID",
  "Power",
  "Base_Curve",
  "Diameter",
  "Color",
  "Color2",
  "Cylinder",
  "Axis",
  "Design",
  "Add",
] as const;

export type CatalogColumn = (typeof CANONICAL_COLUMNS)[number];

export interface ManufacturerFields {
  code: string;
  description: string;
}

export interface ProductFields {
  code: string;
  description: string;
  mode: string;
  quantity: string;
  quantityUnit: string;
  /** Newer schema only. */
  trialOrRevenue: string;
  /** Newer schema only. */
  modality: string;
  /** Newer schema only. */
  productType: string;
}

export interface UpcFields {
  id: string;
  power: string;
  baseCurve: string;
  diameter: string;
  color: string;
  color2: string;
  cylinder: string;
  axis: string;
  design: string;
  add: string;
}

/** One manufacturer × product × `<upc>` combination. */
export type FlatRow = Readonly<Record<CatalogColumn, string>>;

export interface OutputTable {
  columns: CatalogColumn[];
  rows: FlatRow[];
}

export type RejectionKind = "preflight" | "parse" | "resource" | "row_limit" | "unexpected";

interface DocumentResultBase {
  fileName: string;
  filePath: string;
  /** `null` when the streaming estimate could not be computed. */
  estimatedUpcCount: number | null;
}

export interface ConvertedDocument extends DocumentResultBase {
  status: "converted";
  table: OutputTable;
}

export interface EmptyDocument extends DocumentResultBase {
  status: "empty";
}

export interface RejectedDocument extends DocumentResultBase {
  status: "rejected";
  kind: RejectionKind;
  reason: string;
}

export type CatalogDocumentResult = ConvertedDocument | EmptyDocument | RejectedDocument;
