import {
  CANONICAL_COLUMNS,
  CatalogColumn,
  FlatRow,
  ManufacturerFields,
  OutputTable,
  ProductFields,
  UpcFields,
} from "../types";
import { attribute, childText, findChildren, findDescendants, UPC_TAG, XmlElement } from "./xmlTree";

export function readManufacturer(element: XmlElement): ManufacturerFields {
  return {
    code: childText(element, "mCode"),
    description: childText(element, "mDesc"),
  };
}

export function readProduct(element: XmlElement): ProductFields {
  return {
    code: childText(element, "pCode"),
    description: childText(element, "pDesc"),
    mode: attribute(element, "mode"),
    quantity: childText(element, "qty"),
    quantityUnit: childText(element, "qtyUnit"),
    trialOrRevenue: childText(element, "pTrialOrRev"),
    modality: childText(element, "pModality"),
    productType: childText(element, "pType"),
  };
}

export function readUpc(element: XmlElement): UpcFields {
  return {
    id: attribute(element, "id"),
    power: attribute(element, "power"),
    baseCurve: attribute(element, "basecurve"),
    diameter: attribute(element, "diameter"),
    color: attribute(element, "color"),
    color2: attribute(element, "color2"),
    cylinder: attribute(element, "cylinder"),
    axis: attribute(element, "axis"),
    design: attribute(element, "design"),
    add: attribute(element, "add"),
  };
}

export function toFlatRow(manufacturer: ManufacturerFields, product: ProductFields, upc: UpcFields): FlatRow {
  return {
    Manufacturer_Code: manufacturer.code,
    Manufacturer_Desc: manufacturer.description,
    Product_Code: product.code,
    Product_Desc: product.description,
    Product_Mode: product.mode,
    Trial_or_Revenue: product.trialOrRevenue,
    Modality: product.modality,
    Product_Type: product.productType,
    Quantity: product.quantity,
    Quantity_Unit: product.quantityUnit,
    UPC_ID: upc.id,
    Power: upc.power,
    Base_Curve: upc.baseCurve,
    Diameter: upc.diameter,
    Color: upc.color,
    Color2: upc.color2,
    Cylinder: upc.cylinder,
    Axis: upc.axis,
    Design: upc.design,
    Add: upc.add,
  };
}

/**
 * One row per `<upc>`: every `manufacturer` below the root, its direct
 * `product` children, and their direct `upc` children, in document order.
 */
export function flattenCatalog(root: XmlElement): FlatRow[] {
  const rows: FlatRow[] = [];

  for (const manufacturerElement of findDescendants(root, "manufacturer")) {
    const manufacturer = readManufacturer(manufacturerElement);

    for (const productElement of findChildren(manufacturerElement, "product")) {
      const product = readProduct(productElement);

      for (const upcElement of findChildren(productElement, UPC_TAG)) {
        rows.push(toFlatRow(manufacturer, product, readUpc(upcElement)));
      }
    }
  }

  return rows;
}

export function presentColumns(rows: readonly FlatRow[]): CatalogColumn[] {
  return CANONICAL_COLUMNS.filter((column) => rows.some((row) => Object.hasOwn(row, column)));
}

export function buildOutputTable(rows: FlatRow[]): OutputTable {
  return { columns: presentColumns(rows), rows };
}
