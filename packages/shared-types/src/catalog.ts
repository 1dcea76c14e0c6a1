/**
 * Ordered XML node as produced by the catalog parser.
 *
 * One key holds the element's children (the tag name) and the optional `:@`
 * key holds its attributes. Matching code never looks inside it; it is written
 * back to the curated catalog unchanged.
 */
export type XmlPayload = Record<string, unknown>;

export interface CatalogEntry {
  displayName: string;
  /** Position of the entry in the input catalog */
  index: number;
  payload: XmlPayload;
}

export interface CatalogHeader {
  name: string | null;
  description: string | null;
  /** Original header elements copied into the curated header as-is */
  carried: XmlPayload[];
}

export interface CatalogDocument {
  header: CatalogHeader | null;
  entries: CatalogEntry[];
}

export interface HeaderInfo {
  label: string;
  version: string;
  date: string;
  author: string;
  homepage?: string;
}
