import { XMLParser, XMLValidator } from "fast-xml-parser";
import { XmlParseError } from "./errors";

export const UPC_TAG = "upc";

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  /** Text preceding the first child element, untrimmed. */
  text: string;
}

export function localName(tagName: string): string {
  const separator = tagName.indexOf(":");
  return separator >= 0 ? tagName.slice(separator + 1) : tagName;
}

const CDATA_KEY = "#cdata";

const PREDEFINED_ENTITIES: ReadonlyMap<string, string> = new Map([
  ["lt", "<"],
  ["gt", ">"],
  ["amp", "&"],
  ["apos", "'"],
  ["quot", '"'],
]);

// An ampersand must open a character or entity reference.
const REFERENCE = /&(?:(#x[0-9a-fA-F]+|#[0-9]+|[A-Za-z_:][\w.:-]*);)?/g;
const DECLARED_ENTITY = /<!ENTITY\s+([A-Za-z_:][\w.:-]*)\s+(?:"([^"]*)"|'([^']*)')\s*>/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isXmlChar(code: number): boolean {
  return (
    code === 0x9 ||
    code === 0xa ||
    code === 0xd ||
    (code >= 0x20 && code <= 0xd7ff) ||
    (code >= 0xe000 && code <= 0xfffd) ||
    (code >= 0x10000 && code <= 0x10ffff)
  );
}

/**
 * Entity handling for one document: the predefined entities, character
 * references and the general entities declared in the internal DTD subset.
 */
class EntityDecoder {
  private readonly entities: Map<string, string>;

  constructor(source: string) {
    this.entities = new Map(PREDEFINED_ENTITIES);
    const doctypeStart = source.indexOf("<!DOCTYPE");
    if (doctypeStart < 0) {
      return;
    }
    const subsetEnd = source.indexOf("]>", doctypeStart);
    const doctype = source.slice(doctypeStart, subsetEnd < 0 ? undefined : subsetEnd);
    for (const match of doctype.matchAll(DECLARED_ENTITY)) {
      if (!this.entities.has(match[1])) {
        this.entities.set(match[1], this.decode(match[2] ?? match[3] ?? ""));
      }
    }
  }

  decode(raw: string): string {
    return raw.replace(REFERENCE, (_match, reference: string | undefined) => {
      if (reference === undefined) {
        throw new XmlParseError("not well-formed (invalid token): '&' does not start a reference");
      }
      if (reference.startsWith("#")) {
        const code = reference.startsWith("#x")
          ? Number.parseInt(reference.slice(2), 16)
          : Number.parseInt(reference.slice(1), 10);
        if (!isXmlChar(code)) {
          throw new XmlParseError(`reference to invalid character number: &${reference};`);
        }
        return String.fromCodePoint(code);
      }
      const value = this.entities.get(reference);
      if (value === undefined) {
        throw new XmlParseError(`undefined entity: &${reference};`);
      }
      return value;
    });
  }

  text(value: unknown): string {
    return this.decode(toText(value).replace(/\r\n?/g, "\n"));
  }

  /** Literal whitespace in attribute values becomes a space; references keep theirs. */
  attribute(value: unknown): string {
    return this.decode(toText(value).replace(/\r\n?/g, "\n").replace(/[\t\n]/g, " "));
  }
}

function toText(value: unknown): string {
  return typeof value === "string" ? value : String(value ?? "");
}

function readAttributes(value: unknown, decoder: EntityDecoder): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [name, raw] of Object.entries(value)) {
    attributes[localName(name)] = decoder.attribute(raw);
  }
  return attributes;
}

function cdataText(part: Record<string, unknown>): string {
  const sections = part[CDATA_KEY];
  if (!Array.isArray(sections)) {
    return "";
  }
  return sections
    .map((section) => (isRecord(section) ? toText(section[TEXT_KEY]) : ""))
    .join("")
    .replace(/\r\n?/g, "\n");
}

function toElements(nodes: unknown, decoder: EntityDecoder): XmlElement[] {
  if (!Array.isArray(nodes)) {
    return [];
  }

  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    const name = Object.keys(node).find((key) => key !== ATTRIBUTES_KEY && key !== TEXT_KEY && key !== CDATA_KEY);
    if (name === undefined) {
      continue;
    }
    elements.push(toElement(name, node, decoder));
  }
  return elements;
}

function toElement(name: string, node: Record<string, unknown>, decoder: EntityDecoder): XmlElement {
  const content = node[name];
  let text = "";
  let leading = true;
  if (Array.isArray(content)) {
    for (const part of content) {
      if (!isRecord(part)) {
        continue;
      }
      // Every text node is decoded so a bad reference anywhere fails the document.
      if (TEXT_KEY in part) {
        const decoded = decoder.text(part[TEXT_KEY]);
        text += leading ? decoded : "";
      } else if (CDATA_KEY in part) {
        text += leading ? cdataText(part) : "";
      } else {
        leading = false;
      }
    }
  }

  return {
    name,
    attributes: readAttributes(node[ATTRIBUTES_KEY], decoder),
    children: toElements(content, decoder),
    text,
  };
}

// Entities are resolved by EntityDecoder so that undefined ones are rejected.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: false,
  cdataPropName: CDATA_KEY,
});

/**
 * Parses a whole document into an element tree and returns its root.
 * Throws {@link XmlParseError} when the document is not well-formed.
 */
export function parseXmlDocument(xml: string): XmlElement {
  const source = xml.charCodeAt(0) === 0xfeff ? xml.slice(1) : xml;
  const validation = guardParserFailure(() => XMLValidator.validate(source));
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlParseError(`${msg} (line ${line}, column ${col})`);
  }

  const tree = guardParserFailure(() => parser.parse(source));
  const [root] = toElements(tree, new EntityDecoder(source));
  if (root === undefined) {
    throw new XmlParseError("no element found");
  }
  return root;
}

// Allocation failures stay RangeErrors; anything else the parser throws is a malformed document.
function guardParserFailure<T>(run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof RangeError || !(error instanceof Error)) {
      throw error;
    }
    throw new XmlParseError(error.message);
  }
}

/** Descendants of `element` named `name`, in document order; `element` itself is not included. */
export function findDescendants(element: XmlElement, name: string): XmlElement[] {
  const found: XmlElement[] = [];
  const visit = (node: XmlElement): void => {
    for (const child of node.children) {
      if (child.name === name) {
        found.push(child);
      }
      visit(child);
    }
  };
  visit(element);
  return found;
}

export function findChildren(element: XmlElement, name: string): XmlElement[] {
  return element.children.filter((child) => child.name === name);
}

/** Text of the first direct child named `name`, or `""` when there is none. */
export function childText(element: XmlElement, name: string): string {
  return element.children.find((child) => child.name === name)?.text ?? "";
}

export function attribute(element: XmlElement, name: string): string {
  return element.attributes[name] ?? "";
}
