import { XMLParser, XMLValidator } from "fast-xml-parser";
import { DocumentError } from "../errors";

export type XmlNode = Record<string, unknown>;

export const ATTR = "@_";

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/** Renders `NAME="value"` pairs, skipping undefined values. */
export function attrs(values: Record<string, string | number | undefined>): string {
  return Object.entries(values)
    .filter((entry): entry is [string, string | number] => entry[1] !== undefined)
    .map(([name, value]) => `${name}="${escapeXml(String(value))}"`)
    .join(" ");
}

/**
 * Parses a whole document. Attribute names get the `@_` prefix, values stay
 * strings, and the listed element names always come back as arrays.
 */
export function parseXmlDocument(filePath: string, xml: string, arrayElements: string[]): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new DocumentError(filePath, `${validation.err.msg} (line ${validation.err.line})`);
  }

  const repeated = new Set(arrayElements);
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    parseAttributeValue: false,
    parseTagValue: false,
    htmlEntities: true,
    trimValues: true,
    isArray: (name, _jPath, _isLeaf, isAttribute) => !isAttribute && repeated.has(name),
  });
  const parsed: unknown = parser.parse(xml);
  if (!isNode(parsed)) {
    throw new DocumentError(filePath, "document is empty");
  }
  return parsed;
}

export function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Child element as a node. Empty elements (`<SETS/>`) parse as "" and come back as {}. */
export function child(node: XmlNode, name: string): XmlNode | undefined {
  const value = node[name];
  if (isNode(value)) return value;
  if (value === "") return {};
  return undefined;
}

export function children(node: XmlNode, name: string): XmlNode[] {
  const value = node[name];
  if (!Array.isArray(value)) return [];
  return value.map((item: unknown) => (isNode(item) ? item : {}));
}

export function attr(node: XmlNode | undefined, name: string): string | undefined {
  if (!node) return undefined;
  const value = node[ATTR + name];
  return typeof value === "string" ? value : undefined;
}

/** Text content of a child element, whether or not it also carries attributes. */
export function childText(node: XmlNode, name: string): string | undefined {
  const value = node[name];
  if (typeof value === "string") return value;
  if (isNode(value)) {
    const text = value["#text"];
    return typeof text === "string" ? text : "";
  }
  return undefined;
}

export function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
