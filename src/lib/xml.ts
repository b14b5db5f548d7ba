import { XMLParser } from "fast-xml-parser";
import { ParseError, errorMessage } from "./errors.js";

export type XmlNode = { [key: string]: unknown };

// Tag values stay strings: tickers such as "0001" and numeric fields are
// interpreted by the callers.
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: true,
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function asNode(value: unknown): XmlNode | null {
  return isNode(value) ? value : null;
}

/** Validating parse; anything that is not well-formed raises `ParseError`. */
export function parseXml(xml: string): XmlNode {
  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    throw new ParseError(`Malformed XML: ${errorMessage(error)}`);
  }
  return asNode(parsed) ?? {};
}

export function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === "") return [];
  return Array.isArray(value) ? value : [value];
}

/** Walks nested element names, taking the first element at each step. */
export function child(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    const first = Array.isArray(current) ? current[0] : current;
    const node = asNode(first);
    if (!node) return undefined;
    current = node[key];
  }
  return current;
}

export function textValue(value: unknown): string | null {
  const first = Array.isArray(value) ? value[0] : value;
  if (typeof first === "string") return first.trim();
  const node = asNode(first);
  if (node) {
    const text = node["#text"];
    if (typeof text === "string") return text.trim();
  }
  return null;
}

export function pickLink(value: unknown): string | null {
  if (!value) return null;
  if (typeof value === "string") return value.trim() || null;
  if (Array.isArray(value)) {
    for (const entry of value) {
      const link = pickLink(entry);
      if (link) return link;
    }
    return null;
  }
  const node = asNode(value);
  if (node) {
    const href = node["@_href"];
    if (typeof href === "string" && href.trim()) return href.trim();
    const text = node["#text"];
    if (typeof text === "string" && text.trim()) return text.trim();
  }
  return null;
}
