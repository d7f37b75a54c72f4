import { XMLParser, XMLValidator } from "fast-xml-parser";
import { createLogger, tryParseTimestamp, type OpusbookLogger } from "@opusbook/common";

import type { ChapterMarker } from "./types.js";

export const MEDIA_MARKERS_TAG = "OverDrive MediaMarkers";
export const EMPTY_MEDIA_MARKERS = '<?xml version="1.0" ?>\n<metadata/>';
export const UNKNOWN_MARKER_NAME = "Unknown name";

const defaultLogger = createLogger("markers");

export class MarkerDocumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MarkerDocumentError";
  }
}

const parser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  // Leading whitespace in a marker name marks a subchapter.
  trimValues: false,
  isArray: (_name, jpath) => typeof jpath === "string" && jpath.split(".").length === 2,
});

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isTextKey(key: string): boolean {
  return key === "#text";
}

/**
 * Text content of a child element. `undefined` when absent or empty, `null`
 * when the element is not plain text.
 */
function readText(node: XmlNode, key: string): string | null | undefined {
  const value = node[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  return null;
}

function readMarker(value: unknown, logger: OpusbookLogger): ChapterMarker | undefined {
  // <Marker/> parses to an empty string
  const node: XmlNode = isXmlNode(value) ? value : {};

  const name = readText(node, "Name");
  const timeText = readText(node, "Time");
  if (name === null || timeText === null) {
    logger.warn("Skipping marker with nested Name/Time content", value);
    return undefined;
  }

  let time = 0;
  if (timeText !== undefined) {
    const parsed = tryParseTimestamp(timeText);
    if (parsed === undefined || parsed < 0) {
      logger.warn(`Skipping marker ${JSON.stringify(name)} with invalid time ${JSON.stringify(timeText)}`);
      return undefined;
    }
    time = parsed;
  }

  return { name: name ?? UNKNOWN_MARKER_NAME, time };
}

/**
 * Parses the `<metadata><Marker><Name/><Time/></Marker>...</metadata>` payload
 * into chapter markers in document order. Throws MarkerDocumentError when the
 * payload is not well-formed XML; individual bad markers are logged and skipped.
 */
export function parseMediaMarkers(xml: string, logger: OpusbookLogger = defaultLogger): ChapterMarker[] {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new MarkerDocumentError(`Malformed media markers (line ${line}): ${msg}`);
  }

  const document: unknown = parser.parse(xml);
  if (!isXmlNode(document)) {
    return [];
  }

  const rootKey = Object.keys(document).find((key) => !isTextKey(key));
  if (rootKey === undefined) {
    return [];
  }
  const root = document[rootKey];
  if (!isXmlNode(root)) {
    return [];
  }

  const markers: ChapterMarker[] = [];
  for (const [key, children] of Object.entries(root)) {
    if (isTextKey(key)) {
      continue;
    }
    if (key !== "Marker") {
      logger.warn(`Ignoring unexpected <${key}> element in media markers`);
      continue;
    }
    const entries: unknown[] = Array.isArray(children) ? children : [children];
    for (const entry of entries) {
      const marker = readMarker(entry, logger);
      if (marker) {
        markers.push(marker);
      }
    }
  }

  logger.debug(`Parsed ${markers.length} media markers`);
  return markers;
}
