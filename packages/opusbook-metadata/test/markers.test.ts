import { describe, expect, it } from "vitest";

import { EMPTY_MEDIA_MARKERS, MarkerDocumentError, parseMediaMarkers } from "../src/markers.js";
import { createTestLogger, markersXml } from "./helpers.js";

describe("parseMediaMarkers", () => {
  it("reads markers in document order", () => {
    const xml = markersXml([
      { name: "Opening Credits", time: "0:00.000" },
      { name: "Chapter 1", time: "0:15.250" },
      { name: "Chapter 2", time: "1:02:03.500" },
    ]);

    expect(parseMediaMarkers(xml, createTestLogger())).toEqual([
      { name: "Opening Credits", time: 0 },
      { name: "Chapter 1", time: 15.25 },
      { name: "Chapter 2", time: 3723.5 },
    ]);
  });

  it("keeps leading whitespace and decodes entities in names", () => {
    const xml = markersXml([{ name: "   Smith &amp; Sons", time: "2:00.000" }]);
    expect(parseMediaMarkers(xml, createTestLogger())).toEqual([{ name: "   Smith & Sons", time: 120 }]);
  });

  it("accepts indented documents", () => {
    const xml = [
      '<?xml version="1.0" ?>',
      "<Markers>",
      "  <Marker>",
      "    <Name>Chapter 1</Name>",
      "    <Time>0:30.000</Time>",
      "  </Marker>",
      "</Markers>",
    ].join("\n");

    expect(parseMediaMarkers(xml, createTestLogger())).toEqual([{ name: "Chapter 1", time: 30 }]);
  });

  it("fills in a missing name or time", () => {
    const xml = '<Markers><Marker><Time>0:10.000</Time></Marker><Marker><Name>Untimed</Name></Marker></Markers>';
    expect(parseMediaMarkers(xml, createTestLogger())).toEqual([
      { name: "Unknown name", time: 10 },
      { name: "Untimed", time: 0 },
    ]);
  });

  it("treats empty Name and Time elements as missing", () => {
    const xml =
      "<Markers>" +
      "<Marker><Name></Name><Time>0:10.000</Time></Marker>" +
      "<Marker><Name>B</Name><Time/></Marker>" +
      "<Marker><Name/><Time></Time></Marker>" +
      "</Markers>";

    expect(parseMediaMarkers(xml, createTestLogger())).toEqual([
      { name: "Unknown name", time: 10 },
      { name: "B", time: 0 },
      { name: "Unknown name", time: 0 },
    ]);
  });

  it("returns nothing for the empty document", () => {
    expect(parseMediaMarkers(EMPTY_MEDIA_MARKERS, createTestLogger())).toEqual([]);
  });

  it("skips markers with unreadable times", () => {
    const logger = createTestLogger();
    const xml = markersXml([
      { name: "Broken", time: "soon" },
      { name: "Chapter 1", time: "0:05.000" },
    ]);

    expect(parseMediaMarkers(xml, logger)).toEqual([{ name: "Chapter 1", time: 5 }]);
    expect(logger.warn).toHaveBeenCalledWith('Skipping marker "Broken" with invalid time "soon"');
  });

  it("ignores unexpected elements", () => {
    const logger = createTestLogger();
    const xml = "<Markers><Note>hello</Note><Marker><Name>A</Name><Time>0:01.000</Time></Marker></Markers>";

    expect(parseMediaMarkers(xml, logger)).toEqual([{ name: "A", time: 1 }]);
    expect(logger.warn).toHaveBeenCalledWith("Ignoring unexpected <Note> element in media markers");
  });

  it("rejects malformed documents", () => {
    expect(() => parseMediaMarkers("<Markers><Marker>", createTestLogger())).toThrow(MarkerDocumentError);
  });
});
