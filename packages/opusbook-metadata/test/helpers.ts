import { vi } from "vitest";
import type { OpusbookLogger } from "@opusbook/common";

import type { ChapterMarker, TrackRecord } from "../src/types.js";

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies OpusbookLogger;
}

export function makeTrack(track: number, duration: number, chapters: ChapterMarker[] = [], extra: Partial<TrackRecord> = {}): TrackRecord {
  return {
    file: `/book/part-${track}.mp3`,
    track,
    duration,
    chapters,
    ...extra,
  };
}

export function markersXml(markers: Array<{ name: string; time: string }>): string {
  const body = markers
    .map((marker) => `<Marker><Name>${marker.name}</Name><Time>${marker.time}</Time></Marker>`)
    .join("");
  return `<?xml version="1.0" encoding="utf-8"?><Markers>${body}</Markers>`;
}
