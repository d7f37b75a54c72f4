/**
 * Parses a colon separated timestamp ("H:MM:SS.fff", "MM:SS", "SS.f") into seconds.
 * Each component is folded base 60 from left to right.
 */
export function parseTimestamp(text: string): number {
  let seconds = 0;
  for (const rawComponent of text.split(":")) {
    const component = rawComponent.trim();
    const value = Number(component);
    if (component === "" || !Number.isFinite(value)) {
      throw new Error(`Invalid timestamp: ${JSON.stringify(text)}`);
    }
    seconds = seconds * 60 + value;
  }
  return seconds;
}

export function tryParseTimestamp(text: string): number | undefined {
  try {
    return parseTimestamp(text);
  } catch {
    return undefined;
  }
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Formats seconds as "HH:MM:SS.fff"; precision <= 0 drops the fraction. */
export function formatTimestamp(totalSeconds: number, precision = 3): string {
  // Round before splitting so 59.9996 carries into the minutes.
  const scale = 10 ** Math.max(precision, 0);
  const rounded = precision <= 0 ? Math.trunc(totalSeconds) : Math.round(totalSeconds * scale) / scale;
  const totalMinutes = Math.floor(rounded / 60);
  const seconds = rounded - totalMinutes * 60;
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  const secondsText =
    precision <= 0
      ? pad2(Math.trunc(seconds))
      : seconds.toFixed(precision).padStart(3 + precision, "0");

  return `${pad2(hours)}:${pad2(minutes)}:${secondsText}`;
}
