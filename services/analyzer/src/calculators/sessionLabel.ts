import path from "node:path";

const MERIDIEM = /^(am|pm)$/i;

/**
 * Turn a session file name into a display label.
 *
 * `saturday__05_46_pm.csv` -> `Saturday 05:46 PM`. Names without exactly one
 * `__` separator come back as the base name.
 */
export function parseSessionLabel(sessionFile: string): string {
  const name = path.parse(sessionFile).name;
  const parts = name.split("__");

  if (parts.length !== 2) {
    return name;
  }

  const [dayPart, timePart] = parts;
  const day = dayPart.charAt(0).toUpperCase() + dayPart.slice(1);

  const segments = timePart.split("_");
  const last = segments[segments.length - 1];
  const time =
    segments.length > 1 && MERIDIEM.test(last)
      ? `${segments.slice(0, -1).join(":")} ${last}`
      : segments.join(":");

  return `${day} ${time.toUpperCase()}`;
}
