const WEEKDAYS = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
] as const;

const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export const ISO_8601 = "iso-8601";

const pad = (value: number, width = 2, fill = "0") =>
  String(value).padStart(width, fill);

const dayOfYear = (date: Date): number => {
  const start = Date.UTC(date.getUTCFullYear(), 0, 1);
  const today = Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
  );
  return (today - start) / 86_400_000 + 1;
};

const hour12 = (date: Date): number => date.getUTCHours() % 12 || 12;

/**
 * All directives read the UTC calendar of the date.
 */
const DIRECTIVES: Readonly<Record<string, (date: Date) => string>> = {
  Y: (d) => pad(d.getUTCFullYear(), 4),
  y: (d) => pad(d.getUTCFullYear() % 100),
  m: (d) => pad(d.getUTCMonth() + 1),
  d: (d) => pad(d.getUTCDate()),
  e: (d) => pad(d.getUTCDate(), 2, " "),
  H: (d) => pad(d.getUTCHours()),
  I: (d) => pad(hour12(d)),
  M: (d) => pad(d.getUTCMinutes()),
  S: (d) => pad(d.getUTCSeconds()),
  f: (d) => pad(d.getUTCMilliseconds() * 1000, 6),
  L: (d) => pad(d.getUTCMilliseconds(), 3),
  p: (d) => (d.getUTCHours() < 12 ? "AM" : "PM"),
  j: (d) => pad(dayOfYear(d), 3),
  a: (d) => WEEKDAYS[d.getUTCDay()].slice(0, 3),
  A: (d) => WEEKDAYS[d.getUTCDay()],
  b: (d) => MONTHS[d.getUTCMonth()].slice(0, 3),
  B: (d) => MONTHS[d.getUTCMonth()],
  z: () => "+0000",
  Z: () => "UTC",
  "%": () => "%",
};

export type FormatResult =
  | { ok: true; value: string }
  | { ok: false; reason: string };

export function strftime(date: Date, pattern: string): FormatResult {
  let out = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char !== "%") {
      out += char;
      continue;
    }
    const directive = pattern[i + 1];
    const render =
      directive === undefined ? undefined : DIRECTIVES[directive];
    if (!render) {
      return {
        ok: false,
        reason: `unsupported format directive "%${directive ?? ""}" in "${pattern}"`,
      };
    }
    out += render(date);
    i++;
  }
  return { ok: true, value: out };
}

export function formatIsoDate(date: Date): string {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/**
 * `YYYY-MM-DDTHH:MM:SS[.mmm]Z`; milliseconds only when non-zero.
 */
export function formatIsoDateTime(date: Date): string {
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  const ms = date.getUTCMilliseconds();
  const fraction = ms === 0 ? "" : `.${pad(ms, 3)}`;
  return `${formatIsoDate(date)}T${time}${fraction}Z`;
}

export const isIsoFormat = (format: string): boolean =>
  format.toLowerCase() === ISO_8601;
