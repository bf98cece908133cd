const PDF_DATE =
  /^(?:D:)?(\d{4})(\d{2})?(\d{2})?(\d{2})?(\d{2})?(\d{2})?(?:([Zz+-])(?:(\d{2})'?(?:(\d{2})'?)?)?)?$/;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function part(raw: string | undefined, fallback: number): number {
  return raw === undefined ? fallback : Number.parseInt(raw, 10);
}

/**
 * Converts a PDF date string (`D:YYYYMMDDHHmmSSOHH'mm'`, every field after
 * the year optional) to ISO-8601. The offset is kept when present. Returns
 * null for anything that is not a valid calendar date.
 *
 * @example
 * parsePdfDate("D:20230415093000+02'00'") // "2023-04-15T09:30:00+02:00"
 * parsePdfDate("D:20230415")              // "2023-04-15T00:00:00"
 */
export function parsePdfDate(raw: string): string | null {
  const match = PDF_DATE.exec(raw.trim());
  if (!match) {
    return null;
  }

  const [, y, mo, d, h, mi, s, sign, tzH, tzM] = match;
  const year = part(y, 0);
  const month = part(mo, 1);
  const day = part(d, 1);
  const hour = part(h, 0);
  const minute = part(mi, 0);
  const second = part(s, 0);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let offset = "";
  if (sign === "Z" || sign === "z") {
    offset = "Z";
  } else if (sign && tzH !== undefined) {
    const offsetHours = part(tzH, 0);
    const offsetMinutes = part(tzM, 0);
    if (offsetHours > 23 || offsetMinutes > 59) return null;
    offset = `${sign}${pad(offsetHours)}:${pad(offsetMinutes)}`;
  }

  return `${y}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}${offset}`;
}

/**
 * Accepts W3CDTF / ISO-8601 timestamps as written in OOXML core properties
 * and returns them unchanged; null when the value is not a real date.
 */
export function normalizeIsoDate(raw: string): string | null {
  const value = raw.trim();
  if (!ISO_DATE.test(value) || Number.isNaN(Date.parse(value))) {
    return null;
  }
  return value;
}
