const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function pad2(n: number) {
  return String(n).padStart(2, "0");
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function toIso(year: number, month: number, day: number): string | null {
  if (!Number.isInteger(year) || year < 1000 || year > 9999) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

export function monthNumber(name: string): number | null {
  return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

/**
 * Reduce a date string to `YYYY-MM-DD`. Numeric day/month orders are read
 * as ISO (Y-M-D), dotted European (D.M.Y) and slashed US (M/D/Y).
 */
export function toIsoDate(input: string | null | undefined): string | null {
  if (!input) return null;
  const s = input.trim();

  const iso = s.match(/^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:$|[T\s])/);
  if (iso) return toIso(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  const dot = s.match(/^(\d{1,2})\.(\d{1,2})\.(\d{4})$/);
  if (dot) return toIso(Number(dot[3]), Number(dot[2]), Number(dot[1]));

  const us = s.match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (us) return toIso(Number(us[3]), Number(us[1]), Number(us[2]));

  const monthFirst = s.match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/);
  if (monthFirst) {
    const m = monthNumber(monthFirst[1]);
    return m ? toIso(Number(monthFirst[3]), m, Number(monthFirst[2])) : null;
  }

  const dayFirst = s.match(/^(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]{3,9})\.?,?\s+(\d{4})$/);
  if (dayFirst) {
    const m = monthNumber(dayFirst[2]);
    return m ? toIso(Number(dayFirst[3]), m, Number(dayFirst[1])) : null;
  }

  return null;
}

export function monthRange(year: number, month: number): { dateFrom: string; dateTo: string } {
  return {
    dateFrom: `${year}-${pad2(month)}-01`,
    dateTo: `${year}-${pad2(month)}-${pad2(daysInMonth(year, month))}`,
  };
}
