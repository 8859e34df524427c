const MS_PER_DAY = 24 * 3600 * 1000;

// 1899-12-30 rather than 1900-01-01: absorbs the phantom 1900-02-29 so serials
// from 61 (1900-03-01) onwards land on the right day.
const EPOCH_1900 = Date.UTC(1899, 11, 30);
const EPOCH_1904 = Date.UTC(1904, 0, 1);
const LATEST = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

/** Largest serial that still maps to a four-digit year (9999-12-31) */
export const MAX_SERIAL = 2958465;

/**
 * Serial day count to a UTC Date. The time of day is rounded to the nearest
 * millisecond. Returns `undefined` for negative serials and for serials that
 * land after 9999-12-31T23:59:59.999Z.
 */
export function excelToDate(serial: number, date1904 = false): Date | undefined {
  if (!Number.isFinite(serial)) {
    return undefined;
  }
  const days = Math.floor(serial);
  if (days < 0 || days > MAX_SERIAL) {
    return undefined;
  }
  const timeOfDay = Math.round((serial - days) * MS_PER_DAY);
  const epoch = date1904 ? EPOCH_1904 : EPOCH_1900;
  const time = epoch + days * MS_PER_DAY + timeOfDay;
  return time > LATEST ? undefined : new Date(time);
}

/** `YYYY-MM-DDTHH:mm:ss.sssZ`, or `undefined` when the serial has no calendar date */
export function excelToIsoString(serial: number, date1904 = false): string | undefined {
  return excelToDate(serial, date1904)?.toISOString();
}
