const SIZE_UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

const pad = (value: number) => String(value).padStart(2, '0');

/** One decimal, with exact binary ties (x.x5) rounded to even like printf-style formatting. */
const toTenths = (value: number): string => {
  const scaled = value * 10;
  if (!Number.isInteger(scaled) && Number.isInteger(scaled * 2)) {
    const lower = Math.floor(scaled);
    return ((lower % 2 === 0 ? lower : lower + 1) / 10).toFixed(1);
  }
  return value.toFixed(1);
};

export const humanReadableSize = (sizeBytes: number): string => {
  if (sizeBytes < 1024) {
    return `${sizeBytes} B`;
  }

  let value = sizeBytes;
  for (const unit of SIZE_UNITS) {
    value /= 1024;
    if (value < 1024) {
      return `${toTenths(value)} ${unit}`;
    }
  }

  return `${toTenths(value / 1024)} PB`;
};

/** Local time for a UNIX timestamp in seconds, minute precision. */
export const humanReadableTime = (timestamp: number): string => {
  const date = new Date(timestamp * 1000);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(
    date.getHours(),
  )}:${pad(date.getMinutes())}`;
};
