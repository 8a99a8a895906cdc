/** Number / duration formatting shared by logs, notifications and displays. */

/**
 * Truncate (never round) to `places` fractional digits, without exponent notation.
 * Trailing zeros are dropped: 12.5 -> "12.5", 3 -> "3".
 */
export function truncateDecimals(value: number, places = 4): string {
  if (!Number.isFinite(value)) return "0";
  const negative = value < 0;
  const [intPart, fracPart = ""] = Math.abs(value).toFixed(Math.min(places + 3, 20)).split(".");
  const frac = fracPart.slice(0, places).replace(/0+$/, "");
  const body = frac ? `${intPart}.${frac}` : intPart;
  return negative && body !== "0" ? `-${body}` : body;
}

/** Amount argument for `stake --amt`: 9 fractional digits, the token's precision. */
export function formatAmount(value: number): string {
  return truncateDecimals(value, 9);
}

/** 4530 -> "1h 15m 30s"; zero hours/minutes are skipped, seconds always shown. */
export function formatHms(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = seconds % 60;
  const parts: string[] = [];
  if (h > 0) parts.push(`${h}h`);
  if (m > 0) parts.push(`${m}m`);
  parts.push(`${s}s`);
  return parts.join(" ");
}

/** Fiat value of an amount, or "?" while the price is unknown. */
export function fiat(amount: number, price: number | null, places = 2): string {
  if (price === null) return "?";
  return truncateDecimals(amount * price, places);
}

export function localTimestamp(d: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}
