/** Formats a date as an XML `dateTime` in UTC without fractional seconds, e.g. `2024-03-01T12:00:00Z`. */
export function toXmlDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
