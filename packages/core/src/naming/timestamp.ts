/**
 * Session timestamps.
 * Formats dates with the strftime subset used in recording configs.
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * Render `date` in local time using %Y %m %d %H %M %S and %%.
 * Unknown directives and all other characters are copied as-is.
 *
 * @example formatTimestamp("%Y-%m-%d_%H-%M-%S", date) // "2025-08-14_15-30-45"
 */
export function formatTimestamp(format: string, date: Date = new Date()): string {
  return format.replace(/%(.)/g, (directive, code: string) => {
    switch (code) {
      case "Y":
        return pad(date.getFullYear(), 4);
      case "m":
        return pad(date.getMonth() + 1);
      case "d":
        return pad(date.getDate());
      case "H":
        return pad(date.getHours());
      case "M":
        return pad(date.getMinutes());
      case "S":
        return pad(date.getSeconds());
      case "%":
        return "%";
      default:
        return directive;
    }
  });
}

/**
 * Whether a value can be used as one directory name.
 * Rejects empty strings, "." and "..", separators and NUL.
 */
export function isSafePathSegment(value: string): boolean {
  if (value.length === 0 || value === "." || value === "..") {
    return false;
  }
  return !/[/\\\0]/.test(value);
}
