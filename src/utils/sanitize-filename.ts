const DEFAULT_MAX_LENGTH = 100;

/**
 * Turn a source URL into a filesystem-safe filename component
 *
 * @example
 * sanitizeFilename("https://example.com/a b/photo.jpg?x=1")
 * // "example.com-a-b-photo.jpg-x-1"
 */
export function sanitizeFilename(
  url: string,
  maxLength: number = DEFAULT_MAX_LENGTH,
): string {
  let sanitized = url
    .replace(/^https?:\/\//, "")
    .replace(/[/:?&=%#\\\s]+/g, "-")
    .replace(/[^a-zA-Z0-9\-.]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (sanitized.length > maxLength) {
    sanitized = sanitized.slice(0, maxLength).replace(/-+$/, "");
  }

  return sanitized;
}
