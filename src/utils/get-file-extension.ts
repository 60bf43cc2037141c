/**
 * Pick a file extension for downloaded image bytes
 * Content-Type wins, then the URL path suffix, then ".jpg"
 */

const CONTENT_TYPE_EXTENSIONS: Record<string, string> = {
  "image/jpeg": ".jpg",
  "image/jpg": ".jpg",
  "image/png": ".png",
  "image/gif": ".gif",
  "image/webp": ".webp",
  "image/bmp": ".bmp",
  "image/tiff": ".tiff",
  "image/svg+xml": ".svg",
};

const URL_EXTENSIONS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".gif",
  ".webp",
  ".bmp",
  ".tiff",
  ".svg",
];

export const DEFAULT_EXTENSION = ".jpg";

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    // Not an absolute URL; strip query and fragment by hand
    return url.split(/[?#]/)[0];
  }
}

export function getFileExtension(url: string, contentType?: string): string {
  if (contentType) {
    const baseType = contentType.split(";")[0].trim().toLowerCase();
    const mapped = CONTENT_TYPE_EXTENSIONS[baseType];
    if (mapped) {
      return mapped;
    }
  }

  const path = urlPath(url).toLowerCase();
  for (const ext of URL_EXTENSIONS) {
    if (path.endsWith(ext)) {
      return ext === ".jpeg" ? ".jpg" : ext;
    }
  }

  return DEFAULT_EXTENSION;
}
