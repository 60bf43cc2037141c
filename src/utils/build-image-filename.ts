import { getFileExtension } from "./get-file-extension";
import { sanitizeFilename } from "./sanitize-filename";

/**
 * Output filename for a saved image
 *
 * @example
 * buildImageFilename("image", 7, "https://cdn.example.com/road.png", "image/png")
 * // "image_007_scraped_from_cdn.example.com-road.png.png"
 */
export function buildImageFilename(
  prefix: string,
  sequence: number,
  url: string,
  contentType?: string,
): string {
  const counter = String(sequence).padStart(3, "0");
  const extension = getFileExtension(url, contentType);
  return `${prefix}_${counter}_scraped_from_${sanitizeFilename(url)}${extension}`;
}
