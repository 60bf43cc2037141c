/**
 * Image Downloader
 * Fetches raw image bytes with a per-attempt timeout and exponential backoff
 */

import type { DownloadedImage, ImageTransport } from "../types";
import { withTimeout } from "./with-timeout";

export interface ImageDownloaderOptions {
  timeout: number;
  retries: number;
  fetch?: typeof fetch;
}

/**
 * Wait for ms, returning early when the signal aborts
 */
function backoff(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function createImageDownloader(
  options: ImageDownloaderOptions,
): ImageTransport {
  const fetchImpl = options.fetch ?? fetch;

  async function attempt(
    url: string,
    parent?: AbortSignal,
  ): Promise<DownloadedImage> {
    const { signal, clear } = withTimeout(options.timeout, parent);
    try {
      const response = await fetchImpl(url, { signal });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      return {
        bytes: Buffer.from(await response.arrayBuffer()),
        contentType: response.headers.get("content-type") ?? "",
      };
    } finally {
      clear();
    }
  }

  return {
    async downloadBytes(
      url: string,
      signal?: AbortSignal,
    ): Promise<DownloadedImage> {
      let lastError: unknown = null;

      for (let i = 0; i <= options.retries; i++) {
        try {
          return await attempt(url, signal);
        } catch (error) {
          lastError = error;
          if (signal?.aborted) break;
          if (i < options.retries) {
            // Exponential backoff: 1s, 2s, 4s, 8s...
            await backoff(Math.pow(2, i) * 1000, signal);
            if (signal?.aborted) break;
          }
        }
      }

      throw lastError ?? new Error(`Failed to download ${url}`);
    },
  };
}
