/**
 * Custom Search Client
 * Search transport for the Google Custom Search JSON API (image search)
 */

import { z } from "zod";
import type {
  SearchItem,
  SearchPageRequest,
  SearchPageResult,
  SearchTransport,
} from "../types";
import { withTimeout } from "./with-timeout";

// 403 error reasons that mean "this key is out of quota" rather than "forbidden"
export const QUOTA_ERROR_REASONS = [
  "dailyLimitExceeded",
  "userRateLimitExceeded",
  "quotaExceeded",
];

const SearchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        link: z.string().optional(),
        title: z.string().optional(),
        image: z
          .object({
            contextLink: z.string().optional(),
          })
          .optional(),
      }),
    )
    .optional(),
});

const ErrorResponseSchema = z.object({
  error: z.object({
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

export interface CustomSearchClientOptions {
  endpoint: string;
  timeout: number;
  fetch?: typeof fetch;
}

function buildSearchUrl(endpoint: string, request: SearchPageRequest): URL {
  const url = new URL(endpoint);
  url.searchParams.set("key", request.credential.key);
  url.searchParams.set("cx", request.credential.scope);
  url.searchParams.set("q", request.query);
  url.searchParams.set("searchType", "image");
  url.searchParams.set("start", String(request.startIndex));
  url.searchParams.set("num", String(request.pageSize));

  if (request.filters.dateRestrict) {
    url.searchParams.set("dateRestrict", request.filters.dateRestrict);
  }
  if (request.filters.imgSize) {
    url.searchParams.set("imgSize", request.filters.imgSize);
  }

  return url;
}

/**
 * First error reason from an API error body, or null when the body has none
 */
async function readErrorReason(response: Response): Promise<string | null> {
  try {
    const { data, success } = ErrorResponseSchema.safeParse(
      await response.json(),
    );
    return success ? (data.error.errors?.[0]?.reason ?? null) : null;
  } catch {
    return null;
  }
}

export function createCustomSearchClient(
  options: CustomSearchClientOptions,
): SearchTransport {
  const fetchImpl = options.fetch ?? fetch;

  return {
    async searchPage(request: SearchPageRequest): Promise<SearchPageResult> {
      const { signal, clear } = withTimeout(options.timeout, request.signal);

      try {
        const response = await fetchImpl(buildSearchUrl(options.endpoint, request), {
          signal,
        });

        if (response.status === 429) {
          return { status: "quota-exceeded", reason: "HTTP 429" };
        }

        if (response.status === 403) {
          const reason = await readErrorReason(response);
          if (reason && QUOTA_ERROR_REASONS.includes(reason)) {
            return { status: "quota-exceeded", reason };
          }
        }

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }

        const body = SearchResponseSchema.parse(await response.json());
        const items: SearchItem[] = (body.items ?? []).map((item) => ({
          // Items without a link are kept; the harvester counts them as missing URLs
          url: item.link ?? "",
          sourcePageUrl: item.image?.contextLink ?? "",
          title: item.title ?? "",
        }));

        return { status: "ok", items };
      } catch (error) {
        return { status: "error", error };
      } finally {
        clear();
      }
    },
  };
}
