/**
 * Search Driver
 * Pages through the search transport for one work unit, rotating credentials
 * on quota signals
 */

import type {
  FilterCombination,
  SearchItem,
  SearchOutcome,
  SearchPageRequest,
  SearchPageResult,
  SearchTransport,
} from "../types";
import type { CredentialRotator } from "./credential-rotator";
import { formatFilterDisplay } from "./filter-combinations";
import type { Logger } from "./logger";

export interface SearchDriverOptions {
  pageSize: number;
  maxResults: number;
  logger?: Logger;
}

export class SearchDriver {
  constructor(
    private transport: SearchTransport,
    private rotator: CredentialRotator,
    private options: SearchDriverOptions,
  ) {}

  /**
   * Collect up to targetCount items for a query/filter pair
   *
   * An empty page ends paging. A transport failure stops the unit early and
   * reports "transient-error" with whatever was gathered, so the caller can
   * tell it apart from a search that legitimately found nothing.
   */
  async fetchResults(
    query: string,
    filters: FilterCombination,
    targetCount: number,
    signal?: AbortSignal,
  ): Promise<SearchOutcome> {
    const { pageSize, maxResults, logger } = this.options;
    const count = Math.min(targetCount, maxResults);
    const items: SearchItem[] = [];
    let startIndex = 1;

    while (items.length < count) {
      if (!this.rotator.hasAvailable()) {
        return { kind: "all-credentials-exhausted" };
      }

      const page = await this.requestPage({
        query,
        filters,
        startIndex,
        pageSize: Math.min(pageSize, count - items.length),
        signal,
      });

      if (page.status === "quota-exceeded") {
        const exhaustedOrdinal = this.rotator.currentOrdinal();
        logger?.warn(
          `API key #${exhaustedOrdinal} quota exceeded (${page.reason})`,
        );
        if (!this.rotator.rotateToNext()) {
          return { kind: "all-credentials-exhausted" };
        }
        logger?.info(`Rotating to API key #${this.rotator.currentOrdinal()}`);
        continue; // Same page, new credential
      }

      if (page.status === "error") {
        logger?.debug(
          `Search failed for "${query}" (${formatFilterDisplay(filters)}) at start=${startIndex}`,
        );
        return { kind: "transient-error", items, error: page.error };
      }

      if (page.items.length === 0) {
        break;
      }

      items.push(...page.items);
      startIndex += pageSize;

      if (startIndex > maxResults) {
        break;
      }
    }

    return { kind: "ok", items };
  }

  private async requestPage(
    request: Omit<SearchPageRequest, "credential">,
  ): Promise<SearchPageResult> {
    try {
      return await this.transport.searchPage({
        ...request,
        credential: this.rotator.current(),
      });
    } catch (error) {
      return { status: "error", error };
    }
  }
}
