import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readdir, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { harvest, clampCount } from "./harvester";
import {
  CheckpointStore,
  CredentialRotator,
  Logger,
  SearchDriver,
  Tracker,
} from "../utils";
import { CheckpointFileSchema } from "../types";
import type {
  CheckpointFile,
  Credential,
  DownloadedImage,
  FilterCombination,
  HarvestConfig,
  HarvestContext,
  ImageTransport,
  SearchPageRequest,
  SearchPageResult,
  WorkUnit,
} from "../types";

const CREDENTIALS: Credential[] = [
  { key: "test-key-1", scope: "test-cx-1" },
  { key: "test-key-2", scope: "test-cx-2" },
];

type SearchHandler = (
  request: SearchPageRequest,
) => SearchPageResult | Promise<SearchPageResult>;

/**
 * One image per query/filter on the first page, nothing after it
 */
function oneImagePerUnit(request: SearchPageRequest): SearchPageResult {
  if (request.startIndex > 1) {
    return { status: "ok", items: [] };
  }
  const facet = request.filters.imgSize ?? "any";
  return {
    status: "ok",
    items: [
      {
        url: `https://img.example.com/${request.query}-${facet}-${request.credential.key}.jpg`,
        sourcePageUrl: "https://example.com/page",
        title: request.query,
      },
    ],
  };
}

function uniqueBytes(url: string): DownloadedImage {
  return { bytes: Buffer.from(`bytes of ${url}`), contentType: "image/jpeg" };
}

describe("harvest", () => {
  let dir: string;
  let outputDir: string;
  let checkpointPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "harvest-"));
    outputDir = join(dir, "images");
    checkpointPath = join(dir, "progress.json");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function buildConfig(): HarvestConfig {
    return {
      search: {
        endpoint: "https://search.example.com/v1",
        resultsPerPage: 10,
        maxResultsPerQuery: 100,
        timeout: 1000,
      },
      download: { timeout: 1000, retries: 0 },
      filters: {
        dateRestrict: ["d30"],
        imgSize: ["large", "huge"],
        useDate: false,
        useSize: true,
      },
      output: { directory: outputDir, prefix: "image", count: 10 },
      queries: { file: "queries.txt" },
      checkpoint: { path: checkpointPath },
      logging: { level: "error" },
    };
  }

  interface Setup {
    queries: string[];
    filters?: FilterCombination[];
    credentials?: Credential[];
    search?: SearchHandler;
    download?: (url: string) => DownloadedImage | Promise<DownloadedImage>;
    signal?: AbortSignal;
    onUnitStart?: (unit: WorkUnit, ordinal: number, total: number) => void;
  }

  async function setup(options: Setup) {
    const logger = new Logger("error");
    const checkpoint = new CheckpointStore(checkpointPath, { logger });
    const resumed = await checkpoint.load();
    const filters = options.filters ?? [{}];
    checkpoint.setSessionInfo({
      queriesFile: "queries.txt",
      totalQueries: options.queries.length,
      totalCombinations: options.queries.length * filters.length,
    });

    const rotator = new CredentialRotator(options.credentials ?? CREDENTIALS);
    const handler = options.search ?? oneImagePerUnit;
    const searchPage = vi.fn(async (request: SearchPageRequest) => handler(request));
    const download = options.download ?? uniqueBytes;
    const downloadBytes = vi.fn(async (url: string) => download(url));
    const images: ImageTransport = { downloadBytes };
    const tracker = new Tracker();

    const ctx: HarvestContext = {
      config: buildConfig(),
      queries: options.queries,
      filters,
      checkpoint,
      rotator,
      search: new SearchDriver({ searchPage }, rotator, {
        pageSize: 10,
        maxResults: 100,
      }),
      images,
      tracker,
      logger,
      signal: options.signal,
      onUnitStart: options.onUnitStart,
    };

    return { ctx, resumed, searchPage, downloadBytes, checkpoint, tracker };
  }

  function searchedUnits(calls: ReadonlyArray<[SearchPageRequest]>): string[] {
    const seen = new Set<string>();
    for (const [request] of calls) {
      seen.add(`${request.query}/${request.filters.imgSize ?? "any"}`);
    }
    return [...seen];
  }

  async function readCheckpoint(): Promise<CheckpointFile> {
    return CheckpointFileSchema.parse(
      JSON.parse(await readFile(checkpointPath, "utf-8")),
    );
  }

  it("saves every unit's images and finishes the session", async () => {
    const { ctx, tracker } = await setup({ queries: ["pothole", "crack"] });

    const outcome = await harvest(ctx);

    expect(outcome.status).toBe("completed");
    expect(outcome.completedUnits).toBe(2);
    expect(outcome.pendingUnits).toBe(0);
    expect(outcome.stats).toEqual({ imagesSaved: 2, duplicatesSkipped: 0, errors: 0 });
    expect((await readdir(outputDir)).sort()).toEqual([
      "image_001_scraped_from_img.example.com-pothole-any-test-key-1.jpg.jpg",
      "image_002_scraped_from_img.example.com-crack-any-test-key-1.jpg.jpg",
    ]);
    expect((await readCheckpoint()).status).toBe("completed");
    expect(tracker.getSummary().processedUnits).toBe(2);
  });

  it("fails over to the second credential without surfacing the quota error", async () => {
    const { ctx, searchPage } = await setup({
      queries: ["q1", "q2", "q3", "q4", "q5"],
      search: (request) =>
        request.query === "q3" && request.credential.key === "test-key-1"
          ? { status: "quota-exceeded", reason: "dailyLimitExceeded" }
          : oneImagePerUnit(request),
    });

    const outcome = await harvest(ctx);

    expect(outcome.status).toBe("completed");
    expect(outcome.completedUnits).toBe(5);
    expect(outcome.stats.errors).toBe(0);
    expect(outcome.credentials.currentOrdinal).toBe(2);
    expect(outcome.credentials.exhausted).toBe(1);

    const files = await readdir(outputDir);
    expect(files).toContain(
      "image_003_scraped_from_img.example.com-q3-any-test-key-2.jpg.jpg",
    );
    const q4Keys = searchPage.mock.calls
      .filter(([request]) => request.query === "q4")
      .map(([request]) => request.credential.key);
    expect(q4Keys).toEqual(["test-key-2", "test-key-2"]);
  });

  it("resumes after an interruption without refetching finished units", async () => {
    const controller = new AbortController();
    const queries = ["q1", "q2", "q3"];
    const filters = [{ imgSize: "large" }, { imgSize: "huge" }];

    const first = await setup({
      queries,
      filters,
      signal: controller.signal,
      onUnitStart: (_unit, ordinal) => {
        if (ordinal === 5) controller.abort();
      },
    });
    expect(first.resumed).toBe(false);

    const interrupted = await harvest(first.ctx);

    expect(interrupted.status).toBe("interrupted");
    expect(interrupted.completedUnits).toBe(4);
    expect(interrupted.position).toEqual({ queryIndex: 2, filterIndex: 0 });
    expect(first.downloadBytes).toHaveBeenCalledTimes(4);
    expect((await readCheckpoint()).status).toBe("in_progress");

    const second = await setup({ queries, filters });
    expect(second.resumed).toBe(true);

    const resumed = await harvest(second.ctx);

    expect(searchedUnits(second.searchPage.mock.calls)).toEqual(["q3/large", "q3/huge"]);
    expect(resumed.status).toBe("completed");
    expect(resumed.completedUnits).toBe(6);
    expect(resumed.stats.imagesSaved).toBe(6);
    expect(second.tracker.getSummary().skippedUnits).toBe(4);
    expect(second.checkpoint.ledger.lastSequenceNumber).toBe(6);
  });

  it("stops before the next unit when interrupted between units", async () => {
    const controller = new AbortController();
    controller.abort();
    const { ctx, searchPage } = await setup({
      queries: ["q1"],
      signal: controller.signal,
    });

    const outcome = await harvest(ctx);

    expect(outcome.status).toBe("interrupted");
    expect(searchPage).not.toHaveBeenCalled();
    expect((await readCheckpoint()).status).toBe("in_progress");
  });

  it("keeps a unit interrupted mid-download open and dedups its saved items on resume", async () => {
    const controller = new AbortController();
    const twoImages: SearchHandler = (request) =>
      request.startIndex > 1
        ? { status: "ok", items: [] }
        : {
            status: "ok",
            items: [
              { url: "https://img.example.com/first.jpg", sourcePageUrl: "", title: "" },
              { url: "https://img.example.com/second.jpg", sourcePageUrl: "", title: "" },
            ],
          };

    const first = await setup({
      queries: ["q1"],
      search: twoImages,
      signal: controller.signal,
      download: (url) => {
        if (url.endsWith("second.jpg")) {
          controller.abort();
          throw new Error("This operation was aborted");
        }
        return uniqueBytes(url);
      },
    });

    const interrupted = await harvest(first.ctx);

    expect(interrupted.status).toBe("interrupted");
    expect(interrupted.completedUnits).toBe(0);
    expect(interrupted.stats).toEqual({ imagesSaved: 1, duplicatesSkipped: 0, errors: 0 });
    const saved = await readCheckpoint();
    expect(saved.status).toBe("in_progress");
    expect(saved.completed).toEqual([]);

    const second = await setup({ queries: ["q1"], search: twoImages });
    const resumed = await harvest(second.ctx);

    expect(searchedUnits(second.searchPage.mock.calls)).toEqual(["q1/any"]);
    expect(resumed.status).toBe("completed");
    expect(resumed.stats).toEqual({ imagesSaved: 2, duplicatesSkipped: 1, errors: 0 });
    expect((await readdir(outputDir)).sort()).toEqual([
      "image_001_scraped_from_img.example.com-first.jpg.jpg",
      "image_002_scraped_from_img.example.com-second.jpg.jpg",
    ]);
  });

  it("ignores completed units outside the current grid when deciding to finish", async () => {
    const flakyQ2: SearchHandler = (request) =>
      request.query === "q2"
        ? { status: "error", error: new Error("HTTP 503: Service Unavailable") }
        : oneImagePerUnit(request);

    const first = await setup({ queries: ["q1", "q2", "q3"], search: flakyQ2 });
    const firstPass = await harvest(first.ctx);
    expect(firstPass.completedUnits).toBe(2);
    expect(firstPass.pendingUnits).toBe(1);

    const second = await setup({ queries: ["q1", "q2"], search: flakyQ2 });
    const secondPass = await harvest(second.ctx);

    expect(secondPass.completedUnits).toBe(1);
    expect(secondPass.pendingUnits).toBe(1);
    expect((await readCheckpoint()).status).toBe("in_progress");
  });

  it("saves identical bytes from two URLs only once", async () => {
    const { ctx, checkpoint } = await setup({
      queries: ["pothole"],
      search: (request) =>
        request.startIndex > 1
          ? { status: "ok", items: [] }
          : {
              status: "ok",
              items: [
                { url: "https://a.example.com/1.png", sourcePageUrl: "", title: "" },
                { url: "https://b.example.com/copy.png", sourcePageUrl: "", title: "" },
              ],
            },
      download: () => ({
        bytes: Buffer.from("same pixels"),
        contentType: "image/png",
      }),
    });

    const outcome = await harvest(ctx);

    expect(outcome.stats).toEqual({ imagesSaved: 1, duplicatesSkipped: 1, errors: 0 });
    expect(checkpoint.ledger.lastSequenceNumber).toBe(1);
    expect(await readdir(outputDir)).toEqual([
      "image_001_scraped_from_a.example.com-1.png.png",
    ]);
  });

  it("marks a zero-result unit done, reports it and never retries it", async () => {
    const first = await setup({
      queries: ["nothing", "q2"],
      credentials: [CREDENTIALS[0]],
      search: (request) =>
        request.query === "nothing"
          ? { status: "ok", items: [] }
          : { status: "quota-exceeded", reason: "HTTP 429" },
    });

    const paused = await harvest(first.ctx);

    expect(paused.status).toBe("paused-exhausted");
    expect(paused.completedUnits).toBe(1);
    expect(first.tracker.getNoResults()).toEqual([
      { queryIndex: 0, filterIndex: 0, query: "nothing", filters: "no filters" },
    ]);
    expect((await readCheckpoint()).status).toBe("in_progress");

    const second = await setup({ queries: ["nothing", "q2"] });
    const resumed = await harvest(second.ctx);

    expect(searchedUnits(second.searchPage.mock.calls)).toEqual(["q2/any"]);
    expect(resumed.status).toBe("completed");
    expect(resumed.completedUnits).toBe(2);
  });

  it("leaves a unit with a failed search open and retries it next run", async () => {
    const first = await setup({
      queries: ["flaky", "stable"],
      search: (request) =>
        request.query === "flaky"
          ? { status: "error", error: new Error("HTTP 503: Service Unavailable") }
          : oneImagePerUnit(request),
    });

    const pass = await harvest(first.ctx);

    expect(pass.status).toBe("completed");
    expect(pass.pendingUnits).toBe(1);
    expect(pass.stats.errors).toBe(1);
    expect(first.checkpoint.isUnitDone({ queryIndex: 0, filterIndex: 0 })).toBe(false);
    expect(first.tracker.getIssues("search")).toEqual([
      {
        type: "search",
        path: "flaky (no filters)",
        reason: "invalid-response",
        details: "HTTP 503: Service Unavailable",
      },
    ]);
    const saved = await readCheckpoint();
    expect(saved.status).toBe("in_progress");
    expect(saved.completed).toEqual([{ query_index: 1, filter_index: 0 }]);

    const second = await setup({ queries: ["flaky", "stable"] });
    const retry = await harvest(second.ctx);

    expect(searchedUnits(second.searchPage.mock.calls)).toEqual(["flaky/any"]);
    expect(retry.pendingUnits).toBe(0);
    expect(retry.stats).toEqual({ imagesSaved: 2, duplicatesSkipped: 0, errors: 1 });
    expect((await readCheckpoint()).status).toBe("completed");
  });

  it("pauses on total credential exhaustion without counting an error", async () => {
    const { ctx, downloadBytes } = await setup({
      queries: ["q1", "q2"],
      search: () => ({ status: "quota-exceeded", reason: "quotaExceeded" }),
    });

    const outcome = await harvest(ctx);

    expect(outcome.status).toBe("paused-exhausted");
    expect(outcome.completedUnits).toBe(0);
    expect(outcome.stats.errors).toBe(0);
    expect(outcome.credentials.available).toBe(0);
    expect(outcome.position).toEqual({ queryIndex: 0, filterIndex: 0 });
    expect(downloadBytes).not.toHaveBeenCalled();
  });

  it("counts per-item download failures and still completes the unit", async () => {
    const { ctx, tracker } = await setup({
      queries: ["pothole"],
      search: (request) =>
        request.startIndex > 1
          ? { status: "ok", items: [] }
          : {
              status: "ok",
              items: [
                { url: "https://img.example.com/broken.jpg", sourcePageUrl: "", title: "" },
                { url: "", sourcePageUrl: "https://example.com/no-link", title: "" },
                { url: "https://img.example.com/fine.jpg", sourcePageUrl: "", title: "" },
              ],
            },
      download: (url) => {
        if (url.endsWith("broken.jpg")) {
          throw new Error("HTTP 404: Not Found");
        }
        return uniqueBytes(url);
      },
    });

    const outcome = await harvest(ctx);

    expect(outcome.completedUnits).toBe(1);
    expect(outcome.stats).toEqual({ imagesSaved: 1, duplicatesSkipped: 0, errors: 2 });
    expect(tracker.getIssues("image").map((i) => i.reason)).toEqual([
      "invalid-response",
      "missing-url",
    ]);
    expect(await readdir(outputDir)).toEqual([
      "image_001_scraped_from_img.example.com-fine.jpg.jpg",
    ]);
  });
});

describe("clampCount", () => {
  it("keeps the target within 1..max", () => {
    expect(clampCount(0, 100)).toBe(1);
    expect(clampCount(50, 100)).toBe(50);
    expect(clampCount(500, 100)).toBe(100);
  });
});
