import { Test } from "@nestjs/testing";
import { createHash } from "crypto";
import { FetcherService } from "./fetcher.service";
import {
  DYNAMIC_PAGE_RETRIEVER,
  PageRetriever,
  RetrievedPage,
  STATIC_PAGE_RETRIEVER,
} from "../retrievers/page-retriever";
import {
  PIPELINE_SETTINGS,
  buildPipelineSettings,
} from "../../../common/config/pipeline-settings";
import {
  FetchFailedError,
  FetchTransientError,
  RunCancelledError,
} from "../../../common/errors/pipeline.errors";
import { RunContext } from "../../../core/run/run-context";
import { FakeClock } from "../../../../test/helpers/fake-clock";
import { makeSource } from "../../../../test/helpers/factories";

const RICH_HTML = `<html><body><h1>Acme</h1><p>${"Cloud consulting for growing teams. ".repeat(4)}</p></body></html>`;
const SHELL_HTML = '<html><body><div id="root"></div></body></html>';
const THIN_HTML = "<html><body><p>Short intro text</p></body></html>";
const CHALLENGE_HTML =
  "<html><head><title>Just a moment...</title></head><body><p>Checking your browser before accessing acme.test.</p></body></html>";

function listingHtml(pageNumber: number, extra = ""): string {
  return `<html><body><h1>Agencies</h1><p>${"Agency listing entry. ".repeat(4)} Page ${pageNumber}</p>${extra}</body></html>`;
}

function page(url: string, html: string, status = 200): RetrievedPage {
  return { url, status, html };
}

describe("FetcherService", () => {
  let fetcher: FetcherService;
  let staticRetrieve: jest.Mock<Promise<RetrievedPage>, [string]>;
  let dynamicRetrieve: jest.Mock<Promise<RetrievedPage>, [string]>;
  let clock: FakeClock;
  let ctx: RunContext;

  beforeEach(async () => {
    staticRetrieve = jest.fn<Promise<RetrievedPage>, [string]>();
    dynamicRetrieve = jest.fn<Promise<RetrievedPage>, [string]>();
    const staticRetriever: PageRetriever = {
      strategy: "static",
      retrieve: staticRetrieve,
    };
    const dynamicRetriever: PageRetriever = {
      strategy: "dynamic",
      retrieve: dynamicRetrieve,
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        FetcherService,
        { provide: STATIC_PAGE_RETRIEVER, useValue: staticRetriever },
        { provide: DYNAMIC_PAGE_RETRIEVER, useValue: dynamicRetriever },
        {
          provide: PIPELINE_SETTINGS,
          useValue: buildPipelineSettings({
            requestDelayMs: 0,
            fetchBackoffMs: 100,
            fetchMaxAttempts: 3,
            maxSectionLinks: 3,
            staticMinTextLength: 50,
          }),
        },
      ],
    }).compile();

    fetcher = moduleRef.get(FetcherService);
    clock = new FakeClock();
    ctx = new RunContext({ runId: "run-1", requestDelayMs: 0, clock });
  });

  it("captures a static page without rendering", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toHaveLength(1);
    expect(captures[0]).toMatchObject({
      sourceId: "https://acme.test",
      url: "https://acme.test",
      fetchedAt: "2024-03-01T09:00:00.000Z",
      strategy: "static",
      status: 200,
      category: "company",
      html: RICH_HTML,
    });
    expect(captures[0]?.id).toBe(
      createHash("sha256")
        .update("https://acme.test|2024-03-01T09:00:00.000Z")
        .digest("hex")
        .slice(0, 16),
    );
    expect(dynamicRetrieve).not.toHaveBeenCalled();
  });

  it("retries transient errors with exponential backoff", async () => {
    staticRetrieve
      .mockRejectedValueOnce(new FetchTransientError("Request timeout"))
      .mockRejectedValueOnce(new FetchTransientError("HTTP 503", 503))
      .mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(staticRetrieve).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(captures).toHaveLength(1);
    expect(captures[0]?.fetchedAt).toBe("2024-03-01T09:00:00.300Z");
    expect(ctx.failures).toHaveLength(0);
  });

  it("records a failure once the attempts are exhausted", async () => {
    staticRetrieve.mockRejectedValue(new FetchTransientError("HTTP 503", 503));

    const captures = await fetcher.fetch(makeSource({ hint: "static" }), ctx);

    expect(captures).toEqual([]);
    expect(staticRetrieve).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([100, 200]);
    expect(ctx.failures).toHaveLength(1);
    expect(ctx.failures[0]).toMatchObject({
      runId: "run-1",
      sourceId: "https://acme.test",
      url: "https://acme.test/",
      stage: "fetch",
      kind: "FetchFailed",
      message: "Gave up after 3 attempts: HTTP 503",
    });
  });

  it("does not retry permanent errors", async () => {
    staticRetrieve.mockRejectedValue(new FetchFailedError("HTTP 404", 404));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toEqual([]);
    expect(staticRetrieve).toHaveBeenCalledTimes(1);
    expect(clock.sleeps).toEqual([]);
    expect(ctx.failures[0]?.message).toBe("HTTP 404");
  });

  it("escalates an empty client shell to rendering", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, SHELL_HTML));
    dynamicRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(dynamicRetrieve).toHaveBeenCalledWith("https://acme.test/");
    expect(captures).toHaveLength(1);
    expect(captures[0]?.strategy).toBe("dynamic");
    expect(captures[0]?.html).toBe(RICH_HTML);
  });

  it("keeps a thin static page when rendering fails", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, THIN_HTML));
    dynamicRetrieve.mockRejectedValue(
      new FetchFailedError("Dynamic rendering unavailable"),
    );

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toHaveLength(1);
    expect(captures[0]?.strategy).toBe("static");
    expect(captures[0]?.html).toBe(THIN_HTML);
    expect(ctx.failures).toHaveLength(0);
  });

  it("records a failure when an empty shell cannot be rendered", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, SHELL_HTML));
    dynamicRetrieve.mockRejectedValue(
      new FetchFailedError("Dynamic rendering unavailable"),
    );

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toEqual([]);
    expect(ctx.failures[0]?.message).toBe("Dynamic rendering unavailable");
  });

  it("never escalates a source hinted static", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, SHELL_HTML));

    const captures = await fetcher.fetch(makeSource({ hint: "static" }), ctx);

    expect(captures).toHaveLength(1);
    expect(captures[0]?.strategy).toBe("static");
    expect(dynamicRetrieve).not.toHaveBeenCalled();
  });

  it("renders sources hinted dynamic", async () => {
    dynamicRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource({ hint: "dynamic" }), ctx);

    expect(captures[0]?.strategy).toBe("dynamic");
    expect(staticRetrieve).not.toHaveBeenCalled();
  });

  it("falls back to a static fetch when rendering fails", async () => {
    dynamicRetrieve.mockRejectedValue(new FetchFailedError("Render crashed"));
    staticRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource({ hint: "dynamic" }), ctx);

    expect(captures).toHaveLength(1);
    expect(captures[0]?.strategy).toBe("static");
  });

  it("tries rendering when a plain client is refused", async () => {
    staticRetrieve.mockRejectedValue(new FetchFailedError("HTTP 403", 403));
    dynamicRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toHaveLength(1);
    expect(captures[0]?.strategy).toBe("dynamic");
  });

  it("follows same-domain section links with the entry strategy", async () => {
    const entryHtml = `<html><body>
      <nav>
        <a href="/about">About</a>
        <a href="/contact">Contact</a>
        <a href="https://other.test/about">Partner</a>
        <a href="/privacy">Privacy</a>
      </nav>
      <p>${"Cloud consulting for growing teams. ".repeat(4)}</p>
    </body></html>`;
    staticRetrieve.mockImplementation(async (url) =>
      page(url, url === "https://acme.test/" ? entryHtml : RICH_HTML),
    );

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures.map((capture) => capture.url)).toEqual([
      "https://acme.test",
      "https://acme.test/about",
      "https://acme.test/contact",
    ]);
    expect(staticRetrieve.mock.calls.map(([url]) => url)).toEqual([
      "https://acme.test/",
      "https://acme.test/about",
      "https://acme.test/contact",
    ]);
  });

  it("fetches a URL at most once per run", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    await fetcher.fetch(makeSource(), ctx);
    const second = await fetcher.fetch(makeSource(), ctx);

    expect(second).toEqual([]);
    expect(staticRetrieve).toHaveBeenCalledTimes(1);
  });

  it("refuses to start once the run is cancelled", async () => {
    ctx.cancel();

    await expect(fetcher.fetch(makeSource(), ctx)).rejects.toBeInstanceOf(
      RunCancelledError,
    );
    expect(staticRetrieve).not.toHaveBeenCalled();
  });

  it("stops retrying when the run is cancelled between attempts", async () => {
    staticRetrieve.mockImplementation(async () => {
      ctx.cancel();
      throw new FetchTransientError("Request timeout");
    });

    await expect(fetcher.fetch(makeSource(), ctx)).rejects.toBeInstanceOf(
      RunCancelledError,
    );
    expect(staticRetrieve).toHaveBeenCalledTimes(1);
    expect(ctx.failures).toHaveLength(0);
  });

  it("abandons a backoff wait as soon as the run is cancelled", async () => {
    const patient = new FetcherService(
      { strategy: "static", retrieve: staticRetrieve },
      { strategy: "dynamic", retrieve: dynamicRetrieve },
      buildPipelineSettings({ requestDelayMs: 0, fetchBackoffMs: 60_000 }),
    );
    const live = new RunContext({ runId: "run-2", requestDelayMs: 0 });
    staticRetrieve.mockImplementation(async () => {
      setImmediate(() => live.cancel("Interrupted"));
      throw new FetchTransientError("HTTP 503", 503);
    });

    await expect(patient.fetch(makeSource(), live)).rejects.toThrow(
      "Interrupted",
    );
    expect(staticRetrieve).toHaveBeenCalledTimes(1);
  });

  it("renders a page when the static fetch returns a bot challenge", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, CHALLENGE_HTML));
    dynamicRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toHaveLength(1);
    expect(captures[0]?.strategy).toBe("dynamic");
    expect(captures[0]?.html).toBe(RICH_HTML);
  });

  it("never keeps a challenge page as the capture", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, CHALLENGE_HTML));
    dynamicRetrieve.mockImplementation(async (url) => page(url, CHALLENGE_HTML));

    const captures = await fetcher.fetch(makeSource(), ctx);

    expect(captures).toEqual([]);
    expect(ctx.failures).toHaveLength(1);
    expect(ctx.failures[0]).toMatchObject({
      url: "https://acme.test/",
      kind: "FetchFailed",
      message: "Blocked by anti-bot challenge",
    });
  });

  it("records a challenge page of a source hinted static as a failure", async () => {
    staticRetrieve.mockImplementation(async (url) => page(url, CHALLENGE_HTML));

    const captures = await fetcher.fetch(makeSource({ hint: "static" }), ctx);

    expect(captures).toEqual([]);
    expect(dynamicRetrieve).not.toHaveBeenCalled();
    expect(ctx.failures[0]?.message).toBe("Blocked by anti-bot challenge");
  });

  describe("listing pagination", () => {
    const directory = makeSource({
      id: "https://dir.test/agencies",
      url: "https://dir.test/agencies",
      domain: "dir.test",
      category: "directory",
    });

    it("follows a page parameter until the content repeats", async () => {
      staticRetrieve.mockImplementation(async (url) => {
        if (url === "https://dir.test/agencies") {
          return page(url, listingHtml(1));
        }
        if (
          url === "https://dir.test/agencies?page=2" ||
          url === "https://dir.test/agencies?page=3"
        ) {
          return page(url, listingHtml(2));
        }
        throw new FetchFailedError("HTTP 404", 404);
      });

      const captures = await fetcher.fetch(directory, ctx);

      expect(captures.map((capture) => capture.url)).toEqual([
        "https://dir.test/agencies",
        "https://dir.test/agencies?page=2",
      ]);
      expect(staticRetrieve.mock.calls.map(([url]) => url)).toEqual([
        "https://dir.test/agencies",
        "https://dir.test/agencies?page=2",
        "https://dir.test/agencies?page=3",
      ]);
      expect(ctx.failures).toEqual([]);
    });

    it("follows next links of a rendered listing", async () => {
      const source = makeSource({
        id: "https://market.test/search",
        url: "https://market.test/search",
        domain: "market.test",
        hint: "dynamic",
        category: "freelance",
      });
      dynamicRetrieve.mockImplementation(async (url) => {
        if (url === "https://market.test/search") {
          return page(url, listingHtml(1, '<a href="/search/2">Suivant</a>'));
        }
        if (url === "https://market.test/search/2") {
          return page(url, listingHtml(2));
        }
        throw new FetchFailedError("HTTP 404", 404);
      });

      const captures = await fetcher.fetch(source, ctx);

      expect(captures.map((capture) => [capture.url, capture.strategy])).toEqual([
        ["https://market.test/search", "dynamic"],
        ["https://market.test/search/2", "dynamic"],
      ]);
      expect(dynamicRetrieve.mock.calls.map(([url]) => url)).toEqual([
        "https://market.test/search",
        "https://market.test/search/2",
        "https://market.test/search?page=3",
        "https://market.test/search?p=3",
        "https://market.test/search?start=3",
        "https://market.test/search?offset=3",
      ]);
      expect(staticRetrieve).not.toHaveBeenCalled();
      expect(ctx.failures).toEqual([]);
    });

    it("stops at the configured number of extra pages", async () => {
      const capped = new FetcherService(
        { strategy: "static", retrieve: staticRetrieve },
        { strategy: "dynamic", retrieve: dynamicRetrieve },
        buildPipelineSettings({
          requestDelayMs: 0,
          staticMinTextLength: 50,
          maxPaginationPages: 2,
        }),
      );
      staticRetrieve.mockImplementation(async (url) => {
        const pageNumber = Number(new URL(url).searchParams.get("page") ?? "1");
        return page(url, listingHtml(pageNumber));
      });

      const captures = await capped.fetch(directory, ctx);

      expect(captures.map((capture) => capture.url)).toEqual([
        "https://dir.test/agencies",
        "https://dir.test/agencies?page=2",
        "https://dir.test/agencies?page=3",
      ]);
      expect(staticRetrieve).toHaveBeenCalledTimes(3);
    });

    it("leaves company sites unpaginated", async () => {
      staticRetrieve.mockImplementation(async (url) => page(url, RICH_HTML));

      await fetcher.fetch(makeSource(), ctx);

      expect(staticRetrieve).toHaveBeenCalledTimes(1);
    });
  });
});
