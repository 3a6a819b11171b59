import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFetchStub, createTestLogger, createTestMetrics, FakeClock, makeTempDir, removeDir, RouteHandler } from "../../__tests__/helpers/fakes";
import { AppConfig, DEFAULT_CONFIG, finalizeConfig } from "../../config";
import { buildIndexQueryUrl } from "../../discovery";
import { JsonlStateStore } from "../../store";
import { CommandContext, EXIT_CODES, runPipeline } from "../commands";
import { StateFileCorruptError } from "../errors";
import { Pacer } from "../pacing";

const CDX = "https://cdx.test/cdx";
const REPLAY = "https://web.archive.org/web";

const indexRows = [
  ["original", "timestamp", "statuscode", "mimetype", "digest"],
  ["http://example.org/", "20050101000000", "200", "text/html", "A"],
  ["http://www.example.org/", "20040101000000", "200", "text/html", "B"],
  ["http://example.org/comics/1.html", "20050101000000", "200", "text/html", "C"],
  ["http://example.org/img/logo.gif", "20050101000000", "200", "image/gif", "D"],
  ["http://example.org/late.html", "20080601000000", "200", "text/html", "E"],
];

const replayBodies: Record<string, string> = {
  [`${REPLAY}/20050101000000id_/http://example.org/`]:
    '<html><body><a href="/comics/1.html">One</a><img src="/img/logo.gif"><a href="/admin/secret.html">x</a></body></html>',
  [`${REPLAY}/20050101000000id_/http://example.org/comics/1.html`]: '<html><body><a href="/">Home</a></body></html>',
  [`${REPLAY}/20050101000000id_/http://example.org/img/logo.gif`]: "GIF89a",
};

describe("runPipeline", () => {
  let outputRoot: string;
  let config: AppConfig;
  let indexUrl: string;

  beforeEach(() => {
    outputRoot = makeTempDir();
    config = finalizeConfig({
      ...DEFAULT_CONFIG,
      domain: "example.org",
      fromDate: "2000-01-01",
      toDate: "2009-12-31",
      modernCutoffDate: "2008-01-01",
      outputRoot,
      requestIntervalMs: 0,
      maxRetries: 0,
      discoveryMaxPageRetries: 0,
      retryBaseDelayMs: 1,
      retryMaxDelayMs: 1,
      cdxEndpoint: CDX,
      replayBaseUrl: REPLAY,
    });
    indexUrl = buildIndexQueryUrl(CDX, {
      domain: "example.org",
      fromTimestamp: "20000101000000",
      toTimestamp: "20091231235959",
      pageSize: config.discoveryPageSize,
    });
  });

  afterEach(() => {
    removeDir(outputRoot);
  });

  function context(indexHandler: RouteHandler = () => new Response(JSON.stringify(indexRows))) {
    const routes: Record<string, RouteHandler> = { [indexUrl]: indexHandler };
    for (const [url, body] of Object.entries(replayBodies)) {
      routes[url] = () => new Response(body);
    }
    const fetchFn = createFetchStub(routes);
    const clock = new FakeClock(Date.UTC(2024, 4, 1));
    const ctx: CommandContext = {
      runId: "test-run",
      config,
      store: new JsonlStateStore(path.join(outputRoot, "state")),
      logger: createTestLogger(),
      metrics: createTestMetrics(),
      fetchFn,
      clock,
      pacer: new Pacer(clock, config.requestIntervalMs),
    };
    return { ctx, fetchFn };
  }

  function readOutput(...segments: string[]): string {
    return fs.readFileSync(path.join(outputRoot, ...segments), "utf-8");
  }

  it("builds the mirror, its state and its reports", async () => {
    const { ctx } = context();

    await expect(runPipeline(ctx)).resolves.toBe(EXIT_CODES.completed);

    expect(readOutput("site", "example.org", "index.html")).toBe(
      '<html><body><a href="comics/1.html">One</a><img src="img/logo.gif"><a href="/admin/secret.html">x</a></body></html>',
    );
    expect(readOutput("state", "canonical_selections.jsonl").trim().split("\n")).toHaveLength(3);
    expect(readOutput("reports", "coverage_report.md").split("\n")).toContain("- Coverage: 100.00%");
    expect(readOutput("reports", "gap_register.csv").split("\n")).toEqual([
      "kind,original_url,canonical_key,reason,suggested_action",
      "unselected_key,http://example.org/late.html,example.org/late.html,no_capture_in_window,broaden_discovery",
      "unresolved_link,http://example.org/admin/secret.html,,missing_canonical,broaden_discovery",
      "",
    ]);
    expect(readOutput("reports", "provenance_manifest.csv").trim().split("\n")).toHaveLength(4);
  });

  it("fetches no capture again on a second run and leaves the mirror as it was", async () => {
    await runPipeline(context().ctx);
    const site = ["index.html", "comics/1.html", "img/logo.gif"].map((file) => readOutput("site", "example.org", file));
    const manifest = readOutput("reports", "provenance_manifest.csv");

    const { ctx, fetchFn } = context();
    await expect(runPipeline(ctx)).resolves.toBe(EXIT_CODES.completed);

    expect(fetchFn.mock.calls.map(([url]) => url)).toEqual([indexUrl]);
    expect(["index.html", "comics/1.html", "img/logo.gif"].map((file) => readOutput("site", "example.org", file))).toEqual(site);
    expect(readOutput("reports", "provenance_manifest.csv")).toBe(manifest);
    const statuses = readOutput("state", "provenance.jsonl")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line).status);
    expect(statuses).toEqual(["recovered", "recovered", "recovered", "skipped_existing", "skipped_existing", "skipped_existing"]);
  });

  it("finishes with a partial-discovery exit code when the index keeps failing", async () => {
    const { ctx } = context(() => new Response("busy", { status: 503 }));

    await expect(runPipeline(ctx)).resolves.toBe(EXIT_CODES.partialDiscovery);

    expect(JSON.parse(readOutput("state", "discovery_status.json"))).toMatchObject({ complete: false, pagesFetched: 0 });
    expect(readOutput("reports", "coverage_report.md").split("\n")).toContain("- Complete: no");
  });

  it("halts on a corrupt ledger after the mirror work is done", async () => {
    fs.mkdirSync(path.join(outputRoot, "state"), { recursive: true });
    fs.writeFileSync(path.join(outputRoot, "state", "provenance.jsonl"), "garbage\n");
    const { ctx } = context();

    await expect(runPipeline(ctx)).rejects.toBeInstanceOf(StateFileCorruptError);
    expect(fs.existsSync(path.join(outputRoot, "site", "example.org", "index.html"))).toBe(true);
  });
});
