import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFetchStub, createTestLogger, createTestMetrics, FakeClock, makeTempDir, removeDir, RouteHandler } from "../../__tests__/helpers/fakes";
import { Pacer } from "../../core/pacing";
import { createHostPolicy } from "../../core/urls";
import { InMemoryStateStore } from "../../store";
import { CanonicalSelection } from "../../types";
import { HASHED_DIR, LocalPathPlan } from "../localPath";
import { RecoverContext, recoverSelection } from "../recoverer";

const SOURCE_URL = "https://web.archive.org/web/20050101000000id_/http://example.org/comics/1.html";

const selection: CanonicalSelection = {
  canonicalKey: "example.org/comics/1.html",
  originalUrl: "http://example.org/comics/1.html",
  timestamp: "20050101000000",
  statusCode: 200,
  mimeType: "text/html",
};

function sha256(value: string): string {
  return crypto.createHash("sha256").update(value).digest("hex");
}

describe("recoverSelection", () => {
  let siteDir: string;
  let clock: FakeClock;
  let store: InMemoryStateStore;

  beforeEach(() => {
    siteDir = makeTempDir();
    clock = new FakeClock(Date.UTC(2024, 4, 1));
    store = new InMemoryStateStore();
  });

  afterEach(() => {
    removeDir(siteDir);
  });

  function context(handler: RouteHandler, maxRetries = 3) {
    const fetchFn = createFetchStub({ [SOURCE_URL]: handler });
    const metrics = createTestMetrics();
    const ctx: RecoverContext = {
      siteDir,
      hostPolicy: createHostPolicy("example.org", ["www.example.org"]),
      preserveQuery: false,
      replayBaseUrl: "https://web.archive.org/web",
      userAgent: "test-agent",
      timeoutMs: 1_000,
      maxRetries,
      retryBaseDelayMs: 10,
      retryMaxDelayMs: 100,
      fetchFn,
      pacer: new Pacer(clock, 1_000),
      store,
      logger: createTestLogger(),
      metrics,
      now: () => new Date(clock.now()),
    };
    return { ctx, fetchFn, metrics };
  }

  it("stores the capture and records its provenance", async () => {
    const { ctx, metrics } = context(() => new Response("<html>one</html>"));

    const record = await recoverSelection(selection, ctx);

    expect(record).toEqual({
      originalUrl: "http://example.org/comics/1.html",
      timestamp: "20050101000000",
      sourceUrl: SOURCE_URL,
      localPath: "example.org/comics/1.html",
      sha256: sha256("<html>one</html>"),
      status: "recovered",
      recoveredAt: "2024-05-01T00:00:00.000Z",
      attempts: 1,
    });
    expect(fs.readFileSync(path.join(siteDir, "example.org", "comics", "1.html"), "utf-8")).toBe("<html>one</html>");
    expect(await store.readProvenance()).toEqual([record]);
    expect(metrics.getCounters().artifacts_recovered).toBe(1);
  });

  it("skips an artifact already on disk without touching the network", async () => {
    const target = path.join(siteDir, "example.org", "comics", "1.html");
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, "<html>kept</html>");
    const { ctx, fetchFn } = context(() => new Response("<html>new</html>"));

    const record = await recoverSelection(selection, ctx);

    expect(record.status).toBe("skipped_existing");
    expect(record.attempts).toBe(0);
    expect(record.sha256).toBe(sha256("<html>kept</html>"));
    expect(fetchFn).not.toHaveBeenCalled();
    expect(clock.sleeps).toEqual([]);
    expect(fs.readFileSync(target, "utf-8")).toBe("<html>kept</html>");
  });

  it("records a single success after exactly the retry budget of transient failures", async () => {
    const callTimes: number[] = [];
    const { ctx, fetchFn } = context(() => {
      callTimes.push(clock.now());
      return callTimes.length <= 3 ? new Response("busy", { status: 503 }) : new Response("<html>late</html>");
    }, 3);

    const record = await recoverSelection(selection, ctx);

    expect(record.status).toBe("recovered");
    expect(record.attempts).toBe(4);
    expect(fetchFn).toHaveBeenCalledTimes(4);
    expect((await store.readProvenance()).map((entry) => entry.status)).toEqual(["recovered"]);
    const gaps = callTimes.slice(1).map((time, index) => time - callTimes[index]);
    expect(gaps.every((gap) => gap >= 1_000)).toBe(true);
  });

  it("gives up after the retry budget", async () => {
    const { ctx, fetchFn } = context(() => new Response("busy", { status: 503 }), 2);

    const record = await recoverSelection(selection, ctx);

    expect(record).toMatchObject({ status: "fetch_failed_503", attempts: 3, error: "HTTP 503", sha256: "" });
    expect(fetchFn).toHaveBeenCalledTimes(3);
    expect(fs.existsSync(path.join(siteDir, "example.org", "comics", "1.html"))).toBe(false);
  });

  it("does not retry a definitive failure", async () => {
    const { ctx, fetchFn, metrics } = context(() => new Response("gone", { status: 404 }));

    const record = await recoverSelection(selection, ctx);

    expect(record).toMatchObject({ status: "fetch_failed_404", attempts: 1 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(metrics.getCounters().artifacts_failed).toBe(1);
  });

  it("leaves no partial file when the body breaks off", async () => {
    const { ctx } = context(
      () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.enqueue(new TextEncoder().encode("<html>part"));
              controller.error(new Error("connection reset"));
            },
          }),
        ),
      0,
    );

    const record = await recoverSelection(selection, ctx);

    expect(record.status).toBe("fetch_error");
    expect(record.attempts).toBe(1);
    const dir = path.join(siteDir, "example.org", "comics");
    expect(fs.existsSync(dir) ? fs.readdirSync(dir) : []).toEqual([]);
  });

  it("retries when the body breaks off", async () => {
    let calls = 0;
    const { ctx, fetchFn } = context(() => {
      calls += 1;
      if (calls > 1) {
        return new Response("<html>whole</html>");
      }
      return new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.error(new Error("connection reset"));
          },
        }),
      );
    }, 1);

    const record = await recoverSelection(selection, ctx);

    expect(record).toMatchObject({ status: "recovered", attempts: 2 });
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("does not ask the archive again when the file cannot be written locally", async () => {
    fs.mkdirSync(path.join(siteDir, "example.org"), { recursive: true });
    fs.writeFileSync(path.join(siteDir, "example.org", "comics"), "a file where a directory is needed");
    const { ctx, fetchFn, metrics } = context(() => new Response("<html>one</html>"), 3);

    const record = await recoverSelection(selection, ctx);

    expect(record).toMatchObject({ status: "fetch_error", attempts: 1, sha256: "" });
    expect(record.error).toMatch(/comics/);
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(metrics.getCounters().artifacts_failed).toBe(1);
  });

  it("writes to the path planned for the selection set", async () => {
    const parent: CanonicalSelection = { ...selection, canonicalKey: "example.org/comics", originalUrl: "http://example.org/comics" };
    const fetchFn = createFetchStub({
      [SOURCE_URL]: () => new Response("<html>one</html>"),
      "https://web.archive.org/web/20050101000000id_/http://example.org/comics": () => new Response("<html>list</html>"),
    });
    const { ctx } = context(() => new Response("unused"));
    const planned: RecoverContext = {
      ...ctx,
      fetchFn,
      localPaths: LocalPathPlan.build([parent, selection], ctx.hostPolicy),
    };

    const parentRecord = await recoverSelection(parent, planned);
    const childRecord = await recoverSelection(selection, planned);

    expect(parentRecord.status).toBe("recovered");
    expect(parentRecord.localPath.startsWith(`example.org/${HASHED_DIR}/`)).toBe(true);
    expect(childRecord).toMatchObject({ status: "recovered", localPath: "example.org/comics/1.html" });
    expect(fs.readFileSync(path.join(siteDir, ...parentRecord.localPath.split("/")), "utf-8")).toBe("<html>list</html>");
  });

  it("records URLs that cannot be mapped without fetching", async () => {
    const { ctx, fetchFn } = context(() => new Response("unused"));

    const record = await recoverSelection({ ...selection, originalUrl: "ftp://example.org/file" }, ctx);

    expect(record).toMatchObject({ status: "fetch_error", attempts: 0, localPath: "example.org/comics/1.html" });
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
