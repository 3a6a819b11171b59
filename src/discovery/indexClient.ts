import { FetchFn, withTimeout } from "../core/fetch";
import { CaptureCandidate } from "../types";

export const INDEX_FIELDS = ["original", "timestamp", "statuscode", "mimetype", "digest"] as const;

export interface IndexQuery {
  domain: string;
  fromTimestamp: string;
  toTimestamp: string;
  pageSize: number;
}

export interface IndexPage {
  candidates: CaptureCandidate[];
  resumeKey?: string;
}

export interface CaptureIndexClient {
  fetchPage(query: IndexQuery, resumeKey?: string): Promise<IndexPage>;
}

export function buildIndexQueryUrl(endpoint: string, query: IndexQuery, resumeKey?: string): string {
  const params = new URLSearchParams({
    url: query.domain,
    matchType: "domain",
    output: "json",
    fl: INDEX_FIELDS.join(","),
    from: query.fromTimestamp,
    to: query.toTimestamp,
    limit: String(query.pageSize),
    showResumeKey: "true",
  });
  if (resumeKey) {
    params.set("resumeKey", resumeKey);
  }
  return `${endpoint}?${params.toString()}`;
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((cell) => typeof cell === "string");
}

/**
 * Parses one JSON page of the capture index. The page is an array of rows: an
 * optional header naming the fields, the data rows, then (when more pages
 * exist) an empty row followed by a one-cell row holding the resume key.
 */
export function parseIndexPage(payload: unknown): IndexPage {
  if (!Array.isArray(payload)) {
    throw new Error("capture index page is not a JSON array");
  }

  const rows: string[][] = [];
  for (const row of payload) {
    if (!isStringRow(row)) {
      throw new Error("capture index page holds a non-string row");
    }
    rows.push(row);
  }

  let fields: readonly string[] = INDEX_FIELDS;
  let start = 0;
  if (rows.length > 0 && rows[0].includes("original") && rows[0].includes("timestamp")) {
    fields = rows[0];
    start = 1;
  }

  const candidates: CaptureCandidate[] = [];
  let resumeKey: string | undefined;
  for (let index = start; index < rows.length; index += 1) {
    const row = rows[index];
    if (row.length === 0) {
      const keyRow = rows[index + 1];
      if (keyRow && keyRow.length > 0 && keyRow[0].length > 0) {
        resumeKey = keyRow[0];
      }
      break;
    }

    const cells = new Map<string, string>();
    fields.forEach((field, position) => {
      const cell = row[position];
      if (cell !== undefined) {
        cells.set(field, cell);
      }
    });

    const originalUrl = cells.get("original");
    const timestamp = cells.get("timestamp");
    if (!originalUrl || !timestamp || !/^\d{14}$/.test(timestamp)) {
      continue;
    }

    const statusCode = Number.parseInt(cells.get("statuscode") ?? "", 10);
    candidates.push({
      originalUrl,
      timestamp,
      statusCode: Number.isFinite(statusCode) ? statusCode : 0,
      mimeType: cells.get("mimetype") ?? "",
      digest: cells.get("digest") ?? "",
    });
  }

  return { candidates, resumeKey };
}

export interface HttpIndexClientOptions {
  endpoint: string;
  userAgent: string;
  timeoutMs: number;
  fetchFn: FetchFn;
}

export class HttpCaptureIndexClient implements CaptureIndexClient {
  private readonly options: HttpIndexClientOptions;

  constructor(options: HttpIndexClientOptions) {
    this.options = options;
  }

  async fetchPage(query: IndexQuery, resumeKey?: string): Promise<IndexPage> {
    const url = buildIndexQueryUrl(this.options.endpoint, query, resumeKey);
    const body = await withTimeout(this.options.timeoutMs, async (signal) => {
      const response = await this.options.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.options.userAgent,
          accept: "application/json",
        },
        signal,
        redirect: "follow",
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} while fetching capture index page`);
      }
      return response.text();
    });

    // The index answers an empty body when the query matches nothing.
    if (body.trim().length === 0) {
      return { candidates: [] };
    }
    return parseIndexPage(JSON.parse(body));
  }
}
