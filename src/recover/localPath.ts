import crypto from "node:crypto";
import path from "node:path";
import { compareStrings } from "../core/compare";
import { canonicalizeHost, canonicalKeyFromUrl, HostPolicy, hostOf, parseHttpUrl } from "../core/urls";
import { CanonicalSelection } from "../types";

const SAFE_SEGMENT = /^[A-Za-z0-9._~+,=@-]+$/;
const SAFE_EXTENSION = /^\.[A-Za-z0-9]{1,8}$/;
const MAX_SEGMENT_LENGTH = 100;

/** Directory under each host that holds files named by hash. */
export const HASHED_DIR = "__hashed__";

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function isRegularSegment(segment: string | undefined): segment is string {
  return (
    segment !== undefined &&
    segment !== "." &&
    segment !== ".." &&
    segment.length <= MAX_SEGMENT_LENGTH &&
    SAFE_SEGMENT.test(segment)
  );
}

function hashedLocalPath(parsed: URL, hostDir: string, policy: HostPolicy, preserveQuery: boolean): string {
  const key = canonicalKeyFromUrl(parsed, policy, preserveQuery);
  const digest = crypto.createHash("sha256").update(key).digest("hex").slice(0, 24);
  const segments = parsed.pathname.split("/");
  const last = decodeSegment(segments[segments.length - 1] || "index.html");
  const extension = last !== undefined ? path.posix.extname(last) : "";
  return `${hostDir}/${HASHED_DIR}/${digest}${SAFE_EXTENSION.test(extension) ? extension.toLowerCase() : ""}`;
}

function hostDirOf(parsed: URL, policy: HostPolicy): string {
  return canonicalizeHost(hostOf(parsed), policy).replace(/:/g, "_");
}

export function localPathFromUrl(parsed: URL, policy: HostPolicy, preserveQuery = false): string {
  const hostDir = hostDirOf(parsed, policy);

  const segments = parsed.pathname.split("/").slice(1);
  if (segments.length === 0 || segments[segments.length - 1] === "") {
    segments[Math.max(segments.length - 1, 0)] = "index.html";
  }
  const decoded = segments.map(decodeSegment);
  const hasQuery = preserveQuery && parsed.search.length > 0;

  if (!hasQuery && decoded[0] !== HASHED_DIR && decoded.every(isRegularSegment)) {
    return [hostDir, ...decoded].join("/");
  }
  return hashedLocalPath(parsed, hostDir, policy, preserveQuery);
}

/**
 * Deterministic mirror-relative path (POSIX separators) for an original URL.
 *
 * `http://www.example.org/comics/` → `example.org/comics/index.html` when
 * `www.example.org` is an alias. Segments that are not plain file-name
 * characters, dot segments, overlong segments, preserved queries and a first
 * segment named like the hash directory all fall back to
 * `<host>/__hashed__/<sha256 of the canonical key, 24 hex><ext>`.
 */
export function localPathFor(originalUrl: string, policy: HostPolicy, preserveQuery = false): string | undefined {
  const parsed = parseHttpUrl(originalUrl);
  if (!parsed) {
    return undefined;
  }
  return localPathFromUrl(parsed, policy, preserveQuery);
}

export function absoluteArtifactPath(siteDir: string, localPath: string): string {
  return path.join(siteDir, ...localPath.split("/"));
}

function parentDirectories(localPath: string): string[] {
  const segments = localPath.split("/");
  return segments.slice(1, -1).map((_, index) => segments.slice(0, index + 2).join("/"));
}

/**
 * Local paths for a whole selection set. A path that another selection needs
 * as a directory (`/x` against `/x/y.html`), or that an earlier key in
 * canonical order already holds (`/x/` against `/x/index.html`), moves to the
 * hashed fallback. The result depends only on the set, not on its order.
 */
export class LocalPathPlan {
  private readonly paths = new Map<string, string>();
  private readonly policy: HostPolicy;
  private readonly preserveQuery: boolean;

  private constructor(policy: HostPolicy, preserveQuery: boolean) {
    this.policy = policy;
    this.preserveQuery = preserveQuery;
  }

  static build(selections: readonly CanonicalSelection[], policy: HostPolicy, preserveQuery = false): LocalPathPlan {
    const plan = new LocalPathPlan(policy, preserveQuery);
    const natural = new Map<string, { parsed: URL; localPath: string }>();
    const directories = new Set<string>();

    const ordered = [...selections].sort((a, b) => compareStrings(a.canonicalKey, b.canonicalKey));
    for (const selection of ordered) {
      const parsed = parseHttpUrl(selection.originalUrl);
      if (!parsed) {
        continue;
      }
      const localPath = localPathFromUrl(parsed, policy, preserveQuery);
      natural.set(selection.canonicalKey, { parsed, localPath });
      for (const directory of parentDirectories(localPath)) {
        directories.add(directory);
      }
    }

    const taken = new Set<string>();
    for (const [canonicalKey, { parsed, localPath }] of natural) {
      const clashes = directories.has(localPath) || taken.has(localPath);
      const planned = clashes ? hashedLocalPath(parsed, hostDirOf(parsed, policy), policy, preserveQuery) : localPath;
      taken.add(planned);
      plan.paths.set(canonicalKey, planned);
    }
    return plan;
  }

  pathFor(selection: CanonicalSelection): string | undefined {
    return this.paths.get(selection.canonicalKey) ?? localPathFor(selection.originalUrl, this.policy, this.preserveQuery);
  }
}
