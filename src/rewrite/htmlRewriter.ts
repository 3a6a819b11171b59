import path from "node:path";
import { load } from "cheerio";
import { canonicalKeyFromUrl, HostPolicy, hostOf, isInternalHost, isWithinDomain, parseHttpUrl, unwrapReplayUrl } from "../core/urls";
import { UnresolvedKind, UnresolvedLink } from "../types";
import { KeyIndexEntry, KeyLookup, KeyState } from "./keyIndex";

export interface RewritePolicy {
  hostPolicy: HostPolicy;
  preserveQuery: boolean;
  windowStart: string;
  windowEnd: string;
  modernCutoffExclusive: string;
}

export interface PageContext {
  /** Original URL of the page; relative references resolve against it. */
  pageUrl: string;
  /** Mirror-relative path of the page itself. */
  pageLocalPath: string;
  /**
   * The page still holds the bytes fetched from the archive, so every relative
   * reference is an original one. Otherwise relative references are first read
   * as mirror paths, the way an earlier rewrite left them.
   */
  originalMarkup?: boolean;
}

export interface RewriteResult {
  html: string;
  changed: boolean;
  rewrittenCount: number;
  unresolved: UnresolvedLink[];
  /** Keys of scheduled, non-navigational references, in document order. */
  assetKeys: string[];
}

interface AttributeTarget {
  selector: string;
  attribute: string;
  navigational: boolean;
  srcset?: boolean;
}

const ATTRIBUTE_TARGETS: readonly AttributeTarget[] = [
  { selector: "a[href], area[href]", attribute: "href", navigational: true },
  { selector: "link[href]", attribute: "href", navigational: false },
  {
    selector: "img[src], script[src], iframe[src], frame[src], embed[src], source[src], audio[src], video[src], input[src], track[src]",
    attribute: "src",
    navigational: false,
  },
  { selector: "img[srcset], source[srcset]", attribute: "srcset", navigational: false, srcset: true },
  { selector: "video[poster]", attribute: "poster", navigational: false },
  { selector: "object[data]", attribute: "data", navigational: false },
  { selector: "form[action]", attribute: "action", navigational: true },
  { selector: "body[background], table[background], td[background], th[background]", attribute: "background", navigational: false },
];

const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):/i;

export type Resolution =
  | { kind: "ignore" }
  | { kind: "local"; canonicalKey: string; state: KeyState }
  | { kind: "rewrite"; value: string; canonicalKey: string; state: KeyState }
  | { kind: "unresolved"; resolvedKind: UnresolvedKind; targetUrl: string };

const IGNORE: Resolution = { kind: "ignore" };

// Attribute values are kept entity-encoded; only the ampersand matters for URLs.
function decodeAttributeValue(value: string): string {
  return value.replace(/&amp;/gi, "&");
}

function encodePath(relative: string): string {
  return relative
    .split("/")
    .map((segment) => (segment === ".." || segment === "." ? segment : encodeURIComponent(segment)))
    .join("/");
}

/** Link from one mirror file to another, relative to the first file's directory. */
export function relativeLink(fromLocalPath: string, toLocalPath: string): string {
  const relative = path.posix.relative(path.posix.dirname(fromLocalPath), toLocalPath);
  return encodePath(relative || path.posix.basename(toLocalPath));
}

function decodePathSegments(value: string): string | undefined {
  try {
    return value
      .split("/")
      .map((segment) => decodeURIComponent(segment))
      .join("/");
  } catch {
    return undefined;
  }
}

/**
 * The selected artifact a relative reference names when read as a path inside
 * the mirror. Rewritten references never carry a query.
 */
function mirrorReferenceEntry(reference: string, page: PageContext, lookup: KeyLookup): KeyIndexEntry | undefined {
  if (page.originalMarkup || reference.startsWith("/") || reference.includes("?") || SCHEME_PATTERN.test(reference)) {
    return undefined;
  }
  const decoded = decodePathSegments(reference.split("#", 1)[0]);
  if (!decoded) {
    return undefined;
  }
  const joined = path.posix.normalize(path.posix.join(path.posix.dirname(page.pageLocalPath), decoded));
  if (joined.startsWith("../")) {
    return undefined;
  }
  return lookup.getByPath(joined);
}

function withoutFragment(url: URL): string {
  const copy = new URL(url.href);
  copy.hash = "";
  return copy.href;
}

function isOutsideWindow(timestamp: string, policy: RewritePolicy): boolean {
  return timestamp < policy.windowStart || timestamp >= policy.windowEnd || timestamp >= policy.modernCutoffExclusive;
}

export function resolveReference(raw: string, page: PageContext, policy: RewritePolicy, lookup: KeyLookup): Resolution {
  const reference = decodeAttributeValue(raw).trim();
  if (!reference || reference.startsWith("#")) {
    return IGNORE;
  }
  const scheme = SCHEME_PATTERN.exec(reference);
  if (scheme && scheme[1].toLowerCase() !== "http" && scheme[1].toLowerCase() !== "https") {
    return IGNORE;
  }
  const mirrored = mirrorReferenceEntry(reference, page, lookup);
  if (mirrored) {
    return { kind: "local", canonicalKey: mirrored.canonicalKey, state: mirrored.state };
  }

  const absolute = parseHttpUrl(reference, page.pageUrl);
  if (!absolute) {
    return IGNORE;
  }

  let target = absolute;
  let replayTimestamp: string | undefined;
  const replay = unwrapReplayUrl(absolute);
  if (replay) {
    const unwrapped = parseHttpUrl(replay.originalUrl);
    if (!unwrapped) {
      return IGNORE;
    }
    target = unwrapped;
    replayTimestamp = replay.timestamp;
  }

  const host = hostOf(target);
  const targetUrl = withoutFragment(target);
  if (!isInternalHost(host, policy.hostPolicy)) {
    return isWithinDomain(host, policy.hostPolicy) ? { kind: "unresolved", resolvedKind: "external_excluded", targetUrl } : IGNORE;
  }
  if (replayTimestamp !== undefined && isOutsideWindow(replayTimestamp, policy)) {
    return { kind: "unresolved", resolvedKind: "out_of_window", targetUrl };
  }

  const canonicalKey = canonicalKeyFromUrl(target, policy.hostPolicy, policy.preserveQuery);
  const entry = lookup.get(canonicalKey);
  if (!entry) {
    return { kind: "unresolved", resolvedKind: "missing_canonical", targetUrl };
  }
  if (entry.state === "out_of_window" || entry.localPath === undefined) {
    return { kind: "unresolved", resolvedKind: "out_of_window", targetUrl };
  }

  const fragment = target.hash;
  return {
    kind: "rewrite",
    value: `${relativeLink(page.pageLocalPath, entry.localPath)}${fragment}`,
    canonicalKey,
    state: entry.state,
  };
}

export interface SrcsetCandidate {
  url: string;
  descriptor: string;
}

/**
 * Splits a srcset value the way browsers do: a URL runs to the next
 * whitespace, so commas inside it stay. A comma ends a candidate only right
 * after the URL or after its descriptor.
 */
export function parseSrcset(value: string): SrcsetCandidate[] {
  const candidates: SrcsetCandidate[] = [];
  let position = 0;

  while (position < value.length) {
    while (position < value.length && /[\s,]/.test(value[position])) {
      position += 1;
    }
    if (position >= value.length) {
      break;
    }

    let end = position;
    while (end < value.length && !/\s/.test(value[end])) {
      end += 1;
    }
    let url = value.slice(position, end);
    position = end;

    let descriptor = "";
    if (url.endsWith(",")) {
      url = url.replace(/,+$/, "");
    } else {
      const comma = value.indexOf(",", position);
      const stop = comma < 0 ? value.length : comma;
      descriptor = value.slice(position, stop).trim();
      position = stop + 1;
    }
    if (url.length > 0) {
      candidates.push({ url, descriptor });
    }
  }
  return candidates;
}

function serializeSrcset(candidates: readonly SrcsetCandidate[]): string {
  return candidates.map((candidate) => (candidate.descriptor ? `${candidate.url} ${candidate.descriptor}` : candidate.url)).join(", ");
}

/**
 * Rewrites every internal reference of one HTML document to a relative path
 * inside the mirror. References that cannot be mapped are left as they are and
 * reported. The markup is only re-serialized when some attribute changed.
 */
export function rewriteHtml(html: string, page: PageContext, policy: RewritePolicy, lookup: KeyLookup): RewriteResult {
  const $ = load(html, { xml: { xmlMode: false, decodeEntities: false } }, false);
  const unresolved: UnresolvedLink[] = [];
  const assetKeys: string[] = [];
  const seenAssets = new Set<string>();
  let rewrittenCount = 0;

  const noteAsset = (canonicalKey: string, state: KeyState, target: AttributeTarget): void => {
    if (!target.navigational && state === "scheduled" && !seenAssets.has(canonicalKey)) {
      seenAssets.add(canonicalKey);
      assetKeys.push(canonicalKey);
    }
  };

  const resolveOne = (raw: string, target: AttributeTarget): string => {
    const resolution = resolveReference(raw, page, policy, lookup);
    switch (resolution.kind) {
      case "ignore":
        return raw;
      case "unresolved":
        unresolved.push({
          referencingArtifact: page.pageLocalPath,
          rawTarget: raw,
          resolvedKind: resolution.resolvedKind,
          targetUrl: resolution.targetUrl,
        });
        return raw;
      case "local":
        noteAsset(resolution.canonicalKey, resolution.state, target);
        return raw;
      case "rewrite":
        noteAsset(resolution.canonicalKey, resolution.state, target);
        if (resolution.value !== raw) {
          rewrittenCount += 1;
        }
        return resolution.value;
    }
  };

  const resolveSrcset = (raw: string, target: AttributeTarget): string => {
    const candidates = parseSrcset(raw);
    let touched = false;
    const next = candidates.map((candidate) => {
      const url = resolveOne(candidate.url, target);
      touched = touched || url !== candidate.url;
      return { ...candidate, url };
    });
    return touched ? serializeSrcset(next) : raw;
  };

  for (const target of ATTRIBUTE_TARGETS) {
    $(target.selector).each((_, element) => {
      const node = $(element);
      const raw = node.attr(target.attribute);
      if (raw === undefined) {
        return;
      }

      const next = target.srcset ? resolveSrcset(raw, target) : resolveOne(raw, target);
      if (next !== raw) {
        node.attr(target.attribute, next);
      }
    });
  }

  const changed = rewrittenCount > 0;
  return {
    html: changed ? $.html() : html,
    changed,
    rewrittenCount,
    unresolved,
    assetKeys,
  };
}
