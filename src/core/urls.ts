const DEFAULT_PORTS = new Set(["80", "443"]);
const REPLAY_HOSTS = new Set(["web.archive.org", "www.web.archive.org"]);
const REPLAY_PATH_PATTERN = /^\/web\/(\d{1,14})([a-z]{2}_)?\/(.+)$/;

/**
 * Which hosts count as the site itself. Every alias in `equivalentHosts`
 * collapses onto `canonicalHost`; `domain` is the scope the index was queried with.
 */
export interface HostPolicy {
  canonicalHost: string;
  equivalentHosts: ReadonlySet<string>;
  domain: string;
}

export function normalizeHost(host: string): string {
  let normalized = host.trim().toLowerCase();
  const at = normalized.lastIndexOf("@");
  if (at >= 0) {
    normalized = normalized.slice(at + 1);
  }

  const colon = normalized.lastIndexOf(":");
  if (colon >= 0 && !normalized.endsWith("]")) {
    const port = normalized.slice(colon + 1);
    if (DEFAULT_PORTS.has(port)) {
      normalized = normalized.slice(0, colon);
    }
  }

  return normalized.replace(/\.+$/, "");
}

export function createHostPolicy(canonicalHost: string, equivalentHosts: Iterable<string>, domain?: string): HostPolicy {
  const canonical = normalizeHost(canonicalHost);
  const hosts = new Set<string>([canonical]);
  for (const host of equivalentHosts) {
    const normalized = normalizeHost(host);
    if (normalized) {
      hosts.add(normalized);
    }
  }
  return {
    canonicalHost: canonical,
    equivalentHosts: hosts,
    domain: normalizeHost(domain ?? canonical),
  };
}

/** Host with the default port dropped, taken from an already parsed URL. */
export function hostOf(url: URL): string {
  const port = url.port && !DEFAULT_PORTS.has(url.port) ? `:${url.port}` : "";
  return normalizeHost(`${url.hostname}${port}`);
}

export function canonicalizeHost(host: string, policy: HostPolicy): string {
  const normalized = normalizeHost(host);
  return policy.equivalentHosts.has(normalized) ? policy.canonicalHost : normalized;
}

export function isInternalHost(host: string, policy: HostPolicy): boolean {
  return policy.equivalentHosts.has(normalizeHost(host));
}

export function isWithinDomain(host: string, policy: HostPolicy): boolean {
  const normalized = normalizeHost(host);
  return normalized === policy.domain || normalized.endsWith(`.${policy.domain}`);
}

export function parseHttpUrl(raw: string, base?: string): URL | undefined {
  let parsed: URL;
  try {
    parsed = base === undefined ? new URL(raw) : new URL(raw, base);
  } catch {
    return undefined;
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return undefined;
  }
  return parsed;
}

/**
 * Identity used for deduplication: canonical host plus path, with the query
 * only when `preserveQuery` is set. Scheme and fragment never take part.
 */
export function canonicalKeyFor(originalUrl: string, policy: HostPolicy, preserveQuery = false): string | undefined {
  const parsed = parseHttpUrl(originalUrl);
  if (!parsed) {
    return undefined;
  }
  return canonicalKeyFromUrl(parsed, policy, preserveQuery);
}

export function canonicalKeyFromUrl(parsed: URL, policy: HostPolicy, preserveQuery = false): string {
  const host = canonicalizeHost(hostOf(parsed), policy);
  const pathname = parsed.pathname || "/";
  const query = preserveQuery ? parsed.search : "";
  return `${host}${pathname}${query}`;
}

export interface ReplayTarget {
  originalUrl: string;
  timestamp: string;
}

/**
 * Recovers the original URL from an archive replay link such as
 * `https://web.archive.org/web/20040101000000im_/http://example.org/a.gif`.
 * Partial timestamps are padded with zeros to 14 digits.
 */
export function unwrapReplayUrl(url: URL): ReplayTarget | undefined {
  if (!REPLAY_HOSTS.has(url.hostname.toLowerCase())) {
    return undefined;
  }

  const match = REPLAY_PATH_PATTERN.exec(url.pathname);
  if (!match) {
    return undefined;
  }

  const [, timestamp, , rest] = match;
  const schemeMatch = /^(https?):\/*/i.exec(rest);
  const withScheme = schemeMatch ? `${schemeMatch[1].toLowerCase()}://${rest.slice(schemeMatch[0].length)}` : `http://${rest}`;
  return {
    originalUrl: `${withScheme}${url.search}${url.hash}`,
    timestamp: timestamp.padEnd(14, "0"),
  };
}

/** Replay address for the unmodified captured bytes (`id_` mode, no archive banner). */
export function buildReplayUrl(replayBaseUrl: string, timestamp: string, originalUrl: string): string {
  return `${replayBaseUrl.replace(/\/+$/, "")}/${timestamp}id_/${originalUrl}`;
}
