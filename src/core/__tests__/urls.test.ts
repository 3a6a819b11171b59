import { describe, expect, it } from "vitest";
import {
  buildReplayUrl,
  canonicalKeyFor,
  createHostPolicy,
  isInternalHost,
  isWithinDomain,
  normalizeHost,
  unwrapReplayUrl,
} from "../urls";

const policy = createHostPolicy("example.org", ["www.example.org"]);

describe("normalizeHost", () => {
  it("drops userinfo, default port and trailing dot", () => {
    expect(normalizeHost("User@WWW.Example.ORG.:443")).toBe("www.example.org");
  });

  it("keeps non-default ports", () => {
    expect(normalizeHost("example.org:8080")).toBe("example.org:8080");
  });
});

describe("canonicalKeyFor", () => {
  it("folds aliases onto the canonical host and strips query and fragment", () => {
    expect(canonicalKeyFor("http://www.example.org:80/comics/1.html?x=1#top", policy)).toBe("example.org/comics/1.html");
  });

  it("keeps the query when asked to", () => {
    expect(canonicalKeyFor("http://www.example.org/comics/1.html?x=1#top", policy, true)).toBe(
      "example.org/comics/1.html?x=1",
    );
  });

  it("ignores the scheme and defaults the path", () => {
    expect(canonicalKeyFor("https://EXAMPLE.org", policy)).toBe("example.org/");
    expect(canonicalKeyFor("http://example.org/", policy)).toBe("example.org/");
  });

  it("leaves hosts outside the equivalence set alone", () => {
    expect(canonicalKeyFor("http://cdn.example.org/a.png", policy)).toBe("cdn.example.org/a.png");
  });

  it("rejects non-http URLs", () => {
    expect(canonicalKeyFor("ftp://example.org/x", policy)).toBeUndefined();
    expect(canonicalKeyFor("not a url", policy)).toBeUndefined();
  });
});

describe("host classification", () => {
  it("treats aliases as internal and subdomains as in-domain", () => {
    expect(isInternalHost("WWW.example.org", policy)).toBe(true);
    expect(isInternalHost("cdn.example.org", policy)).toBe(false);
    expect(isWithinDomain("cdn.example.org", policy)).toBe(true);
    expect(isWithinDomain("notexample.org", policy)).toBe(false);
  });
});

describe("replay URLs", () => {
  it("unwraps an archived link with a mode suffix", () => {
    const target = unwrapReplayUrl(new URL("https://web.archive.org/web/20040101000000im_/http://example.org/a.gif"));
    expect(target).toEqual({ originalUrl: "http://example.org/a.gif", timestamp: "20040101000000" });
  });

  it("pads partial timestamps", () => {
    const target = unwrapReplayUrl(new URL("https://web.archive.org/web/2004/http://example.org/"));
    expect(target).toEqual({ originalUrl: "http://example.org/", timestamp: "20040000000000" });
  });

  it("ignores links that are not on the archive host", () => {
    expect(unwrapReplayUrl(new URL("http://example.org/web/2004/http://example.org/"))).toBeUndefined();
  });

  it("builds raw-capture replay addresses", () => {
    expect(buildReplayUrl("https://web.archive.org/web/", "20040101000000", "http://example.org/")).toBe(
      "https://web.archive.org/web/20040101000000id_/http://example.org/",
    );
  });
});
