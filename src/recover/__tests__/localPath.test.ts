import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import { createHostPolicy } from "../../core/urls";
import { CanonicalSelection } from "../../types";
import { HASHED_DIR, LocalPathPlan, localPathFor } from "../localPath";

const policy = createHostPolicy("example.org", ["www.example.org"]);

function hashed(key: string): string {
  return crypto.createHash("sha256").update(key).digest("hex").slice(0, 24);
}

describe("localPathFor", () => {
  it("maps directory URLs to index.html under the canonical host", () => {
    expect(localPathFor("http://www.example.org/", policy)).toBe("example.org/index.html");
    expect(localPathFor("http://example.org", policy)).toBe("example.org/index.html");
    expect(localPathFor("http://example.org/comics/", policy)).toBe("example.org/comics/index.html");
  });

  it("keeps plain file names", () => {
    expect(localPathFor("http://example.org/comics/1.html", policy)).toBe("example.org/comics/1.html");
    expect(localPathFor("https://cdn.example.org/img/logo.gif", policy)).toBe("cdn.example.org/img/logo.gif");
  });

  it("replaces the port separator in the host directory", () => {
    expect(localPathFor("http://example.org:8080/a.html", policy)).toBe("example.org_8080/a.html");
  });

  it("drops the query unless it is preserved", () => {
    expect(localPathFor("http://example.org/list.php?page=2", policy)).toBe("example.org/list.php");
    expect(localPathFor("http://example.org/list.php?page=2", policy, true)).toBe(
      `example.org/${HASHED_DIR}/${hashed("example.org/list.php?page=2")}.php`,
    );
  });

  it("hashes segments that are not plain file names", () => {
    expect(localPathFor("http://example.org/my%20page.html", policy)).toBe(
      `example.org/${HASHED_DIR}/${hashed("example.org/my%20page.html")}.html`,
    );
  });

  it("never escapes the host directory", () => {
    const mapped = localPathFor("http://example.org/a/..%2f..%2fetc%2fpasswd", policy);
    expect(mapped?.startsWith(`example.org/${HASHED_DIR}/`)).toBe(true);
  });

  it("keeps the hash directory name for fallbacks", () => {
    expect(localPathFor("http://example.org/__hashed__/a.html", policy)).toBe(
      `example.org/${HASHED_DIR}/${hashed("example.org/__hashed__/a.html")}.html`,
    );
  });

  it("returns undefined for non-http URLs", () => {
    expect(localPathFor("mailto:someone@example.org", policy)).toBeUndefined();
  });
});

function selection(url: string): CanonicalSelection {
  const parsed = new URL(url);
  return {
    canonicalKey: `${parsed.host}${parsed.pathname}`,
    originalUrl: url,
    timestamp: "20050101000000",
    statusCode: 200,
    mimeType: "text/html",
  };
}

describe("LocalPathPlan", () => {
  it("moves a file that another selection needs as a directory", () => {
    const file = selection("http://example.org/x");
    const child = selection("http://example.org/x/y.html");

    const plan = LocalPathPlan.build([file, child], policy);

    expect(plan.pathFor(file)).toBe(`example.org/${HASHED_DIR}/${hashed("example.org/x")}`);
    expect(plan.pathFor(child)).toBe("example.org/x/y.html");
  });

  it("gives a shared path to the first key in canonical order", () => {
    const directory = selection("http://example.org/x/");
    const explicit = selection("http://example.org/x/index.html");

    const plan = LocalPathPlan.build([explicit, directory], policy);

    expect(plan.pathFor(directory)).toBe("example.org/x/index.html");
    expect(plan.pathFor(explicit)).toBe(`example.org/${HASHED_DIR}/${hashed("example.org/x/index.html")}.html`);
  });

  it("does not depend on selection order", () => {
    const selections = [
      selection("http://example.org/a"),
      selection("http://example.org/a/b"),
      selection("http://example.org/a/b/c.gif"),
      selection("http://example.org/d.html"),
    ];

    const forward = LocalPathPlan.build(selections, policy);
    const backward = LocalPathPlan.build([...selections].reverse(), policy);

    expect(selections.map((item) => backward.pathFor(item))).toEqual(selections.map((item) => forward.pathFor(item)));
    expect(forward.pathFor(selections[1])).toBe(`example.org/${HASHED_DIR}/${hashed("example.org/a/b")}`);
    expect(forward.pathFor(selections[3])).toBe("example.org/d.html");
  });

  it("falls back to the plain mapping for selections it was not built with", () => {
    const plan = LocalPathPlan.build([], policy);

    expect(plan.pathFor(selection("http://www.example.org/comics/"))).toBe("example.org/comics/index.html");
  });
});
