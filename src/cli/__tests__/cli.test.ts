import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeTempDir, removeDir } from "../../__tests__/helpers/fakes";
import { ConfigError } from "../../core/errors";
import { getHelpText, parseCliArgs, runCli } from "../index";

describe("parseCliArgs", () => {
  it("collects options into config overrides", () => {
    const parsed = parseCliArgs([
      "run",
      "--domain",
      "example.org",
      "--equivalent-host",
      "www.example.org",
      "--equivalent-host",
      "example.org",
      "--max-selections",
      "5",
      "--to-date",
      "2009-12-31",
      "--preserve-query",
      "--config",
      "mirror.json",
    ]);

    expect(parsed).toEqual({
      command: "run",
      configPath: "mirror.json",
      overrides: {
        domain: "example.org",
        toDate: "2009-12-31",
        equivalentHosts: ["www.example.org", "example.org"],
        maxSelections: 5,
        preserveQuery: true,
      },
    });
  });

  it("shows help for unknown commands and help flags", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["run", "-h"])).toBe("help");
  });

  it("rejects malformed option values", () => {
    expect(() => parseCliArgs(["recover", "--max-selections", "many"])).toThrow(ConfigError);
    expect(() => parseCliArgs(["recover", "--domain"])).toThrow("--domain needs a value");
  });
});

describe("runCli", () => {
  let outputRoot: string;

  beforeEach(() => {
    outputRoot = makeTempDir();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(outputRoot);
  });

  it("prints help", async () => {
    await expect(runCli(["--help"], {})).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(getHelpText());
  });

  it("writes reports from empty state", async () => {
    const exitCode = await runCli(["report", "--domain", "example.org", "--output-root", outputRoot], {});

    expect(exitCode).toBe(0);
    expect(fs.readdirSync(path.join(outputRoot, "reports")).sort()).toEqual([
      "coverage_report.md",
      "gap_register.csv",
      "provenance_manifest.csv",
    ]);
  });

  it("refuses to run without a domain", async () => {
    await expect(runCli(["report", "--output-root", outputRoot], {})).rejects.toThrow("domain is required");
  });
});
