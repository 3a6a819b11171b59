import path from "node:path";
import { stringify } from "csv-stringify/sync";
import { writeFileAtomic } from "../core/atomicWrite";
import { OutputPaths } from "../config";
import { GapEntry } from "../types";
import { CoverageReport, ManifestRow } from "./reporter";

export const REPORT_FILES = {
  coverage: "coverage_report.md",
  gaps: "gap_register.csv",
  manifest: "provenance_manifest.csv",
} as const;

export function renderCoverageReport(report: CoverageReport): string {
  const { summary, discoveryStatus } = report;
  const lines = [
    "# Coverage Report",
    "",
    "## Summary",
    `- Selected canonical URLs: ${summary.totalSelected}`,
    `- Recovered: ${summary.recoveredCount}`,
    `- Missing: ${summary.missingCount}`,
    `- Coverage: ${summary.coveragePercentage.toFixed(2)}%`,
    `- Keys without a capture in the window: ${summary.unselectedCount}`,
    `- Unresolved links: ${summary.unresolvedCount}`,
    `- Gap register entries: ${report.gaps.length}`,
    "",
    "## Discovery",
  ];

  if (discoveryStatus) {
    lines.push(
      `- Domain: ${discoveryStatus.domain}`,
      `- Complete: ${discoveryStatus.complete ? "yes" : "no"}`,
      `- Index pages fetched: ${discoveryStatus.pagesFetched}`,
      `- Captures discovered: ${discoveryStatus.candidateCount}`,
      `- Finished at: ${discoveryStatus.finishedAt}`,
    );
  } else {
    lines.push("- Not run");
  }

  lines.push("", "## Date-Range Confidence Notes");
  for (const note of report.notes) {
    lines.push(`- ${note}`);
  }
  return `${lines.join("\n")}\n`;
}

export function renderGapRegister(gaps: readonly GapEntry[]): string {
  return stringify(
    gaps.map((gap) => ({ ...gap, canonicalKey: gap.canonicalKey ?? "" })),
    {
      header: true,
      columns: [
        { key: "kind", header: "kind" },
        { key: "originalUrl", header: "original_url" },
        { key: "canonicalKey", header: "canonical_key" },
        { key: "reason", header: "reason" },
        { key: "suggestedAction", header: "suggested_action" },
      ],
    },
  );
}

export function renderManifest(rows: readonly ManifestRow[]): string {
  return stringify([...rows], {
    header: true,
    columns: [
      { key: "originalUrl", header: "original_url" },
      { key: "timestamp", header: "timestamp" },
      { key: "sourceUrl", header: "source_url" },
      { key: "sha256", header: "sha256" },
      { key: "localPath", header: "local_path" },
    ],
  });
}

export async function writeReports(paths: OutputPaths, report: CoverageReport): Promise<string[]> {
  const written = [
    path.join(paths.reportsDir, REPORT_FILES.coverage),
    path.join(paths.reportsDir, REPORT_FILES.gaps),
    path.join(paths.reportsDir, REPORT_FILES.manifest),
  ];
  await writeFileAtomic(written[0], renderCoverageReport(report));
  await writeFileAtomic(written[1], renderGapRegister(report.gaps));
  await writeFileAtomic(written[2], renderManifest(report.manifest));
  return written;
}
