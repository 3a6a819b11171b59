import { ConfigOverrides, finalizeConfig, loadConfig } from "../config";
import { EXIT_CODES, runDiscover, runPipeline, runRecover, runReport } from "../core/commands";
import { ConfigError } from "../core/errors";
import { createFetchFn } from "../core/fetch";
import { Pacer, systemClock } from "../core/pacing";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { createStateStore } from "../store";

export type CommandName = "discover" | "recover" | "report" | "run";

export interface ParsedCliArgs {
  command: CommandName;
  configPath?: string;
  overrides: ConfigOverrides;
}

const HELP_TEXT = `
Usage:
  archive-mirror <command> [options]

Commands:
  discover   Walk the capture index and select one capture per canonical URL
  recover    Fetch selected captures into the mirror and rewrite their links
  report     Write coverage report, gap register and provenance manifest
  run        discover, recover and report in one go

Options:
  --config <path>               Optional path to JSON config file
  --domain <host>               Domain to mirror
  --canonical-host <host>       Host the mirror is laid out under
  --equivalent-host <host>      Host treated as the same site (repeatable)
  --from-date <YYYY-MM-DD>      First day of the capture window
  --to-date <YYYY-MM-DD>        Last day of the capture window
  --modern-cutoff-date <date>   Captures on or after this day are never used
  --output-root <dir>           Where site/, state/ and reports/ are written
  --max-selections <n>          Recover at most n selections per run (0 = all)
  --request-interval-ms <n>     Minimum gap between network calls
  --only-missing-from <csv>     Restrict recovery to URLs listed in a gap register
  --preserve-query              Keep query strings in canonical keys
  --ignore-https-errors         Ignore TLS certificate errors (use only when required)
  -h, --help                    Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "discover" || raw === "recover" || raw === "report" || raw === "run") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  if (index < 0) {
    return undefined;
  }
  const value = argv[index + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new ConfigError(`${flag} needs a value`);
  }
  return value;
}

function optionValues(argv: string[], flag: string): string[] {
  const values: string[] = [];
  argv.forEach((arg, index) => {
    if (arg !== flag) {
      return;
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new ConfigError(`${flag} needs a value`);
    }
    values.push(value);
  });
  return values;
}

function intOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${flag} must be a non-negative integer, got "${raw}"`);
  }
  return Number.parseInt(raw, 10);
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const overrides: ConfigOverrides = {};
  const stringFlags = [
    ["--domain", "domain"],
    ["--canonical-host", "canonicalHost"],
    ["--from-date", "fromDate"],
    ["--to-date", "toDate"],
    ["--modern-cutoff-date", "modernCutoffDate"],
    ["--output-root", "outputRoot"],
    ["--only-missing-from", "onlyMissingFrom"],
  ] as const;
  for (const [flag, field] of stringFlags) {
    const value = optionValue(argv, flag);
    if (value !== undefined) {
      overrides[field] = value;
    }
  }

  const equivalentHosts = optionValues(argv, "--equivalent-host");
  if (equivalentHosts.length > 0) {
    overrides.equivalentHosts = equivalentHosts;
  }

  const maxSelections = intOption(argv, "--max-selections");
  if (maxSelections !== undefined) {
    overrides.maxSelections = maxSelections;
  }
  const requestIntervalMs = intOption(argv, "--request-interval-ms");
  if (requestIntervalMs !== undefined) {
    overrides.requestIntervalMs = requestIntervalMs;
  }
  if (argv.includes("--preserve-query")) {
    overrides.preserveQuery = true;
  }
  if (argv.includes("--ignore-https-errors")) {
    overrides.ignoreHttpsErrors = true;
  }

  return {
    command,
    configPath: optionValue(argv, "--config"),
    overrides,
  };
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return EXIT_CODES.completed;
  }

  const config = finalizeConfig({ ...loadConfig(parsed.configPath, env), ...parsed.overrides });
  const runId = createRunId(parsed.command);
  const store = createStateStore(config);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const context = {
    runId,
    config,
    store,
    logger,
    metrics,
    fetchFn: createFetchFn(config.ignoreHttpsErrors),
    clock: systemClock,
    pacer: new Pacer(systemClock, config.requestIntervalMs),
  };

  logger.info("command_start", {
    command: parsed.command,
    domain: config.domain,
    canonicalHost: config.canonicalHost,
    equivalentHosts: config.equivalentHosts,
    fromDate: config.fromDate,
    toDate: config.toDate,
    modernCutoffDate: config.modernCutoffDate,
    outputRoot: config.outputRoot,
    maxSelections: config.maxSelections,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    let exitCode: number = EXIT_CODES.completed;
    switch (parsed.command) {
      case "discover": {
        const outcome = await runDiscover({ ...context, logger: logger.child("discover") });
        exitCode = outcome.status.complete ? EXIT_CODES.completed : EXIT_CODES.partialDiscovery;
        break;
      }
      case "recover":
        await runRecover({ ...context, logger: logger.child("recover") });
        break;
      case "report":
        await runReport({ ...context, logger: logger.child("report") });
        break;
      case "run":
        exitCode = await runPipeline({ ...context, logger: logger.child("pipeline") });
        break;
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return EXIT_CODES.halted;
    }

    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    metrics.printSummary(runId);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
