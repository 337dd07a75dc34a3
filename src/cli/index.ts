import { FORECAST_ENDPOINTS, loadConfig } from "../config";
import { checkAvailability, CollectorDeps, runCollection } from "../core/collector";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { ConsoleReporter } from "../report/consoleReporter";

export type CommandName = "run" | "status";

export interface ParsedCliArgs {
  command: CommandName;
  failOnError: boolean;
  ignoreHttpsErrors: boolean;
  outputDir?: string;
  configPath?: string;
}

const HELP_TEXT = `
Usage:
  ipma-forecast-collector <command> [options]

Commands:
  run     Download today's and tomorrow's RCM forecasts
  status  Show which forecast files are present on disk

Options:
  --config <path>        Optional path to JSON config file
  --output-dir <dir>     Directory the forecast files are written to
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  --fail-on-error        Exit with status 1 when any forecast could not be fetched
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  if (raw === "run" || raw === "status") {
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
  return value && !value.startsWith("--") ? value : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    failOnError: argv.includes("--fail-on-error"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    outputDir: optionValue(argv, "--output-dir"),
    configPath: optionValue(argv, "--config"),
  };
}

export type CliOverrides = Pick<CollectorDeps, "fetchFn" | "sleepFn">;

export async function runCli(argv: string[], overrides: CliOverrides = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  let config = loadConfig(parsed.configPath);
  if (parsed.ignoreHttpsErrors) {
    config = { ...config, ignoreHttpsErrors: true };
  }
  if (parsed.outputDir !== undefined) {
    config = { ...config, outputDir: parsed.outputDir };
  }

  const runId = createRunId();
  const minLevel = parseLogLevel(process.env.LOG_LEVEL, "warn");
  const logger = new Logger({ component: "cli", runId, minLevel });
  const metrics = new MetricsRegistry();
  const reporter = new ConsoleReporter();

  logger.info("command_start", {
    command: parsed.command,
    outputDir: config.outputDir,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
  });

  try {
    switch (parsed.command) {
      case "run": {
        console.log("Starting systematic weather data collection...\n");
        const summary = await runCollection({
          config,
          logger: logger.child("collector"),
          metrics,
          reporter,
          fetchFn: overrides.fetchFn,
          sleepFn: overrides.sleepFn,
        });
        logger.info("command_complete", { command: parsed.command });
        return parsed.failOnError && summary.failures > 0 ? 1 : 0;
      }
      case "status": {
        const everyEndpoint = new Map(FORECAST_ENDPOINTS.map((endpoint) => [endpoint.id, true]));
        reporter.availability(checkAvailability(FORECAST_ENDPOINTS, everyEndpoint, config.outputDir));
        logger.info("command_complete", { command: parsed.command });
        return 0;
      }
      default:
        console.error(`Unsupported command: ${String(parsed.command)}`);
        return 1;
    }
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
