import fs from "node:fs";
import path from "node:path";
import { AppConfig, FORECAST_ENDPOINTS } from "../config";
import { processEndpoint } from "../download/forecastFetcher";
import { Logger, MetricsRegistry } from "../observability";
import { CollectionReporter } from "../report/consoleReporter";
import { EndpointDescriptor, EndpointResult, FileAvailability, RunSummary } from "../types";
import { FetchLike } from "./fetch";

export interface CollectorDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  reporter?: CollectionReporter;
  endpoints?: readonly EndpointDescriptor[];
  fetchFn?: FetchLike;
  sleepFn?: (ms: number) => Promise<void>;
  now?: () => Date;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function computeSuccessRate(successes: number, failures: number): number {
  const total = successes + failures;
  if (total === 0) {
    throw new RangeError("cannot compute success rate for an empty run");
  }
  return Math.round((successes / total) * 1000) / 10;
}

export function checkAvailability(
  endpoints: readonly EndpointDescriptor[],
  outcomes: ReadonlyMap<string, boolean>,
  outputDir: string,
): FileAvailability[] {
  return endpoints.map((endpoint) => {
    const filePath = path.resolve(outputDir, endpoint.fileName);
    const base = { id: endpoint.id, fileName: endpoint.fileName, filePath };
    if (outcomes.get(endpoint.id) !== true || !fs.existsSync(filePath)) {
      return { ...base, available: false };
    }
    return { ...base, available: true, bytes: fs.statSync(filePath).size };
  });
}

export async function runCollection(deps: CollectorDeps): Promise<RunSummary> {
  const { config, logger, metrics, reporter } = deps;
  const endpoints = deps.endpoints ?? FORECAST_ENDPOINTS;
  const sleepFn = deps.sleepFn ?? sleep;
  const now = deps.now ?? (() => new Date());

  const startedAt = now();
  const outcomes = new Map<string, boolean>();
  const results = new Map<string, EndpointResult>();
  let successes = 0;
  let failures = 0;

  reporter?.runStarted(startedAt);
  logger.info("collect_start", { endpoints: endpoints.map((endpoint) => endpoint.id) });

  for (const [index, endpoint] of endpoints.entries()) {
    reporter?.attemptStarted(endpoint);
    const result = await processEndpoint(endpoint, {
      config,
      logger,
      metrics,
      fetchFn: deps.fetchFn,
    });
    reporter?.attemptFinished(endpoint, result);

    results.set(endpoint.id, result);
    outcomes.set(endpoint.id, result.status === "ok");
    if (result.status === "ok") {
      successes += 1;
    } else {
      failures += 1;
    }

    if (index < endpoints.length - 1) {
      await sleepFn(config.pauseBetweenRequestsMs);
    }
  }

  const summary: RunSummary = {
    outcomes,
    results,
    successes,
    failures,
    successRate: computeSuccessRate(successes, failures),
    startedAt,
    finishedAt: now(),
    availability: checkAvailability(endpoints, outcomes, config.outputDir),
  };

  reporter?.runFinished(summary);
  logger.info("collect_complete", {
    successes,
    failures,
    successRate: summary.successRate,
  });
  return summary;
}
