import fs from "node:fs";
import { STATUS_CODES } from "node:http";
import path from "node:path";
import { AppConfig } from "../config";
import { defaultFetch, FetchLike, getFetchDispatcher, HttpResponseLike } from "../core/fetch";
import { Logger, MetricsRegistry } from "../observability";
import { EndpointDescriptor, EndpointFailure, EndpointResult } from "../types";

export interface ForecastFetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
}

type BodyResult = { ok: true; body: string } | { ok: false; failure: EndpointFailure };

function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // undici reports transport failures as "fetch failed" with the socket error as cause
  if (error.cause instanceof Error && error.cause.message !== error.message) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

export function reasonPhrase(response: Pick<HttpResponseLike, "status" | "statusText">): string {
  return response.statusText || STATUS_CODES[response.status] || "Unknown Status";
}

export function validatePayload(bytes: Buffer): BodyResult {
  let text: string;
  try {
    // keep a leading BOM so the stored file matches the body byte for byte
    text = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    return { ok: false, failure: { status: "malformed_payload", message: `invalid UTF-8: ${describeError(error)}` } };
  }

  try {
    JSON.parse(text.startsWith("\uFEFF") ? text.slice(1) : text);
  } catch (error) {
    return { ok: false, failure: { status: "malformed_payload", message: describeError(error) } };
  }

  return { ok: true, body: text };
}

async function discardBody(response: HttpResponseLike): Promise<void> {
  try {
    await response.body?.cancel();
  } catch {
    // stream already closed by the peer
  }
}

async function requestBody(endpoint: EndpointDescriptor, config: AppConfig, fetchFn: FetchLike): Promise<BodyResult> {
  const controller = new AbortController();
  let timedOut = false;
  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, config.requestTimeoutMs);

  try {
    const response = await fetchFn(endpoint.url, {
      method: "GET",
      headers: {
        "User-Agent": config.userAgent,
        Accept: "application/json",
      },
      dispatcher: getFetchDispatcher(config.ignoreHttpsErrors),
      signal: controller.signal,
    });

    if (response.status !== 200) {
      await discardBody(response);
      return {
        ok: false,
        failure: { status: "http_status_error", statusCode: response.status, reason: reasonPhrase(response) },
      };
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    return validatePayload(bytes);
  } catch (error) {
    const message = timedOut ? `request timed out after ${config.requestTimeoutMs}ms` : describeError(error);
    return { ok: false, failure: { status: "connection_error", message } };
  } finally {
    clearTimeout(timeout);
  }
}

function logFailure(logger: Logger, metrics: MetricsRegistry, endpoint: EndpointDescriptor, failure: EndpointFailure, durationMs: number): void {
  const fields = { endpointId: endpoint.id, url: endpoint.url, durationMs };
  metrics.incrementCounter("fetch_failed");
  switch (failure.status) {
    case "connection_error":
      metrics.incrementCounter("connection_errors");
      logger.warn("fetch_connection_error", { ...fields, error: failure.message });
      break;
    case "http_status_error":
      metrics.incrementCounter("http_status_errors");
      logger.warn("fetch_http_status_error", { ...fields, statusCode: failure.statusCode, reason: failure.reason });
      break;
    case "malformed_payload":
      metrics.incrementCounter("malformed_payloads");
      logger.warn("fetch_malformed_payload", { ...fields, error: failure.message });
      break;
  }
}

/**
 * Fetches one forecast document, checks that it is a 200 response carrying
 * syntactically valid JSON, and writes the body verbatim to the endpoint's file.
 *
 * Failures in the request or the payload come back as results and leave the
 * destination untouched. Filesystem errors while writing are thrown.
 */
export async function processEndpoint(endpoint: EndpointDescriptor, deps: ForecastFetcherDeps): Promise<EndpointResult> {
  const { config, logger, metrics } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const stopTimer = metrics.startTimer("fetch_ms");

  logger.info("fetch_item_start", { endpointId: endpoint.id, url: endpoint.url });
  const outcome = await requestBody(endpoint, config, fetchFn);
  const durationMs = stopTimer();

  if (!outcome.ok) {
    logFailure(logger, metrics, endpoint, outcome.failure, durationMs);
    return outcome.failure;
  }

  const filePath = path.resolve(config.outputDir, endpoint.fileName);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, outcome.body, { encoding: "utf-8", flag: "w" });
  const stats = await fs.promises.stat(filePath);

  metrics.incrementCounter("fetch_ok");
  logger.info("fetch_item_ok", {
    endpointId: endpoint.id,
    url: endpoint.url,
    fileName: endpoint.fileName,
    bytes: stats.size,
    modifiedAt: stats.mtime.toISOString(),
    durationMs,
  });

  return { status: "ok", filePath, bytes: stats.size, modifiedAt: stats.mtime };
}
