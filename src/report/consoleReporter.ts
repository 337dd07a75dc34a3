import path from "node:path";
import { EndpointDescriptor, EndpointResult, FileAvailability, RunSummary } from "../types";

export interface CollectionReporter {
  runStarted(startedAt: Date): void;
  attemptStarted(endpoint: EndpointDescriptor): void;
  attemptFinished(endpoint: EndpointDescriptor, result: EndpointResult): void;
  runFinished(summary: RunSummary): void;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `dd/mm/yyyy HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatSuccessRate(rate: number): string {
  return rate.toFixed(1);
}

export function formatAttemptStart(endpoint: EndpointDescriptor): string[] {
  return [`--- Processing ${endpoint.id.toUpperCase()} ---`, `Processing: ${endpoint.description}`, `Source: ${endpoint.url}`];
}

export function formatAttemptResult(result: EndpointResult): string[] {
  switch (result.status) {
    case "ok":
      return [
        `SUCCESS: File ${path.basename(result.filePath)} created`,
        `Size: ${result.bytes} bytes`,
        `Timestamp: ${formatTimestamp(result.modifiedAt)}`,
        "",
      ];
    case "connection_error":
      return [`ERROR - Connection failure: ${result.message}`, "FAILURE: Unable to reach the forecast server"];
    case "http_status_error":
      return [`HTTP ERROR: ${result.statusCode} - ${result.reason}`];
    case "malformed_payload":
      return [`ERROR - Corrupted JSON data: ${result.message}`, "FAILURE: Invalid data structure received"];
  }
}

export function formatAvailability(entries: FileAvailability[]): string[] {
  return entries.map((entry) =>
    entry.available
      ? `✓ ${entry.fileName} - Available ( ${entry.bytes ?? 0} bytes )`
      : `✗ ${entry.fileName} - Unavailable`,
  );
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    "=== FINAL REPORT ===",
    `Operations completed: ${summary.successes + summary.failures}`,
    `Successes: ${summary.successes}`,
    `Failures: ${summary.failures}`,
    `Success rate: ${formatSuccessRate(summary.successRate)} %`,
    `Completed: ${formatTimestamp(summary.finishedAt)}`,
  ];

  if (summary.successes > 0) {
    lines.push("", "=== AVAILABLE FILES ===", ...formatAvailability(summary.availability));
  }
  return lines;
}

export class ConsoleReporter implements CollectionReporter {
  private readonly write: (line: string) => void;

  constructor(write: (line: string) => void = console.log) {
    this.write = write;
  }

  runStarted(startedAt: Date): void {
    this.writeLines([
      "=== IPMA WEATHER DATA COLLECTION ===",
      `Started: ${formatTimestamp(startedAt)}`,
      "Model: RCM (Regional Climate Model)",
      "Coverage: Portuguese national territory",
      "",
    ]);
  }

  attemptStarted(endpoint: EndpointDescriptor): void {
    this.writeLines(formatAttemptStart(endpoint));
  }

  attemptFinished(_endpoint: EndpointDescriptor, result: EndpointResult): void {
    this.writeLines(formatAttemptResult(result));
  }

  runFinished(summary: RunSummary): void {
    this.writeLines(formatSummary(summary));
  }

  availability(entries: FileAvailability[]): void {
    this.writeLines(["=== AVAILABLE FILES ===", ...formatAvailability(entries)]);
  }

  private writeLines(lines: string[]): void {
    for (const line of lines) {
      this.write(line);
    }
  }
}
