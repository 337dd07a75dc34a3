import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG, FORECAST_ENDPOINTS } from "../config";
import { Logger, MetricsRegistry } from "../observability";
import { ConsoleReporter } from "../report/consoleReporter";
import { checkAvailability, computeSuccessRate, runCollection } from "./collector";
import { createMockFetch } from "./mockFetch";

const [today, tomorrow] = FORECAST_ENDPOINTS;

describe("runCollection", () => {
  let outputDir: string;
  let config: AppConfig;
  let lines: string[];
  const logger = new Logger({ component: "test", runId: "run_test", minLevel: "error" });
  const sleepFn = vi.fn(async (_ms: number) => undefined);
  const now = () => new Date(2025, 0, 2, 3, 4, 5);

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "collector-"));
    config = { ...DEFAULT_CONFIG, outputDir };
    lines = [];
    sleepFn.mockClear();
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  function deps(fetchFn: ReturnType<typeof createMockFetch>["fetchFn"]) {
    return {
      config,
      logger,
      metrics: new MetricsRegistry(),
      reporter: new ConsoleReporter((line) => lines.push(line)),
      fetchFn,
      sleepFn,
      now,
    };
  }

  it("stores both forecasts when every endpoint succeeds", async () => {
    const { fetchFn } = createMockFetch({
      [today.url]: { status: 200, body: '{"a":1}' },
      [tomorrow.url]: { status: 200, body: '{"b":2}' },
    });

    const summary = await runCollection(deps(fetchFn));

    expect(summary.successes).toBe(2);
    expect(summary.failures).toBe(0);
    expect(summary.successRate).toBe(100);
    expect(lines).toContain("Success rate: 100.0 %");
    expect([...summary.outcomes]).toEqual([
      ["d0", true],
      ["d1", true],
    ]);
    expect(fs.readFileSync(path.join(outputDir, "rcm-d0.json"), "utf-8")).toBe('{"a":1}');
    expect(fs.readFileSync(path.join(outputDir, "rcm-d1.json"), "utf-8")).toBe('{"b":2}');
    expect(summary.availability.map((entry) => [entry.fileName, entry.available, entry.bytes])).toEqual([
      ["rcm-d0.json", true, 7],
      ["rcm-d1.json", true, 7],
    ]);
  });

  it("keeps going after a failed endpoint", async () => {
    const { fetchFn } = createMockFetch({
      [today.url]: { status: 200, body: '{"a":1}' },
      [tomorrow.url]: { status: 500, statusText: "Internal Server Error" },
    });

    const summary = await runCollection(deps(fetchFn));

    expect(summary.successes).toBe(1);
    expect(summary.failures).toBe(1);
    expect(summary.successRate).toBe(50);
    expect(summary.results.get("d1")).toEqual({
      status: "http_status_error",
      statusCode: 500,
      reason: "Internal Server Error",
    });
    expect(fs.readdirSync(outputDir)).toEqual(["rcm-d0.json"]);
    expect(lines).toContain("HTTP ERROR: 500 - Internal Server Error");
    expect(lines).toContain("Success rate: 50.0 %");
    expect(lines.slice(-2)).toEqual(["✓ rcm-d0.json - Available ( 7 bytes )", "✗ rcm-d1.json - Unavailable"]);
  });

  it("requests the endpoints in their defined order", async () => {
    const { fetchFn, requests } = createMockFetch({
      [today.url]: { status: 200, body: "{}" },
      [tomorrow.url]: { status: 200, body: "{}" },
    });

    await runCollection(deps(fetchFn));

    expect(requests.map((request) => request.url)).toEqual([today.url, tomorrow.url]);
  });

  it("pauses between endpoints but not after the last one", async () => {
    const { fetchFn } = createMockFetch({
      [today.url]: { status: 200, body: "{}" },
      [tomorrow.url]: { status: 200, body: "{}" },
    });

    await runCollection(deps(fetchFn));

    expect(sleepFn).toHaveBeenCalledTimes(1);
    expect(sleepFn).toHaveBeenCalledWith(2_000);
  });

  it("prints the final report with the completion time", async () => {
    const { fetchFn } = createMockFetch({});

    const summary = await runCollection(deps(fetchFn));

    expect(summary.successRate).toBe(0);
    expect(lines.slice(-6)).toEqual([
      "=== FINAL REPORT ===",
      "Operations completed: 2",
      "Successes: 0",
      "Failures: 2",
      "Success rate: 0.0 %",
      "Completed: 02/01/2025 03:04:05",
    ]);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it("refuses to summarise an empty endpoint list", async () => {
    const { fetchFn } = createMockFetch({});

    await expect(runCollection({ ...deps(fetchFn), endpoints: [] })).rejects.toThrow(RangeError);
  });
});

describe("computeSuccessRate", () => {
  it("rounds to one decimal place", () => {
    expect(computeSuccessRate(2, 1)).toBe(66.7);
    expect(computeSuccessRate(1, 2)).toBe(33.3);
  });

  it("throws when nothing was processed", () => {
    expect(() => computeSuccessRate(0, 0)).toThrow("cannot compute success rate for an empty run");
  });
});

describe("checkAvailability", () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), "availability-"));
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it("reports a successful file that has since been removed as unavailable", () => {
    fs.writeFileSync(path.join(outputDir, "rcm-d1.json"), "[1]");
    const outcomes = new Map([
      ["d0", true],
      ["d1", true],
    ]);

    const entries = checkAvailability(FORECAST_ENDPOINTS, outcomes, outputDir);

    expect(entries).toEqual([
      { id: "d0", fileName: "rcm-d0.json", filePath: path.join(outputDir, "rcm-d0.json"), available: false },
      { id: "d1", fileName: "rcm-d1.json", filePath: path.join(outputDir, "rcm-d1.json"), available: true, bytes: 3 },
    ]);
  });

  it("ignores files left over from an earlier run when this run failed", () => {
    fs.writeFileSync(path.join(outputDir, "rcm-d0.json"), "{}");

    const entries = checkAvailability(FORECAST_ENDPOINTS, new Map([["d0", false]]), outputDir);

    expect(entries.map((entry) => entry.available)).toEqual([false, false]);
  });
});
