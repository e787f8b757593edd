import { afterEach, describe, expect, it, vi } from "vitest";
import { createRunId, isLogLevel, Logger, MetricsRegistry } from "../../src/observability";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes one JSON line with context and fields", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run_test" }).child("convert");

    logger.info("convert_file_ok", { sourceId: "src-1", tableCount: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(log.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: "info",
      msg: "convert_file_ok",
      component: "convert",
      runId: "run_test",
      sourceId: "src-1",
      tableCount: 2,
    });
  });

  it("sends errors to stderr", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    new Logger({ component: "cli", runId: "run_test" }).error("convert_file_failed");

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("drops entries below the minimum level, also in children", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const logger = new Logger({ component: "cli", runId: "run_test", minLevel: "warn" }).child("converter");

    logger.debug("convert_complete");
    logger.info("convert_start");
    logger.warn("language_check_failed");

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0][0])).msg).toBe("language_check_failed");
  });

  it("recognizes log level names", () => {
    expect(["debug", "warn", "verbose"].filter(isLogLevel)).toEqual(["debug", "warn"]);
  });
});

describe("MetricsRegistry", () => {
  it("accumulates counters and timer samples", () => {
    const metrics = new MetricsRegistry();

    metrics.incrementCounter("files_converted");
    metrics.incrementCounter("files_converted", 2);
    metrics.startTimer("convert_ms")();

    expect(metrics.getCounters().files_converted).toBe(3);
    expect(metrics.getCounters().files_failed).toBe(0);
    expect(metrics.getTimerSummaries().convert_ms.count).toBe(1);
  });
});

describe("createRunId", () => {
  it("prefixes a filesystem-safe timestamp", () => {
    const runId = createRunId(new Date("2026-03-04T05:06:07.089Z"));

    expect(runId).toMatch(/^convert_2026-03-04T05-06-07-089Z_[a-z0-9]{0,6}$/);
  });
});
