import { describe, it, expect, afterEach, vi } from "vitest";
import { logger } from "./logs.js";

describe("logger", () => {
  afterEach(() => {
    logger.setLevel("warn");
    logger.setEnabled(true);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("should skip info events at the default level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.info("store.open");
    expect(warn).not.toHaveBeenCalled();
  });

  it("should format table, collection, message and details", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    logger.setLevel("info");
    logger.info("table.verify", {
      table: "owners",
      collection: "owners/by_value",
      message: "checked",
      details: { missing: 0 },
    });
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0]?.[0]).toMatch(
      /^\[[^\]]+\] \[INFO\] \[table\.verify\] owners\/owners\/by_value checked \{"missing":0\}$/
    );
  });

  it("should write errors to console.error", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.error("store.compact.failed", { message: "disk full" });
    expect(error.mock.calls[0]?.[0]).toMatch(/\[ERROR\] \[store\.compact\.failed\] disk full$/);
  });

  it("should write debug events only with ORDTAB_DEBUG", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.stubEnv("ORDTAB_DEBUG", "");
    logger.debug("table.clear");
    expect(debug).not.toHaveBeenCalled();

    vi.stubEnv("ORDTAB_DEBUG", "1");
    logger.debug("table.clear");
    expect(debug).toHaveBeenCalledTimes(1);
  });

  it("should drop everything when disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    logger.setEnabled(false);
    logger.error("store.open");
    expect(error).not.toHaveBeenCalled();
  });
});
