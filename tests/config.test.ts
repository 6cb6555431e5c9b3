import { describe, it, expect, vi, afterEach } from "vitest";
import { loadConfig, loadEnvFiles } from "../server/config";
import { logger } from "../server/logger";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({ PORT: 5000, LOG_LEVEL: "info" });
  });

  it("coerces the port", () => {
    expect(loadConfig({ PORT: "8080", LOG_LEVEL: "debug" })).toEqual({ PORT: 8080, LOG_LEVEL: "debug" });
  });

  it("rejects unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
  });

  it("skips env files that do not exist", () => {
    expect(() => loadEnvFiles(["does-not-exist.env"])).not.toThrow();
  });
});

describe("logger", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it("tags lines with the component and respects LOG_LEVEL", () => {
    vi.stubEnv("LOG_LEVEL", "warn");
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    logger.info("crawler", "hidden");
    logger.warn("crawler", "shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[crawler] shown");
  });

  it("passes metadata through", () => {
    vi.stubEnv("LOG_LEVEL", "debug");
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    logger.debug("discovery", "details", { urls: 3 });

    expect(debug).toHaveBeenCalledWith("[discovery] details", { urls: 3 });
  });
});
