import { afterEach, expect, test, vi } from "vitest";
import {
  consoleLogger,
  defaultConfig,
  resolveConfig,
} from "../src/config.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

test("resolveConfig falls back to the defaults", () => {
  expect(resolveConfig()).toEqual(defaultConfig);
  expect(resolveConfig({ vendor: undefined })).toEqual(defaultConfig);
});

test("resolveConfig applies overrides", () => {
  const logger = { info: vi.fn(), warn: vi.fn() };
  const config = resolveConfig({ coverDescription: "Cover", logger });

  expect(config.vendor).toBe(defaultConfig.vendor);
  expect(config.coverDescription).toBe("Cover");
  expect(config.logger).toBe(logger);
});

test("consoleLogger prefixes its messages", () => {
  const log = vi.spyOn(console, "log").mockImplementation(() => {});
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

  consoleLogger.info("saved");
  consoleLogger.warn("no cover");

  expect(log).toHaveBeenCalledWith("[Metadata] saved");
  expect(warn).toHaveBeenCalledWith("[Metadata] Warning: no cover");
});
