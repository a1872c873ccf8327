import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  resolveConfig,
  loadConfigFile,
  loadConfig,
  toRetryPolicy,
  checkCliOverrides,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "./config.js";

// Mock fs module
vi.mock("fs", async (importOriginal) => ({
  ...(await importOriginal<typeof import("fs")>()),
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("Expected function to throw");
}

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      const config = resolveConfig();

      expect(config.downloadDir).toBe("./downloads");
      expect(config.workers).toBe(CONFIG_DEFAULTS.workers);
      expect(config.replacement).toBe("_");
      expect(config.timeoutMs).toBe(15000);
      expect(config.headTimeoutMs).toBe(15000);
      expect(config.retryAttempts).toBe(10);
      expect(config.backoffFactor).toBe(0.3);
      expect(config.maxBackoffMs).toBe(120000);
      expect(config.retryStatusCodes).toEqual([500, 502, 504]);
      expect(config.headers).toEqual({});
      expect(config.logLevel).toBe("info");
      expect(config.logJson).toBe(false);
    });

    it("user config overrides system config", () => {
      const systemConfig = { download: { workers: 3 } };
      const userConfig = { download: { workers: 8 } };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.workers).toBe(8);
    });

    it("CLI options override all configs", () => {
      const userConfig = { download: { workers: 8, dir: "/srv/mirror" } };

      const config = resolveConfig({ workers: 1 }, userConfig);

      expect(config.workers).toBe(1);
      expect(config.downloadDir).toBe("/srv/mirror");
    });

    it("ignores CLI options left undefined", () => {
      const userConfig = { http: { timeoutMs: 5000 } };

      const config = resolveConfig({ timeoutMs: undefined }, userConfig);

      expect(config.timeoutMs).toBe(5000);
    });

    it("merges headers from both config files", () => {
      const systemConfig = { http: { headers: { Referer: "http://example.com/" } } };
      const userConfig = { http: { headers: { "X-Test": "1" } } };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.headers).toEqual({ Referer: "http://example.com/", "X-Test": "1" });
    });

    it("applies retry settings from config", () => {
      const userConfig = {
        retry: { maxAttempts: 3, backoffFactor: 1, maxBackoffMs: 5000, statusCodes: [503] },
      };

      const config = resolveConfig({}, userConfig);

      expect(toRetryPolicy(config)).toEqual({
        maxAttempts: 3,
        backoffFactor: 1,
        maxBackoffMs: 5000,
        retriableStatusCodes: [503],
      });
    });

    it("applies logging settings from config", () => {
      const userConfig = { logging: { level: "debug" as const, json: true } };

      const config = resolveConfig({}, userConfig);

      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("ConfigFileSchema", () => {
    it("validates correct config", () => {
      const input = {
        download: { dir: "./mirror", workers: 2, replacement: "-" },
        http: { timeoutMs: 30000, headers: { Referer: "http://example.com/" } },
      };

      expect(ConfigFileSchema.safeParse(input).success).toBe(true);
    });

    it("validates empty config", () => {
      expect(ConfigFileSchema.safeParse({}).success).toBe(true);
    });

    it("rejects a worker count of zero", () => {
      expect(ConfigFileSchema.safeParse({ download: { workers: 0 } }).success).toBe(false);
    });

    it("rejects a multi-character replacement", () => {
      expect(ConfigFileSchema.safeParse({ download: { replacement: "--" } }).success).toBe(false);
    });

    it.each(["/", "."])("rejects %s as a replacement", (replacement) => {
      expect(ConfigFileSchema.safeParse({ download: { replacement } }).success).toBe(false);
    });

    it("rejects a status code outside the HTTP range", () => {
      expect(ConfigFileSchema.safeParse({ retry: { statusCodes: [999] } }).success).toBe(false);
    });

    it("rejects invalid logging level", () => {
      expect(ConfigFileSchema.safeParse({ logging: { level: "verbose" } }).success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined for non-existent file", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(loadConfigFile("/path/to/config.yaml")).toBeUndefined();
    });

    it("loads and parses valid YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
download:
  workers: 6
logging:
  level: debug
`);

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result?.download?.workers).toBe(6);
      expect(result?.logging?.level).toBe("debug");
    });

    it("handles empty YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      expect(loadConfigFile("/path/to/config.yaml")).toEqual({});
    });

    it("throws on invalid YAML syntax", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
download:
  workers: [invalid
`);

      const error = catchError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error).toMatchObject({ code: "VALIDATION_CONFIG_INVALID" });
      expect(error).toHaveProperty("details", expect.stringMatching(/^Invalid YAML: /));
    });

    it("throws on schema validation failure", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
download:
  workers: 999
`);

      expect(() => loadConfigFile("/path/to/config.yaml")).toThrow(
        "Config file /path/to/config.yaml has errors"
      );
    });
  });

  describe("checkCliOverrides", () => {
    it("accepts overrides within the config bounds", () => {
      expect(() =>
        checkCliOverrides({ workers: 64, timeoutMs: 100, retryAttempts: 100, replacement: "-" })
      ).not.toThrow();
    });

    it("ignores overrides left undefined", () => {
      expect(() => checkCliOverrides({ timeoutMs: undefined, workers: undefined })).not.toThrow();
    });

    it("names the flag whose value is out of range", () => {
      expect(catchError(() => checkCliOverrides({ timeoutMs: 1 }))).toMatchObject({
        code: "VALIDATION_INVALID_OPTION",
        message: "Invalid --timeout: Number must be greater than or equal to 100",
      });
      expect(() => checkCliOverrides({ retryAttempts: 100000 })).toThrow(
        "Invalid --retry: Number must be less than or equal to 100"
      );
      expect(() => checkCliOverrides({ workers: 65 })).toThrow(
        "Invalid --workers: Number must be less than or equal to 64"
      );
    });
  });

  describe("loadConfig", () => {
    it("reads system and user files when no path is given", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync)
        .mockReturnValueOnce("download:\n  workers: 2\n")
        .mockReturnValueOnce("download:\n  dir: ./mine\n");

      const { config, sources } = loadConfig();

      expect(sources).toEqual([SYSTEM_CONFIG_PATH, USER_CONFIG_PATH]);
      expect(config.workers).toBe(2);
      expect(config.downloadDir).toBe("./mine");
    });

    it("uses only the explicit file when one is named", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("download:\n  workers: 7\n");

      const { config, sources } = loadConfig("/tmp/custom.yaml", { replacement: "-" });

      expect(sources).toEqual(["/tmp/custom.yaml"]);
      expect(config.workers).toBe(7);
      expect(config.replacement).toBe("-");
    });

    it("checks overrides before reading any file", () => {
      expect(() => loadConfig(undefined, { replacement: "/" })).toThrow(
        "Invalid --replacement: must be a single letter, digit, underscore or hyphen"
      );
      expect(existsSync).not.toHaveBeenCalled();
    });

    it("fails when the explicit file does not exist", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      expect(catchError(() => loadConfig("/tmp/missing.yaml"))).toMatchObject({
        code: "FILE_NOT_READABLE",
        details: "File does not exist",
      });
    });
  });
});
