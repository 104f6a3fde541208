/**
 * Configuration loading tests
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { CONFIG_FILE_NAME, envOverrides, loadConfig } from "../src/core/config";
import { ConfigurationError } from "../src/core/errors";

describe("loadConfig", () => {
  let cwd: string;

  const writeConfig = (content: unknown) =>
    fs.writeFileSync(path.join(cwd, CONFIG_FILE_NAME), JSON.stringify(content), "utf8");

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "sentinel-config-"));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  test("defaults apply without a file or environment", () => {
    const config = loadConfig({ cwd, env: {} });

    expect(config.siteName).toBe("Login Sentinel");
    expect(config.port).toBe(4000);
    expect(config.jwtSecret).toBeUndefined();
    expect(config.bruteForce).toEqual({});
    expect(config.storage).toEqual({ redisPrefix: "sentinel:", dataFile: "./data/sentinel.json" });
    expect(config.logger).toEqual({ level: "info", format: "pretty" });
    expect(config.users).toEqual([]);
  });

  test("reads the config file from the working directory", () => {
    writeConfig({ siteName: "Shop", bruteForce: { maxAttempts: 3 }, rateLimits: { comment_post: { limit: 2, window: 60 } } });

    const config = loadConfig({ cwd, env: {} });
    expect(config.siteName).toBe("Shop");
    expect(config.bruteForce).toEqual({ maxAttempts: 3 });
    expect(config.rateLimits).toEqual({ comment_post: { limit: 2, window: 60 } });
  });

  test("environment overrides the file, nested values merge", () => {
    writeConfig({ bruteForce: { maxAttempts: 3, banDuration: 7200 }, storage: { dataFile: "./state.json" } });

    const config = loadConfig({
      cwd,
      env: { SENTINEL_MAX_ATTEMPTS: "8", REDIS_URL: "redis://localhost:6379", JWT_SECRET: "test-secret" },
    });
    expect(config.bruteForce).toEqual({ maxAttempts: 8, banDuration: 7200 });
    expect(config.storage).toEqual({
      redisUrl: "redis://localhost:6379",
      redisPrefix: "sentinel:",
      dataFile: "./state.json",
    });
    expect(config.jwtSecret).toBe("test-secret");
  });

  test("an explicit file path wins over the working directory", () => {
    const other = path.join(cwd, "other.json");
    fs.writeFileSync(other, JSON.stringify({ port: 5050 }), "utf8");
    writeConfig({ port: 6060 });

    expect(loadConfig({ cwd, env: {}, file: other }).port).toBe(5050);
  });

  test("an unreadable file is ignored with a warning", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    fs.writeFileSync(path.join(cwd, CONFIG_FILE_NAME), "{ nope", "utf8");

    expect(loadConfig({ cwd, env: {} }).port).toBe(4000);
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  test("invalid values raise a ConfigurationError listing the issues", () => {
    writeConfig({ adminEmail: "not-an-email" });

    expect(() => loadConfig({ cwd, env: { SENTINEL_MAX_ATTEMPTS: "zero" } })).toThrow(ConfigurationError);
    try {
      loadConfig({ cwd, env: { SENTINEL_MAX_ATTEMPTS: "zero" } });
    } catch (error: unknown) {
      if (!(error instanceof ConfigurationError)) throw error;
      expect(error.message).toBe("Configuration error: invalid settings");
      const issues = error.details?.issues;
      expect(Array.isArray(issues) ? issues.map((i: { path: string }) => i.path) : []).toEqual([
        "adminEmail",
        "bruteForce.maxAttempts",
      ]);
    }
  });
});

describe("envOverrides", () => {
  test("maps variables into nested settings", () => {
    expect(
      envOverrides({
        PORT: "8080",
        SENTINEL_ALLOWED_ORIGINS: "https://a.example, https://b.example,",
        SMTP_HOST: "mail.example.test",
        SENTINEL_SESSION_TIMEOUT: "600",
        UNRELATED: "x",
      })
    ).toEqual({
      port: 8080,
      allowedOrigins: ["https://a.example", "https://b.example"],
      smtp: { host: "mail.example.test" },
      session: { sessionTimeout: 600 },
    });
  });

  test("empty values are skipped", () => {
    expect(envOverrides({ PORT: "", LOG_FILE: "" })).toEqual({});
  });
});
