/**
 * tests/cli/cli.test.ts
 * In-process runs of the `sentinel` commands
 */

import fs from "fs";
import os from "os";
import path from "path";
import jwt from "jsonwebtoken";
import { createCli } from "../../src/cli";
import { formatTable } from "../../src/cli/utils/printTable";

describe("sentinel CLI", () => {
  let dir: string;
  let configPath: string;
  let output: string[];
  let log: jest.SpyInstance;

  const run = async (...args: string[]) => {
    await createCli().parseAsync(["node", "sentinel", "--config", configPath, ...args]);
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sentinel-cli-"));
    configPath = path.join(dir, "sentinel.config.json");
    fs.writeFileSync(
      configPath,
      JSON.stringify({
        jwtSecret: "test-secret",
        storage: { dataFile: path.join(dir, "state.json") },
        logger: { level: "silent" },
      }),
      "utf8"
    );
    output = [];
    log = jest.spyOn(console, "log").mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(() => {
    log.mockRestore();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("ban persists across invocations", async () => {
    await run("ban", "198.51.100.9", "--reason", "abuse");
    expect(output).toEqual(["Banned 198.51.100.9 for 24h (abuse)"]);

    output = [];
    await run("bans");
    expect(output).toHaveLength(3);
    expect(output[2]).toContain("198.51.100.9");
    expect(output[2]).toContain("abuse");
    expect(output[2]).toContain("manual");

    output = [];
    await run("stats", "--json");
    expect(JSON.parse(output.join("\n"))).toEqual({
      totalLoginAttempts: 0,
      failedAttempts24h: 0,
      blockedAttempts: 0,
      securityEvents: 0,
      bannedIps: 1,
      activeLockouts: 0,
    });
  });

  test("unban clears the durable record", async () => {
    await run("ban", "198.51.100.9", "-d", "600");
    await run("unban", "198.51.100.9");

    output = [];
    await run("bans");
    expect(output).toEqual(["(none)"]);
  });

  test("token issues an admin JWT", async () => {
    await run("token", "--subject", "ops", "--expires", "120");

    const claims = jwt.verify(output[0], "test-secret");
    expect(typeof claims === "object" && claims.sub).toBe("ops");
    expect(typeof claims === "object" && claims.roles).toEqual(["admin"]);
  });

  test("rules lists the configured table", async () => {
    await run("rules");
    expect(output[0]).toBe("ACTION         │ LIMIT │ WINDOW");
    expect(output).toContain("profile_update │     5 │ 5m");
  });
});

describe("formatTable", () => {
  test("aligns columns and right-aligns numbers", () => {
    expect(
      formatTable(
        ["IP", "COUNT"],
        [
          ["203.0.113.5", "3"],
          ["::1", "12"],
        ]
      )
    ).toEqual([
      "IP          │ COUNT",
      "────────────┼──────",
      "203.0.113.5 │     3",
      "::1         │    12",
    ]);
  });

  test("says so when there is nothing to show", () => {
    expect(formatTable(["IP"], [])).toEqual(["(none)"]);
  });
});
