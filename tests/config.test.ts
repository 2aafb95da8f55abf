import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_TIMEOUTS, loadConfig } from "../lib/config.js";

describe("loadConfig", () => {
  let rootDir: string;

  function writeConfig(name: string, content: string): void {
    fs.mkdirSync(path.join(rootDir, "config"), { recursive: true });
    fs.writeFileSync(path.join(rootDir, "config", name), content);
  }

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), "crm-config-"));
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it("falls back to defaults without config files", () => {
    const config = loadConfig({ rootDir, env: {} });

    expect(config).toEqual({
      configDir: path.join(rootDir, "config"),
      googleAccount: "personal",
      timezone: "America/Mexico_City",
      timeouts: DEFAULT_TIMEOUTS,
      database: { url: path.join(rootDir, "data", "crm.db") },
    });
  });

  it("reads assistant.json and merges partial timeouts", () => {
    writeConfig(
      "assistant.json",
      JSON.stringify({ timezone: "Europe/Madrid", databasePath: "db/test.db", timeouts: { deleteMs: 2000 } })
    );

    const config = loadConfig({ rootDir, env: {} });

    expect(config.timezone).toBe("Europe/Madrid");
    expect(config.timeouts).toEqual({ createMs: 10_000, updateMs: 10_000, deleteMs: 2000 });
    expect(config.database).toEqual({ url: path.join(rootDir, "db", "test.db") });
  });

  it("lets the environment pick the account and timezone", () => {
    writeConfig("assistant.json", JSON.stringify({ timezone: "Europe/Madrid" }));

    const config = loadConfig({ rootDir, env: { GOOGLE_ACCOUNT: "work", CALENDAR_TIMEZONE: "America/Bogota" } });

    expect(config.googleAccount).toBe("work");
    expect(config.timezone).toBe("America/Bogota");
  });

  it("uses Turso when configured and no local path is set", () => {
    writeConfig("turso.json", JSON.stringify({ url: "libsql://crm-test.turso.io", authToken: "test-secret" }));

    const config = loadConfig({ rootDir, env: {} });

    expect(config.database).toEqual({ url: "libsql://crm-test.turso.io", authToken: "test-secret" });
  });

  it("keeps an in-memory database path as is", () => {
    writeConfig("assistant.json", JSON.stringify({ databasePath: ":memory:" }));

    expect(loadConfig({ rootDir, env: {} }).database).toEqual({ url: ":memory:" });
  });

  it("rejects invalid values", () => {
    writeConfig("assistant.json", JSON.stringify({ timeouts: { createMs: -5 } }));

    expect(() => loadConfig({ rootDir, env: {} })).toThrow(/Invalid configuration in .*assistant\.json/);
  });

  it("rejects unknown keys such as a calendar id", () => {
    writeConfig("assistant.json", JSON.stringify({ calendarId: "sales" }));

    expect(() => loadConfig({ rootDir, env: {} })).toThrow(/Invalid configuration in .*assistant\.json/);
  });

  it("rejects malformed JSON", () => {
    writeConfig("assistant.json", "{ not json");

    expect(() => loadConfig({ rootDir, env: {} })).toThrow(/Invalid JSON in .*assistant\.json/);
  });
});
