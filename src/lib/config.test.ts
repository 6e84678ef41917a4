import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to local defaults", () => {
    expect(loadConfig({})).toEqual({
      host: "127.0.0.1",
      port: 8000,
      databasePath: "data/expenses.db",
      staticDir: "public",
      timeZone: undefined,
      requestLog: true,
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      HOST: "0.0.0.0",
      PORT: "3000",
      EXPENSES_DB_PATH: "/tmp/test-expenses.db",
      EXPENSES_TIME_ZONE: "America/Mexico_City",
      EXPENSES_REQUEST_LOG: "off",
    });
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(3000);
    expect(config.databasePath).toBe("/tmp/test-expenses.db");
    expect(config.timeZone).toBe("America/Mexico_City");
    expect(config.requestLog).toBe(false);
  });

  it("treats a blank time zone as unset", () => {
    expect(loadConfig({ EXPENSES_TIME_ZONE: "  " }).timeZone).toBeUndefined();
  });

  it("falls back to the default port when PORT is blank", () => {
    expect(loadConfig({ PORT: "" }).port).toBe(8000);
    expect(loadConfig({ PORT: "  " }).port).toBe(8000);
  });

  it("rejects an unknown time zone", () => {
    expect(() => loadConfig({ EXPENSES_TIME_ZONE: "Nowhere/Special" })).toThrow(
      "Invalid configuration: EXPENSES_TIME_ZONE: Unknown time zone",
    );
  });

  it("rejects a port that is not a number", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(/^Invalid configuration: PORT:/);
  });
});
