import { describe, expect, it } from "vitest";

import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults on an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      databasePath: "hoa.db",
      seedDatabase: false,
      smtp: null,
    });
  });

  it("reads SMTP settings when host, user and password are set", () => {
    const config = loadConfig({
      PORT: "8080",
      DATABASE_PATH: "/tmp/test.db",
      SEED_DATABASE: "true",
      SMTP_HOST: "smtp.example.test",
      SMTP_USER: "board@example.test",
      SMTP_PASS: "test-secret",
    });

    expect(config.port).toBe(8080);
    expect(config.databasePath).toBe("/tmp/test.db");
    expect(config.seedDatabase).toBe(true);
    expect(config.smtp).toEqual({
      host: "smtp.example.test",
      port: 587,
      user: "board@example.test",
      pass: "test-secret",
      from: "board@example.test",
    });
  });

  it("uses EMAIL_FROM and SMTP_PORT when given", () => {
    const config = loadConfig({
      SMTP_HOST: "smtp.example.test",
      SMTP_PORT: "2525",
      SMTP_USER: "board@example.test",
      SMTP_PASS: "test-secret",
      EMAIL_FROM: "HOA Office <office@example.test>",
    });

    expect(config.smtp?.port).toBe(2525);
    expect(config.smtp?.from).toBe("HOA Office <office@example.test>");
  });

  it("leaves SMTP unconfigured when the password is missing", () => {
    const config = loadConfig({
      SMTP_HOST: "smtp.example.test",
      SMTP_USER: "board@example.test",
    });
    expect(config.smtp).toBeNull();
  });

  it("ignores a malformed port", () => {
    expect(loadConfig({ PORT: "abc" }).port).toBe(3001);
  });
});
