import * as path from "node:path";
import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import {
  buildInlineConfig,
  extractInlineOptions,
  hasInlineOptions,
  mergeInlineConfig,
} from "../../src/config/inline";
import { ConfigError } from "../../src/config/validator";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("reads the inline flags", () => {
      const options = extractInlineOptions({
        "backup-root": "/srv/backups",
        "archive-prefix": "bk",
        compression: "9",
        "compose-command": "docker compose up -d",
        "docker-binary": "/usr/local/bin/docker",
        database: "/srv/catalog.db",
        "log-file": "/var/log/dockpack.log",
        verbose: true,
      });

      expect(options).toEqual({
        backupRoot: "/srv/backups",
        archivePrefix: "bk",
        compression: 9,
        composeCommand: "docker compose up -d",
        dockerBinary: "/usr/local/bin/docker",
        database: "/srv/catalog.db",
        logFile: "/var/log/dockpack.log",
      });
    });

    test("rejects a non-numeric compression level", () => {
      expect(() => extractInlineOptions({ compression: "max" })).toThrow(ConfigError);
    });

    test("ignores flags of the wrong type", () => {
      expect(hasInlineOptions(extractInlineOptions({ "backup-root": true }))).toBe(false);
    });
  });

  describe("buildInlineConfig", () => {
    test("returns an empty config without options", () => {
      expect(buildInlineConfig({})).toEqual({});
    });

    test("resolves paths against the working directory", () => {
      const config = buildInlineConfig({ backupRoot: "backups", database: "cat.db", logFile: "out.log" });

      expect(config.backupRoot).toBe(path.resolve("backups"));
      expect(config.database).toEqual({ path: path.resolve("cat.db") });
      expect(config.log).toEqual({ path: path.resolve("out.log") });
    });

    test("groups archive and docker options", () => {
      expect(
        buildInlineConfig({ archivePrefix: "bk", compression: 0, composeCommand: "podman-compose up -d" }),
      ).toEqual({
        archive: { prefix: "bk", compression: 0 },
        docker: { composeUpCommand: "podman-compose up -d" },
      });
    });
  });

  describe("hasInlineOptions", () => {
    test("detects any provided option", () => {
      expect(hasInlineOptions({})).toBe(false);
      expect(hasInlineOptions({ compression: 0 })).toBe(true);
    });
  });

  describe("mergeInlineConfig", () => {
    test("overrides only the given fields", () => {
      const config = mergeInlineConfig(DEFAULT_CONFIG, { dockerBinary: "podman" });

      expect(config.docker).toEqual({ binary: "podman", composeUpCommand: "docker-compose up -d" });
      expect(config.archive).toEqual(DEFAULT_CONFIG.archive);
    });
  });
});
