import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import {
  ManifestError,
  parseManifest,
  readManifest,
  serializeManifest,
} from "../../src/core/archive/manifest";
import type { ProjectManifest } from "../../src/types";

const MANIFEST: ProjectManifest = {
  formatVersion: 1,
  projectName: "web1",
  backupTimestamp: "20250101_120000",
  createdAt: "2025-01-01T12:00:00.000Z",
  isComposeProject: false,
  containers: [
    {
      id: "c1",
      name: "web1",
      image: "nginx",
      restartPolicy: "always",
      launchCommand: "docker run -v /data/web1:/usr/share/nginx/html --name web1 nginx",
      mounts: [{ type: "bind", hostPath: "/data/web1", destination: "/usr/share/nginx/html" }],
      networks: ["bridge"],
    },
  ],
  payloads: [{ type: "bind", source: "/data/web1", file: "bind_L2RhdGEvd2ViMQ.tar.gz" }],
};

function withFields(fields: Record<string, unknown>): string {
  return JSON.stringify({ ...MANIFEST, ...fields });
}

describe("manifest", () => {
  describe("serializeManifest / parseManifest", () => {
    test("parses what it serializes", () => {
      expect(parseManifest(serializeManifest(MANIFEST))).toEqual(MANIFEST);
    });

    test("writes indented JSON with a trailing newline", () => {
      const text = serializeManifest(MANIFEST);
      expect(text.startsWith('{\n  "formatVersion": 1,')).toBe(true);
      expect(text.endsWith("}\n")).toBe(true);
    });

    test("keeps compose fields", () => {
      const manifest = parseManifest(
        withFields({ isComposeProject: true, composeSourcePath: "/srv/shop", composeFile: "docker-compose.yml" }),
      );
      expect(manifest.isComposeProject).toBe(true);
      expect(manifest.composeSourcePath).toBe("/srv/shop");
      expect(manifest.composeFile).toBe("docker-compose.yml");
    });
  });

  describe("validation", () => {
    test("rejects invalid JSON", () => {
      expect(() => parseManifest("{")).toThrow("manifest is not valid JSON");
    });

    test("rejects an unknown format version", () => {
      expect(() => parseManifest(withFields({ formatVersion: 2 }))).toThrow(
        "unsupported manifest format version: 2",
      );
    });

    test("requires a project name and timestamp", () => {
      expect(() => parseManifest(withFields({ projectName: "" }))).toThrow("manifest has no project name");
      expect(() => parseManifest(withFields({ backupTimestamp: "yesterday" }))).toThrow(
        "manifest has no valid backup timestamp",
      );
    });

    test("requires the compose classification", () => {
      expect(() => parseManifest(withFields({ isComposeProject: "no" }))).toThrow(ManifestError);
    });

    test("drops containers without an id", () => {
      const manifest = parseManifest(
        withFields({ containers: [{ name: "ghost" }, ...MANIFEST.containers] }),
      );
      expect(manifest.containers.map((c) => c.id)).toEqual(["c1"]);
    });

    test("rejects a manifest without valid containers", () => {
      expect(() => parseManifest(withFields({ containers: [] }))).toThrow("manifest lists no containers");
      expect(() => parseManifest(withFields({ containers: [{ name: "ghost" }] }))).toThrow(
        "manifest lists no containers",
      );
    });

    test("drops malformed mounts and payloads", () => {
      const manifest = parseManifest(
        withFields({
          containers: [{ id: "c1", mounts: [{ type: "tmpfs", destination: "/run" }, { type: "volume", name: "v", destination: "/v" }] }],
          payloads: [{ type: "other", source: "x", file: "y" }],
        }),
      );
      expect(manifest.containers[0]?.mounts).toEqual([{ type: "volume", name: "v", destination: "/v" }]);
      expect(manifest.payloads).toEqual([]);
    });
  });

  describe("readManifest", () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-manifest-test-"));
    });

    afterAll(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    test("reads manifest.json from a directory", async () => {
      const dir = await mkdtemp(path.join(tempDir, "ok-"));
      await writeFile(path.join(dir, "manifest.json"), serializeManifest(MANIFEST));

      expect(await readManifest(dir)).toEqual(MANIFEST);
    });

    test("throws ManifestError when the file is missing", async () => {
      const dir = await mkdtemp(path.join(tempDir, "missing-"));
      await expect(readManifest(dir)).rejects.toThrow("manifest.json is missing");
    });
  });
});
