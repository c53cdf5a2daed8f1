import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { TarGzipCodec } from "../../src/core/archive/codec";

describe("TarGzipCodec", () => {
  let tempDir: string;
  const codec = new TarGzipCodec(6);

  beforeAll(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "dockpack-codec-test-"));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function makeTree(root: string): Promise<void> {
    await mkdir(path.join(root, "nested"), { recursive: true });
    await writeFile(path.join(root, "a.txt"), "alpha");
    await writeFile(path.join(root, "nested", "b.txt"), "beta");
  }

  test("packDirectory keeps the directory name as the leading component", async () => {
    const source = path.join(tempDir, "pack-dir", "payload");
    await makeTree(source);
    const archive = path.join(tempDir, "pack-dir.tar.gz");
    const out = path.join(tempDir, "pack-dir-out");
    await mkdir(out);

    await codec.packDirectory(source, archive);
    await codec.unpack(archive, out);

    expect(await readdir(out)).toEqual(["payload"]);
    expect(await readFile(path.join(out, "payload", "nested", "b.txt"), "utf-8")).toBe("beta");
  });

  test("unpack can strip the leading component", async () => {
    const source = path.join(tempDir, "strip", "data");
    await makeTree(source);
    const archive = path.join(tempDir, "strip.tar.gz");
    const out = path.join(tempDir, "strip-out");
    await mkdir(out);

    await codec.packDirectory(source, archive);
    await codec.unpack(archive, out, { stripComponents: 1 });

    expect((await readdir(out)).sort()).toEqual(["a.txt", "nested"]);
    expect(await readFile(path.join(out, "a.txt"), "utf-8")).toBe("alpha");
  });

  test("packContents stores entries relative to the directory", async () => {
    const source = path.join(tempDir, "contents");
    await makeTree(source);
    const archive = path.join(tempDir, "contents.tar.gz");
    const out = path.join(tempDir, "contents-out");
    await mkdir(out);

    await codec.packContents(source, archive);
    await codec.unpack(archive, out);

    expect((await readdir(out)).sort()).toEqual(["a.txt", "nested"]);
  });

  test("packContents refuses an empty directory", async () => {
    const source = path.join(tempDir, "empty");
    await mkdir(source);

    await expect(codec.packContents(source, path.join(tempDir, "empty.tar.gz"))).rejects.toThrow(
      `No entries to archive in ${source}`,
    );
  });

  test("unpack rejects a file that is not gzip", async () => {
    const bogus = path.join(tempDir, "bogus.tar.gz");
    await writeFile(bogus, "this is not an archive");
    const out = path.join(tempDir, "bogus-out");
    await mkdir(out);

    await expect(codec.unpack(bogus, out)).rejects.toThrow();
  });
});
