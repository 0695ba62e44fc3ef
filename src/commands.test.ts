import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import {
  appendToPackage,
  createPackage,
  extractPackage,
  listPackage,
  removeFromPackage,
  type PakLogger,
} from "./commands.js";
import { PakArchive } from "./pak-archive.js";

let tempDir: string;

function createLogger(): { logger: PakLogger; logs: string[]; warnings: string[] } {
  const logs: string[] = [];
  const warnings: string[] = [];
  const logger: PakLogger = {
    log: (message) => logs.push(message),
    warn: (message) => warnings.push(message),
    error: (message) => logs.push(message),
  };
  return { logger, logs, warnings };
}

/**
 * Builds tree/ with a.txt, b.txt and maps/e1m1.bsp and packs it into game.pak.
 */
async function setupPackage(): Promise<string> {
  const treeDir = join(tempDir, "tree");
  await mkdir(join(treeDir, "maps"), { recursive: true });
  await writeFile(join(treeDir, "b.txt"), "bb");
  await writeFile(join(treeDir, "a.txt"), "a");
  await writeFile(join(treeDir, "maps", "e1m1.bsp"), "map");

  const pakFile = join(tempDir, "game.pak");
  await createPackage(pakFile, treeDir, { logger: createLogger().logger });
  return pakFile;
}

describe("commands", () => {
  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "pak-commands-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("createPackage", () => {
    it("packs files under their relative paths in sorted order", async () => {
      const pakFile = await setupPackage();

      const archive = await PakArchive.fromFile(pakFile);

      expect(archive.list()).toEqual([
        { name: "a.txt", offset: 204, size: 1 },
        { name: "b.txt", offset: 205, size: 2 },
        { name: "maps/e1m1.bsp", offset: 207, size: 3 },
      ]);
    });

    it("reports what it wrote", async () => {
      await mkdir(join(tempDir, "in"));
      await writeFile(join(tempDir, "in", "only.txt"), "x");
      const { logger, logs } = createLogger();

      await createPackage(join(tempDir, "one.pak"), join(tempDir, "in"), { logger });

      expect(logs).toEqual(["Found 1 files to pack", `Wrote 1 entries to: ${join(tempDir, "one.pak")}`]);
    });

    it("refuses an empty directory", async () => {
      await mkdir(join(tempDir, "empty"));

      await expect(
        createPackage(join(tempDir, "empty.pak"), join(tempDir, "empty"), { logger: createLogger().logger }),
      ).rejects.toMatchObject({ code: "INVALID_ARGUMENT" });
    });
  });

  describe("listPackage", () => {
    it("prints one row per entry and a total", async () => {
      const pakFile = await setupPackage();
      const { logger, logs } = createLogger();

      const summaries = await listPackage(pakFile, { logger });

      expect(summaries.map((s) => s.name)).toEqual(["a.txt", "b.txt", "maps/e1m1.bsp"]);
      expect(logs).toEqual([
        `${"1".padStart(10)}  ${"204".padStart(10)}  a.txt`,
        `${"2".padStart(10)}  ${"205".padStart(10)}  b.txt`,
        `${"3".padStart(10)}  ${"207".padStart(10)}  maps/e1m1.bsp`,
        "3 entries, 6 bytes",
      ]);
    });

    it("appends hashes on request", async () => {
      const pakFile = join(tempDir, "hello.pak");
      const archive = new PakArchive();
      archive.add({ name: "a.txt", data: Buffer.from("hello", "utf8") });
      await archive.save(pakFile);
      const { logger, logs } = createLogger();

      await listPackage(pakFile, { hash: true, logger });

      expect(logs[0]).toBe(
        `${"5".padStart(10)}  ${"76".padStart(10)}  a.txt  2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824`,
      );
    });
  });

  describe("extractPackage", () => {
    it("recreates nested paths by default", async () => {
      const pakFile = await setupPackage();
      const outDir = join(tempDir, "out");

      const written = await extractPackage(pakFile, outDir, { logger: createLogger().logger });

      expect(written).toEqual([join(outDir, "a.txt"), join(outDir, "b.txt"), join(outDir, "maps", "e1m1.bsp")]);
      expect(await readFile(join(outDir, "maps", "e1m1.bsp"), "utf8")).toBe("map");
    });

    it("flattens entries to their basenames", async () => {
      const pakFile = await setupPackage();
      const outDir = join(tempDir, "flat");

      const written = await extractPackage(pakFile, outDir, {
        names: ["maps/e1m1.bsp"],
        flat: true,
        logger: createLogger().logger,
      });

      expect(written).toEqual([join(outDir, "e1m1.bsp")]);
      expect(await readFile(join(outDir, "e1m1.bsp"), "utf8")).toBe("map");
    });

    it("writes every duplicate's own data when extracting everything", async () => {
      const pakFile = join(tempDir, "dups.pak");
      const archive = new PakArchive();
      archive.add({ name: "dup.txt", data: Buffer.from("one", "utf8") });
      archive.add({ name: "dup.txt", data: Buffer.from("two", "utf8") });
      await archive.save(pakFile);
      const outDir = join(tempDir, "out");
      const { logger, logs } = createLogger();

      const written = await extractPackage(pakFile, outDir, { logger });

      expect(written).toEqual([join(outDir, "dup.txt"), join(outDir, "dup.txt")]);
      expect(await readFile(join(outDir, "dup.txt"), "utf8")).toBe("two");
      expect(logs[0]).toBe(`Extracting 2 of 2 entries to: ${outDir}`);
    });

    it("extracts the first duplicate when asked by name", async () => {
      const pakFile = join(tempDir, "dups.pak");
      const archive = new PakArchive();
      archive.add({ name: "dup.txt", data: Buffer.from("one", "utf8") });
      archive.add({ name: "dup.txt", data: Buffer.from("two", "utf8") });
      await archive.save(pakFile);
      const outDir = join(tempDir, "out");

      await extractPackage(pakFile, outDir, { names: ["dup.txt"], logger: createLogger().logger });

      expect(await readFile(join(outDir, "dup.txt"), "utf8")).toBe("one");
    });

    it("fails for a name that is not in the archive", async () => {
      const pakFile = await setupPackage();

      await expect(
        extractPackage(pakFile, join(tempDir, "out"), { names: ["nope.txt"], logger: createLogger().logger }),
      ).rejects.toMatchObject({ code: "NOT_FOUND" });
    });
  });

  describe("appendToPackage", () => {
    it("creates the archive when asked", async () => {
      const input = join(tempDir, "gfx.lmp");
      await writeFile(input, "palette");
      const pakFile = join(tempDir, "new.pak");

      await appendToPackage(pakFile, [input], { create: true, prefix: "gfx/", logger: createLogger().logger });

      const archive = await PakArchive.fromFile(pakFile);
      expect(archive.list()).toEqual([{ name: "gfx/gfx.lmp", offset: 76, size: 7 }]);
    });

    it("does not create a missing archive by default", async () => {
      const input = join(tempDir, "x.txt");
      await writeFile(input, "x");

      await expect(
        appendToPackage(join(tempDir, "missing.pak"), [input], { logger: createLogger().logger }),
      ).rejects.toMatchObject({ code: "ENOENT" });
    });

    it("warns and adds a duplicate when the name exists", async () => {
      const pakFile = await setupPackage();
      const input = join(tempDir, "a.txt");
      await writeFile(input, "new a");
      const { logger, warnings } = createLogger();

      await appendToPackage(pakFile, [input], { logger });

      const archive = await PakArchive.fromFile(pakFile);
      expect(archive.entries.map((e) => e.name)).toEqual(["a.txt", "b.txt", "maps/e1m1.bsp", "a.txt"]);
      expect(archive.find("a.txt").data.toString("utf8")).toBe("a");
      expect(warnings).toEqual(["⚠️  a.txt already exists; adding a duplicate entry"]);
    });

    it("replaces the existing entry in place with --replace", async () => {
      const pakFile = await setupPackage();
      const input = join(tempDir, "a.txt");
      await writeFile(input, "new a");

      await appendToPackage(pakFile, [input], { replace: true, logger: createLogger().logger });

      const archive = await PakArchive.fromFile(pakFile);
      expect(archive.list()).toEqual([
        { name: "a.txt", offset: 204, size: 5 },
        { name: "b.txt", offset: 209, size: 2 },
        { name: "maps/e1m1.bsp", offset: 211, size: 3 },
      ]);
      expect(archive.find("a.txt").data.toString("utf8")).toBe("new a");
    });
  });

  describe("removeFromPackage", () => {
    it("removes entries and rewrites the archive", async () => {
      const pakFile = await setupPackage();

      await removeFromPackage(pakFile, ["b.txt"], { logger: createLogger().logger });

      const archive = await PakArchive.fromFile(pakFile);
      expect(archive.list()).toEqual([
        { name: "a.txt", offset: 140, size: 1 },
        { name: "maps/e1m1.bsp", offset: 141, size: 3 },
      ]);
    });

    it("leaves the file untouched when a name is missing", async () => {
      const pakFile = await setupPackage();
      const before = await readFile(pakFile);

      await expect(
        removeFromPackage(pakFile, ["a.txt", "doesnotexist.txt"], { logger: createLogger().logger }),
      ).rejects.toMatchObject({ code: "NOT_FOUND" });
      expect((await readFile(pakFile)).equals(before)).toBe(true);
    });
  });
});
