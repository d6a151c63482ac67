import { describe, expect, it } from "vitest";
import { decodeToString } from "../utils/buffer.js";
import { InMemoryFileSystem } from "./in-memory-filesystem.js";

describe("InMemoryFileSystem", () => {
  it("reads back what was written", async () => {
    const fs = new InMemoryFileSystem();
    fs.writeFile("/site/index.html", "<h1>Home</h1>");

    expect(decodeToString(await fs.readFile("/site/index.html"))).toBe(
      "<h1>Home</h1>",
    );
    const stat = await fs.stat("/site/index.html");
    expect(stat.size).toBe(13);
    expect(stat.isFile).toBe(true);
    expect(stat.isDirectory).toBe(false);
  });

  it("creates parent directories implicitly", async () => {
    const fs = new InMemoryFileSystem();
    fs.writeFile("/a/b/c.txt", "c");

    expect(await fs.exists("/a")).toBe(true);
    expect(await fs.exists("/a/b")).toBe(true);
    const stat = await fs.stat("/a/b");
    expect(stat.isDirectory).toBe(true);
    expect(stat.isFile).toBe(false);
  });

  it("normalizes separators and dot segments", async () => {
    const fs = new InMemoryFileSystem();
    fs.writeFile("docs\\guide.md", "# Guide");

    expect(await fs.exists("/docs/./guide.md")).toBe(true);
    expect(await fs.exists("/docs/extra/../guide.md")).toBe(true);
    expect(await fs.exists("//docs//guide.md")).toBe(true);
  });

  it("returns copies so callers cannot change stored data", async () => {
    const fs = new InMemoryFileSystem();
    fs.writeFile("/data.bin", new Uint8Array([1, 2, 3]));

    const first = await fs.readFile("/data.bin");
    first[0] = 99;

    expect([...(await fs.readFile("/data.bin"))]).toEqual([1, 2, 3]);
  });

  it("fails with ENOENT for missing paths", async () => {
    const fs = new InMemoryFileSystem();

    expect(await fs.exists("/missing.txt")).toBe(false);
    await expect(fs.readFile("/missing.txt")).rejects.toMatchObject({
      code: "ENOENT",
    });
    await expect(fs.stat("/missing.txt")).rejects.toMatchObject({
      code: "ENOENT",
    });
  });

  it("refuses to create a directory beneath a file", () => {
    const fs = new InMemoryFileSystem();
    fs.writeFile("/file", "x");

    expect(() => fs.mkdir("/file/sub")).toThrow("Not a directory: /file");
  });
});
