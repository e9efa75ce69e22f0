import test from "node:test";
import assert from "node:assert/strict";
import path from "node:path";
import fs from "node:fs/promises";
import { DirSource, DirTarget, ZipSource, ZipTarget, withArchive } from "../src/archive/index.js";
import { ArchiveError } from "../src/errors.js";
import { makeTempDir, readZip, writeFile, writeTree } from "./helpers.js";

function isArchiveError(code: ArchiveError["code"]) {
  return (err: unknown) => err instanceof ArchiveError && err.code === code;
}

test("directory source lists nested entries with directories marked", async () => {
  const tempRoot = await makeTempDir();
  try {
    await writeTree(tempRoot, {
      "content.xml": "<xmap-content/>",
      "Thumbnails/thumbnail.png": "png",
      "Revisions/s1/rev-1-1.xml": "<rev/>"
    });
    const entries = await withArchive(new DirSource(tempRoot), (source) => source.entries());
    assert.deepEqual(entries, [
      "Revisions/",
      "Revisions/s1/",
      "Revisions/s1/rev-1-1.xml",
      "Thumbnails/",
      "Thumbnails/thumbnail.png",
      "content.xml"
    ]);
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("directory source reads bytes and gives directories empty content", async () => {
  const tempRoot = await makeTempDir();
  try {
    await writeTree(tempRoot, { "Thumbnails/a.txt": "abc" });
    await withArchive(new DirSource(tempRoot), async (source) => {
      assert.equal((await source.read("Thumbnails/a.txt")).toString("utf8"), "abc");
      assert.equal((await source.read("Thumbnails/")).length, 0);
      await assert.rejects(source.read("missing.xml"), isArchiveError("ARCHIVE_ENTRY_MISSING"));
    });
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("directory source tells unreadable entries from missing ones", async () => {
  const tempRoot = await makeTempDir();
  try {
    await writeTree(tempRoot, { "Thumbnails/a.txt": "abc", "content.xml": "<xmap-content/>" });
    await withArchive(new DirSource(tempRoot), async (source) => {
      await assert.rejects(source.read("Thumbnails"), isArchiveError("ARCHIVE_IO"));
      await assert.rejects(source.read("content.xml/inner.xml"), isArchiveError("ARCHIVE_ENTRY_MISSING"));
      await assert.rejects(source.read("content.xml/"), isArchiveError("ARCHIVE_ENTRY_MISSING"));
    });
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("zip source keeps repeated entry names", async () => {
  const tempRoot = await makeTempDir();
  const zipPath = path.join(tempRoot, "dup.zip");
  try {
    await withArchive(new ZipTarget(zipPath), async (target) => {
      await target.write("a.txt", Buffer.from("first"));
      await target.write("b.txt", Buffer.from("b"));
      await target.write("a.txt", Buffer.from("second"));
    });
    await withArchive(new ZipSource(zipPath), async (source) => {
      assert.deepEqual(await source.entries(), ["a.txt", "b.txt", "a.txt"]);
      assert.equal((await source.read("a.txt")).toString("utf8"), "second");
    });
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("sources refuse to work outside their scope", async () => {
  const tempRoot = await makeTempDir();
  try {
    const source = new DirSource(tempRoot);
    await assert.rejects(source.entries(), isArchiveError("ARCHIVE_NOT_OPEN"));

    await assert.rejects(
      withArchive(source, async () => {
        throw new Error("boom");
      }),
      /boom/
    );
    await assert.rejects(source.read("anything"), isArchiveError("ARCHIVE_NOT_OPEN"));

    const zip = new ZipSource(path.join(tempRoot, "none.zip"));
    await assert.rejects(zip.entries(), isArchiveError("ARCHIVE_NOT_OPEN"));
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("zip target output reads back byte for byte", async () => {
  const tempRoot = await makeTempDir();
  const zipPath = path.join(tempRoot, "out", "doc.zip");
  const binary = Buffer.from([0, 1, 2, 253, 254, 255]);
  try {
    await withArchive(new ZipTarget(zipPath), async (target) => {
      await target.write("Thumbnails/", Buffer.alloc(0));
      await target.write("Thumbnails/thumbnail.png", binary);
      await target.write("empty.txt", Buffer.alloc(0));
    });

    await withArchive(new ZipSource(zipPath), async (source) => {
      assert.deepEqual(await source.entries(), ["Thumbnails/", "Thumbnails/thumbnail.png", "empty.txt"]);
      assert.deepEqual(await source.read("Thumbnails/thumbnail.png"), binary);
      assert.equal((await source.read("empty.txt")).length, 0);
      await assert.rejects(source.read("content.xml"), isArchiveError("ARCHIVE_ENTRY_MISSING"));
    });
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("compressed zip target keeps contents intact", async () => {
  const tempRoot = await makeTempDir();
  const zipPath = path.join(tempRoot, "doc.zip");
  const text = "<sheet>".repeat(200);
  try {
    await withArchive(new ZipTarget(zipPath, { compress: true }), (target) =>
      target.write("content.xml", Buffer.from(text, "utf8"))
    );
    assert.deepEqual(await readZip(zipPath), [["content.xml", text]]);
    const stat = await fs.stat(zipPath);
    assert.ok(stat.size < text.length);
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("zip target discard removes the partial file", async () => {
  const tempRoot = await makeTempDir();
  const zipPath = path.join(tempRoot, "partial.zip");
  try {
    const target = new ZipTarget(zipPath);
    await target.open();
    await target.write("a.txt", Buffer.from("a"));
    await target.discard();
    await assert.rejects(fs.access(zipPath));
    await assert.rejects(target.write("b.txt", Buffer.from("b")), isArchiveError("ARCHIVE_NOT_OPEN"));
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("directory target creates parent directories on demand", async () => {
  const tempRoot = await makeTempDir();
  const outDir = path.join(tempRoot, "out");
  try {
    await withArchive(new DirTarget(outDir), async (target) => {
      await target.write("META-INF/", Buffer.alloc(0));
      await target.write("Revisions/s1/rev-1-1.xml", Buffer.from("<rev/>"));
    });
    assert.equal(await fs.readFile(path.join(outDir, "Revisions", "s1", "rev-1-1.xml"), "utf8"), "<rev/>");
    assert.ok((await fs.stat(path.join(outDir, "META-INF"))).isDirectory());
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("directory target fails with an I/O error when a parent cannot be created", async () => {
  const tempRoot = await makeTempDir();
  const outDir = path.join(tempRoot, "out");
  try {
    await writeFile(path.join(outDir, "blocked"), "a file where a directory should go");
    await withArchive(new DirTarget(outDir), async (target) => {
      await assert.rejects(target.write("blocked/inner.xml", Buffer.from("x")), isArchiveError("ARCHIVE_IO"));
    });
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});

test("directory target discard removes a root it created", async () => {
  const tempRoot = await makeTempDir();
  const outDir = path.join(tempRoot, "out");
  try {
    const target = new DirTarget(outDir);
    await target.open();
    await target.write("a/b.txt", Buffer.from("b"));
    await target.discard();
    assert.deepEqual(await fs.readdir(tempRoot), []);
  } finally {
    await fs.rm(tempRoot, { recursive: true, force: true });
  }
});
