import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { ZipSource, withArchive } from "../src/archive/index.js";
import type { RepairTools } from "../src/fix/tools.js";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "xmfix-test-"));
}

export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export async function writeTree(rootDir: string, files: Record<string, string>): Promise<void> {
  await fs.mkdir(rootDir, { recursive: true });
  for (const [relPath, content] of Object.entries(files)) {
    await writeFile(path.join(rootDir, relPath), content);
  }
}

/** Entry names and text contents of a zip, in archive order. */
export async function readZip(zipPath: string): Promise<Array<[string, string]>> {
  return withArchive(new ZipSource(zipPath), async (source) => {
    const result: Array<[string, string]> = [];
    for (const name of await source.entries()) {
      result.push([name, (await source.read(name)).toString("utf8")]);
    }
    return result;
  });
}

type ToolStep = (inputPath: string, outputPath: string) => Promise<number>;

export interface FakeTools extends RepairTools {
  calls: string[];
}

/** In-process stand-in for the zip utilities; records every call. */
export function fakeTools(steps: { repair?: ToolStep; extract?: ToolStep }): FakeTools {
  const calls: string[] = [];
  return {
    calls,
    async repair(sourcePath, outPath) {
      calls.push(`repair ${path.basename(sourcePath)} ${path.basename(outPath)}`);
      return steps.repair ? steps.repair(sourcePath, outPath) : 1;
    },
    async extract(zipPath, outDir) {
      calls.push(`extract ${path.basename(zipPath)} ${path.basename(outDir)}`);
      await fs.mkdir(outDir, { recursive: true });
      return steps.extract ? steps.extract(zipPath, outDir) : 1;
    }
  };
}

/** A repair step that "repairs" by copying the input. */
export async function copyRepair(sourcePath: string, outPath: string): Promise<number> {
  await fs.copyFile(sourcePath, outPath);
  return 0;
}
