import path from "node:path";

const DRIVE_PREFIX = /^[a-zA-Z]:/;

/** Entry names always use "/", whatever the host separator. */
export function toEntryName(filePath: string): string {
  return filePath.replace(/\\/g, "/");
}

function unsafeEntry(entryName: string, reason: string): Error {
  return new Error(`Unsafe entry name ${JSON.stringify(entryName)}: ${reason}`);
}

/**
 * Path segments of an entry name. Names that are absolute, empty or that
 * climb above the archive root are refused.
 */
export function entrySegments(entryName: string): string[] {
  const name = toEntryName(entryName);
  if (name.includes("\0")) throw unsafeEntry(entryName, "contains a null byte");
  if (name.startsWith("/") || DRIVE_PREFIX.test(name)) throw unsafeEntry(entryName, "is absolute");
  const segments = (isDirectoryEntry(name) ? name.slice(0, -1) : name).split("/");
  if (segments.some((segment) => segment === "" || segment === ".")) throw unsafeEntry(entryName, "has an empty segment");
  if (segments.includes("..")) throw unsafeEntry(entryName, "leaves the archive root");
  return segments;
}

/** Absolute file-system location of an entry below rootDir. */
export function resolveEntry(rootDir: string, entryName: string): string {
  const root = path.resolve(rootDir);
  const resolved = path.join(root, ...entrySegments(entryName));
  const relative = path.relative(root, resolved);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw unsafeEntry(entryName, "leaves the archive root");
  }
  return resolved;
}

export function isDirectoryEntry(entryName: string): boolean {
  return entryName.endsWith("/");
}

export function isXmlEntry(entryName: string): boolean {
  return entryName.toLowerCase().endsWith(".xml");
}

export interface SourceLocation {
  dir: string;
  stem: string;
}

/** Splits `/a/b/doc.xmind` into `{ dir: "/a/b", stem: "doc" }`. */
export function locateSource(sourcePath: string): SourceLocation {
  const parsed = path.parse(path.resolve(sourcePath));
  return { dir: parsed.dir, stem: parsed.name };
}
