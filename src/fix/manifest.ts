import { withArchive, type ArchiveSource, type ArchiveTarget } from "../archive/index.js";
import { log } from "../utils/log.js";
import { isXmlEntry } from "../utils/paths.js";

export const MANIFEST_DIR = "META-INF/";
export const MANIFEST_ENTRY = "META-INF/manifest.xml";
export const MANIFEST_MEDIA_TYPE = "text/xml";

const MANIFEST_HEAD =
  '<?xml version="1.0" encoding="UTF-8" standalone="no"?>' +
  '<manifest xmlns="urn:xmind:xmap:xmlns:manifest:1.0">';
const MANIFEST_TAIL = "</manifest>";

export function escapeAttribute(value: string): string {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;").replace(/"/g, "&quot;");
}

export function fileEntry(fullPath: string, mediaType = ""): string {
  return `<file-entry full-path="${escapeAttribute(fullPath)}" media-type="${escapeAttribute(mediaType)}"/>`;
}

/** Manifest listing the given entries followed by its own two entries. */
export function buildManifest(entryNames: readonly string[]): string {
  return (
    MANIFEST_HEAD +
    entryNames.map((name) => fileEntry(name)).join("") +
    fileEntry(MANIFEST_DIR) +
    fileEntry(MANIFEST_ENTRY, MANIFEST_MEDIA_TYPE) +
    MANIFEST_TAIL
  );
}

/** Empty XML payloads make XMind's parser fail, so they are dropped. */
export function shouldSkip(entryName: string, content: Buffer): boolean {
  return content.length === 0 && isXmlEntry(entryName);
}

export interface RebuildOptions {
  /** Entry contents to use instead of the source's; names the source lacks are appended. */
  replacements?: ReadonlyMap<string, Buffer>;
}

export interface RebuildResult {
  kept: string[];
  skipped: string[];
}

/**
 * Copies every usable entry of source into target and appends a freshly
 * generated manifest. On failure the partially written target is discarded.
 */
export async function rebuildManifest(
  source: ArchiveSource,
  target: ArchiveTarget,
  options: RebuildOptions = {}
): Promise<RebuildResult> {
  const replacements = options.replacements ?? new Map<string, Buffer>();
  const result: RebuildResult = { kept: [], skipped: [] };

  log.info(`Rebuilding manifest from ${source.path} ....`);
  log.debug(`Archive target: ${target.path}`);

  const copy = async (entryName: string, content: Buffer): Promise<void> => {
    if (shouldSkip(entryName, content)) {
      log.warn(`Empty XML removed: ${entryName}`);
      result.skipped.push(entryName);
      return;
    }
    log.debug(`Archiving ${entryName}...`);
    await target.write(entryName, content);
    result.kept.push(entryName);
  };

  try {
    await withArchive(target, () =>
      withArchive(source, async () => {
        const pending = new Map(replacements);
        for (const entryName of await source.entries()) {
          if (entryName === MANIFEST_DIR || entryName === MANIFEST_ENTRY) {
            log.debug(`Dropping existing ${entryName}`);
            continue;
          }
          const replacement = pending.get(entryName);
          pending.delete(entryName);
          await copy(entryName, replacement ?? (await source.read(entryName)));
        }
        for (const [entryName, content] of pending) {
          await copy(entryName, content);
        }
        await target.write(MANIFEST_DIR, Buffer.alloc(0));
        await target.write(MANIFEST_ENTRY, Buffer.from(buildManifest(result.kept), "utf8"));
      })
    );
  } catch (err) {
    await target.discard();
    throw err;
  }

  log.info(`Manifest rebuilt: ${target.path} (${result.kept.length} entries kept, ${result.skipped.length} removed)`);
  return result;
}
