import path from "node:path";
import fs from "node:fs/promises";
import { log } from "../utils/log.js";

export const CONTENT_ENTRY = "content.xml";
export const REVISIONS_DIR = "Revisions";

const REVISION_FILE_PATTERN = /^rev-(\d+)-\d+\.xml$/;
const REVISION_CONTENT_PATTERN = /<xmap-revision-content[^>]+>(<sheet[^>]+>.*<\/sheet>)<\/xmap-revision-content>/s;

const CONTENT_HEAD =
  '<?xml version="1.0" encoding="UTF-8" standalone="no"?>' +
  '<xmap-content xmlns="urn:xmind:xmap:xmlns:content:2.0" ' +
  'xmlns:fo="http://www.w3.org/1999/XSL/Format" ' +
  'xmlns:svg="http://www.w3.org/2000/svg" ' +
  'xmlns:xhtml="http://www.w3.org/1999/xhtml" ' +
  'xmlns:xlink="http://www.w3.org/1999/xlink" ' +
  'version="2.0">';
const CONTENT_TAIL = "</xmap-content>";

async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch {
    return null;
  }
}

async function listDir(dirPath: string): Promise<string[]> {
  try {
    return (await fs.readdir(dirPath)).sort();
  } catch {
    return [];
  }
}

/** Latest revision of one sheet that still holds a complete `<sheet>` element. */
export async function latestSheet(revisionDir: string): Promise<string | null> {
  let best = -1;
  let sheet: string | null = null;
  for (const name of await listDir(revisionDir)) {
    const match = REVISION_FILE_PATTERN.exec(name);
    if (!match) continue;
    const revision = Number.parseInt(match[1], 10);
    if (revision <= best) continue;
    const revisionFile = path.join(revisionDir, name);
    let text: string;
    try {
      text = await fs.readFile(revisionFile, "utf8");
    } catch (err) {
      log.warn(`Failed to load revision: ${revisionFile} (${err instanceof Error ? err.message : String(err)})`);
      continue;
    }
    const content = REVISION_CONTENT_PATTERN.exec(text);
    if (content) {
      sheet = content[1];
      best = revision;
    }
  }
  return sheet;
}

/**
 * Reassembles `content.xml` from the editing history when the recovered
 * copy is missing or empty. Resolves to null when there is nothing to do or
 * nothing could be recovered; the directory itself is never modified.
 */
export async function rebuildContent(recoveredDir: string): Promise<Buffer | null> {
  const size = await fileSize(path.join(recoveredDir, CONTENT_ENTRY));
  if (size !== null && size > 0) {
    log.debug("Content file already exists.");
    return null;
  }

  const revisionsDir = path.join(recoveredDir, REVISIONS_DIR);
  const sheets: string[] = [];
  for (const sheetId of await listDir(revisionsDir)) {
    const sheet = await latestSheet(path.join(revisionsDir, sheetId));
    if (sheet) {
      sheets.push(sheet);
      log.info(`Sheet recovered: ${sheetId}`);
    }
  }

  if (sheets.length === 0) {
    log.warn(`'${CONTENT_ENTRY}' is missing or empty and could not be rebuilt from revisions`);
    return null;
  }
  log.warn(`Content rebuilt from editing history (${sheets.length} sheets).`);
  return Buffer.from(CONTENT_HEAD + sheets.join("") + CONTENT_TAIL, "utf8");
}
