import type { FixPhase } from "../errors.js";
import type { RepairTools } from "./tools.js";

export interface FixOptions {
  tools: RepairTools;
  /** Deflate entries of the rebuilt archive. Stored by default. */
  compress?: boolean;
  /** Rebuild a missing or empty content.xml from revision history. On by default. */
  rebuildContent?: boolean;
}

export interface FixSuccess {
  ok: true;
  sourcePath: string;
  targetPath: string;
}

export interface FixFailure {
  ok: false;
  sourcePath: string;
  phase: FixPhase;
  error: Error;
}

export type FixResult = FixSuccess | FixFailure;

export interface FixReport {
  succeeded: FixSuccess[];
  failed: FixFailure[];
}
