export type ArchiveErrorCode = "ARCHIVE_NOT_OPEN" | "ARCHIVE_ENTRY_MISSING" | "ARCHIVE_IO";

export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;
  readonly archivePath: string;

  constructor(code: ArchiveErrorCode, message: string, options: { archivePath: string; cause?: unknown }) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ArchiveError";
    this.code = code;
    this.archivePath = options.archivePath;
  }
}

export type ExternalToolErrorCode = "EXTERNAL_TOOL_MISSING" | "EXTERNAL_TOOL_FAILED";

export class ExternalToolError extends Error {
  readonly code: ExternalToolErrorCode;
  readonly tool: string;
  readonly exitCode?: number;

  constructor(
    code: ExternalToolErrorCode,
    message: string,
    options: { tool: string; exitCode?: number; cause?: unknown }
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ExternalToolError";
    this.code = code;
    this.tool = options.tool;
    if (options.exitCode !== undefined) this.exitCode = options.exitCode;
  }
}

export type FixPhase =
  | "pending"
  | "extracting"
  | "repairing"
  | "rebuilding-content"
  | "rebuilding-manifest"
  | "renaming"
  | "done";

export class FixError extends Error {
  readonly phase: FixPhase;
  readonly sourcePath: string;

  constructor(phase: FixPhase, sourcePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed while ${phase}: ${detail}`, { cause });
    this.name = "FixError";
    this.phase = phase;
    this.sourcePath = sourcePath;
  }
}
