export interface ToolConfig {
  /** Command that repairs a damaged zip (`zip -FF`). */
  zipCommand: string;
  /** Command that extracts a zip into a directory. */
  unzipCommand: string;
}

export const DEFAULT_TOOL_CONFIG: ToolConfig = {
  zipCommand: "zip",
  unzipCommand: "unzip"
};

function pick(value: string | undefined, fallback: string): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : fallback;
}

export function resolveToolConfig(env: NodeJS.ProcessEnv = process.env): ToolConfig {
  return {
    zipCommand: pick(env.XMFIX_ZIP, DEFAULT_TOOL_CONFIG.zipCommand),
    unzipCommand: pick(env.XMFIX_UNZIP, DEFAULT_TOOL_CONFIG.unzipCommand)
  };
}
