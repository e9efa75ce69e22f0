import { Command } from "commander";
import { resolveToolConfig } from "./config.js";
import { fixFiles } from "./fix/fixer.js";
import { formatReport } from "./fix/report.js";
import { createCommandTools, type RepairTools } from "./fix/tools.js";
import { setLogLevel } from "./utils/log.js";

export interface ProgramOptions {
  /** Defaults to the zip/unzip commands named by the environment. */
  tools?: RepairTools;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name("xmfix")
    .description("Repair XMind files whose ZIP structure was damaged, e.g. by an interrupted save.")
    .version("0.1.0")
    .helpOption(false)
    .option("--help", "Show this usage and exit")
    .option("--debug", "Log every step, command and entry")
    .argument("[files...]", "XMind files, or directories holding an extracted XMind file")
    .action(async (files: string[], opts: { help?: boolean; debug?: boolean }) => {
      if (opts.help || files.length === 0) {
        program.outputHelp();
        process.exitCode = 1;
        return;
      }
      if (opts.debug) {
        setLogLevel("debug");
      }

      const tools = options.tools ?? createCommandTools(resolveToolConfig(process.env));
      const report = await fixFiles(files, { tools });
      for (const line of formatReport(report)) {
        console.log(line);
      }
    });

  return program;
}
