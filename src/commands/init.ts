/**
 * `aliasmgr init`: print the shell integration snippet.
 */

import { resolve } from "node:path";
import type { Command } from "commander";
import { parseShell, SUPPORTED_SHELLS } from "../shell/detect.js";
import { generateInitScript } from "../shell/init.js";
import { invalidArguments } from "./common.js";

export function registerInitCommand(program: Command): void {
  program
    .command("init <shell>")
    .description(`Print the shell integration snippet (${SUPPORTED_SHELLS.join(", ")})`)
    .option("--config <path>", "Use this alias file instead of the default one")
    .addHelpText("after", "\nAdd to your shell rc file:\n  eval \"$(aliasmgr init zsh)\"")
    .action((shellName: string, options: { config?: string; }) => {
      const shell = parseShell(shellName);
      if (!shell) {
        throw invalidArguments(
          `Unsupported shell: ${shellName}. Supported: ${SUPPORTED_SHELLS.join(", ")}`,
        );
      }
      const configPath = options.config === undefined
        ? undefined
        : resolve(process.cwd(), options.config);
      console.log(generateInitScript(shell, { configPath }));
    });
}
