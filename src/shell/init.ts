/**
 * Shell integration snippet printed by `aliasmgr init <shell>`.
 * Meant to be evaluated from the shell rc file:
 *
 *   eval "$(aliasmgr init zsh)"
 */

import type { ShellType } from "./detect.js";
import { SHELL_ENV_VAR } from "./detect.js";
import { CONFIG_PATH_ENV_VAR } from "../config/paths.js";
import { quoteSingle } from "./projector.js";

// Runs the real binary with fd 3 captured and fd 4 carrying its stdout.
// The binary path is resolved once, before the function shadows the name.
// The function returns the binary's exit status, not the eval's.
const WRAPPER_FUNCTION = `__aliasmgr_cmd="\${__aliasmgr_cmd:-$(command -v aliasmgr)}"

aliasmgr() {
    local deltas ret
    {
        deltas="$("$__aliasmgr_cmd" "$@" 3>&1 1>&4)"
    } 4>&1
    ret=$?
    if [ -n "$deltas" ]; then
        eval "$deltas"
    fi
    return $ret
}`;

export interface InitOptions {
  /** Absolute alias file path to pin via ALIASMGR_CONFIG_PATH. */
  configPath?: string;
}

export function generateInitScript(shell: ShellType, options: InitOptions = {}): string {
  const lines = [
    "# aliasmgr shell integration",
    `export ${SHELL_ENV_VAR}=${shell}`,
  ];
  if (options.configPath !== undefined) {
    lines.push(`export ${CONFIG_PATH_ENV_VAR}=${quoteSingle(options.configPath)}`);
  }
  lines.push("", WRAPPER_FUNCTION, "", "# Load aliases into this shell", "aliasmgr sync");
  return lines.join("\n");
}
