import pkg from "../../package.json"

import { defineCli } from "./command.ts"
import { helpCommand } from "../commands/help.ts"
import { printCommand } from "../commands/print.ts"
import { versionCommand } from "../commands/version.ts"
import { viewCommand } from "../commands/view.ts"

export const CLI_SPEC = defineCli({
  name: "logq",
  version: pkg.version,
  summary: "follow Android logcat files with live package, tag, level and text filters",
  commands: [viewCommand, printCommand, versionCommand, helpCommand]
} as const)
