import React from "react";
import { ResolveView } from "../components/ResolveView.js";
import { getDisplayMessage } from "../services/errors.js";
import { resolveChanges } from "../services/path-resolver.js";
import { parseArgs, stringFlag } from "../utils/argv.js";
import { plural } from "../utils/formatters.js";
import { fail, loadForCommand } from "./shared.js";
import type { Command, CommandContext } from "./types.js";

export class ResolveCommand implements Command {
  aliases = ["r"];
  description = "Show which applications a set of changed paths affects";
  usage = "resolve <path...> | --since <ref> [--head <ref>]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args, ["since", "head"]);
    const since = stringFlag(parsed, "since");
    let paths = parsed.positionals;

    if (since) {
      const changed = await context.git.changedFiles(since, stringFlag(parsed, "head") ?? "HEAD");
      if (changed.isErr()) {
        fail(context, getDisplayMessage(changed.error), "git");
        return;
      }
      paths = [...paths, ...changed.value];
    } else if (paths.length === 0) {
      fail(context, `Usage: ${this.usage}`);
      return;
    }

    const load = await loadForCommand(context);
    if (!load) return;
    if (load.errors.length > 0) {
      context.statusLog.warn(`${plural(load.errors.length, "registry error")} excluded some applications; run validate`, "resolve");
    }

    const impact = resolveChanges(paths, load.applications);
    await context.render(<ResolveView impact={impact} />);
    if (impact.errors.length > 0) context.setExitCode(1);
  }
}
