import React from "react";
import { ApplicationList } from "../components/ApplicationList.js";
import { PolicyView } from "../components/PolicyView.js";
import { ValidationReport } from "../components/ValidationReport.js";
import { getDisplayMessage } from "../services/errors.js";
import { hookJobToYaml, renderHookJob } from "../services/hook-job.js";
import { selectPolicy } from "../services/policy.js";
import { parseArgs, stringFlag } from "../utils/argv.js";
import { isPositiveInteger } from "../utils/validators.js";
import { fail, loadForCommand } from "./shared.js";
import type { Command, CommandContext } from "./types.js";

export class ValidateCommand implements Command {
  aliases = ["check"];
  description = "Validate every application definition";
  usage = "validate";

  async execute(context: CommandContext): Promise<void> {
    const load = await loadForCommand(context);
    if (!load) return;

    await context.render(<ValidationReport load={load} />);
    if (load.errors.length > 0) context.setExitCode(1);
  }
}

export class ListCommand implements Command {
  aliases = ["ls"];
  description = "List valid applications";
  usage = "list";

  async execute(context: CommandContext): Promise<void> {
    const load = await loadForCommand(context);
    if (!load) return;

    await context.render(<ApplicationList applications={load.applications} />);
    if (load.errors.length > 0) {
      context.statusLog.warn(`${load.errors.length} definition(s) excluded; run validate for details`, "list");
    }
  }
}

export class PolicyCommand implements Command {
  aliases = [];
  description = "Show the sync and hook policy of a tier";
  usage = "policy <tier>";

  async execute(context: CommandContext, tier?: string): Promise<void> {
    if (!tier) {
      fail(context, `Usage: ${this.usage}`);
      return;
    }
    const policy = selectPolicy(tier);
    if (policy.isErr()) {
      fail(context, getDisplayMessage(policy.error), "policy");
      return;
    }
    await context.render(<PolicyView policy={policy.value} />);
  }
}

export class HookCommand implements Command {
  aliases = [];
  description = "Print the post-sync validation Job of an application";
  usage = "hook <app> [--image <image>] [--target-service <name>] [--target-port <port>]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args, ["image", "target-service", "target-port"]);
    const name = parsed.positionals[0];
    if (!name) {
      fail(context, `Usage: ${this.usage}`);
      return;
    }

    const port = stringFlag(parsed, "target-port");
    if (port !== undefined && !isPositiveInteger(port)) {
      fail(context, "target-port: must be a positive number");
      return;
    }

    const load = await loadForCommand(context);
    if (!load) return;
    const app = load.applications.find((a) => a.name === name);
    if (!app) {
      fail(context, `Application '${name}' is not a valid registered application`, "hook");
      return;
    }

    const job = renderHookJob(app, {
      image: stringFlag(parsed, "image") ?? context.settings.config.hookImage,
      targetService: stringFlag(parsed, "target-service"),
      targetPort: port === undefined ? undefined : Number(port),
    });
    context.print(hookJobToYaml(job));
  }
}
