import path from "node:path";
import React from "react";
import { StatusTable, type StatusRow } from "../components/StatusTable.js";
import { getDisplayMessage } from "../services/errors.js";
import type { Application } from "../types/domain.js";
import { booleanFlag, parseArgs, stringFlag } from "../utils/argv.js";
import { plural } from "../utils/formatters.js";
import { segments } from "../utils/paths.js";
import { isPositiveInteger } from "../utils/validators.js";
import { fail, loadForCommand } from "./shared.js";
import type { Command, CommandContext } from "./types.js";

const NOT_FOUND = "Not Found";
const WATCH_INTERVAL_SECONDS = 5;
const DEPLOY_TIMEOUT_SECONDS = 150;
const DEPLOY_POLL_MS = 5_000;

/**
 * Read a whole-number flag; reports and returns null when it is not a
 * positive integer.
 */
function positiveFlag(context: CommandContext, value: string | undefined, flag: string, fallback: number): number | null {
  if (value === undefined) return fallback;
  if (!isPositiveInteger(value)) {
    fail(context, `--${flag} must be a positive whole number`);
    return null;
  }
  return Number(value);
}

export class StatusCommand implements Command {
  aliases = ["monitor"];
  description = "Show sync and health status of every application";
  usage = "status [--details|-d] [--watch|-w] [--interval <seconds>] [--count <n>]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args, ["interval", "count"]);
    const details = parsed.flags.details === true || parsed.flags.d === true;
    if (parsed.flags.watch !== true && parsed.flags.w !== true) {
      await this.refresh(context, details);
      return;
    }

    const interval = positiveFlag(context, stringFlag(parsed, "interval"), "interval", WATCH_INTERVAL_SECONDS);
    if (interval === null) return;
    const count = positiveFlag(context, stringFlag(parsed, "count"), "count", Number.POSITIVE_INFINITY);
    if (count === null) return;

    context.statusLog.info(`Refreshing every ${interval}s, press Ctrl+C to stop`, "status");
    for (let shown = 1; ; shown++) {
      if (!(await this.refresh(context, details)) || shown >= count) return;
      await context.sleep(interval * 1000);
    }
  }

  // false once the table cannot be produced; the exit code is set then
  private async refresh(context: CommandContext, details: boolean): Promise<boolean> {
    const load = await loadForCommand(context);
    if (!load) return false;

    const rows: StatusRow[] = [];
    for (const app of load.applications) {
      const row = await this.statusOf(context, app);
      if (!row) return false;
      rows.push(row);
    }

    await context.render(<StatusTable rows={rows} details={details} />);
    return true;
  }

  private async statusOf(context: CommandContext, app: Application): Promise<StatusRow | null> {
    const base = { name: app.name, namespace: app.destinationNamespace, sourcePath: app.sourcePath };
    const live = await context.kubectl.getApplication(app.name);
    if (live.isErr()) {
      if (live.error.type === "not-installed") {
        fail(context, getDisplayMessage(live.error), "status");
        return null;
      }
      context.statusLog.warn(`${app.name}: ${getDisplayMessage(live.error)}`, "status");
      return { ...base, sync: "Unknown", health: "Unknown", resources: null };
    }
    if (!live.value) {
      return { ...base, sync: NOT_FOUND, health: NOT_FOUND, resources: null };
    }

    const status = live.value.status;
    const resources = await context.kubectl.countResources(app.destinationNamespace);
    return {
      ...base,
      sync: status?.sync?.status ?? "Unknown",
      health: status?.health?.status ?? "Unknown",
      lastSync: status?.operationState?.finishedAt,
      resources: resources.isOk() ? resources.value : null,
    };
  }
}

export class SyncCommand implements Command {
  aliases = ["s"];
  description = "Force a sync of one application";
  usage = "sync <app> [--prune]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args);
    const name = parsed.positionals[0];
    if (!name) {
      fail(context, `Usage: ${this.usage}`);
      return;
    }

    const load = await loadForCommand(context);
    if (!load) return;
    if (!load.applications.some((a) => a.name === name)) {
      fail(context, `Application '${name}' is not a valid registered application`, "sync");
      return;
    }

    const exists = await context.kubectl.applicationExists(name);
    if (exists.isErr()) {
      fail(context, getDisplayMessage(exists.error), "sync");
      return;
    }
    if (!exists.value) {
      fail(context, `Application '${name}' not found in the cluster`, "sync");
      return;
    }

    const synced = await context.kubectl.triggerSync(name, { prune: parsed.flags.prune === true });
    if (synced.isErr()) {
      fail(context, getDisplayMessage(synced.error), "sync");
      return;
    }
    context.statusLog.success(`Sync triggered for ${name}`, "sync");
  }
}

export class DeployCommand implements Command {
  aliases = ["apply"];
  description = "Apply application definitions to the cluster and wait until Argo CD has them all";
  usage = "deploy [app...] [--timeout <seconds>] [--dry-run]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args, ["timeout"]);
    const timeout = positiveFlag(context, stringFlag(parsed, "timeout"), "timeout", DEPLOY_TIMEOUT_SECONDS);
    if (timeout === null) return;

    const load = await loadForCommand(context);
    if (!load) return;
    if (load.errors.length > 0) {
      context.statusLog.warn(`${plural(load.errors.length, "registry error")} excluded some applications; run validate`, "deploy");
    }

    const requested = parsed.positionals;
    const unknown = requested.filter((name) => !load.applications.some((a) => a.name === name));
    if (unknown.length > 0) {
      fail(context, `Not valid registered applications: ${unknown.join(", ")}`, "deploy");
      return;
    }
    const targets = requested.length > 0 ? load.applications.filter((a) => requested.includes(a.name)) : load.applications;
    if (targets.length === 0) {
      context.statusLog.warn("No applications to deploy", "deploy");
      return;
    }

    // one apply per file; a multi-document file is applied whole
    const files = Array.from(new Set(targets.map((a) => a.definitionPath.split("#")[0])));
    if (booleanFlag(parsed, "dry-run")) {
      for (const file of files) context.statusLog.info(`[dry-run] would apply ${file}`, "deploy");
      return;
    }

    for (const file of files) {
      const applied = await context.kubectl.apply(path.join(context.settings.root, ...segments(file)));
      if (applied.isErr()) {
        fail(context, getDisplayMessage(applied.error), "deploy");
        return;
      }
      for (const line of applied.value) context.statusLog.info(line, "deploy");
    }

    const names = targets.map((a) => a.name);
    const waited = await context.kubectl.waitForApplications(names, {
      timeoutMs: timeout * 1000,
      intervalMs: DEPLOY_POLL_MS,
      onPoll: (found, total) => context.statusLog.info(`Found ${found}/${total} applications, waiting`, "deploy"),
    });
    if (waited.isErr()) {
      fail(context, getDisplayMessage(waited.error), "deploy");
      return;
    }
    context.statusLog.success(`${plural(names.length, "application")} deployed`, "deploy");
  }
}
