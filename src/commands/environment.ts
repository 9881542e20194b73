import { planCleanup, removeApplicationFiles, type CleanupPlan } from "../services/cleanup.js";
import { getDisplayMessage } from "../services/errors.js";
import { readDefinitions } from "../services/registry.js";
import { checkPlan, planEnvironment, writePlan } from "../services/scaffold.js";
import { booleanFlag, parseArgs, stringFlag } from "../utils/argv.js";
import { plural } from "../utils/formatters.js";
import { fail, registryOptions } from "./shared.js";
import type { Command, CommandContext } from "./types.js";

const onOff = (value: boolean) => (value ? "on" : "off");

export class AddEnvironmentCommand implements Command {
  aliases = ["add-environment"];
  description = "Scaffold manifests and Argo CD applications for a new environment";
  usage =
    "add-env <name> [--replicas <n>] [--service-type <type>] [--tier <tier>] [--services <a,b>] [--no-auto-sync] [--no-auto-heal] [--dry-run]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args, ["replicas", "service-type", "tier", "services"]);
    const environment = parsed.positionals[0];
    if (!environment) {
      fail(context, `Usage: ${this.usage}`);
      return;
    }

    const { config } = context.settings;
    const replicas = stringFlag(parsed, "replicas");
    const services = stringFlag(parsed, "services");
    const planned = planEnvironment(
      {
        environment,
        replicas: replicas === undefined ? undefined : Number(replicas),
        serviceType: stringFlag(parsed, "service-type"),
        tier: stringFlag(parsed, "tier"),
        autoSync: booleanFlag(parsed, "auto-sync"),
        selfHeal: booleanFlag(parsed, "auto-heal"),
        services: services === undefined ? undefined : services.split(",").map((s) => s.trim()),
      },
      config,
    );
    if (planned.isErr()) {
      fail(context, getDisplayMessage(planned.error), "scaffold");
      return;
    }

    const checked = await checkPlan(planned.value, context.source, config, registryOptions(context.settings));
    if (checked.isErr()) {
      fail(context, getDisplayMessage(checked.error), "scaffold");
      return;
    }
    const plan = checked.value;

    context.statusLog.info(
      `Environment '${plan.environment}': tier ${plan.tier}, ${plural(plan.replicas, "replica")}, ${plan.serviceType}, auto-sync ${onOff(plan.autoSync)}, self-heal ${onOff(plan.selfHeal)}`,
      "scaffold",
    );

    if (booleanFlag(parsed, "dry-run")) {
      for (const file of Object.keys(plan.files).sort()) {
        context.statusLog.info(`[dry-run] would create ${file}`, "scaffold");
      }
      return;
    }

    const written = await writePlan(plan, context.settings.root);
    if (written.isErr()) {
      fail(context, getDisplayMessage(written.error), "scaffold");
      return;
    }
    for (const file of written.value) context.statusLog.info(`Created ${file}`, "scaffold");
    context.statusLog.success(
      `Environment '${plan.environment}' created with ${plural(plan.applications.length, "application")}: ${plan.applications.join(", ")}`,
      "scaffold",
    );
  }
}

type CleanupOptions = {
  dryRun: boolean;
  appsOnly: boolean;
  manifestsOnly: boolean;
};

export class CleanupCommand implements Command {
  aliases = ["rm"];
  description = "Delete applications from the cluster and the repository";
  usage = "cleanup <app...> | --all [--dry-run] [--force] [--apps-only] [--manifests-only]";

  async execute(context: CommandContext, ...args: string[]): Promise<void> {
    const parsed = parseArgs(args);
    const all = parsed.flags.all === true || parsed.flags.a === true;
    const force = parsed.flags.force === true || parsed.flags.f === true;
    const options: CleanupOptions = {
      dryRun: parsed.flags["dry-run"] === true,
      appsOnly: parsed.flags["apps-only"] === true,
      manifestsOnly: parsed.flags["manifests-only"] === true,
    };

    if (options.appsOnly && options.manifestsOnly) {
      fail(context, "--apps-only and --manifests-only cannot be combined");
      return;
    }
    if (all === (parsed.positionals.length > 0)) {
      fail(context, `Usage: ${this.usage}`);
      return;
    }

    const definitions = await readDefinitions(context.source, context.settings.config.appsDir);
    if (definitions.isErr()) {
      fail(context, getDisplayMessage(definitions.error), "cleanup");
      return;
    }
    const { entries } = definitions.value;

    const targets: CleanupPlan[] = [];
    if (all) {
      const seen = new Set<string>();
      for (const entry of entries) {
        if (seen.has(entry.name)) continue;
        seen.add(entry.name);
        targets.push(planCleanup(entry, context.settings.config.appsDir));
      }
      targets.sort((a, b) => a.application.localeCompare(b.application));
      if (targets.length === 0) {
        context.statusLog.warn("No applications found to clean up", "cleanup");
        return;
      }
    } else {
      for (const name of parsed.positionals) {
        const entry = entries.find((e) => e.name === name);
        if (!entry) {
          fail(context, `Application '${name}' not found in ${context.settings.config.appsDir}`, "cleanup");
          return;
        }
        targets.push(planCleanup(entry, context.settings.config.appsDir));
      }
    }

    if (!options.dryRun && !force) {
      const question = all
        ? `Delete ALL ${plural(targets.length, "application")} and their resources?`
        : `Delete ${targets.map((t) => t.application).join(", ")} and all their resources?`;
      if (!(await context.confirm(question))) {
        context.statusLog.info("Operation cancelled", "cleanup");
        return;
      }
    }

    for (const target of targets) {
      const cleaned = await this.cleanupOne(context, target, options);
      if (!cleaned) return;
    }
  }

  private async cleanupOne(context: CommandContext, target: CleanupPlan, options: CleanupOptions): Promise<boolean> {
    const { statusLog } = context;
    const name = target.application;

    if (!options.manifestsOnly) {
      const exists = await context.kubectl.applicationExists(name);
      if (exists.isErr()) {
        fail(context, getDisplayMessage(exists.error), "cleanup");
        return false;
      }
      if (!exists.value) {
        statusLog.warn(`Argo CD application ${name} not found`, "cleanup");
      } else if (options.dryRun) {
        statusLog.info(`[dry-run] would delete Argo CD application ${name}`, "cleanup");
      } else {
        const deleted = await context.kubectl.deleteApplication(name);
        if (deleted.isErr()) {
          fail(context, getDisplayMessage(deleted.error), "cleanup");
          return false;
        }
        statusLog.success(`Deleted Argo CD application ${name}`, "cleanup");

        const gone = await context.kubectl.waitForNamespaceGone(target.namespace);
        if (gone.isOk()) {
          statusLog.success(`Namespace ${target.namespace} cleaned up`, "cleanup");
        } else if (gone.error.type === "timeout") {
          statusLog.warn(`${getDisplayMessage(gone.error)}; it may need manual cleanup`, "cleanup");
        } else {
          fail(context, getDisplayMessage(gone.error), "cleanup");
          return false;
        }
      }
    }

    if (!options.appsOnly) {
      if (options.dryRun) {
        for (const dir of [target.manifestDir, target.definition]) {
          if (dir && ((await context.source.isDirectory(dir)) || (await context.source.isFile(dir)))) {
            statusLog.info(`[dry-run] would delete ${dir}`, "cleanup");
          }
        }
      } else {
        const removed = await removeApplicationFiles(target, context.settings.root);
        if (removed.isErr()) {
          fail(context, getDisplayMessage(removed.error), "cleanup");
          return false;
        }
        for (const path of removed.value) statusLog.success(`Deleted ${path}`, "cleanup");
        if (target.definition === null) {
          statusLog.warn(`Definition of ${name} shares a file with other applications; edit it by hand`, "cleanup");
        }
      }
    }

    if (!options.dryRun) statusLog.success(`Application '${name}' cleaned up`, "cleanup");
    return true;
  }
}
