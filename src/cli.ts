import { Git } from "./api/git.js";
import { Kubectl } from "./api/kubectl.js";
import { sleep, type CommandRunner } from "./api/runner.js";
import { createCommandRegistry } from "./commands/index.js";
import type { CommandContext } from "./commands/types.js";
import { confirm, renderOnce } from "./components/render.js";
import { readPathwiseConfig } from "./config/pathwise-config.js";
import { resolveConfigPath, resolveRoot } from "./config/paths.js";
import { getDisplayMessage } from "./services/errors.js";
import { log } from "./services/logger.js";
import { FsRegistrySource } from "./services/registry-source.js";
import { createStatusService } from "./services/status-service.js";
import type { RuntimeSettings } from "./types/pathwise.js";
import { getVersion } from "./version.js";

const GLOBAL_VALUE_FLAGS = ["root", "config", "context"] as const;
type GlobalFlag = (typeof GLOBAL_VALUE_FLAGS)[number];

export type Invocation = {
  command: string | null;
  args: string[];
  globals: Partial<Record<GlobalFlag, string>>;
  help: boolean;
  version: boolean;
};

function isGlobalFlag(name: string): name is GlobalFlag {
  return GLOBAL_VALUE_FLAGS.some((f) => f === name);
}

/**
 * Pull global flags out of argv wherever they appear. `--help` and
 * `--version` only count before the command name.
 */
export function parseInvocation(argv: readonly string[]): Invocation {
  const invocation: Invocation = { command: null, args: [], globals: {}, help: false, version: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const body = arg.slice(2);
      const eq = body.indexOf("=");
      const name = eq === -1 ? body : body.slice(0, eq);
      if (isGlobalFlag(name)) {
        if (eq !== -1) {
          invocation.globals[name] = body.slice(eq + 1);
        } else if (i + 1 < argv.length) {
          invocation.globals[name] = argv[++i];
        }
        continue;
      }
    }
    if (invocation.command === null) {
      if (arg === "--help" || arg === "-h") {
        invocation.help = true;
        continue;
      }
      if (arg === "--version" || arg === "-v") {
        invocation.version = true;
        continue;
      }
      if (!arg.startsWith("-")) {
        invocation.command = arg;
        continue;
      }
    }
    invocation.args.push(arg);
  }

  return invocation;
}

export type CliOverrides = Partial<
  Pick<CommandContext, "statusLog" | "source" | "kubectl" | "git" | "render" | "print" | "confirm" | "sleep">
> & {
  runner?: CommandRunner;
};

/**
 * Run one pathwise invocation and return its exit code.
 */
export async function runCli(argv: readonly string[], overrides: CliOverrides = {}): Promise<number> {
  const invocation = parseInvocation(argv);
  const statusLog = overrides.statusLog ?? createStatusService();
  const print = overrides.print ?? ((text: string) => {
    process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
  });

  if (invocation.version) {
    print(getVersion());
    return 0;
  }

  const root = resolveRoot(invocation.globals.root);
  const configLocation = resolveConfigPath(root, invocation.globals.config);
  const config = await readPathwiseConfig(configLocation.path, configLocation.explicit);
  if (config.isErr()) {
    statusLog.error(getDisplayMessage(config.error), "config");
    return 1;
  }

  const settings: RuntimeSettings = {
    root,
    configPath: configLocation.path,
    config: config.value,
  };

  let exitCode = 0;
  const context: CommandContext = {
    settings,
    statusLog,
    source: overrides.source ?? new FsRegistrySource(root),
    kubectl:
      overrides.kubectl ??
      new Kubectl({
        argocdNamespace: config.value.argocdNamespace,
        context: invocation.globals.context ?? config.value.kubeContext,
        runner: overrides.runner,
      }),
    git: overrides.git ?? new Git({ cwd: root, runner: overrides.runner }),
    render: overrides.render ?? renderOnce,
    print,
    confirm: overrides.confirm ?? confirm,
    sleep: overrides.sleep ?? sleep,
    setExitCode: (code) => {
      exitCode = code;
    },
  };

  const registry = createCommandRegistry();
  const name = invocation.help || invocation.command === null ? "help" : invocation.command;
  const command = registry.getCommand(name);
  if (!command) {
    statusLog.error(`Unknown command: ${name}. Run 'pathwise help' for the list of commands`, "cli");
    return 1;
  }

  if (invocation.args.includes("--help") || invocation.args.includes("-h")) {
    print(`Usage: pathwise ${command.usage ?? name}\n\n${command.description}`);
    return 0;
  }

  log.info(`Running ${name}`, "cli", { args: invocation.args, root });
  const ok = await registry.executeCommand(name, context, ...invocation.args);
  if (!ok) return 1;
  // no command at all is a usage error
  if (invocation.command === null && !invocation.help) return 1;
  return exitCode;
}
