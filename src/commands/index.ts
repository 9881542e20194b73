import { CleanupCommand, AddEnvironmentCommand } from "./environment.js";
import { HookCommand, ListCommand, PolicyCommand, ValidateCommand } from "./inspect.js";
import { ResolveCommand } from "./resolve.js";
import { CommandRegistry } from "./registry.js";
import { DeployCommand, StatusCommand, SyncCommand } from "./cluster.js";
import { HelpCommand, VersionCommand } from "./system.js";

export function createCommandRegistry(): CommandRegistry {
  const registry = new CommandRegistry();

  registry.registerCommand("resolve", new ResolveCommand());
  registry.registerCommand("validate", new ValidateCommand());
  registry.registerCommand("list", new ListCommand());
  registry.registerCommand("policy", new PolicyCommand());
  registry.registerCommand("hook", new HookCommand());
  registry.registerCommand("add-env", new AddEnvironmentCommand());
  registry.registerCommand("status", new StatusCommand());
  registry.registerCommand("sync", new SyncCommand());
  registry.registerCommand("deploy", new DeployCommand());
  registry.registerCommand("cleanup", new CleanupCommand());
  registry.registerCommand("help", new HelpCommand(() => registry.getAllCommands()));
  registry.registerCommand("version", new VersionCommand());

  return registry;
}

export { CommandRegistry } from "./registry.js";
export type { Command, CommandContext } from "./types.js";
