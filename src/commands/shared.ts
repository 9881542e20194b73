import { getDisplayMessage } from "../services/errors.js";
import { loadRegistry, type RegistryLoad, type RegistryOptions } from "../services/registry.js";
import type { RuntimeSettings } from "../types/pathwise.js";
import type { CommandContext } from "./types.js";

export function registryOptions(settings: RuntimeSettings): RegistryOptions {
  return {
    appsDir: settings.config.appsDir,
    requiredManifests: settings.config.requiredManifests,
  };
}

/**
 * Load the registry, reporting a read failure. Returns null when the
 * repository could not be read; the exit code is already set then.
 */
export async function loadForCommand(context: CommandContext): Promise<RegistryLoad | null> {
  const result = await loadRegistry(context.source, registryOptions(context.settings));
  if (result.isErr()) {
    context.statusLog.error(getDisplayMessage(result.error), "registry");
    context.setExitCode(1);
    return null;
  }
  return result.value;
}

export function fail(context: CommandContext, message: string, area?: string): void {
  context.statusLog.error(message, area);
  context.setExitCode(1);
}
