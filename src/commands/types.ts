import type { ReactElement } from "react";
import type { Git } from "../api/git.js";
import type { Kubectl } from "../api/kubectl.js";
import type { RegistrySource } from "../services/registry-source.js";
import type { StatusLogger } from "../services/status-service.js";
import type { RuntimeSettings } from "../types/pathwise.js";

export interface CommandContext {
  settings: RuntimeSettings;
  statusLog: StatusLogger;
  source: RegistrySource;
  kubectl: Kubectl;
  git: Git;
  // Renders a report once and resolves when it has been written
  render: (view: ReactElement) => Promise<void>;
  print: (text: string) => void;
  confirm: (question: string) => Promise<boolean>;
  sleep: (ms: number) => Promise<void>;
  setExitCode: (code: number) => void;
}

export interface Command {
  aliases: string[];
  description: string;
  usage?: string;
  canExecute?(context: CommandContext): boolean;
  execute(context: CommandContext, ...args: string[]): void | Promise<void>;
}
