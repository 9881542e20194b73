import { errorMessage } from "../utils/error-fields.js";
import type { Command, CommandContext } from "./types.js";

export class CommandRegistry {
  private commands = new Map<string, Command>();
  private primary = new Map<string, Command>();

  registerCommand(name: string, command: Command): void {
    const key = name.toLowerCase();
    this.primary.set(key, command);
    this.commands.set(key, command);
    for (const alias of command.aliases) {
      this.commands.set(alias.toLowerCase(), command);
    }
  }

  getCommand(name: string): Command | undefined {
    return this.commands.get(name.toLowerCase());
  }

  /**
   * Registered commands by primary name, in registration order
   */
  getAllCommands(): Array<[string, Command]> {
    return Array.from(this.primary.entries());
  }

  async executeCommand(
    name: string,
    context: CommandContext,
    ...args: string[]
  ): Promise<boolean> {
    const command = this.getCommand(name);
    if (!command) return false;

    if (command.canExecute && !command.canExecute(context)) {
      return false;
    }

    try {
      await command.execute(context, ...args);
      return true;
    } catch (error) {
      context.statusLog.error(
        `Command '${name}' failed: ${errorMessage(error)}`,
        "command",
      );
      return false;
    }
  }
}
