import React from "react";
import Help, { type HelpEntry } from "../components/Help.js";
import { getVersion } from "../version.js";
import type { Command, CommandContext } from "./types.js";

export class HelpCommand implements Command {
  aliases = ["?"];
  description = "Show help";
  usage = "help";

  constructor(private readonly listCommands: () => Array<[string, Command]>) {}

  async execute(context: CommandContext): Promise<void> {
    const commands: HelpEntry[] = this.listCommands().map(([name, command]) => ({
      name,
      aliases: command.aliases,
      usage: command.usage ?? name,
      description: command.description,
    }));
    await context.render(<Help version={getVersion()} commands={commands} />);
  }
}

export class VersionCommand implements Command {
  aliases = [];
  description = "Print the version";
  usage = "version";

  execute(context: CommandContext): void {
    context.print(getVersion());
  }
}
