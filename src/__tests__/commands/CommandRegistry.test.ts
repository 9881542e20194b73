import { beforeEach, describe, expect, test } from "vitest";
import { CommandRegistry } from "../../commands/registry.js";
import { createMockCommand, createTestContext } from "../test-utils.js";

describe("CommandRegistry", () => {
  let registry: CommandRegistry;

  beforeEach(() => {
    registry = new CommandRegistry();
  });

  describe("registerCommand", () => {
    test("registers commands with aliases", async () => {
      const command = createMockCommand({ aliases: ["s", "synchronize"] });
      registry.registerCommand("sync", command);

      const context = createTestContext();
      await registry.executeCommand("sync", context);
      await registry.executeCommand("s", context);
      await registry.executeCommand("synchronize", context);

      expect(command.execute).toHaveBeenCalledTimes(3);
    });

    test("command names are case-insensitive", async () => {
      const command = createMockCommand();
      registry.registerCommand("Sync", command);

      const context = createTestContext();
      await registry.executeCommand("sync", context);
      await registry.executeCommand("SYNC", context);

      expect(command.execute).toHaveBeenCalledTimes(2);
    });

    test("lists primary names only, in registration order", () => {
      registry.registerCommand("resolve", createMockCommand({ aliases: ["r"] }));
      registry.registerCommand("list", createMockCommand({ aliases: ["ls"] }));

      expect(registry.getAllCommands().map(([name]) => name)).toEqual(["resolve", "list"]);
    });
  });

  describe("executeCommand", () => {
    test("passes the context and arguments through", async () => {
      const command = createMockCommand();
      registry.registerCommand("test", command);
      const context = createTestContext();

      const result = await registry.executeCommand("test", context, "arg1", "arg2");

      expect(result).toBe(true);
      expect(command.execute).toHaveBeenCalledWith(context, "arg1", "arg2");
    });

    test("unknown commands are not executed", async () => {
      expect(await registry.executeCommand("nonexistent", createTestContext())).toBe(false);
    });

    test("respects canExecute", async () => {
      const command = createMockCommand({ canExecute: () => false });
      registry.registerCommand("test", command);

      expect(await registry.executeCommand("test", createTestContext())).toBe(false);
      expect(command.execute).not.toHaveBeenCalled();
    });

    test("reports a command that throws", async () => {
      const command = createMockCommand();
      command.execute.mockRejectedValue(new Error("boom"));
      registry.registerCommand("test", command);
      const context = createTestContext();

      expect(await registry.executeCommand("test", context)).toBe(false);
      expect(context.statusLog.error).toHaveBeenCalledWith("Command 'test' failed: boom", "command");
    });
  });
});
