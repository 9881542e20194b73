import { describe, expect, test } from "vitest";
import { booleanFlag, parseArgs, stringFlag } from "../../utils/argv.js";

describe("parseArgs", () => {
  test("separates flags from positionals", () => {
    const parsed = parseArgs(["qa", "--replicas", "3", "--service-type=NodePort", "--no-auto-sync", "-f"], ["replicas"]);

    expect(parsed).toEqual({
      positionals: ["qa"],
      flags: { replicas: "3", "service-type": "NodePort", "auto-sync": false, f: true },
    });
  });

  test("undeclared value flags are booleans", () => {
    expect(parseArgs(["--details", "extra"])).toEqual({ positionals: ["extra"], flags: { details: true } });
  });

  test("everything after -- is positional", () => {
    expect(parseArgs(["--", "--weird-file.yaml"]).positionals).toEqual(["--weird-file.yaml"]);
  });
});

describe("flag readers", () => {
  const parsed = parseArgs(["--since=main", "--dry-run", "--auto-heal=false"]);

  test("stringFlag only returns values", () => {
    expect(stringFlag(parsed, "since")).toBe("main");
    expect(stringFlag(parsed, "dry-run")).toBeUndefined();
  });

  test("booleanFlag reads switches and literal booleans", () => {
    expect(booleanFlag(parsed, "dry-run")).toBe(true);
    expect(booleanFlag(parsed, "auto-heal")).toBe(false);
    expect(booleanFlag(parsed, "auto-sync")).toBeUndefined();
  });
});
