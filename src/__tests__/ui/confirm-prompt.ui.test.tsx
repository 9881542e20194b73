import { render } from "ink-testing-library";
import React from "react";
import { describe, expect, test, vi } from "vitest";
import { ConfirmPrompt } from "../../components/ConfirmPrompt.js";
import { stripAnsi } from "../test-utils.js";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("ConfirmPrompt", () => {
  test("y answers yes", async () => {
    const onAnswer = vi.fn();
    const { stdin, lastFrame } = render(<ConfirmPrompt question="Delete dev-demo-app?" onAnswer={onAnswer} />);
    expect(stripAnsi(lastFrame())).toContain("Delete dev-demo-app? [y/N]");

    await tick();
    stdin.write("y");
    await tick();

    expect(onAnswer).toHaveBeenCalledWith(true);
  });

  test("enter takes the default", async () => {
    const onAnswer = vi.fn();
    const { stdin } = render(<ConfirmPrompt question="Delete?" onAnswer={onAnswer} />);

    await tick();
    stdin.write("\r");
    await tick();

    expect(onAnswer).toHaveBeenCalledWith(false);
  });

  test("other keys are ignored", async () => {
    const onAnswer = vi.fn();
    const { stdin } = render(<ConfirmPrompt question="Delete?" onAnswer={onAnswer} />);

    await tick();
    stdin.write("x");
    await tick();

    expect(onAnswer).not.toHaveBeenCalled();
  });
});
