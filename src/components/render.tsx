import { render } from "ink";
import React, { type ReactElement } from "react";
import { ConfirmPrompt } from "./ConfirmPrompt.js";

/**
 * Render a view once to stdout and return when it is flushed.
 */
export async function renderOnce(view: ReactElement): Promise<void> {
  const instance = render(view);
  instance.unmount();
  await instance.waitUntilExit();
}

/**
 * Ask a y/N question on the terminal. Without a TTY the answer is no.
 */
export async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) return false;
  let answer = false;
  const instance = render(
    <ConfirmPrompt
      question={question}
      onAnswer={(yes) => {
        answer = yes;
      }}
    />,
  );
  await instance.waitUntilExit();
  return answer;
}
