import { Box, Text, useApp, useInput } from "ink";
import React, { useState } from "react";

export type ConfirmPromptProps = {
  question: string;
  onAnswer: (yes: boolean) => void;
};

/**
 * y/N prompt. Anything other than y counts as no.
 */
export const ConfirmPrompt: React.FC<ConfirmPromptProps> = ({ question, onAnswer }) => {
  const { exit } = useApp();
  const [answer, setAnswer] = useState<boolean | null>(null);

  useInput((input, key) => {
    if (answer !== null) return;
    const yes = input.toLowerCase() === "y";
    if (!yes && !key.return && !key.escape && input.toLowerCase() !== "n") return;
    setAnswer(yes);
    onAnswer(yes);
    exit();
  });

  return (
    <Box>
      <Text>
        <Text color="yellow">{question}</Text> <Text dimColor>[y/N]</Text>
        {answer !== null && <Text> {answer ? "y" : "n"}</Text>}
      </Text>
    </Box>
  );
};
