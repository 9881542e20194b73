import chalk from "chalk";
import { Box, Text } from "ink";
import React from "react";
import { getDisplayMessage } from "../services/errors.js";
import type { RegistryLoad } from "../services/registry.js";
import { plural } from "../utils/formatters.js";

export type ValidationReportProps = {
  load: RegistryLoad;
};

export const ValidationReport: React.FC<ValidationReportProps> = ({ load }) => {
  const { applications, errors, warnings } = load;
  const summary = `${plural(applications.length, "valid application")}, ${plural(errors.length, "error")}, ${plural(warnings.length, "warning")}`;

  return (
    <Box flexDirection="column">
      {errors.map((e, i) => (
        <Text key={`e${i}`}>
          {chalk.red("✗")} {getDisplayMessage(e)}
        </Text>
      ))}
      {warnings.map((w, i) => (
        <Text key={`w${i}`}>
          {chalk.yellow("!")} {getDisplayMessage(w)}
        </Text>
      ))}
      <Box marginTop={errors.length + warnings.length > 0 ? 1 : 0}>
        <Text color={errors.length > 0 ? "red" : "green"}>{summary}</Text>
      </Box>
    </Box>
  );
};
