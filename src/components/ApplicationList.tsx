import chalk from "chalk";
import { Box, Text } from "ink";
import React from "react";
import type { Application } from "../types/domain.js";
import { alignColumns } from "../utils/formatters.js";

export type ApplicationListProps = {
  applications: Application[];
};

export const ApplicationList: React.FC<ApplicationListProps> = ({ applications }) => {
  if (applications.length === 0) {
    return <Text dimColor>No applications registered</Text>;
  }

  const [header, ...lines] = alignColumns([
    ["NAME", "TIER", "NAMESPACE", "SOURCE"],
    ...applications.map((app) => [app.name, app.environmentTier, app.destinationNamespace, app.sourcePath]),
  ]);

  return (
    <Box flexDirection="column">
      <Text>{chalk.bold(header)}</Text>
      {lines.map((line, i) => (
        <Text key={applications[i].name}>{line}</Text>
      ))}
    </Box>
  );
};
