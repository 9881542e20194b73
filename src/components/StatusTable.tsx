import chalk from "chalk";
import { Box, Text } from "ink";
import React from "react";
import { alignColumns, colorFor, humanizeSince } from "../utils/formatters.js";

export type StatusRow = {
  name: string;
  sync: string;
  health: string;
  lastSync?: string;
  resources: number | null;
  namespace: string;
  sourcePath: string;
};

export type StatusTableProps = {
  rows: StatusRow[];
  details?: boolean;
  now?: number;
};

export const StatusTable: React.FC<StatusTableProps> = ({ rows, details = false, now }) => {
  if (rows.length === 0) {
    return <Text dimColor>No applications registered</Text>;
  }

  const cells = rows.map((r) => {
    const base = [r.name, r.sync, r.health, humanizeSince(r.lastSync, now), r.resources === null ? "-" : String(r.resources)];
    return details ? [...base, r.namespace, r.sourcePath] : base;
  });
  const head = ["APPLICATION", "SYNC", "HEALTH", "LAST SYNC", "RESOURCES"];
  const [header, ...lines] = alignColumns([details ? [...head, "NAMESPACE", "SOURCE"] : head, ...cells]);

  return (
    <Box flexDirection="column">
      <Text>{chalk.bold(header)}</Text>
      {lines.map((line, i) => {
        const { color, dimColor } = colorFor(rows[i].health === "Not Found" ? rows[i].health : rows[i].sync);
        return (
          <Text key={rows[i].name} color={color} dimColor={dimColor}>
            {line}
          </Text>
        );
      })}
    </Box>
  );
};
