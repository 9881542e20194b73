import chalk from "chalk";
import { Box, Text } from "ink";
import React from "react";
import { getDisplayMessage } from "../services/errors.js";
import type { ChangeImpact } from "../services/path-resolver.js";
import { selectPolicy } from "../services/policy.js";
import { formatHookPolicy, formatSyncPolicy, plural } from "../utils/formatters.js";

export type ResolveViewProps = {
  impact: ChangeImpact;
};

export const ResolveView: React.FC<ResolveViewProps> = ({ impact }) => {
  const { affected, unowned, errors } = impact;

  return (
    <Box flexDirection="column">
      {affected.length === 0 ? (
        <Text dimColor>No application affected</Text>
      ) : (
        <Text>{chalk.bold(`Affected applications (${affected.length})`)}</Text>
      )}
      {affected.map(({ application: app, paths }) => {
        const policy = selectPolicy(app.environmentTier);
        return (
          <Box key={app.name} flexDirection="column" paddingLeft={2}>
            <Text>
              <Text color="cyan">{app.name}</Text> {app.environmentTier} {app.sourcePath}
            </Text>
            {policy.isOk() && (
              <Box flexDirection="column" paddingLeft={2}>
                <Text>sync: {formatSyncPolicy(policy.value)}</Text>
                <Text>hook: {formatHookPolicy(policy.value)}</Text>
              </Box>
            )}
            <Box paddingLeft={2}>
              <Text dimColor>{plural(paths.length, "changed path")}</Text>
            </Box>
          </Box>
        );
      })}
      {unowned.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text>{chalk.bold(`Unowned paths (${unowned.length})`)}</Text>
          {unowned.map((p) => (
            <Box key={p} paddingLeft={2}>
              <Text dimColor>{p}</Text>
            </Box>
          ))}
        </Box>
      )}
      {errors.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="red" bold>
            Errors ({errors.length})
          </Text>
          {errors.map((e) => (
            <Box key={e.subject} paddingLeft={2}>
              <Text color="red">{getDisplayMessage(e)}</Text>
            </Box>
          ))}
        </Box>
      )}
    </Box>
  );
};
