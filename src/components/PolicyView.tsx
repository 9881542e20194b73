import { Box, Text } from "ink";
import React from "react";
import type { Policy } from "../types/domain.js";
import { yesNo } from "../utils/formatters.js";

const Row: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <Box>
    <Box width={16}>
      <Text color="green">{label}</Text>
    </Box>
    <Text>{value}</Text>
  </Box>
);

export const PolicyView: React.FC<{ policy: Policy }> = ({ policy }) => (
  <Box flexDirection="column">
    <Text bold>Tier {policy.tier}</Text>
    <Row label="auto-sync" value={yesNo(policy.sync.autoSync)} />
    <Row label="self-heal" value={yesNo(policy.sync.selfHeal)} />
    <Row label="prune" value={yesNo(policy.sync.pruneResources)} />
    <Row label="wait" value={`${policy.hook.waitSeconds}s`} />
    <Row label="attempts" value={String(policy.hook.retryAttempts)} />
    <Row label="checks" value={policy.hook.checks.join(", ")} />
  </Box>
);
