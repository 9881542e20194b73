import {Box, Text} from 'ink';
import React from 'react';

export type HelpEntry = {
  name: string;
  aliases: string[];
  usage: string;
  description: string;
};

export type HelpProps = {
  version: string;
  commands: HelpEntry[];
};

const Help: React.FC<HelpProps> = ({version, commands}) => (
  <Box flexDirection="column">
    <Text color="magentaBright" bold>
      pathwise {version}
    </Text>
    <Text dimColor>Per-application selective sync for Argo CD GitOps repositories</Text>
    <Box marginTop={1}>
      <Text color="green" bold>
        COMMANDS
      </Text>
    </Box>
    {commands.map((c) => (
      <Box key={c.name} flexDirection="column" paddingLeft={2}>
        <Text>
          <Text color="cyan">{c.usage}</Text>
          {c.aliases.length > 0 && <Text dimColor> ({c.aliases.join(', ')})</Text>}
        </Text>
        <Box paddingLeft={4}>
          <Text>{c.description}</Text>
        </Box>
      </Box>
    ))}
    <Box marginTop={1}>
      <Text color="green" bold>
        GLOBAL
      </Text>
    </Box>
    <Box flexDirection="column" paddingLeft={2}>
      <Text>
        <Text color="cyan">--root {'<dir>'}</Text> repository root • <Text color="cyan">--config {'<file>'}</Text> config file • <Text color="cyan">--context {'<name>'}</Text> kube context
      </Text>
      <Text>
        <Text color="cyan">-h, --help</Text> • <Text color="cyan">-v, --version</Text>
      </Text>
    </Box>
  </Box>
);

export default Help;
