import { Box, Text } from 'ink';
import type { ExplorerState } from '../../types/session';
import { helpBarText, statusLine } from '../viewport';

interface StatusLineProps {
  state: ExplorerState;
  width: number;
}

const TONE_COLORS = {
  prompt: 'cyan',
  info: 'green',
  error: 'red',
  idle: 'gray',
} as const;

export default function StatusLine({ state, width }: StatusLineProps) {
  const { text, tone } = statusLine(state);
  return (
    <Box flexDirection="column">
      <Text color={TONE_COLORS[tone]} wrap="truncate-end">
        {text}
      </Text>
      <Text dimColor wrap="truncate-end">
        {helpBarText(width)}
      </Text>
    </Box>
  );
}
