import { Box, Text } from 'ink';
import type { PreviewState } from '../../types/session';
import { previewLines } from '../viewport';

interface PreviewPanelProps {
  preview: PreviewState;
  height: number;
}

export default function PreviewPanel({ preview, height }: PreviewPanelProps) {
  const { data } = preview;
  // border takes two rows
  const innerHeight = Math.max(1, height - 2);
  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" height={height} paddingX={1}>
      {data ? (
        previewLines(data, preview.scroll, innerHeight).map((line, index) => (
          <Text
            // eslint-disable-next-line react/no-array-index-key
            key={index}
            bold={index === 0}
            dimColor={index === 1}
            wrap="truncate-end"
          >
            {line}
          </Text>
        ))
      ) : (
        <Text dimColor>Loading…</Text>
      )}
    </Box>
  );
}
