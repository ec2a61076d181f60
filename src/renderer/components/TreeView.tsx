import { Box, Text } from 'ink';
import type { Entry, TreeSnapshot } from '../../types/entry';
import { iconFor } from '../icons';
import { entryLabel } from '../viewport';

interface TreeViewProps {
  entries: TreeSnapshot;
  cursor: number;
  offset: number;
  height: number;
  matches: ReadonlySet<number>;
  isRecentlyChanged: (entryPath: string) => boolean;
}

const entryColor = (entry: Entry, recent: boolean) => {
  if (recent) return 'yellow';
  if (entry.kind === 'directory') return 'blue';
  if (entry.kind === 'symlink') return 'cyan';
  if (entry.executable) return 'green';
  return undefined;
};

export default function TreeView({
  entries,
  cursor,
  offset,
  height,
  matches,
  isRecentlyChanged,
}: TreeViewProps) {
  if (entries.length === 0) {
    return (
      <Box height={height}>
        <Text dimColor>(empty directory)</Text>
      </Box>
    );
  }

  const rows = entries.slice(offset, offset + height);
  return (
    <Box flexDirection="column" height={height}>
      {rows.map((entry, row) => {
        const index = offset + row;
        return (
          <Text
            key={entry.path}
            wrap="truncate-end"
            inverse={index === cursor}
            underline={matches.has(index)}
            color={entryColor(entry, isRecentlyChanged(entry.path))}
            dimColor={entry.hidden}
          >
            {entryLabel(entry, iconFor(entry))}
          </Text>
        );
      })}
    </Box>
  );
}
