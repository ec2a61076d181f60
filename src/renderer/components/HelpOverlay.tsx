import { Box, Text } from 'ink';

const SECTIONS: Array<{ title: string; bindings: Array<[string, string]> }> = [
  {
    title: 'Navigation',
    bindings: [
      ['j / k, ↓ / ↑', 'Move cursor'],
      ['PgDn / PgUp', 'Move a page'],
      ['g / G', 'First / last entry'],
      ['l, →, Enter', 'Expand directory or open file'],
      ['h, ←', 'Collapse or go to parent'],
      ['E / W', 'Expand all / collapse all'],
      ['H', 'Toggle hidden files'],
      ['R', 'Refresh'],
      ['Click / double-click', 'Select / expand directory'],
      ['Right click, wheel', 'Open entry, scroll'],
    ],
  },
  {
    title: 'Files',
    bindings: [
      ['a / A', 'New file / directory'],
      ['r', 'Rename'],
      ['d', 'Delete'],
      ['y / x / p', 'Copy / cut / paste'],
      ['O', 'Open in file manager'],
    ],
  },
  {
    title: 'Search & preview',
    bindings: [
      ['/', 'Search (Tab / Shift-Tab to cycle)'],
      ['n / N', 'Next / previous match'],
      ['P', 'Toggle preview'],
      ['J / K', 'Scroll preview'],
    ],
  },
  {
    title: 'General',
    bindings: [
      ['?', 'Toggle this help'],
      ['q, Ctrl-C', 'Quit'],
    ],
  },
];

export default function HelpOverlay() {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={1}>
      <Text bold color="cyan">
        Keyboard shortcuts
      </Text>
      {SECTIONS.map((section) => (
        <Box key={section.title} flexDirection="column" marginTop={1}>
          <Text bold color="yellow">
            {section.title}
          </Text>
          {section.bindings.map(([keys, description]) => (
            <Text key={keys}>
              {'  '}
              {keys.padEnd(16)}
              {description}
            </Text>
          ))}
        </Box>
      ))}
      <Box marginTop={1}>
        <Text dimColor>Press Esc, q or ? to close</Text>
      </Box>
    </Box>
  );
}
