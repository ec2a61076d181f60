import { useEffect, useMemo, useRef, useState } from 'react';
import { Box, Text, useApp, useInput, useStdin, useStdout } from 'ink';
import type { ExplorerSession } from '../main/session';
import type { KeyPress } from '../types/session';
import { openInEditor } from '../main/launcher';
import { appLog } from '../utils/logger';
import HelpOverlay from './components/HelpOverlay';
import PreviewPanel from './components/PreviewPanel';
import StatusLine from './components/StatusLine';
import TreeView from './components/TreeView';
import { parseMouseReports, toKeyPress, toMouseInput } from './keys';
import { CLEAR_SCREEN, DISABLE_MOUSE, ENABLE_MOUSE } from './terminal';
import { headerText, scrollOffset, treeHeight } from './viewport';

const TICK_INTERVAL_MS = 250;

interface AppProps {
  session: ExplorerSession;
  editor: string;
}

const useTerminalSize = () => {
  const { stdout } = useStdout();
  const [size, setSize] = useState({ columns: stdout?.columns ?? 80, rows: stdout?.rows ?? 24 });

  useEffect(() => {
    if (!stdout) return undefined;
    const handleResize = () => setSize({ columns: stdout.columns, rows: stdout.rows });
    stdout.on('resize', handleResize);
    return () => {
      stdout.off('resize', handleResize);
    };
  }, [stdout]);

  return size;
};

export default function App({ session, editor }: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const { setRawMode } = useStdin();
  const { columns, rows } = useTerminalSize();
  const [state, setState] = useState(() => session.getState());
  const offsetRef = useRef(0);

  useEffect(() => session.subscribe(setState), [session]);

  useEffect(() => {
    const timer = setInterval(() => session.tick(), TICK_INTERVAL_MS);
    return () => clearInterval(timer);
  }, [session]);

  useEffect(() => {
    if (state.shouldQuit) {
      exit();
    }
  }, [state.shouldQuit, exit]);

  useEffect(() => {
    if (!state.pendingEditorFile) return;
    const file = session.takePendingEditorFile();
    if (!file) return;
    const result = openInEditor(editor, file, {
      suspend: () => {
        stdout?.write(DISABLE_MOUSE);
        setRawMode(false);
      },
      resume: () => {
        setRawMode(true);
        stdout?.write(ENABLE_MOUSE + CLEAR_SCREEN);
      },
    });
    if (!result.ok) {
      session.setStatus(`Error: ${result.message}`, 'error');
    }
  }, [state.pendingEditorFile, session, editor, setRawMode, stdout]);

  const height = treeHeight(rows);
  const offset = scrollOffset(offsetRef.current, state.cursor, height, state.entries.length);
  offsetRef.current = offset;

  const send = (press: KeyPress) => {
    session.handleKey(press).catch((error: unknown) => {
      const failure = error instanceof Error ? error : new Error(String(error));
      appLog.error(`Key handling failed: ${failure.stack ?? failure.message}`);
      exit(failure);
    });
  };

  useInput((input, key) => {
    const reports = parseMouseReports(input);
    if (reports.length > 0) {
      const view = { offset: offsetRef.current, height, total: state.entries.length };
      reports.forEach((report) => {
        const press = toMouseInput(report, view);
        if (press) send(press);
      });
      return;
    }
    const press = toKeyPress(input, key);
    if (press) send(press);
  });

  const matches = useMemo(() => new Set(state.search.matches), [state.search.matches]);

  return (
    <Box flexDirection="column" height={rows}>
      <Text bold wrap="truncate-start">
        {headerText(state)}
      </Text>
      {state.mode.type === 'help' ? (
        <Box height={height} flexDirection="column">
          <HelpOverlay />
        </Box>
      ) : (
        <Box flexDirection="row" height={height}>
          <Box flexDirection="column" flexGrow={1}>
            <TreeView
              entries={state.entries}
              cursor={state.cursor}
              offset={offset}
              height={height}
              matches={matches}
              isRecentlyChanged={session.isRecentlyChanged}
            />
          </Box>
          {state.preview.visible && (
            <Box width="50%">
              <PreviewPanel preview={state.preview} height={height} />
            </Box>
          )}
        </Box>
      )}
      <StatusLine state={state} width={columns} />
    </Box>
  );
}
