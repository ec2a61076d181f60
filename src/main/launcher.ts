import { spawn, spawnSync } from 'child_process';
import { appLog } from '../utils/logger';

export type LaunchResult = { ok: true } | { ok: false; message: string };

export interface TerminalHandoff {
  /** Stop reading input and release raw mode */
  suspend: () => void;
  /** Re-enter raw mode and redraw */
  resume: () => void;
}

/** `"code --wait"` -> `["code", "--wait"]` */
export const splitCommand = (command: string): string[] =>
  command.split(/\s+/).filter((part) => part.length > 0);

/**
 * Runs the editor in the foreground with the terminal handed over, then gives
 * the terminal back whether or not the editor succeeded.
 */
export const openInEditor = (
  editor: string,
  filePath: string,
  terminal: TerminalHandoff,
): LaunchResult => {
  const [command, ...args] = splitCommand(editor);
  if (!command) {
    return { ok: false, message: 'No editor configured' };
  }
  terminal.suspend();
  try {
    const result = spawnSync(command, [...args, filePath], { stdio: 'inherit' });
    if (result.error) {
      return { ok: false, message: `Failed to launch ${command}: ${result.error.message}` };
    }
    if (result.status !== 0 && result.status !== null) {
      return { ok: false, message: `${command} exited with status ${result.status}` };
    }
    return { ok: true };
  } finally {
    terminal.resume();
  }
};

export const fileManagerCommand = (platform: NodeJS.Platform = process.platform) => {
  if (platform === 'darwin') return 'open';
  if (platform === 'win32') return 'explorer';
  return 'xdg-open';
};

export const openInFileManager = (directoryPath: string): LaunchResult => {
  const command = fileManagerCommand();
  try {
    const child = spawn(command, [directoryPath], { detached: true, stdio: 'ignore' });
    child.on('error', (error) => {
      appLog.warn(`Failed to open file manager (${command}): ${error.message}`);
    });
    child.unref();
    return { ok: true };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, message: `Failed to launch ${command}: ${message}` };
  }
};
