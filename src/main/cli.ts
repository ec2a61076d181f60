#!/usr/bin/env node
import { Command } from 'commander';
import { blue, bold, cyan, dim, green, red } from 'colorette';
import { render } from 'ink';
import { createElement } from 'react';
import App from '../renderer/App';
import { iconFor } from '../renderer/icons';
import { DISABLE_MOUSE, ENABLE_MOUSE } from '../renderer/terminal';
import { entryLabel } from '../renderer/viewport';
import type { Entry } from '../types/entry';
import { appLog, configureLogging } from '../utils/logger';
import { resolveExplorerConfig } from './config';
import type { ExplorerConfig } from './config';
import { openInFileManager } from './launcher';
import { createExplorerSession } from './session';
import { buildExpandedTree } from './treeBuilder';
import { startWatcher } from './watcher';

const VERSION = '0.1.0';
const SYNC_DELAY_MS = 200;

interface CliOptions {
  hidden?: boolean;
  print?: boolean;
  watch: boolean;
}

const colourEntry = (entry: Entry) => {
  const label = entryLabel(entry, iconFor(entry));
  if (entry.kind === 'directory') return bold(blue(label));
  if (entry.kind === 'symlink') return cyan(label);
  if (entry.executable) return green(label);
  return entry.hidden ? dim(label) : label;
};

const printTree = async (config: ExplorerConfig) => {
  const { entries, truncated } = await buildExpandedTree(
    config.rootPath,
    config.showHidden,
    config.expandAllLimit,
  );
  const lines = [bold(config.rootPath), ...entries.map(colourEntry)];
  if (truncated) {
    lines.push(dim(`(stopped after ${entries.length} entries)`));
  }
  process.stdout.write(`${lines.join('\n')}\n`);
};

const explore = async (config: ExplorerConfig) => {
  const session = createExplorerSession({
    rootPath: config.rootPath,
    showHidden: config.showHidden,
    statusTtlMs: config.statusTtlMs,
    recentChangeMs: config.recentChangeMs,
    expandAllLimit: config.expandAllLimit,
    openInFileManager,
  });
  if (!(await session.refresh())) {
    const { status } = session.getState();
    throw new Error(status?.text ?? `Cannot read ${config.rootPath}`);
  }

  let syncTimer: NodeJS.Timeout | null = null;
  const scheduleSync = () => {
    if (syncTimer) clearTimeout(syncTimer);
    syncTimer = setTimeout(() => {
      syncTimer = null;
      session.syncWithDisk().catch((error: unknown) => {
        appLog.error(`Sync after external change failed: ${String(error)}`);
      });
    }, SYNC_DELAY_MS);
  };
  const watcher = config.watch
    ? startWatcher(config.rootPath, (changedPath) => {
        session.recordChange(changedPath);
        scheduleSync();
      })
    : null;

  appLog.info(`Exploring ${config.rootPath}`);
  process.stdout.write(ENABLE_MOUSE);
  const app = render(createElement(App, { session, editor: config.editor }), {
    exitOnCtrlC: false,
  });
  try {
    await app.waitUntilExit();
  } finally {
    process.stdout.write(DISABLE_MOUSE);
    if (syncTimer) clearTimeout(syncTimer);
    watcher?.close();
    appLog.info('Session closed');
  }
};

const program = new Command()
  .name('dirtree')
  .description('Keyboard-driven tree explorer for a local directory')
  .version(VERSION, '-V, --version', 'Print version')
  .argument('[root]', 'directory to explore', '.')
  .option('--hidden', 'show hidden files')
  .option('--print', 'print the fully expanded tree and exit')
  .option('--no-watch', 'do not watch the directory for changes')
  .action(async (root: string, options: CliOptions) => {
    const config = resolveExplorerConfig(process.env, {
      rootPath: root,
      showHidden: Boolean(options.hidden),
      watch: options.watch,
    });
    configureLogging({ verbose: config.verboseLogging, logFile: config.logFile });
    if (options.print) {
      await printTree(config);
      return;
    }
    await explore(config);
  });

program.addHelpText(
  'after',
  `
${bold('Examples:')}
  ${dim('$')} dirtree                 ${dim('# Explore the current directory')}
  ${dim('$')} dirtree ~/projects      ${dim('# Explore another directory')}
  ${dim('$')} dirtree . --print       ${dim('# Print the tree and exit')}
`,
);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  process.stderr.write(`${red('dirtree:')} ${message}\n`);
  process.exitCode = 1;
});
