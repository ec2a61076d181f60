import path from 'path';
import { FsError, isFsError } from '../common/fsError';
import { ensureValidName, nextFreeName } from '../common/names';
import type { Entry, ExpandedTree, TreeSnapshot } from '../types/entry';
import type { PreviewData } from '../types/preview';
import type {
  ConfirmAction,
  ExplorerState,
  InputKind,
  KeyPress,
  PendingPaste,
  SearchState,
  StatusLevel,
} from '../types/session';
import { logFsError, logOperation, logRefresh } from '../utils/logger';
import { DEFAULT_RECENT_CHANGE_MS, DEFAULT_STATUS_TTL_MS } from './config';
import { isDirectoryEntry } from './entry';
import {
  assertNotInside,
  copyPath,
  createDirectory,
  createFile,
  isSameFile,
  isSameOrDescendant,
  movePath,
  pathExists,
  removePath,
  renamePath,
} from './fileOperations';
import { dispatchKey } from './keymap';
import type { LaunchResult } from './launcher';
import { generatePreview } from './preview';
import { buildExpandedTree, buildTree, DEFAULT_EXPAND_ALL_LIMIT } from './treeBuilder';

export interface SessionOptions {
  rootPath: string;
  showHidden?: boolean;
  statusTtlMs?: number;
  recentChangeMs?: number;
  expandAllLimit?: number;
  now?: () => number;
  openInFileManager?: (directoryPath: string) => LaunchResult;
}

export type CursorDirection = 'up' | 'down';

export interface ExplorerSession {
  getState: () => ExplorerState;
  subscribe: (listener: (state: ExplorerState) => void) => () => void;
  currentEntry: () => Entry | undefined;
  targetDirectory: () => string;

  moveCursor: (direction: CursorDirection, count?: number) => void;
  /** Puts the cursor on `index`; false when no entry is there. */
  selectIndex: (index: number) => boolean;
  /** Selects `index`; a second click on the same directory within 400 ms toggles it. */
  clickEntry: (index: number, at?: number) => Promise<void>;
  goToTop: () => void;
  goToBottom: () => void;
  toggleExpand: () => Promise<void>;
  collapseOrParent: () => Promise<void>;
  toggleHidden: () => Promise<void>;
  refresh: () => Promise<boolean>;
  expandAll: () => Promise<void>;
  collapseAll: () => Promise<void>;
  openCurrent: () => Promise<void>;
  takePendingEditorFile: () => string | null;
  openInFileManager: () => void;

  create: (kind: 'file' | 'directory', name: string) => Promise<void>;
  rename: (newName: string) => Promise<void>;
  deleteEntry: (target: Entry) => Promise<void>;
  deleteCurrent: () => Promise<void>;
  yank: () => void;
  cut: () => void;
  paste: () => Promise<void>;

  startSearch: () => void;
  updateSearchQuery: (query: string) => void;
  nextMatch: () => void;
  previousMatch: () => void;
  confirmSearch: () => void;
  cancelSearch: () => void;

  beginInput: (kind: InputKind) => void;
  setInputBuffer: (value: string) => void;
  submitInput: () => Promise<void>;
  cancelInput: () => void;
  requestDelete: () => void;
  confirm: (accepted: boolean) => Promise<void>;
  openHelp: () => void;
  closeHelp: () => void;

  togglePreview: () => Promise<void>;
  scrollPreview: (delta: number) => void;
  loadPreview: () => Promise<void>;

  recordChange: (changedPath: string, at?: number) => void;
  /** Queued behind pending keys: rebuilds after changes made outside the explorer. */
  syncWithDisk: () => Promise<void>;
  isRecentlyChanged: (entryPath: string, at?: number) => boolean;
  pruneChanges: (at?: number) => void;
  setStatus: (text: string, level?: StatusLevel, persistent?: boolean) => void;
  expireStatus: (at?: number) => void;
  statusRemainingMs: (at?: number) => number | null;
  tick: (at?: number) => void;

  quit: () => void;
  handleKey: (key: KeyPress) => Promise<void>;
}

const clampCursor = (index: number, length: number) =>
  length === 0 ? 0 : Math.min(Math.max(index, 0), length - 1);

export const computeMatches = (entries: TreeSnapshot, query: string): number[] => {
  if (!query) return [];
  const needle = query.toLowerCase();
  const matches: number[] = [];
  entries.forEach((entry, index) => {
    if (entry.name.toLowerCase().includes(needle)) {
      matches.push(index);
    }
  });
  return matches;
};

/** Rewrites `candidate` when it is `from` or lies below it. */
export const remapPath = (candidate: string, from: string, to: string) => {
  if (!isSameOrDescendant(candidate, from)) return candidate;
  const relative = path.relative(from, candidate);
  return relative ? path.join(to, relative) : to;
};

export const DOUBLE_CLICK_MS = 400;

const emptySearch = (): SearchState => ({ query: '', matches: [], index: 0 });

export const createExplorerSession = (options: SessionOptions): ExplorerSession => {
  const rootPath = path.resolve(options.rootPath);
  const now = options.now ?? Date.now;
  const statusTtlMs = options.statusTtlMs ?? DEFAULT_STATUS_TTL_MS;
  const recentChangeMs = options.recentChangeMs ?? DEFAULT_RECENT_CHANGE_MS;
  const expandAllLimit = options.expandAllLimit ?? DEFAULT_EXPAND_ALL_LIMIT;
  const previewCache = new Map<string, PreviewData>();
  const listeners = new Set<(state: ExplorerState) => void>();
  let keyQueue: Promise<void> = Promise.resolve();
  let lastClick: { index: number; at: number } | null = null;

  let state: ExplorerState = {
    rootPath,
    entries: [],
    cursor: 0,
    expanded: new Set<string>(),
    showHidden: options.showHidden ?? false,
    mode: { type: 'normal' },
    inputBuffer: '',
    search: emptySearch(),
    clipboard: null,
    status: null,
    preview: { visible: false, scroll: 0, data: null },
    recentChanges: new Map<string, number>(),
    pendingEditorFile: null,
    shouldQuit: false,
  };

  const update = (
    partial: Partial<ExplorerState> | ((current: ExplorerState) => Partial<ExplorerState>),
  ) => {
    const partialState = typeof partial === 'function' ? partial(state) : partial;
    state = { ...state, ...partialState };
    listeners.forEach((listener) => listener(state));
  };

  const currentEntry = (): Entry | undefined => state.entries[state.cursor];

  const setStatus = (text: string, level: StatusLevel = 'info', persistent = false) => {
    update({ status: { text, level, createdAt: now(), persistent } });
  };

  const reportFailure = (error: FsError, operation: string, persistent = false) => {
    logFsError(error, operation);
    setStatus(`Error: ${error.message}`, 'error', persistent);
  };

  /**
   * Runs one filesystem action. `FsError`s end here as an error status; the
   * snapshot is left as it was. Anything else is a bug and propagates.
   */
  const runFsAction = async (operation: string, action: () => Promise<void>) => {
    try {
      await action();
    } catch (error: unknown) {
      if (!isFsError(error)) {
        throw error;
      }
      reportFailure(error, operation);
    }
  };

  /** Keeps the match index on the cursor row when that row still matches. */
  const recomputeSearch = (entries: TreeSnapshot, search: SearchState, cursor: number): SearchState => {
    if (!search.query) return search;
    const matches = computeMatches(entries, search.query);
    return { ...search, matches, index: Math.max(matches.indexOf(cursor), 0) };
  };

  /**
   * Rebuilds from root + `expanded`. The cursor stays on `focusPath` (default:
   * the entry under the cursor) when it survives, else the old index is
   * clamped. On failure nothing but the status changes.
   */
  const rebuild = async (
    expanded: ReadonlySet<string>,
    showHidden: boolean,
    focusPath: string | null = currentEntry()?.path ?? null,
  ): Promise<boolean> => {
    const startedAt = Date.now();
    let entries: Entry[];
    try {
      entries = await buildTree(rootPath, expanded, showHidden);
    } catch (error: unknown) {
      if (!isFsError(error)) throw error;
      reportFailure(error, 'Refresh', true);
      return false;
    }
    const focusIndex = focusPath ? entries.findIndex((entry) => entry.path === focusPath) : -1;
    update((current) => {
      const cursor = focusIndex >= 0 ? focusIndex : clampCursor(current.cursor, entries.length);
      return {
        entries,
        expanded,
        showHidden,
        cursor,
        search: recomputeSearch(entries, current.search, cursor),
        status: current.status?.persistent ? null : current.status,
      };
    });
    logRefresh({
      rootPath,
      entryCount: entries.length,
      expandedCount: expanded.size,
      durationMs: Date.now() - startedAt,
    });
    return true;
  };

  const targetDirectory = () => {
    const entry = currentEntry();
    if (!entry) return rootPath;
    return entry.kind === 'directory' ? entry.path : path.dirname(entry.path);
  };

  const withExpanded = (expanded: ReadonlySet<string>, directoryPath: string) => {
    if (directoryPath === rootPath || expanded.has(directoryPath)) return expanded;
    return new Set([...expanded, directoryPath]);
  };

  const remapExpanded = (expanded: ReadonlySet<string>, from: string, to: string) =>
    new Set([...expanded].map((entryPath) => remapPath(entryPath, from, to)));

  const withoutSubtree = (expanded: ReadonlySet<string>, removedPath: string) =>
    new Set([...expanded].filter((entryPath) => !isSameOrDescendant(entryPath, removedPath)));

  const moveCursor = (direction: CursorDirection, count = 1) => {
    if (state.entries.length === 0) return;
    const delta = direction === 'up' ? -count : count;
    update({ cursor: clampCursor(state.cursor + delta, state.entries.length) });
  };

  const selectIndex = (index: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= state.entries.length) return false;
    update({ cursor: index });
    return true;
  };

  const clickEntry = async (index: number, at = now()) => {
    if (!selectIndex(index)) {
      lastClick = null;
      return;
    }
    const isDouble = lastClick !== null && lastClick.index === index && at - lastClick.at < DOUBLE_CLICK_MS;
    if (!isDouble) {
      lastClick = { index, at };
      return;
    }
    lastClick = null;
    if (isDirectoryEntry(currentEntry())) {
      await toggleExpand();
    }
  };

  const toggleExpand = async () => {
    const entry = currentEntry();
    if (!isDirectoryEntry(entry)) return;
    const next = new Set(state.expanded);
    if (next.has(entry.path)) {
      next.delete(entry.path);
    } else {
      next.add(entry.path);
    }
    await rebuild(next, state.showHidden, entry.path);
  };

  const collapseOrParent = async () => {
    const entry = currentEntry();
    if (!entry) return;
    if (entry.kind === 'directory' && state.expanded.has(entry.path)) {
      const next = new Set(state.expanded);
      next.delete(entry.path);
      await rebuild(next, state.showHidden, entry.path);
      return;
    }
    if (entry.depth === 0) return;
    for (let index = state.cursor - 1; index >= 0; index -= 1) {
      const candidate = state.entries[index];
      if (candidate.kind === 'directory' && candidate.depth < entry.depth) {
        update({ cursor: index });
        return;
      }
    }
  };

  const toggleHidden = async () => {
    const showHidden = !state.showHidden;
    if (await rebuild(state.expanded, showHidden)) {
      setStatus(showHidden ? 'Showing hidden files' : 'Hiding hidden files');
    }
  };

  const refresh = () => rebuild(state.expanded, state.showHidden);

  const expandAll = async () => {
    const focusPath = currentEntry()?.path ?? null;
    let tree: ExpandedTree;
    try {
      tree = await buildExpandedTree(rootPath, state.showHidden, expandAllLimit);
    } catch (error: unknown) {
      if (!isFsError(error)) throw error;
      reportFailure(error, 'Expand all', true);
      return;
    }
    const { entries, truncated } = tree;
    const expanded = new Set(entries.filter((entry) => entry.expanded).map((entry) => entry.path));
    const focusIndex = focusPath ? entries.findIndex((entry) => entry.path === focusPath) : -1;
    update((current) => {
      const cursor = focusIndex >= 0 ? focusIndex : clampCursor(current.cursor, entries.length);
      return { entries, expanded, cursor, search: recomputeSearch(entries, current.search, cursor) };
    });
    setStatus(
      truncated
        ? `Expanded all (limited to ${entries.length} entries)`
        : `Expanded all (${entries.length} entries)`,
    );
  };

  const collapseAll = async () => {
    if (await rebuild(new Set<string>(), state.showHidden)) {
      setStatus('Collapsed all directories');
    }
  };

  const afterMutation = () => {
    previewCache.clear();
  };

  const create = (kind: 'file' | 'directory', name: string) =>
    runFsAction('Create', async () => {
      ensureValidName(name);
      const directoryPath = targetDirectory();
      const targetPath = path.join(directoryPath, name);
      if (await pathExists(targetPath)) {
        throw new FsError('AlreadyExists', `Already exists: ${name}`, { path: targetPath });
      }
      if (kind === 'directory') {
        await createDirectory(targetPath);
      } else {
        await createFile(targetPath);
      }
      logOperation({ operation: kind === 'directory' ? 'Create directory' : 'Create file', path: targetPath });
      afterMutation();
      if (await rebuild(withExpanded(state.expanded, directoryPath), state.showHidden, targetPath)) {
        setStatus(kind === 'directory' ? `Created directory: ${name}` : `Created: ${name}`);
      }
    });

  const ensureSourceExists = async (sourcePath: string) => {
    if (!(await pathExists(sourcePath))) {
      throw new FsError('NotFound', `Not found: ${sourcePath}`, { path: sourcePath });
    }
  };

  const performRename = async (sourcePath: string, destination: string, overwrite: boolean) => {
    if (overwrite) {
      await ensureSourceExists(sourcePath);
      await removePath(destination);
    }
    await renamePath(sourcePath, destination);
    logOperation({ operation: 'Rename', path: sourcePath, destination });
    afterMutation();
    const { clipboard } = state;
    if (clipboard) {
      update({ clipboard: { ...clipboard, path: remapPath(clipboard.path, sourcePath, destination) } });
    }
    const expanded = remapExpanded(state.expanded, sourcePath, destination);
    if (await rebuild(expanded, state.showHidden, destination)) {
      setStatus(`Renamed to: ${path.basename(destination)}`);
    }
  };

  const rename = (newName: string) =>
    runFsAction('Rename', async () => {
      const entry = currentEntry();
      if (!entry) return;
      ensureValidName(newName);
      if (newName === entry.name) return;
      const destination = path.join(path.dirname(entry.path), newName);
      // case-only renames on case-insensitive filesystems resolve to the source itself
      if ((await pathExists(destination)) && !(await isSameFile(entry.path, destination))) {
        update({
          mode: {
            type: 'confirm',
            action: { kind: 'overwrite', operation: { kind: 'rename', source: entry.path, destination } },
          },
        });
        return;
      }
      await performRename(entry.path, destination, false);
    });

  const deleteEntry = (target: Entry) =>
    runFsAction('Delete', async () => {
      await removePath(target.path);
      logOperation({ operation: 'Delete', path: target.path });
      afterMutation();
      const { clipboard } = state;
      if (clipboard && isSameOrDescendant(clipboard.path, target.path)) {
        update({ clipboard: null });
      }
      const expanded = withoutSubtree(state.expanded, target.path);
      if (await rebuild(expanded, state.showHidden)) {
        setStatus(`Deleted: ${target.name}`);
      }
    });

  const setClipboard = (cut: boolean) => {
    const entry = currentEntry();
    if (!entry) return;
    update({ clipboard: { path: entry.path, cut } });
    setStatus(cut ? `Cut: ${entry.name}` : `Copied: ${entry.name}`);
  };

  const performPaste = async (operation: PendingPaste, overwrite: boolean) => {
    const { source, destination, cut } = operation;
    if (overwrite) {
      await ensureSourceExists(source);
      if (isSameOrDescendant(source, destination)) {
        throw new FsError('InvalidName', 'Cannot overwrite a directory that contains the source', {
          path: destination,
        });
      }
      await removePath(destination);
    }
    if (cut) {
      await movePath(source, destination);
    } else {
      await copyPath(source, destination);
    }
    logOperation({ operation: cut ? 'Move' : 'Copy', path: source, destination });
    afterMutation();
    let expanded = withExpanded(state.expanded, path.dirname(destination));
    if (cut) {
      expanded = remapExpanded(expanded, source, destination);
      update({ clipboard: null });
    }
    if (await rebuild(expanded, state.showHidden, destination)) {
      setStatus(cut ? `Moved: ${path.basename(destination)}` : `Pasted: ${path.basename(destination)}`);
    }
  };

  const paste = () =>
    runFsAction('Paste', async () => {
      const { clipboard } = state;
      if (!clipboard) {
        setStatus('Clipboard is empty');
        return;
      }
      const source = clipboard.path;
      if (!(await pathExists(source))) {
        update({ clipboard: null });
        throw new FsError('NotFound', `Not found: ${source}`, { path: source });
      }
      const directoryPath = targetDirectory();
      assertNotInside(source, directoryPath);
      let destination = path.join(directoryPath, path.basename(source));
      if (destination === source) {
        if (clipboard.cut) {
          setStatus('Already here');
          return;
        }
        const freeName = await nextFreeName(path.basename(source), (candidate) =>
          pathExists(path.join(directoryPath, candidate)),
        );
        destination = path.join(directoryPath, freeName);
      }
      const operation: PendingPaste = { kind: 'paste', source, destination, cut: clipboard.cut };
      if (await pathExists(destination)) {
        update({ mode: { type: 'confirm', action: { kind: 'overwrite', operation } } });
        return;
      }
      await performPaste(operation, false);
    });

  const openCurrent = async () => {
    const entry = currentEntry();
    if (!entry) return;
    if (entry.kind === 'directory') {
      await toggleExpand();
      return;
    }
    update({ pendingEditorFile: entry.path });
  };

  const takePendingEditorFile = () => {
    const file = state.pendingEditorFile;
    if (file) {
      update({ pendingEditorFile: null });
    }
    return file;
  };

  const openInFileManager = () => {
    if (!options.openInFileManager) {
      setStatus('No file manager available', 'error');
      return;
    }
    const directoryPath = targetDirectory();
    const result = options.openInFileManager(directoryPath);
    if (result.ok) {
      setStatus(`Opened in file manager: ${directoryPath}`);
    } else {
      setStatus(`Error: ${result.message}`, 'error');
    }
  };

  const jumpToMatch = (search: SearchState) => {
    const target = search.matches[search.index];
    update(target === undefined ? { search } : { search, cursor: target });
  };

  const updateSearchQuery = (query: string) => {
    const matches = computeMatches(state.entries, query);
    jumpToMatch({ query, matches, index: 0 });
  };

  const stepMatch = (step: 1 | -1) => {
    const { search } = state;
    const count = search.matches.length;
    if (count === 0) return;
    jumpToMatch({ ...search, index: (search.index + step + count) % count });
  };

  const beginInput = (kind: InputKind) => {
    if (kind === 'rename') {
      const entry = currentEntry();
      if (!entry) return;
      update({ mode: { type: 'input', kind }, inputBuffer: entry.name });
      return;
    }
    update({ mode: { type: 'input', kind }, inputBuffer: '' });
  };

  const submitInput = async () => {
    const { mode, inputBuffer } = state;
    update({ mode: { type: 'normal' }, inputBuffer: '' });
    if (mode.type !== 'input' || inputBuffer.length === 0) return;
    switch (mode.kind) {
      case 'createFile':
        await create('file', inputBuffer);
        return;
      case 'createDir':
        await create('directory', inputBuffer);
        return;
      case 'rename':
        await rename(inputBuffer);
        return;
      default: {
        const exhaustive: never = mode.kind;
        throw new Error(`Unsupported input kind ${String(exhaustive)}`);
      }
    }
  };

  const requestDelete = () => {
    const entry = currentEntry();
    if (!entry) return;
    update({ mode: { type: 'confirm', action: { kind: 'delete', target: entry } } });
  };

  const runConfirmed = async (action: ConfirmAction) => {
    if (action.kind === 'delete') {
      await deleteEntry(action.target);
      return;
    }
    const { operation } = action;
    if (operation.kind === 'paste') {
      await runFsAction('Paste', () => performPaste(operation, true));
    } else {
      await runFsAction('Rename', () => performRename(operation.source, operation.destination, true));
    }
  };

  const confirm = async (accepted: boolean) => {
    const { mode } = state;
    if (mode.type !== 'confirm') return;
    update({ mode: { type: 'normal' } });
    if (!accepted) {
      setStatus('Cancelled');
      return;
    }
    await runConfirmed(mode.action);
  };

  const loadPreview = async () => {
    const entry = currentEntry();
    if (!entry) {
      update((current) => ({ preview: { ...current.preview, data: null } }));
      return;
    }
    if (state.preview.data?.path === entry.path) return;
    let data = previewCache.get(entry.path);
    if (!data) {
      try {
        data = await generatePreview(entry.path);
      } catch (error: unknown) {
        if (!isFsError(error)) throw error;
        data = {
          path: entry.path,
          content: { type: 'error', message: error.message },
          metadata: { size: 0, modifiedMs: null, permissions: 0 },
        };
      }
      previewCache.set(entry.path, data);
    }
    const loaded = data;
    update((current) => ({ preview: { ...current.preview, scroll: 0, data: loaded } }));
  };

  const togglePreview = async () => {
    if (state.preview.visible) {
      update({ preview: { visible: false, scroll: 0, data: null } });
      return;
    }
    update({ preview: { visible: true, scroll: 0, data: null } });
    await loadPreview();
  };

  const scrollPreview = (delta: number) => {
    if (!state.preview.visible) return;
    update((current) => ({
      preview: { ...current.preview, scroll: Math.max(0, current.preview.scroll + delta) },
    }));
  };

  const recordChange = (changedPath: string, at = now()) => {
    previewCache.delete(changedPath);
    previewCache.delete(path.dirname(changedPath));
    update((current) => {
      const recentChanges = new Map(current.recentChanges);
      recentChanges.set(changedPath, at);
      const stale = current.preview.data?.path;
      const previewStale = stale === changedPath || stale === path.dirname(changedPath);
      return previewStale
        ? { recentChanges, preview: { ...current.preview, data: null } }
        : { recentChanges };
    });
  };

  const isRecentlyChanged = (entryPath: string, at = now()) => {
    const changedAt = state.recentChanges.get(entryPath);
    return changedAt !== undefined && at - changedAt < recentChangeMs;
  };

  const pruneChanges = (at = now()) => {
    const stale = [...state.recentChanges].filter(([, changedAt]) => at - changedAt >= recentChangeMs);
    if (stale.length === 0) return;
    const recentChanges = new Map(state.recentChanges);
    stale.forEach(([changedPath]) => recentChanges.delete(changedPath));
    update({ recentChanges });
  };

  const expireStatus = (at = now()) => {
    const { status } = state;
    if (status && !status.persistent && at - status.createdAt >= statusTtlMs) {
      update({ status: null });
    }
  };

  const statusRemainingMs = (at = now()) => {
    const { status } = state;
    if (!status) return null;
    if (status.persistent) return Number.POSITIVE_INFINITY;
    return Math.max(0, statusTtlMs - (at - status.createdAt));
  };

  const enqueue = (task: () => Promise<void>) => {
    const run = keyQueue.then(task);
    // the caller receives the rejection; later tasks still run
    keyQueue = run.catch(() => undefined);
    return run;
  };

  const session: ExplorerSession = {
    getState: () => state,
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    currentEntry,
    targetDirectory,
    moveCursor,
    selectIndex,
    clickEntry,
    goToTop: () => {
      if (state.entries.length > 0) update({ cursor: 0 });
    },
    goToBottom: () => {
      if (state.entries.length > 0) update({ cursor: state.entries.length - 1 });
    },
    toggleExpand,
    collapseOrParent,
    toggleHidden,
    refresh,
    expandAll,
    collapseAll,
    openCurrent,
    takePendingEditorFile,
    openInFileManager,
    create,
    rename,
    deleteEntry,
    deleteCurrent: async () => {
      const entry = currentEntry();
      if (entry) {
        await deleteEntry(entry);
      }
    },
    yank: () => setClipboard(false),
    cut: () => setClipboard(true),
    paste,
    startSearch: () => update({ mode: { type: 'search' }, search: emptySearch() }),
    updateSearchQuery,
    nextMatch: () => stepMatch(1),
    previousMatch: () => stepMatch(-1),
    confirmSearch: () => update({ mode: { type: 'normal' } }),
    cancelSearch: () => update({ mode: { type: 'normal' }, search: emptySearch() }),
    beginInput,
    setInputBuffer: (value) => update({ inputBuffer: value }),
    submitInput,
    cancelInput: () => update({ mode: { type: 'normal' }, inputBuffer: '' }),
    requestDelete,
    confirm,
    openHelp: () => update({ mode: { type: 'help' } }),
    closeHelp: () => update({ mode: { type: 'normal' } }),
    togglePreview,
    scrollPreview,
    loadPreview,
    recordChange,
    syncWithDisk: () =>
      enqueue(async () => {
        await refresh();
        if (state.preview.visible) {
          await loadPreview();
        }
      }),
    isRecentlyChanged,
    pruneChanges,
    setStatus,
    expireStatus,
    statusRemainingMs,
    tick(at = now()) {
      expireStatus(at);
      pruneChanges(at);
    },
    quit: () => update({ shouldQuit: true }),
    handleKey: (key) => enqueue(() => dispatchKey(session, key)),
  };

  return session;
};
