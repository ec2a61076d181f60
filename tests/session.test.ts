import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { createExplorerSession } from '../src/main/session';
import type { ExplorerSession, SessionOptions } from '../src/main/session';
import type { KeyPress } from '../src/types/session';

const names = (session: ExplorerSession) => session.getState().entries.map((entry) => entry.name);
const statusText = (session: ExplorerSession) => session.getState().status?.text;
const currentName = (session: ExplorerSession) => session.currentEntry()?.name;

const char = (value: string): KeyPress => ({ kind: 'char', char: value });

describe('Explorer session', () => {
  let rootDir: string;
  const at = (...segments: string[]) => path.join(rootDir, ...segments);

  const write = async (relative: string, contents = '') => {
    await fs.mkdir(path.dirname(at(relative)), { recursive: true });
    await fs.writeFile(at(relative), contents);
  };

  const openSession = async (options: Partial<SessionOptions> = {}) => {
    const session = createExplorerSession({ rootPath: rootDir, ...options });
    expect(await session.refresh()).toBe(true);
    return session;
  };

  const moveTo = (session: ExplorerSession, name: string) => {
    const index = session.getState().entries.findIndex((entry) => entry.name === name);
    expect(index).toBeGreaterThanOrEqual(0);
    session.goToTop();
    session.moveCursor('down', index);
  };

  const typeKeys = async (session: ExplorerSession, text: string) => {
    for (const value of text) {
      await session.handleKey(char(value));
    }
  };

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'explorer-session-'));
  });

  afterEach(async () => {
    await fs.rm(rootDir, { recursive: true, force: true });
  });

  describe('navigation', () => {
    beforeEach(async () => {
      await write('A/inner.txt');
      await write('b.txt');
    });

    it('starts collapsed with the cursor on the first entry', async () => {
      const session = await openSession();
      expect(names(session)).toEqual(['A', 'b.txt']);
      expect(session.getState().cursor).toBe(0);
      expect(session.getState().mode).toEqual({ type: 'normal' });
    });

    it('clamps cursor movement to the snapshot', async () => {
      const session = await openSession();
      session.moveCursor('up');
      expect(session.getState().cursor).toBe(0);
      session.moveCursor('down', 10);
      expect(session.getState().cursor).toBe(1);
    });

    it('moves with arrows and page keys', async () => {
      const session = await openSession();
      await session.handleKey({ kind: 'special', name: 'pageDown' });
      expect(session.getState().cursor).toBe(1);
      await session.handleKey({ kind: 'special', name: 'up' });
      expect(session.getState().cursor).toBe(0);
      await session.handleKey({ kind: 'special', name: 'right' });
      expect(names(session)).toEqual(['A', 'inner.txt', 'b.txt']);
      await session.handleKey({ kind: 'special', name: 'left' });
      expect(names(session)).toEqual(['A', 'b.txt']);
      await session.handleKey(char('G'));
      expect(session.getState().cursor).toBe(1);
      await session.handleKey(char('g'));
      expect(session.getState().cursor).toBe(0);
    });

    it('expands, walks to the parent and collapses again', async () => {
      const session = await openSession();
      await session.toggleExpand();
      expect(names(session)).toEqual(['A', 'inner.txt', 'b.txt']);
      expect(session.getState().cursor).toBe(0);

      session.moveCursor('down');
      await session.collapseOrParent();
      expect(currentName(session)).toBe('A');

      await session.collapseOrParent();
      expect(names(session)).toEqual(['A', 'b.txt']);
      expect(session.getState().expanded.size).toBe(0);
    });

    it('remembers nested expansion when a parent is collapsed and reopened', async () => {
      await write('A/B/deep.txt');
      const session = await openSession();
      await session.toggleExpand();
      moveTo(session, 'B');
      await session.toggleExpand();
      expect(names(session)).toEqual(['A', 'B', 'deep.txt', 'inner.txt', 'b.txt']);

      session.goToTop();
      await session.toggleExpand();
      expect(names(session)).toEqual(['A', 'b.txt']);
      await session.toggleExpand();
      expect(names(session)).toEqual(['A', 'B', 'deep.txt', 'inner.txt', 'b.txt']);
    });

    it('toggles hidden files and keeps the cursor on the same entry', async () => {
      await write('.env', 'KEY=test-secret');
      const session = await openSession();
      moveTo(session, 'b.txt');

      await session.toggleHidden();
      expect(names(session)).toEqual(['A', '.env', 'b.txt']);
      expect(currentName(session)).toBe('b.txt');
      expect(statusText(session)).toBe('Showing hidden files');

      await session.toggleHidden();
      expect(names(session)).toEqual(['A', 'b.txt']);
      expect(statusText(session)).toBe('Hiding hidden files');
    });

    it('expands and collapses everything', async () => {
      const session = await openSession();
      await session.expandAll();
      expect(names(session)).toEqual(['A', 'inner.txt', 'b.txt']);
      expect(statusText(session)).toBe('Expanded all (3 entries)');

      await session.collapseAll();
      expect(names(session)).toEqual(['A', 'b.txt']);
      expect(statusText(session)).toBe('Collapsed all directories');
    });

    it('reports when expand all hits its limit', async () => {
      const session = await openSession({ expandAllLimit: 2 });
      await session.expandAll();
      expect(names(session)).toEqual(['A', 'inner.txt']);
      expect(statusText(session)).toBe('Expanded all (limited to 2 entries)');
    });

    it('queues files for the editor instead of opening them', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      await session.openCurrent();
      expect(session.getState().pendingEditorFile).toBe(at('b.txt'));
      expect(session.takePendingEditorFile()).toBe(at('b.txt'));
      expect(session.takePendingEditorFile()).toBeNull();
    });
  });

  describe('create', () => {
    beforeEach(async () => {
      await fs.mkdir(at('A'));
      await write('b.txt');
    });

    it('creates inside the directory under the cursor and focuses the new file', async () => {
      const session = await openSession();
      await session.toggleExpand();

      await session.create('file', 'new.txt');

      expect(await fs.readFile(at('A', 'new.txt'), 'utf8')).toBe('');
      expect(names(session)).toEqual(['A', 'new.txt', 'b.txt']);
      expect(session.getState().cursor).toBe(1);
      expect(statusText(session)).toBe('Created: new.txt');
    });

    it('expands a collapsed target directory', async () => {
      const session = await openSession();
      await session.create('directory', 'nested');

      expect((await fs.stat(at('A', 'nested'))).isDirectory()).toBe(true);
      expect(names(session)).toEqual(['A', 'nested', 'b.txt']);
      expect(currentName(session)).toBe('nested');
      expect(statusText(session)).toBe('Created directory: nested');
    });

    it('creates next to a file under the cursor', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      await session.create('file', 'c.txt');
      expect(names(session)).toEqual(['A', 'b.txt', 'c.txt']);
      expect(currentName(session)).toBe('c.txt');
    });

    it('reports invalid and duplicate names without touching the tree', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');

      await session.create('file', 'a/b');
      expect(statusText(session)).toBe('Error: Name a/b contains a path separator');

      await session.create('file', 'b.txt');
      expect(statusText(session)).toBe('Error: Already exists: b.txt');
      expect(session.getState().status?.level).toBe('error');
      expect(names(session)).toEqual(['A', 'b.txt']);
    });

    it('creates through the input prompt', async () => {
      const session = await openSession();
      await session.handleKey(char('l'));
      await session.handleKey(char('a'));
      expect(session.getState().mode).toEqual({ type: 'input', kind: 'createFile' });

      await typeKeys(session, 'x.mdd');
      await session.handleKey({ kind: 'special', name: 'backspace' });
      expect(session.getState().inputBuffer).toBe('x.md');
      await session.handleKey({ kind: 'special', name: 'enter' });

      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(names(session)).toEqual(['A', 'x.md', 'b.txt']);
      expect(currentName(session)).toBe('x.md');
    });

    it('leaves the disk alone when input is cancelled', async () => {
      const session = await openSession();
      await session.handleKey(char('A'));
      await typeKeys(session, 'skipped');
      await session.handleKey({ kind: 'special', name: 'escape' });

      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(session.getState().inputBuffer).toBe('');
      expect(await fs.readdir(at('A'))).toEqual([]);
    });
  });

  describe('rename', () => {
    it('prefills the current name and renames on submit', async () => {
      await write('a.txt', 'one');
      const session = await openSession();

      await session.handleKey(char('r'));
      expect(session.getState().inputBuffer).toBe('a.txt');
      await session.handleKey({ kind: 'special', name: 'backspace' });
      await session.handleKey({ kind: 'special', name: 'backspace' });
      await session.handleKey({ kind: 'special', name: 'backspace' });
      await typeKeys(session, 'md');
      await session.handleKey({ kind: 'special', name: 'enter' });

      expect(names(session)).toEqual(['a.md']);
      expect(statusText(session)).toBe('Renamed to: a.md');
      expect(await fs.readFile(at('a.md'), 'utf8')).toBe('one');
    });

    it('asks before replacing an existing entry', async () => {
      await write('a.txt', 'one');
      await write('b.txt', 'two');
      const session = await openSession();

      await session.rename('b.txt');
      expect(session.getState().mode).toEqual({
        type: 'confirm',
        action: {
          kind: 'overwrite',
          operation: { kind: 'rename', source: at('a.txt'), destination: at('b.txt') },
        },
      });

      await session.confirm(true);
      expect(names(session)).toEqual(['b.txt']);
      expect(await fs.readFile(at('b.txt'), 'utf8')).toBe('one');
      expect(statusText(session)).toBe('Renamed to: b.txt');
    });

    it('keeps an expanded directory expanded under its new name', async () => {
      await write('A/inner.txt');
      const session = await openSession();
      await session.toggleExpand();

      await session.rename('B');

      expect(names(session)).toEqual(['B', 'inner.txt']);
      expect(session.getState().entries[0].expanded).toBe(true);
      expect([...session.getState().expanded]).toEqual([at('B')]);
      expect(currentName(session)).toBe('B');
    });

    it('follows a renamed clipboard source', async () => {
      await write('a.txt');
      const session = await openSession();
      session.yank();
      await session.rename('c.txt');
      expect(session.getState().clipboard).toEqual({ path: at('c.txt'), cut: false });
    });

    it('renames onto another name of the same file without asking', async () => {
      await write('a.txt', 'one');
      await fs.link(at('a.txt'), at('b.txt'));
      const session = await openSession();

      await session.rename('b.txt');

      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(statusText(session)).toBe('Renamed to: b.txt');
      expect(currentName(session)).toBe('b.txt');
      expect(await fs.readFile(at('b.txt'), 'utf8')).toBe('one');
    });

    it('treats the unchanged name as a no-op', async () => {
      await write('a.txt');
      const session = await openSession();
      await session.rename('a.txt');
      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(statusText(session)).toBeUndefined();
    });
  });

  describe('delete', () => {
    beforeEach(async () => {
      await write('a.txt');
      await write('b.txt');
      await write('c.txt');
    });

    it('confirms, deletes and clamps the cursor', async () => {
      const session = await openSession();
      session.goToBottom();
      session.requestDelete();
      expect(session.getState().mode).toMatchObject({
        type: 'confirm',
        action: { kind: 'delete', target: { name: 'c.txt' } },
      });

      await session.confirm(true);

      expect(names(session)).toEqual(['a.txt', 'b.txt']);
      expect(session.getState().cursor).toBe(1);
      expect(statusText(session)).toBe('Deleted: c.txt');
      expect(await fs.readdir(rootDir)).toEqual(expect.not.arrayContaining(['c.txt']));
    });

    it('cancels on any key other than y', async () => {
      const session = await openSession();
      await session.handleKey(char('d'));
      await session.handleKey(char('n'));

      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(statusText(session)).toBe('Cancelled');
      expect(names(session)).toEqual(['a.txt', 'b.txt', 'c.txt']);
    });

    it('deletes on y through the key map', async () => {
      const session = await openSession();
      await session.handleKey(char('d'));
      await session.handleKey(char('y'));
      expect(names(session)).toEqual(['b.txt', 'c.txt']);
      expect(session.getState().cursor).toBe(0);
    });

    it('deletes the current entry directly', async () => {
      const session = await openSession();
      session.moveCursor('down');
      await session.deleteCurrent();
      expect(names(session)).toEqual(['a.txt', 'c.txt']);
      expect(currentName(session)).toBe('c.txt');
    });

    it('drops a clipboard entry that was deleted', async () => {
      const session = await openSession();
      session.yank();
      await session.deleteEntry(session.getState().entries[0]);
      expect(session.getState().clipboard).toBeNull();
    });

    it('removes directories recursively and forgets their expansion', async () => {
      await write('dir/sub/leaf.txt');
      const session = await openSession();
      await session.toggleExpand();
      moveTo(session, 'sub');
      await session.toggleExpand();
      expect(session.getState().expanded.size).toBe(2);

      session.goToTop();
      session.requestDelete();
      await session.confirm(true);

      expect(names(session)).toEqual(['a.txt', 'b.txt', 'c.txt']);
      expect(session.getState().expanded.size).toBe(0);
    });
  });

  describe('clipboard', () => {
    beforeEach(async () => {
      await fs.mkdir(at('A'));
      await write('b.txt', 'payload');
    });

    it('copies into the directory under the cursor and keeps the clipboard', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      session.yank();
      expect(statusText(session)).toBe('Copied: b.txt');

      session.goToTop();
      await session.paste();

      expect(names(session)).toEqual(['A', 'b.txt', 'b.txt']);
      expect(session.getState().cursor).toBe(1);
      expect(statusText(session)).toBe('Pasted: b.txt');
      expect(session.getState().clipboard).toEqual({ path: at('b.txt'), cut: false });
      expect(await fs.readFile(at('A', 'b.txt'), 'utf8')).toBe('payload');
      expect(await fs.readFile(at('b.txt'), 'utf8')).toBe('payload');
    });

    it('moves on cut and clears the clipboard', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      await session.handleKey(char('x'));
      expect(statusText(session)).toBe('Cut: b.txt');

      session.goToTop();
      await session.handleKey(char('p'));

      expect(names(session)).toEqual(['A', 'b.txt']);
      expect(session.getState().entries[1].depth).toBe(1);
      expect(session.getState().clipboard).toBeNull();
      expect(statusText(session)).toBe('Moved: b.txt');
      await expect(fs.access(at('b.txt'))).rejects.toThrow();
    });

    it('pastes a copy beside the source under a free name', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      session.yank();
      await session.paste();

      expect(names(session)).toEqual(['A', 'b-1.txt', 'b.txt']);
      expect(currentName(session)).toBe('b-1.txt');
      expect(statusText(session)).toBe('Pasted: b-1.txt');
    });

    it('does nothing when cutting and pasting in place', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      session.cut();
      await session.paste();
      expect(statusText(session)).toBe('Already here');
      expect(session.getState().clipboard).toEqual({ path: at('b.txt'), cut: true });
    });

    it('asks before overwriting and honours the answer', async () => {
      await write('A/b.txt', 'old');
      const session = await openSession();
      moveTo(session, 'b.txt');
      session.yank();
      session.goToTop();

      await session.paste();
      expect(session.getState().mode).toEqual({
        type: 'confirm',
        action: {
          kind: 'overwrite',
          operation: { kind: 'paste', source: at('b.txt'), destination: at('A', 'b.txt'), cut: false },
        },
      });
      await session.confirm(false);
      expect(statusText(session)).toBe('Cancelled');
      expect(await fs.readFile(at('A', 'b.txt'), 'utf8')).toBe('old');

      await session.paste();
      await session.confirm(true);
      expect(await fs.readFile(at('A', 'b.txt'), 'utf8')).toBe('payload');
      expect(statusText(session)).toBe('Pasted: b.txt');
      expect(session.getState().mode).toEqual({ type: 'normal' });
    });

    it('refuses to paste a directory into itself', async () => {
      const session = await openSession();
      session.yank();
      await session.paste();
      expect(statusText(session)).toBe('Error: Cannot paste a directory into itself');
      expect(await fs.readdir(at('A'))).toEqual([]);
    });

    it('clears the clipboard when its source disappeared', async () => {
      const session = await openSession();
      moveTo(session, 'b.txt');
      session.yank();
      await fs.rm(at('b.txt'));

      await session.paste();
      expect(statusText(session)).toBe(`Error: Not found: ${at('b.txt')}`);
      expect(session.getState().clipboard).toBeNull();
    });

    it('reports an empty clipboard', async () => {
      const session = await openSession();
      await session.paste();
      expect(statusText(session)).toBe('Clipboard is empty');
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await write('apple');
      await write('box');
      await write('taxi');
    });

    it('jumps to matches and wraps in both directions', async () => {
      const session = await openSession();
      session.startSearch();
      session.updateSearchQuery('x');
      expect(session.getState().search.matches).toEqual([1, 2]);
      expect(session.getState().cursor).toBe(1);

      session.nextMatch();
      expect(session.getState().cursor).toBe(2);
      session.nextMatch();
      expect(session.getState().cursor).toBe(1);
      session.previousMatch();
      expect(session.getState().cursor).toBe(2);
    });

    it('is case-insensitive', async () => {
      const session = await openSession();
      session.startSearch();
      session.updateSearchQuery('APP');
      expect(session.getState().search.matches).toEqual([0]);
    });

    it('keeps the query after enter and clears it on escape', async () => {
      const session = await openSession();
      await session.handleKey(char('/'));
      await typeKeys(session, 'x');
      await session.handleKey({ kind: 'special', name: 'tab' });
      expect(session.getState().cursor).toBe(2);
      await session.handleKey({ kind: 'special', name: 'enter' });
      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(session.getState().search.query).toBe('x');

      await session.handleKey(char('n'));
      expect(session.getState().cursor).toBe(1);
      await session.handleKey(char('N'));
      expect(session.getState().cursor).toBe(2);

      await session.handleKey(char('/'));
      expect(session.getState().search.query).toBe('');
      await typeKeys(session, 'box');
      await session.handleKey({ kind: 'special', name: 'escape' });
      expect(session.getState().search).toEqual({ query: '', matches: [], index: 0 });
      expect(session.getState().cursor).toBe(1);
    });

    it('recomputes matches on refresh without moving the cursor', async () => {
      const session = await openSession();
      session.startSearch();
      session.updateSearchQuery('x');
      session.nextMatch();
      session.confirmSearch();
      await write('axe');

      await session.refresh();
      expect(names(session)).toEqual(['apple', 'axe', 'box', 'taxi']);
      expect(session.getState().search).toEqual({ query: 'x', matches: [1, 2, 3], index: 2 });
      expect(currentName(session)).toBe('taxi');

      session.nextMatch();
      expect(currentName(session)).toBe('axe');
    });

    it('restarts the match index when the cursor row no longer matches', async () => {
      const session = await openSession();
      session.startSearch();
      session.updateSearchQuery('x');
      session.confirmSearch();
      session.goToTop();

      await session.refresh();
      expect(session.getState().search).toEqual({ query: 'x', matches: [1, 2], index: 0 });
      session.nextMatch();
      expect(currentName(session)).toBe('taxi');
    });

    it('leaves the cursor alone when nothing matches', async () => {
      const session = await openSession();
      session.goToBottom();
      session.startSearch();
      session.updateSearchQuery('zzz');
      expect(session.getState().search.matches).toEqual([]);
      expect(session.getState().cursor).toBe(2);
    });
  });

  describe('mouse', () => {
    let clock: number;
    const click = (index: number): KeyPress => ({ kind: 'mouse', action: 'click', index });

    beforeEach(async () => {
      clock = 1000;
      await write('A/inner.txt');
      await write('b.txt');
      await write('c.txt');
      await write('d.txt');
      await write('e.txt');
    });

    it('selects the clicked row', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey(click(2));
      expect(currentName(session)).toBe('c.txt');
      expect(names(session)).toEqual(['A', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);
    });

    it('ignores clicks below the last entry', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey(click(1));
      await session.handleKey(click(9));
      expect(currentName(session)).toBe('b.txt');
    });

    it('toggles a directory on a quick second click', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey(click(0));
      clock += 300;
      await session.handleKey(click(0));
      expect(names(session)).toEqual(['A', 'inner.txt', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);

      clock += 50;
      await session.handleKey(click(0));
      expect(names(session)).toHaveLength(6);
      clock += 50;
      await session.handleKey(click(0));
      expect(names(session)).toEqual(['A', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);
    });

    it('treats slow clicks as separate selections', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey(click(0));
      clock += 500;
      await session.handleKey(click(0));
      expect(names(session)).toEqual(['A', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);
    });

    it('opens the row under a right click', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey({ kind: 'mouse', action: 'rightClick', index: 0 });
      expect(names(session)).toEqual(['A', 'inner.txt', 'b.txt', 'c.txt', 'd.txt', 'e.txt']);

      await session.handleKey({ kind: 'mouse', action: 'rightClick', index: 3 });
      expect(session.takePendingEditorFile()).toBe(at('c.txt'));
    });

    it('scrolls the cursor three rows per wheel step', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey({ kind: 'mouse', action: 'scrollDown' });
      expect(session.getState().cursor).toBe(3);
      await session.handleKey({ kind: 'mouse', action: 'scrollDown' });
      expect(session.getState().cursor).toBe(4);
      await session.handleKey({ kind: 'mouse', action: 'scrollUp' });
      expect(session.getState().cursor).toBe(1);
    });

    it('ignores the mouse outside normal mode', async () => {
      const session = await openSession({ now: () => clock });
      await session.handleKey(char('d'));
      await session.handleKey(click(2));
      expect(session.getState().mode).toMatchObject({
        type: 'confirm',
        action: { kind: 'delete', target: { name: 'A' } },
      });
      expect(currentName(session)).toBe('A');
    });
  });

  describe('refresh and status', () => {
    it('keeps the last snapshot and a persistent error when the root vanishes', async () => {
      await write('a.txt');
      const session = await openSession();
      await fs.rm(rootDir, { recursive: true, force: true });

      expect(await session.refresh()).toBe(false);
      expect(names(session)).toEqual(['a.txt']);
      expect(session.getState().status).toMatchObject({
        text: `Error: Not found: ${rootDir}`,
        level: 'error',
        persistent: true,
      });
      expect(session.statusRemainingMs()).toBe(Number.POSITIVE_INFINITY);

      await fs.mkdir(rootDir);
      expect(await session.refresh()).toBe(true);
      expect(names(session)).toEqual([]);
      expect(session.getState().status).toBeNull();
    });

    it('expires transient status messages', async () => {
      await write('a.txt');
      let clock = 1000;
      const session = await openSession({ now: () => clock });
      session.yank();

      expect(session.statusRemainingMs(2000)).toBe(2000);
      session.expireStatus(3999);
      expect(statusText(session)).toBe('Copied: a.txt');
      clock = 4000;
      session.tick();
      expect(session.getState().status).toBeNull();
      expect(session.statusRemainingMs()).toBeNull();
    });

    it('highlights recent changes for a while', async () => {
      const session = await openSession({ now: () => 0 });
      const changed = at('a.txt');
      session.recordChange(changed, 1000);

      expect(session.isRecentlyChanged(changed, 5999)).toBe(true);
      expect(session.isRecentlyChanged(changed, 6000)).toBe(false);
      session.tick(6000);
      expect(session.getState().recentChanges.size).toBe(0);
    });

    it('picks up external changes when syncing', async () => {
      await write('a.txt');
      const session = await openSession();
      await write('b.txt');
      session.recordChange(at('b.txt'));

      await session.syncWithDisk();
      expect(names(session)).toEqual(['a.txt', 'b.txt']);
    });

    it('reports refreshes made from the keyboard', async () => {
      await write('a.txt');
      const session = await openSession();
      await session.handleKey(char('R'));
      expect(statusText(session)).toBe('Refreshed');
    });
  });

  describe('modes', () => {
    beforeEach(async () => {
      await write('a.txt', 'hello\nworld\n');
    });

    it('opens and closes help', async () => {
      const session = await openSession();
      await session.handleKey(char('?'));
      expect(session.getState().mode).toEqual({ type: 'help' });
      await session.handleKey(char('j'));
      expect(session.getState().mode).toEqual({ type: 'help' });
      await session.handleKey(char('q'));
      expect(session.getState().mode).toEqual({ type: 'normal' });
      expect(session.getState().shouldQuit).toBe(false);
    });

    it('quits on q and on ctrl-c from any mode', async () => {
      const session = await openSession();
      await session.handleKey(char('/'));
      await session.handleKey({ kind: 'char', char: 'c', ctrl: true });
      expect(session.getState().shouldQuit).toBe(true);

      const other = await openSession();
      await other.handleKey(char('q'));
      expect(other.getState().shouldQuit).toBe(true);
    });

    it('loads and scrolls the preview for the current entry', async () => {
      const session = await openSession();
      await session.handleKey(char('P'));
      const { preview } = session.getState();
      expect(preview.visible).toBe(true);
      expect(preview.data?.content).toEqual({ type: 'text', lines: ['hello', 'world'] });

      await session.handleKey(char('J'));
      expect(session.getState().preview.scroll).toBe(5);
      await session.handleKey(char('K'));
      await session.handleKey(char('K'));
      expect(session.getState().preview.scroll).toBe(0);

      await session.handleKey(char('P'));
      expect(session.getState().preview).toEqual({ visible: false, scroll: 0, data: null });
    });

    it('reports a missing file manager', async () => {
      const session = await openSession();
      await session.handleKey(char('O'));
      expect(statusText(session)).toBe('No file manager available');
    });

    it('opens the directory around the cursor in the file manager', async () => {
      const opened: string[] = [];
      const session = await openSession({
        openInFileManager: (directoryPath) => {
          opened.push(directoryPath);
          return { ok: true };
        },
      });
      session.openInFileManager();
      expect(opened).toEqual([rootDir]);
      expect(statusText(session)).toBe(`Opened in file manager: ${rootDir}`);
    });

    it('notifies subscribers until they unsubscribe', async () => {
      const session = await openSession();
      const seen: number[] = [];
      const unsubscribe = session.subscribe((state) => seen.push(state.cursor));
      session.goToBottom();
      unsubscribe();
      session.goToTop();
      expect(seen).toEqual([0]);
    });
  });
});
