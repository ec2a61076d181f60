import type { CharKey, KeyPress, MouseInput, SpecialKey } from '../types/session';
import type { ExplorerSession } from './session';

export const PAGE_SIZE = 10;
export const PREVIEW_SCROLL_STEP = 5;
export const MOUSE_SCROLL_ROWS = 3;

type KeyAction = (session: ExplorerSession) => void | Promise<unknown>;
type KeyboardKey = CharKey | SpecialKey;

const NORMAL_CHAR_ACTIONS: Record<string, KeyAction> = {
  j: (session) => session.moveCursor('down'),
  k: (session) => session.moveCursor('up'),
  h: (session) => session.collapseOrParent(),
  l: (session) => session.openCurrent(),
  g: (session) => session.goToTop(),
  G: (session) => session.goToBottom(),
  H: (session) => session.toggleHidden(),
  R: async (session) => {
    if (await session.refresh()) {
      session.setStatus('Refreshed');
    }
  },
  E: (session) => session.expandAll(),
  W: (session) => session.collapseAll(),
  O: (session) => session.openInFileManager(),
  P: (session) => session.togglePreview(),
  J: (session) => session.scrollPreview(PREVIEW_SCROLL_STEP),
  K: (session) => session.scrollPreview(-PREVIEW_SCROLL_STEP),
  '/': (session) => session.startSearch(),
  n: (session) => session.nextMatch(),
  N: (session) => session.previousMatch(),
  a: (session) => session.beginInput('createFile'),
  A: (session) => session.beginInput('createDir'),
  r: (session) => session.beginInput('rename'),
  d: (session) => session.requestDelete(),
  y: (session) => session.yank(),
  x: (session) => session.cut(),
  p: (session) => session.paste(),
  '?': (session) => session.openHelp(),
  q: (session) => session.quit(),
};

/** Text a key adds to a search query or input buffer, or null for control keys. */
const printableText = (key: KeyboardKey): string | null => {
  if (key.kind !== 'char' || key.ctrl || key.char.length === 0) return null;
  return /[\u0000-\u001f\u007f]/.test(key.char) ? null : key.char;
};

const dispatchNormal = async (session: ExplorerSession, key: KeyboardKey) => {
  if (key.kind === 'char') {
    if (key.ctrl) return;
    const action = NORMAL_CHAR_ACTIONS[key.char];
    if (action) {
      await action(session);
    }
    return;
  }
  switch (key.name) {
    case 'down':
      session.moveCursor('down');
      return;
    case 'up':
      session.moveCursor('up');
      return;
    case 'pageDown':
      session.moveCursor('down', PAGE_SIZE);
      return;
    case 'pageUp':
      session.moveCursor('up', PAGE_SIZE);
      return;
    case 'left':
      await session.collapseOrParent();
      return;
    case 'right':
    case 'enter':
      await session.openCurrent();
      return;
    default:
      break;
  }
};

const dispatchSearch = (session: ExplorerSession, key: KeyboardKey) => {
  const { query } = session.getState().search;
  const text = printableText(key);
  if (text !== null) {
    session.updateSearchQuery(query + text);
    return;
  }
  if (key.kind === 'char') return;
  switch (key.name) {
    case 'backspace':
      session.updateSearchQuery(query.slice(0, -1));
      return;
    case 'down':
      session.nextMatch();
      return;
    case 'up':
      session.previousMatch();
      return;
    case 'tab':
      if (key.shift) {
        session.previousMatch();
      } else {
        session.nextMatch();
      }
      return;
    case 'enter':
      session.confirmSearch();
      return;
    case 'escape':
      session.cancelSearch();
      return;
    default:
      break;
  }
};

const dispatchInput = async (session: ExplorerSession, key: KeyboardKey) => {
  const { inputBuffer } = session.getState();
  const text = printableText(key);
  if (text !== null) {
    session.setInputBuffer(inputBuffer + text);
    return;
  }
  if (key.kind === 'char') return;
  switch (key.name) {
    case 'backspace':
      session.setInputBuffer(inputBuffer.slice(0, -1));
      return;
    case 'enter':
      await session.submitInput();
      return;
    case 'escape':
      session.cancelInput();
      return;
    default:
      break;
  }
};

const dispatchHelp = (session: ExplorerSession, key: KeyboardKey) => {
  const closes =
    (key.kind === 'special' && key.name === 'escape') ||
    (key.kind === 'char' && (key.char === 'q' || key.char === '?'));
  if (closes) {
    session.closeHelp();
  }
};

const dispatchMouse = async (session: ExplorerSession, input: MouseInput) => {
  switch (input.action) {
    case 'click':
      await session.clickEntry(input.index);
      return;
    case 'rightClick':
      if (session.selectIndex(input.index)) {
        await session.openCurrent();
      }
      return;
    case 'scrollUp':
      session.moveCursor('up', MOUSE_SCROLL_ROWS);
      return;
    case 'scrollDown':
      session.moveCursor('down', MOUSE_SCROLL_ROWS);
      return;
    default: {
      const exhaustive: never = input;
      throw new Error(`Unsupported mouse input ${JSON.stringify(exhaustive)}`);
    }
  }
};

const dispatchKeyboard = async (session: ExplorerSession, key: KeyboardKey) => {
  const { mode } = session.getState();
  switch (mode.type) {
    case 'normal':
      await dispatchNormal(session, key);
      break;
    case 'search':
      dispatchSearch(session, key);
      break;
    case 'input':
      await dispatchInput(session, key);
      break;
    case 'confirm':
      await session.confirm(key.kind === 'char' && (key.char === 'y' || key.char === 'Y'));
      break;
    case 'help':
      dispatchHelp(session, key);
      break;
    default: {
      const exhaustive: never = mode;
      throw new Error(`Unsupported mode ${JSON.stringify(exhaustive)}`);
    }
  }
};

/**
 * Routes one key through the current mode. Ctrl-C quits from anywhere; mouse
 * input only acts in normal mode.
 */
export const dispatchKey = async (session: ExplorerSession, key: KeyPress): Promise<void> => {
  if (key.kind === 'char' && key.ctrl && key.char === 'c') {
    session.quit();
    return;
  }
  if (key.kind === 'mouse') {
    if (session.getState().mode.type === 'normal') {
      await dispatchMouse(session, key);
    }
  } else {
    await dispatchKeyboard(session, key);
  }
  if (session.getState().preview.visible) {
    await session.loadPreview();
  }
};
