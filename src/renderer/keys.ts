import type { KeyPress, MouseInput } from '../types/session';
import { TREE_FIRST_ROW } from './viewport';

/** The subset of Ink's `Key` the explorer reads. */
export interface TerminalKey {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  return: boolean;
  escape: boolean;
  ctrl: boolean;
  shift: boolean;
  tab: boolean;
  backspace: boolean;
  delete: boolean;
}

/**
 * Normalises one Ink input event. Most terminals send DEL (0x7f) for the
 * backspace key, which Ink reports as `delete`, so both map to backspace.
 */
export const toKeyPress = (input: string, key: TerminalKey): KeyPress | null => {
  if (key.upArrow) return { kind: 'special', name: 'up' };
  if (key.downArrow) return { kind: 'special', name: 'down' };
  if (key.leftArrow) return { kind: 'special', name: 'left' };
  if (key.rightArrow) return { kind: 'special', name: 'right' };
  if (key.pageUp) return { kind: 'special', name: 'pageUp' };
  if (key.pageDown) return { kind: 'special', name: 'pageDown' };
  if (key.return) return { kind: 'special', name: 'enter' };
  if (key.escape) return { kind: 'special', name: 'escape' };
  if (key.backspace || key.delete) return { kind: 'special', name: 'backspace' };
  if (key.tab) return { kind: 'special', name: 'tab', shift: key.shift };
  if (!input) return null;
  return key.ctrl ? { kind: 'char', char: input, ctrl: true } : { kind: 'char', char: input };
};

/** One SGR (mode 1006) mouse report; `column` and `row` are 1-based. */
export interface MouseReport {
  button: number;
  column: number;
  row: number;
  pressed: boolean;
}

/** The visible slice of the tree a report is resolved against. */
export interface TreeWindow {
  offset: number;
  height: number;
  total: number;
}

// Ink strips the leading ESC and flags `meta`, so it is optional here
const SGR_MOUSE_REPORT = /\u001b?\[<(\d+);(\d+);(\d+)([Mm])/g;

const LEFT_BUTTON = 0;
const RIGHT_BUTTON = 2;
const WHEEL_UP = 64;
const WHEEL_DOWN = 65;
const MOTION_FLAG = 32;
const MODIFIER_FLAGS = 4 | 8 | 16;

export const parseMouseReports = (input: string): MouseReport[] =>
  [...input.matchAll(SGR_MOUSE_REPORT)].map((match) => ({
    button: Number(match[1]),
    column: Number(match[2]),
    row: Number(match[3]),
    pressed: match[4] === 'M',
  }));

/**
 * Maps a button press onto the tree. Releases, drags and presses outside the
 * tree rows give null.
 */
export const toMouseInput = (report: MouseReport, view: TreeWindow): MouseInput | null => {
  if (!report.pressed || (report.button & MOTION_FLAG) !== 0) return null;
  const button = report.button & ~MODIFIER_FLAGS;
  if (button === WHEEL_UP) return { kind: 'mouse', action: 'scrollUp' };
  if (button === WHEEL_DOWN) return { kind: 'mouse', action: 'scrollDown' };
  if (button !== LEFT_BUTTON && button !== RIGHT_BUTTON) return null;

  const line = report.row - TREE_FIRST_ROW;
  if (line < 0 || line >= view.height) return null;
  const index = view.offset + line;
  if (index >= view.total) return null;
  return { kind: 'mouse', action: button === LEFT_BUTTON ? 'click' : 'rightClick', index };
};
