import path from 'path';
import { formatModified, formatPermissions, formatSize } from '../main/preview';
import type { Entry } from '../types/entry';
import type { PreviewData } from '../types/preview';
import type { ExplorerState } from '../types/session';

/** Rows taken by the header, status line and help bar. */
export const CHROME_ROWS = 3;

/** 1-based terminal row of the first tree line; the header sits above it. */
export const TREE_FIRST_ROW = 2;

export const treeHeight = (terminalRows: number) => Math.max(1, terminalRows - CHROME_ROWS);

/**
 * First visible row for a window of `height` rows. The previous offset is kept
 * while the cursor stays inside it, so the view only scrolls at the edges.
 */
export const scrollOffset = (previous: number, cursor: number, height: number, total: number) => {
  if (height <= 0 || total <= height) return 0;
  let offset = Math.min(Math.max(previous, 0), total - height);
  if (cursor < offset) {
    offset = cursor;
  } else if (cursor >= offset + height) {
    offset = cursor - height + 1;
  }
  return offset;
};

const HELP_BAR_VARIANTS = [
  'j/k move  h/l fold  a/A new  r rename  d delete  y/x/p copy/cut/paste  / search  P preview  ? help  q quit',
  'j/k move  h/l fold  a/A new  r rename  d del  y/x/p clip  / search  ? help  q quit',
  'j/k h/l  a/A r d  y/x/p  /  ?  q',
  '? help  q quit',
];

/** Longest key hint that fits in `width` columns, or '' when none does. */
export const helpBarText = (width: number) =>
  HELP_BAR_VARIANTS.find((variant) => variant.length <= width) ?? '';

export const entryLabel = (entry: Entry, icon: string) => {
  const indent = '  '.repeat(entry.depth);
  const suffix = entry.kind === 'directory' ? '/' : '';
  return `${indent}${icon} ${entry.name}${suffix}`;
};

export const promptText = (state: ExplorerState): string | null => {
  const { mode } = state;
  switch (mode.type) {
    case 'search': {
      const { query, matches, index } = state.search;
      if (!query) return '/';
      const counter = matches.length === 0 ? 'no matches' : `${index + 1}/${matches.length}`;
      return `/${query}  [${counter}]`;
    }
    case 'input':
      if (mode.kind === 'createFile') return `New file: ${state.inputBuffer}`;
      if (mode.kind === 'createDir') return `New directory: ${state.inputBuffer}`;
      return `Rename to: ${state.inputBuffer}`;
    case 'confirm': {
      const { action } = mode;
      if (action.kind === 'delete') {
        const suffix = action.target.kind === 'directory' ? '/' : '';
        return `Delete ${action.target.name}${suffix}? (y/N)`;
      }
      return `Overwrite ${path.basename(action.operation.destination)}? (y/N)`;
    }
    default:
      return null;
  }
};

export type StatusTone = 'prompt' | 'info' | 'error' | 'idle';

export interface StatusLineContent {
  text: string;
  tone: StatusTone;
}

/** Prompt first, then the status message, then a position summary. */
export const statusLine = (state: ExplorerState): StatusLineContent => {
  const prompt = promptText(state);
  if (prompt !== null) return { text: prompt, tone: 'prompt' };
  if (state.status) {
    return { text: state.status.text, tone: state.status.level === 'error' ? 'error' : 'info' };
  }
  const total = state.entries.length;
  const position = total === 0 ? 'empty' : `${state.cursor + 1}/${total}`;
  const search = state.search.query ? `  /${state.search.query}` : '';
  return { text: `${position}${search}`, tone: 'idle' };
};

export const headerText = (state: ExplorerState) => {
  const hidden = state.showHidden ? '  [hidden shown]' : '';
  const { clipboard } = state;
  const clip = clipboard
    ? `  [${clipboard.cut ? 'cut' : 'copied'}: ${path.basename(clipboard.path)}]`
    : '';
  return `${state.rootPath}${hidden}${clip}`;
};

const previewBody = (data: PreviewData): string[] => {
  const { content } = data;
  switch (content.type) {
    case 'text':
      return content.lines;
    case 'directory':
      return content.children.map((child) => (child.isDirectory ? `${child.name}/` : child.name));
    case 'binary':
      return ['(binary file)'];
    case 'tooLarge':
      return ['(file too large to preview)'];
    case 'empty':
      return ['(empty)'];
    case 'error':
      return [`Error: ${content.message}`];
    default: {
      const exhaustive: never = content;
      throw new Error(`Unsupported preview ${JSON.stringify(exhaustive)}`);
    }
  }
};

/** Metadata header plus the body window starting at `scroll`. */
export const previewLines = (data: PreviewData, scroll: number, height: number) => {
  const { metadata } = data;
  const header = [
    path.basename(data.path),
    `Size: ${formatSize(metadata.size)}  Mode: ${formatPermissions(metadata.permissions)}  Modified: ${formatModified(metadata.modifiedMs)}`,
  ];
  const body = previewBody(data);
  const bodyHeight = Math.max(0, height - header.length);
  const start = Math.min(scroll, Math.max(0, body.length - bodyHeight));
  return [...header, ...body.slice(start, start + bodyHeight)];
};
