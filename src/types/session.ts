import type { Entry, TreeSnapshot } from './entry';
import type { PreviewData } from './preview';

export type InputKind = 'createFile' | 'createDir' | 'rename';

export interface PendingPaste {
  kind: 'paste';
  source: string;
  destination: string;
  cut: boolean;
}

export interface PendingRename {
  kind: 'rename';
  source: string;
  destination: string;
}

export type PendingOverwrite = PendingPaste | PendingRename;

export type ConfirmAction =
  | { kind: 'delete'; target: Entry }
  | { kind: 'overwrite'; operation: PendingOverwrite };

export type Mode =
  | { type: 'normal' }
  | { type: 'search' }
  | { type: 'input'; kind: InputKind }
  | { type: 'confirm'; action: ConfirmAction }
  | { type: 'help' };

export interface ClipboardEntry {
  path: string;
  cut: boolean;
}

export type StatusLevel = 'info' | 'error';

export interface StatusMessage {
  text: string;
  level: StatusLevel;
  createdAt: number;
  /** Persistent messages survive expiry until replaced */
  persistent: boolean;
}

export interface SearchState {
  query: string;
  /** Snapshot indices of matching entries, in snapshot order */
  matches: number[];
  index: number;
}

export interface PreviewState {
  visible: boolean;
  scroll: number;
  data: PreviewData | null;
}

export interface ExplorerState {
  rootPath: string;
  entries: TreeSnapshot;
  cursor: number;
  expanded: ReadonlySet<string>;
  showHidden: boolean;
  mode: Mode;
  inputBuffer: string;
  search: SearchState;
  clipboard: ClipboardEntry | null;
  status: StatusMessage | null;
  preview: PreviewState;
  /** Changed path -> time the change was observed */
  recentChanges: ReadonlyMap<string, number>;
  pendingEditorFile: string | null;
  shouldQuit: boolean;
}

export type SpecialKeyName =
  | 'up'
  | 'down'
  | 'left'
  | 'right'
  | 'enter'
  | 'escape'
  | 'backspace'
  | 'tab'
  | 'pageUp'
  | 'pageDown';

export type CharKey = { kind: 'char'; char: string; ctrl?: boolean };

export type SpecialKey = { kind: 'special'; name: SpecialKeyName; shift?: boolean };

/** Clicks carry the snapshot index under the pointer; wheel events scroll the cursor. */
export type MouseInput =
  | { kind: 'mouse'; action: 'click' | 'rightClick'; index: number }
  | { kind: 'mouse'; action: 'scrollUp' | 'scrollDown' };

export type KeyPress = CharKey | SpecialKey | MouseInput;
