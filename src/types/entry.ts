export type EntryKind = 'file' | 'directory' | 'symlink';

export interface Entry {
  /** Final path component shown in the tree */
  name: string;
  /** Absolute path; unique within one snapshot */
  path: string;
  kind: EntryKind;
  /** Name starts with a dot */
  hidden: boolean;
  /** Only meaningful for directories; mirrors the expansion set at build time */
  expanded: boolean;
  /** Nesting level below the root (the root's children are depth 0) */
  depth: number;
  /** Any execute bit set (POSIX only) */
  executable: boolean;
  /** Symlink whose target is a directory; sorts with directories but never expands */
  linksToDirectory: boolean;
}

export type TreeSnapshot = readonly Entry[];

export interface ExpandedTree {
  entries: Entry[];
  truncated: boolean;
}
