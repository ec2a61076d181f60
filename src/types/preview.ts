export interface PreviewMetadata {
  size: number;
  modifiedMs: number | null;
  /** Permission bits (`mode & 0o777`), 0 where unsupported */
  permissions: number;
}

export interface DirectoryChild {
  name: string;
  isDirectory: boolean;
}

export type PreviewContent =
  | { type: 'text'; lines: string[] }
  | { type: 'directory'; children: DirectoryChild[] }
  | { type: 'binary' }
  | { type: 'tooLarge' }
  | { type: 'empty' }
  | { type: 'error'; message: string };

export interface PreviewData {
  path: string;
  content: PreviewContent;
  metadata: PreviewMetadata;
}
