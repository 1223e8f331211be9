export interface FileMetadata {
  /** Byte count, or a formatted size such as `1.2 KB` */
  size: number | string;
  /** UNIX timestamp in seconds, or local time as `YYYY-MM-DD HH:MM` */
  modified_time: number | string;
  /** Inferred from the extension; only present when requested */
  mime_type?: string | null;
}

/** Files and directories whose metadata could not be read map to `{}`. */
export type EmptyEntry = Record<string, never>;

export interface DirTree {
  [name: string]: FileMetadata | EmptyEntry | DirTree;
}

export interface FileInfoOptions {
  humanReadable?: boolean;
  includeMimeType?: boolean;
}

export interface DirTreeOptions extends FileInfoOptions {
  /** Levels to descend below the root; `-1` for unlimited */
  depth?: number;
  followSymlinks?: boolean;
}
