export interface ChapterMarker {
  name: string;
  /** Seconds from the start of the track, or of the whole book once merged */
  time: number;
}

export interface NumberedChapter extends ChapterMarker {
  /** 1-based position among the kept chapters, at least two digits, used in encoder comment keys */
  label: string;
}

export interface TrackRecord {
  file: string;
  title?: string;
  artist?: string;
  genre?: string;
  publisher?: string;
  comment?: string;
  album?: string;
  copyright?: string;
  track: number;
  duration: number;
  chapters: ChapterMarker[];
}

export type DescriptiveField = "title" | "album" | "artist" | "genre" | "comment" | "publisher" | "copyright";

export type FolderFields = Record<DescriptiveField, string>;

export interface FolderMetadata extends FolderFields {
  image?: string;
  /** Tracks sorted by track number */
  files: TrackRecord[];
  /** Merged, filtered, numbered and speed-scaled chapters */
  chapters: NumberedChapter[];
  /** Sum of the track durations, before any speed change */
  duration: number;
}
