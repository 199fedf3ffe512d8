/**
 * Collection document and playlist configuration types
 */

/**
 * A track record as it appears in the collection document.
 * Only tracks with a non-empty `location` are real tracks; the rest are
 * playlist membership artifacts.
 */
export interface CollectionTrack {
  id: string;
  genre: string;
  /** Free text, may embed a tag list as `/* tag / tag *\/` */
  comments: string;
  /** Numeric BPM serialized as a string, e.g. "127.50" */
  bpm: string;
  /** One of "0", "51", "102", "153", "204", "255" */
  rating: string;
  location: string;
}

export interface PlaylistFolderDocument {
  type: 'folder';
  name: string;
  children: PlaylistDocumentNode[];
}

export interface PlaylistLeafDocument {
  type: 'playlist';
  name: string;
  trackIds: string[];
}

export type PlaylistDocumentNode = PlaylistFolderDocument | PlaylistLeafDocument;

export interface CollectionDocument {
  tracks: CollectionTrack[];
  playlists: PlaylistFolderDocument;
}

/**
 * Declarative taxonomy: either a playlist (bare tag string) or a folder.
 * A folder named `_ignore` only registers its playlists as known tags.
 */
export interface TaxonomyFolder {
  name: string;
  playlists: PlaylistTaxonomyNode[];
}

export type PlaylistTaxonomyNode = string | TaxonomyFolder;

/**
 * Tag -> track id -> the full tag list that track produced.
 * Insertion order follows collection order.
 */
export type TagTrackIndex = Map<string, Map<string, string[]>>;

export type RemainderMode = 'folder' | 'playlist';

export interface CombinerConfig {
  name: string;
  playlists: string[];
}

export type TagParserName = 'GenreTagParser' | 'CommentTagParser';

export interface TagParserConfig {
  parser: TagParserName;
  taxonomy: PlaylistTaxonomyNode;
}

/**
 * Parsed playlist configuration: tag parsers in declaration order plus an
 * optional combiner.
 */
export interface PlaylistBuilderConfig {
  parsers: TagParserConfig[];
  combiner?: CombinerConfig;
}
