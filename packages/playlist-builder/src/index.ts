/**
 * Tagcrate Playlist Builder - Library Entry Point
 *
 * This module exports the builder components for programmatic use.
 * For CLI usage, see ./cli.ts
 */

// Core exports
export { PlaylistBuilder, buildPlaylists, applyToDocument, AUTO_PLAYLISTS } from './orchestrators/playlist-builder';
export { loadConfig, generateExampleConfig } from './config';

// Tag parsing and combining
export { createTagParser, parseTags } from './parsers/tag-parsers';
export { Combiner, mergeTagIndexes } from './combiner/combiner';
export { BooleanExpression, evaluateExpression, createIndexResolver } from './combiner/boolean-node';
export { prescanExpressions, indexNumericSelectors } from './combiner/prescanner';

// Playlist trees
export { PlaylistTree } from './tree/playlist-tree';
export { createPlaylists, addTracks, addOther, parseTaxonomy } from './tree/taxonomy-builder';
export {
  HipHopFilter,
  MinimalDeepTechFilter,
  ComplexTrackFilter,
  TransitionTrackFilter,
  createPlaylistFilters
} from './tree/playlist-filters';

// Services
export { logService, log } from './services/log-service';
export { loadPlaylistConfig, parsePlaylistConfig } from './services/playlist-config';
export { readCollection, writeCollection, parseCollectionDocument, defaultOutputPath } from './services/collection-store';
export { computeTagStatistics, formatTagStatistics, formatHistogram } from './utils/tag-statistics';

// Errors
export {
  MalformedExpressionError,
  UnknownSelectorError,
  InvalidTaxonomyError,
  ConfigurationError
} from './errors';

// Types
export type * from './types';
export type { BuilderConfig } from './config';
export type { PlaylistBuildOptions, PlaylistBuildResult } from './orchestrators/playlist-builder';
export type { TagParser } from './parsers/tag-parsers';
export type { PlaylistTreeNode } from './tree/playlist-tree';
export type { PlaylistFilter, FilterPlaylist, FilterTrack, TrackDetails, PlaylistFilterSettings } from './tree/playlist-filters';
export type { LogEntry, LogLevel } from './services/log-service';
