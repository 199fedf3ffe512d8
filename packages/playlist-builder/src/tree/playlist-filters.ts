/**
 * Playlist filters drop tracks from particular playlists while they are
 * filled. A filter first decides from a playlist's name and the names of its
 * folders whether it applies, then decides per track whether the track stays.
 *
 * - HipHopFilter: separates the "pure" Hip Hop playlist from Hip Hop as a
 *   component of other genres
 * - MinimalDeepTechFilter: keeps Minimal Deep Tech under Techno / House to
 *   tracks that also carry that genre
 * - ComplexTrackFilter: keeps "complex" playlists to tracks with several
 *   non-genre tags
 * - TransitionTrackFilter: keeps "transition" playlists to tracks whose
 *   comments mark a genre or tempo transition as `[a / b]`
 */

import { InvalidTaxonomyError } from '../errors';

export interface FilterPlaylist {
  name: string;
  /** Names of the enclosing folders, nearest first */
  ancestors: string[];
}

export interface TrackDetails {
  genreTags: string[];
  /** Genre tags followed by comment tags */
  allTags: string[];
  comments: string;
}

export interface FilterTrack extends TrackDetails {
  id: string;
  /** Tags of the index entry the playlist is filled from */
  tags: string[];
}

export interface PlaylistFilter {
  readonly name: string;
  /** Whether tracks going into this playlist are filtered at all */
  isFilterPlaylist(playlist: FilterPlaylist): boolean;
  /** Whether the track stays in the playlist */
  filterTrack(track: FilterTrack, playlist: FilterPlaylist): boolean;
}

function containsIgnoreCase(value: string, needle: string): boolean {
  return value.toLowerCase().includes(needle.toLowerCase());
}

function nameOrAncestorContains(playlist: FilterPlaylist, needle: string): boolean {
  return [playlist.name, ...playlist.ancestors].some(name => containsIgnoreCase(name, needle));
}

export interface HipHopFilterOptions {
  playlist: string;
  /** Folder whose direct child is the "pure" playlist */
  pureParent: string;
  /** Substrings that make a tag count as part of the genre */
  substrings: string[];
}

export const DEFAULT_HIP_HOP_OPTIONS: HipHopFilterOptions = {
  playlist: 'Hip Hop',
  pureParent: 'Genres',
  substrings: ['r&b', 'hip hop']
};

export class HipHopFilter implements PlaylistFilter {
  readonly name = 'HipHopFilter';
  private options: HipHopFilterOptions;

  constructor(options: Partial<HipHopFilterOptions> = {}) {
    this.options = { ...DEFAULT_HIP_HOP_OPTIONS, ...options };
  }

  isFilterPlaylist(playlist: FilterPlaylist): boolean {
    return playlist.name === this.options.playlist;
  }

  /**
   * The pure playlist keeps tracks whose tags are all Hip Hop / R&B, any
   * other playlist of that name keeps the rest
   */
  filterTrack(track: FilterTrack, playlist: FilterPlaylist): boolean {
    const pure = track.tags.every(tag =>
      this.options.substrings.some(substring => containsIgnoreCase(tag, substring))
    );
    return playlist.ancestors[0] === this.options.pureParent ? pure : !pure;
  }
}

export interface MinimalDeepTechFilterOptions {
  playlist: string;
  /** Genre folders; under each, a track needs a genre tag containing its name */
  folders: string[];
}

export const DEFAULT_MINIMAL_DEEP_TECH_OPTIONS: MinimalDeepTechFilterOptions = {
  playlist: 'Minimal Deep Tech',
  folders: ['Techno', 'House']
};

export class MinimalDeepTechFilter implements PlaylistFilter {
  readonly name = 'MinimalDeepTechFilter';
  private options: MinimalDeepTechFilterOptions;

  constructor(options: Partial<MinimalDeepTechFilterOptions> = {}) {
    this.options = { ...DEFAULT_MINIMAL_DEEP_TECH_OPTIONS, ...options };
  }

  isFilterPlaylist(playlist: FilterPlaylist): boolean {
    return playlist.name === this.options.playlist && this.genreFolders(playlist).length > 0;
  }

  filterTrack(track: FilterTrack, playlist: FilterPlaylist): boolean {
    return this.genreFolders(playlist).every(folder =>
      track.genreTags.some(tag => containsIgnoreCase(tag, folder))
    );
  }

  private genreFolders(playlist: FilterPlaylist): string[] {
    return this.options.folders.filter(folder => playlist.ancestors.includes(folder));
  }
}

export interface ComplexTrackFilterOptions {
  minTags: number;
  /** Tags not counted towards the minimum */
  excludeTags: string[];
}

export const DEFAULT_COMPLEX_TRACK_OPTIONS: ComplexTrackFilterOptions = {
  minTags: 3,
  excludeTags: ['DELETE', 'Flute', 'Guitar', 'Horn', 'Piano', 'Scratch', 'Strings', 'Vocal']
};

export class ComplexTrackFilter implements PlaylistFilter {
  readonly name = 'ComplexTrackFilter';
  private minTags: number;
  private excludeTags: Set<string>;

  constructor(options: Partial<ComplexTrackFilterOptions> = {}) {
    this.minTags = options.minTags ?? DEFAULT_COMPLEX_TRACK_OPTIONS.minTags;
    this.excludeTags = new Set(options.excludeTags ?? DEFAULT_COMPLEX_TRACK_OPTIONS.excludeTags);
  }

  isFilterPlaylist(playlist: FilterPlaylist): boolean {
    return nameOrAncestorContains(playlist, 'complex');
  }

  filterTrack(track: FilterTrack): boolean {
    const genreTags = new Set(track.genreTags);
    const otherTags = new Set(
      track.allTags.filter(tag => !genreTags.has(tag) && !this.excludeTags.has(tag))
    );
    return otherTags.size > 0 && otherTags.size >= this.minTags;
  }
}

export type TransitionType = 'genre' | 'tempo';

const TRANSITION_TYPES: readonly TransitionType[] = ['genre', 'tempo'];
const TRANSITION_PATTERN = /\[([^\]]+)\]/g;

export interface TransitionTrackFilterOptions {
  separator: string;
}

export class TransitionTrackFilter implements PlaylistFilter {
  readonly name = 'TransitionTrackFilter';
  private separator: string;

  constructor(options: Partial<TransitionTrackFilterOptions> = {}) {
    this.separator = options.separator ?? '/';
  }

  /**
   * @throws InvalidTaxonomyError when a transition playlist names both types
   */
  isFilterPlaylist(playlist: FilterPlaylist): boolean {
    return nameOrAncestorContains(playlist, 'transition') && this.transitionType(playlist) !== null;
  }

  filterTrack(track: FilterTrack, playlist: FilterPlaylist): boolean {
    const type = this.transitionType(playlist);
    for (const match of track.comments.matchAll(TRANSITION_PATTERN)) {
      const tokens = (match[1] ?? '').split(this.separator).map(token => token.trim());
      const tempo = tokens.every(token => token !== '' && !Number.isNaN(Number(token)));
      if ((tempo ? 'tempo' : 'genre') === type) return true;
    }
    return false;
  }

  transitionType(playlist: FilterPlaylist): TransitionType | null {
    const types = TRANSITION_TYPES.filter(type => containsIgnoreCase(playlist.name, type));
    if (types.length > 1) {
      throw new InvalidTaxonomyError(
        `Playlist matches multiple transition types (${types.join(', ')})`,
        playlist.name
      );
    }
    return types[0] ?? null;
  }
}

/**
 * Filter selection and options as they appear in configuration
 */
export interface PlaylistFilterSettings {
  hipHop: { enabled: boolean; playlist: string; pureParent: string };
  minimalDeepTech: { enabled: boolean; playlist: string };
  complexTrack: { enabled: boolean; minTags: number; excludeTags: string[] };
  transitionTrack: { enabled: boolean; separator: string };
}

/** Filter class names, as listed in TAGCRATE_PLAYLIST_FILTERS, by settings key */
export const PLAYLIST_FILTER_NAMES: ReadonlyArray<readonly [string, keyof PlaylistFilterSettings]> = [
  ['HipHopFilter', 'hipHop'],
  ['MinimalDeepTechFilter', 'minimalDeepTech'],
  ['ComplexTrackFilter', 'complexTrack'],
  ['TransitionTrackFilter', 'transitionTrack']
];

export function createPlaylistFilters(settings: PlaylistFilterSettings): PlaylistFilter[] {
  const filters: PlaylistFilter[] = [];
  const { hipHop, minimalDeepTech, complexTrack, transitionTrack } = settings;

  if (hipHop.enabled) {
    filters.push(new HipHopFilter({ playlist: hipHop.playlist, pureParent: hipHop.pureParent }));
  }
  if (minimalDeepTech.enabled) {
    filters.push(new MinimalDeepTechFilter({ playlist: minimalDeepTech.playlist }));
  }
  if (complexTrack.enabled) {
    filters.push(new ComplexTrackFilter({ minTags: complexTrack.minTags, excludeTags: complexTrack.excludeTags }));
  }
  if (transitionTrack.enabled) {
    filters.push(new TransitionTrackFilter({ separator: transitionTrack.separator }));
  }

  return filters;
}
