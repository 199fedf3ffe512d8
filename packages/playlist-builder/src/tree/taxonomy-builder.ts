/**
 * Builds playlist trees from a declarative taxonomy and fills them with the
 * tracks of a tag index.
 *
 * A taxonomy is a nested structure of folders, each declared with a `name` and
 * a list of `playlists`, which are either more folders or tag names:
 *
 *   name: Genres
 *   playlists:
 *     - Techno
 *     - name: Bass
 *       playlists: [Dubstep, Hip Hop]
 *     - name: _ignore
 *       playlists: [Ambient]
 *
 * Every folder except the top-level one gets an "All <folder>" playlist that
 * aggregates the tracks of everything beneath it.
 */

import type { PlaylistTaxonomyNode, RemainderMode, TagTrackIndex } from '../types';
import { InvalidTaxonomyError } from '../errors';
import { log } from '../services/log-service';
import { HipHopFilter, type FilterPlaylist, type PlaylistFilter, type TrackDetails } from './playlist-filters';
import { PlaylistTree } from './playlist-tree';

const SERVICE = 'TaxonomyBuilder';

export const IGNORE_FOLDER = '_ignore';
export const OTHER_PLAYLIST = 'Other';

interface FolderRecord {
  name: string;
  playlists: unknown[];
}

/**
 * Folder records are matched with case-insensitive keys
 */
function asFolderRecord(content: unknown): FolderRecord | undefined {
  if (typeof content !== 'object' || content === null || Array.isArray(content)) {
    return undefined;
  }

  const record = new Map(
    Object.entries(content).map(([key, value]) => [key.toLowerCase(), value] as const)
  );
  const name = record.get('name');
  const playlists = record.get('playlists');

  if (typeof name !== 'string' || !Array.isArray(playlists)) {
    throw new InvalidTaxonomyError('Folder needs a "name" and a list of "playlists"', content);
  }

  return { name, playlists };
}

function registerIgnoredTags(playlists: unknown[], declaredTags: Set<string>): void {
  for (const entry of playlists) {
    if (typeof entry === 'string') {
      declaredTags.add(entry);
      continue;
    }
    const folder = asFolderRecord(entry);
    if (!folder) {
      throw new InvalidTaxonomyError('Encountered invalid taxonomy entry', entry);
    }
    registerIgnoredTags(folder.playlists, declaredTags);
  }
}

/**
 * Validate a taxonomy read from configuration
 *
 * @throws InvalidTaxonomyError for entries that are neither tags nor folders
 */
export function parseTaxonomy(content: unknown): PlaylistTaxonomyNode {
  if (typeof content === 'string') return content;

  const folder = asFolderRecord(content);
  if (!folder) {
    throw new InvalidTaxonomyError(`Encountered invalid input type ${typeof content}`, content);
  }

  return { name: folder.name, playlists: folder.playlists.map(parseTaxonomy) };
}

export interface CreatePlaylistsOptions {
  /** No "All <folder>" playlist is created for the top-level folder */
  topLevel?: boolean;
  /** Position among the parent's children, defaults to the end */
  position?: number;
}

/**
 * Recursively create the playlists declared by `content` under `parent`.
 * Every tag named by the taxonomy, including those under `_ignore`, is added
 * to `declaredTags`.
 *
 * @returns index of the created node, or null for an `_ignore` folder
 */
export function createPlaylists(
  tree: PlaylistTree,
  parent: number,
  content: unknown,
  declaredTags: Set<string>,
  options: CreatePlaylistsOptions = {}
): number | null {
  if (typeof content === 'string') {
    declaredTags.add(content);
    return tree.addPlaylist(parent, content, options.position);
  }

  const folder = asFolderRecord(content);
  if (!folder) {
    throw new InvalidTaxonomyError(`Encountered invalid input type ${typeof content}`, content);
  }

  if (folder.name === IGNORE_FOLDER) {
    registerIgnoredTags(folder.playlists, declaredTags);
    return null;
  }

  const folderIndex = tree.addFolder(parent, folder.name, options.position);
  if (!options.topLevel) {
    tree.addPlaylist(folderIndex, `All ${folder.name}`);
  }
  for (const playlist of folder.playlists) {
    createPlaylists(tree, folderIndex, playlist, declaredTags);
  }

  return folderIndex;
}

export interface AddTracksOptions {
  /** Filters run on every playlist as it is filled; defaults to a HipHopFilter */
  filters?: PlaylistFilter[];
  /** Per-track details for filters; a track without any falls back to its entry tags */
  tracks?: ReadonlyMap<string, TrackDetails>;
}

/**
 * Insert the tracks of `index` into every playlist under `scope` whose name is
 * a key of the index, then into the "All <folder>" playlist of each ancestor
 * folder until one has none.
 *
 * A track skipped by any filter that applies to the playlist is added neither
 * to the playlist nor to its "All" ancestors.
 */
export function addTracks(
  tree: PlaylistTree,
  scope: number,
  index: TagTrackIndex,
  options: AddTracksOptions = {}
): void {
  const filters = options.filters ?? [new HipHopFilter()];

  for (const playlist of tree.playlists(scope)) {
    const entries = index.get(playlist.name);
    if (!entries) continue;

    const target: FilterPlaylist = {
      name: playlist.name,
      ancestors: tree.ancestors(playlist.index).map(node => node.name)
    };
    const active = filters.filter(filter => filter.isFilterPlaylist(target));

    for (const [trackId, tags] of entries) {
      if (active.length > 0) {
        const details = options.tracks?.get(trackId) ?? { genreTags: tags, allTags: tags, comments: '' };
        const track = { ...details, id: trackId, tags };
        if (!active.every(filter => filter.filterTrack(track, target))) {
          log.debug(SERVICE, `Filtered ${trackId} from "${playlist.name}"`);
          continue;
        }
      }

      tree.addTrack(playlist.index, trackId);
      addToAncestors(tree, playlist.index, trackId);
    }
  }
}

function addToAncestors(tree: PlaylistTree, playlist: number, trackId: string): void {
  let parent = tree.parentOf(playlist);
  while (parent !== null) {
    const folder = tree.get(parent);
    const all = tree.findChild(parent, `All ${folder.name}`, 'playlist');
    if (!all) break;

    tree.addTrack(all.index, trackId);
    parent = folder.parent;
  }
}

/**
 * Collect tags that appear in the index but not in the taxonomy under an
 * "Other" folder (one playlist per tag) or a single "Other" playlist.
 *
 * @returns the index to fill the tree from; in "playlist" mode it also maps
 * "Other" to the tracks of every leftover tag
 */
export function addOther(
  tree: PlaylistTree,
  scope: number,
  mode: RemainderMode | string | undefined,
  declaredTags: Set<string>,
  index: TagTrackIndex
): TagTrackIndex {
  if (!mode) return index;

  if (mode !== 'folder' && mode !== 'playlist') {
    log.error(SERVICE, `Invalid remainder type "${mode}"`);
    return index;
  }

  if (tree.get(scope).type !== 'folder') {
    log.error(SERVICE, `Cannot add "${OTHER_PLAYLIST}" to playlist "${tree.get(scope).name}"`);
    return index;
  }

  const otherTags = [...index.keys()].filter(tag => !declaredTags.has(tag)).sort();

  if (mode === 'folder') {
    const folder = tree.addFolder(scope, OTHER_PLAYLIST);
    for (const tag of otherTags) {
      tree.addPlaylist(folder, tag);
    }
    return index;
  }

  tree.addPlaylist(scope, OTHER_PLAYLIST);
  const otherTracks = new Map<string, string[]>(index.get(OTHER_PLAYLIST) ?? []);
  for (const tag of otherTags) {
    for (const [trackId, tags] of index.get(tag) ?? []) {
      if (!otherTracks.has(trackId)) otherTracks.set(trackId, tags);
    }
  }

  return new Map(index).set(OTHER_PLAYLIST, otherTracks);
}
