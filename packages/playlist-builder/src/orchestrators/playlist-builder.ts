/**
 * Playlist Builder - builds the tag playlists and combiner playlists of a
 * collection in one run.
 *
 * 1. Every tag parser turns each track into tags and fills its taxonomy tree.
 * 2. The combiner, if configured, evaluates its expressions over the merged
 *    tags of all parsers plus BPM / rating and playlist selectors.
 *
 * All trees are placed in a fresh "AUTO_PLAYLISTS" folder; later trees come
 * first.
 */

import type {
  CollectionDocument,
  CollectionTrack,
  PlaylistBuilderConfig,
  PlaylistDocumentNode,
  RemainderMode,
  TagTrackIndex
} from '../types';
import { Combiner, mergeTagIndexes, type PlaylistLookup } from '../combiner/combiner';
import { createTagParser, parseTags } from '../parsers/tag-parsers';
import { logService, log, type LogEntry } from '../services/log-service';
import type { PlaylistFilter, TrackDetails } from '../tree/playlist-filters';
import { PlaylistTree } from '../tree/playlist-tree';
import { addOther, addTracks, createPlaylists } from '../tree/taxonomy-builder';

const SERVICE = 'PlaylistBuilder';

export const AUTO_PLAYLISTS = 'AUTO_PLAYLISTS';

export interface PlaylistBuildOptions {
  /** "folder" or "playlist"; anything else is logged and ignored */
  remainder?: RemainderMode | string;
  pureGenrePlaylists?: string[];
  genreDelimiter?: string;
  /** Run on tag and combiner playlists alike; defaults to a HipHopFilter */
  filters?: PlaylistFilter[];
  rootName?: string;
}

export interface PlaylistBuildResult {
  tree: PlaylistTree;
  /** Parser name -> tag -> track id -> tags */
  parserIndexes: Map<string, TagTrackIndex>;
  /** Combiner expression -> track ids */
  combinerResults: Map<string, Set<string>>;
  /** Warnings and errors logged during the run */
  diagnostics: LogEntry[];
}

export class PlaylistBuilder {
  constructor(
    private config: PlaylistBuilderConfig,
    private options: PlaylistBuildOptions = {}
  ) {}

  get rootName(): string {
    return this.options.rootName ?? AUTO_PLAYLISTS;
  }

  build(document: CollectionDocument): PlaylistBuildResult {
    const diagnostics: LogEntry[] = [];
    const collect = (entry: LogEntry) => {
      if (entry.level === 'warn' || entry.level === 'error') diagnostics.push(entry);
    };
    logService.on('log', collect);

    try {
      return { ...this.run(document), diagnostics };
    } finally {
      logService.off('log', collect);
    }
  }

  private run(document: CollectionDocument): Omit<PlaylistBuildResult, 'diagnostics'> {
    const tracks = document.tracks.filter(track => Boolean(track.location));
    const tree = new PlaylistTree(this.rootName);
    const parserIndexes = new Map<string, TagTrackIndex>();
    const fill = { filters: this.options.filters, tracks: this.trackDetails(tracks) };

    log.info(SERVICE, `Building playlists for ${tracks.length} tracks`, {
      parsers: this.config.parsers.map(p => p.parser),
      combiner: this.config.combiner?.playlists.length ?? 0
    });

    const combiner = this.config.combiner
      ? new Combiner(this.config.combiner, tracks)
      : undefined;

    const parsed = this.config.parsers.map(parserConfig => {
      const parser = createTagParser(parserConfig.parser, parserConfig.taxonomy, {
        genreDelimiter: this.options.genreDelimiter,
        pureGenrePlaylists: this.options.pureGenrePlaylists
      });
      const declaredTags = new Set<string>();
      const top = createPlaylists(tree, tree.root, parser.taxonomy, declaredTags, {
        topLevel: true,
        position: 0
      });
      const index = indexTags(tracks, track => parseTags(parser, track));
      parserIndexes.set(parserConfig.parser, index);

      return { top, declaredTags, index };
    });

    for (const { top, declaredTags, index } of parsed) {
      if (top === null) continue;
      const fillIndex = addOther(tree, top, this.options.remainder, declaredTags, index);
      addTracks(tree, top, fillIndex, fill);
    }

    const combinerResults = new Map<string, Set<string>>();
    if (combiner) {
      combiner.resolvePlaylistSelectors(this.playlistLookup(tree, document));
      const results = combiner.evaluate(mergeTagIndexes(parserIndexes.values()));

      const resultIndex: TagTrackIndex = new Map();
      for (const [expression, trackIds] of results) {
        combinerResults.set(expression, trackIds);
        resultIndex.set(expression, new Map([...trackIds].map(id => [id, []])));
      }

      const top = createPlaylists(
        tree,
        tree.root,
        { name: combiner.config.name, playlists: combiner.expressions },
        new Set(),
        { topLevel: true, position: 0 }
      );
      if (top !== null) {
        addTracks(tree, top, resultIndex, fill);
      }
    }

    return { tree, parserIndexes, combinerResults };
  }

  /**
   * Genre tags, genre plus comment tags, and comments of every track, for
   * playlist filters
   */
  private trackDetails(tracks: CollectionTrack[]): Map<string, TrackDetails> {
    const genreParser = createTagParser('GenreTagParser', '', { genreDelimiter: this.options.genreDelimiter });
    const commentParser = createTagParser('CommentTagParser', '');

    return new Map(
      tracks.map((track): [string, TrackDetails] => {
        const genreTags = parseTags(genreParser, track).filter(Boolean);
        const commentTags = parseTags(commentParser, track).filter(Boolean);
        const allTags = [...new Set([...genreTags, ...commentTags])];
        return [track.id, { genreTags, allTags, comments: track.comments }];
      })
    );
  }

  /**
   * Playlists are looked up in the freshly built tree first, then among the
   * playlists already in the document (skipping a previous build's output)
   */
  private playlistLookup(tree: PlaylistTree, document: CollectionDocument): PlaylistLookup {
    return (name) => {
      const built = tree.findByName(name);
      if (built) {
        return built.type === 'playlist' ? [...built.trackIds] : [];
      }

      const existing = document.playlists.children
        .filter(child => child.name !== this.rootName)
        .map(child => findDocumentNode(child, name))
        .find(node => node !== undefined);
      if (existing) {
        return existing.type === 'playlist' ? [...existing.trackIds] : [];
      }

      return undefined;
    };
  }
}

export function buildPlaylists(
  document: CollectionDocument,
  config: PlaylistBuilderConfig,
  options: PlaylistBuildOptions = {}
): PlaylistBuildResult {
  return new PlaylistBuilder(config, options).build(document);
}

function indexTags(
  tracks: CollectionTrack[],
  tagsFor: (track: CollectionTrack) => string[]
): TagTrackIndex {
  const index: TagTrackIndex = new Map();
  for (const track of tracks) {
    const tags = tagsFor(track);
    for (const tag of tags) {
      let tagTracks = index.get(tag);
      if (!tagTracks) {
        tagTracks = new Map();
        index.set(tag, tagTracks);
      }
      tagTracks.set(track.id, tags);
    }
  }
  return index;
}

function findDocumentNode(node: PlaylistDocumentNode, name: string): PlaylistDocumentNode | undefined {
  if (node.name === name) return node;
  if (node.type === 'playlist') return undefined;

  for (const child of node.children) {
    const found = findDocumentNode(child, name);
    if (found) return found;
  }
  return undefined;
}

/**
 * Return a copy of the document whose playlist root holds the built tree in
 * place of any previous build
 */
export function applyToDocument(document: CollectionDocument, tree: PlaylistTree): CollectionDocument {
  const built = tree.toFolderDocument();
  return {
    ...document,
    playlists: {
      ...document.playlists,
      children: [
        ...document.playlists.children.filter(child => child.name !== built.name),
        built
      ]
    }
  };
}
