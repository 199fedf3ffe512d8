/**
 * The Combiner builds playlists by evaluating boolean algebra expressions,
 * given as the playlist names, over the tags of a collection.
 *
 * Operands:
 * - tags produced by a tag parser, e.g. "Techno"
 * - tags matched with a "*" wildcard, e.g. "*House" matches "Acid House" and
 *   "Bass House"
 * - existing playlists in curly braces, e.g. "{My Favorites}"
 * - ratings (0-5) and BPMs (above 5) in square brackets, comma separated,
 *   with ranges joined by "-", e.g. "[4-5]" or "[120-124, 128]"
 *
 * Example:
 *   "(([120-129] & *Techno) | [130-160]) ~ [5]"
 */

import type { CollectionTrack, CombinerConfig, TagTrackIndex } from '../types';
import { MalformedExpressionError, UnknownSelectorError } from '../errors';
import { log } from '../services/log-service';
import { createIndexResolver, evaluateExpression } from './boolean-node';
import { playlistSelectorKey } from './selectors';
import { indexNumericSelectors, prescanExpressions, type PrescanResult } from './prescanner';

const SERVICE = 'Combiner';

/**
 * Returns the ids of the tracks directly in the named playlist, or undefined
 * when no such playlist exists
 */
export type PlaylistLookup = (name: string) => string[] | undefined;

export class Combiner {
  private tracks: TagTrackIndex = new Map();
  private prescan: PrescanResult;

  constructor(
    readonly config: CombinerConfig,
    collectionTracks: Iterable<CollectionTrack>
  ) {
    this.prescan = prescanExpressions(config.playlists);
    indexNumericSelectors(this.prescan.numericSelectors.values(), collectionTracks, this.tracks);

    log.debug(SERVICE, 'Prescanned combiner expressions', {
      expressions: config.playlists.length,
      playlistSelectors: this.prescan.playlistNames.size,
      numericSelectors: this.prescan.numericSelectors.size
    });
  }

  get expressions(): string[] {
    return this.config.playlists;
  }

  /**
   * Tag / selector -> tracks mapping accumulated so far
   */
  getCombinerTracks(): TagTrackIndex {
    return this.tracks;
  }

  getPlaylistSelectors(): string[] {
    return [...this.prescan.playlistNames];
  }

  /**
   * Register the tracks of every `{Playlist Name}` selector. Must run after the
   * tag playlists have been built so their tracks are included.
   *
   * @throws UnknownSelectorError when a named playlist does not exist
   */
  resolvePlaylistSelectors(lookup: PlaylistLookup): TagTrackIndex {
    for (const name of this.prescan.playlistNames) {
      const trackIds = lookup(name);
      if (!trackIds) {
        throw new UnknownSelectorError(name);
      }
      this.tracks.set(
        playlistSelectorKey(name),
        new Map(trackIds.map(id => [id, []]))
      );
    }

    return this.tracks;
  }

  /**
   * Evaluate every expression against the merged tag index plus the
   * selectors registered by this combiner. A malformed expression is logged
   * as an error and yields no tracks.
   *
   * @returns expression -> track ids, in configuration order
   */
  evaluate(tagTracks: TagTrackIndex): Map<string, Set<string>> {
    for (const [tag, tracks] of tagTracks) {
      if (!this.tracks.has(tag)) this.tracks.set(tag, tracks);
    }

    const resolve = createIndexResolver(this.tracks);
    const results = new Map<string, Set<string>>();
    for (const expression of this.config.playlists) {
      let tracks: Set<string>;
      try {
        tracks = evaluateExpression(expression, resolve);
      } catch (error) {
        if (!(error instanceof MalformedExpressionError)) throw error;
        log.error(SERVICE, error.message, { expression });
        tracks = new Set();
      }
      results.set(expression, tracks);
      log.debug(SERVICE, `Evaluated "${expression}"`, { tracks: tracks.size });
    }

    return results;
  }
}

/**
 * Merge per-parser tag indexes, unioning the tracks of tags that appear in
 * more than one
 */
export function mergeTagIndexes(indexes: Iterable<TagTrackIndex>): TagTrackIndex {
  const merged: TagTrackIndex = new Map();
  for (const index of indexes) {
    for (const [tag, tracks] of index) {
      const existing = merged.get(tag);
      if (!existing) {
        merged.set(tag, new Map(tracks));
        continue;
      }
      for (const [trackId, tags] of tracks) {
        existing.set(trackId, tags);
      }
    }
  }
  return merged;
}
