/**
 * Tag parsers turn a track into the list of tags its playlists are built from.
 *
 * - GenreTagParser reads the genre field, split on a delimiter ("/" by default)
 *   and optionally adds "Pure <genre>" tags.
 * - CommentTagParser reads a tag list embedded in the comments field as
 *   `/* tag 1 / tag 2 *\/`.
 */

import type { CollectionTrack, PlaylistTaxonomyNode, TagParserName } from '../types';

export interface GenreTagParser {
  kind: 'GenreTagParser';
  taxonomy: PlaylistTaxonomyNode;
  delimiter: string;
  /**
   * Genres for which a "Pure <genre>" tag is added when every tag of the
   * track contains the genre
   */
  pureGenres: string[];
}

export interface CommentTagParser {
  kind: 'CommentTagParser';
  taxonomy: PlaylistTaxonomyNode;
}

export type TagParser = GenreTagParser | CommentTagParser;

export interface TagParserOptions {
  genreDelimiter?: string;
  pureGenrePlaylists?: string[];
}

const COMMENT_TAGS_PATTERN = /\/\*(.*)\*\//;

export function createTagParser(
  kind: TagParserName,
  taxonomy: PlaylistTaxonomyNode,
  options: TagParserOptions = {}
): TagParser {
  switch (kind) {
    case 'GenreTagParser':
      return {
        kind,
        taxonomy,
        delimiter: options.genreDelimiter ?? '/',
        pureGenres: options.pureGenrePlaylists ?? []
      };
    case 'CommentTagParser':
      return { kind, taxonomy };
  }
}

export function parseTags(parser: TagParser, track: CollectionTrack): string[] {
  switch (parser.kind) {
    case 'GenreTagParser':
      return parseGenreTags(parser, track.genre);
    case 'CommentTagParser':
      return parseCommentTags(track.comments);
  }
}

function parseGenreTags(parser: GenreTagParser, genre: string): string[] {
  const tags = genre.split(parser.delimiter).map(tag => tag.trim());

  // Checked against the growing list, so an earlier "Pure" tag takes part
  // in the check for later genres.
  for (const pureGenre of parser.pureGenres) {
    const needle = pureGenre.toLowerCase();
    if (tags.every(tag => tag.toLowerCase().includes(needle))) {
      tags.push(`Pure ${pureGenre}`);
    }
  }

  return tags;
}

function parseCommentTags(comments: string): string[] {
  const match = COMMENT_TAGS_PATTERN.exec(comments);
  if (!match) return [];

  return (match[1] ?? '').split('/').map(tag => tag.trim());
}
