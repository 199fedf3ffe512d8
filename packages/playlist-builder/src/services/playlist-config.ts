/**
 * Playlist configuration loader
 *
 * The playlist configuration is a YAML file mapping tag parser names to the
 * taxonomy their playlists follow, plus an optional Combiner section:
 *
 *   GenreTagParser:
 *     name: Genres
 *     playlists: [Techno, House]
 *   CommentTagParser:
 *     name: My Tags
 *     playlists: [Dark, Energetic]
 *   Combiner:
 *     name: Combiner
 *     playlists:
 *       - Techno & Dark
 */

import * as fs from 'fs';
import YAML from 'yaml';
import type { CombinerConfig, PlaylistBuilderConfig, TagParserName } from '../types';
import { ConfigurationError } from '../errors';
import { parseTaxonomy } from '../tree/taxonomy-builder';
import { isRecord, isStringArray } from '../utils/guards';
import { log } from './log-service';

export const DEFAULT_COMBINER_NAME = 'Combiner';

const PARSER_ALIASES: ReadonlyMap<string, TagParserName> = new Map([
  ['GenreTagParser', 'GenreTagParser'],
  ['CommentTagParser', 'CommentTagParser'],
  ['MyTagParser', 'CommentTagParser']
]);

function parseCombiner(raw: unknown, source: string): CombinerConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError('Combiner must be a mapping with a list of "playlists"', source);
  }

  const { name, playlists } = raw;
  if (!isStringArray(playlists)) {
    throw new ConfigurationError('Combiner "playlists" must be a list of expressions', source);
  }
  if (name !== undefined && name !== null && typeof name !== 'string') {
    throw new ConfigurationError('Combiner "name" must be a string', source);
  }

  return { name: name || DEFAULT_COMBINER_NAME, playlists };
}

/**
 * Validate parsed playlist configuration. Parsers keep their declaration
 * order.
 */
export function parsePlaylistConfig(raw: unknown, source: string = 'playlist config'): PlaylistBuilderConfig {
  const config: PlaylistBuilderConfig = { parsers: [] };
  if (raw === undefined || raw === null) return config;

  if (!isRecord(raw)) {
    throw new ConfigurationError('Playlist config must contain a mapping', source);
  }

  for (const [key, value] of Object.entries(raw)) {
    if (key === 'Combiner') {
      config.combiner = parseCombiner(value, source);
      continue;
    }

    const parser = PARSER_ALIASES.get(key);
    if (!parser) {
      throw new ConfigurationError(`${key} is not a valid TagParser`, source);
    }
    config.parsers.push({ parser, taxonomy: parseTaxonomy(value) });
  }

  return config;
}

export function loadPlaylistConfig(filePath: string): PlaylistBuilderConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError('Playlist config not found', filePath);
  }

  log.info('PlaylistConfig', `Loading from: ${filePath}`);

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse playlist config: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  return parsePlaylistConfig(raw, filePath);
}

/**
 * Generate example playlist config file
 */
export function generateExamplePlaylistConfig(): string {
  return YAML.stringify({
    GenreTagParser: {
      name: 'Genres',
      playlists: [
        'Techno',
        {
          name: 'House',
          playlists: ['Deep House', 'Tech House', 'Acid House']
        },
        {
          name: 'Bass',
          playlists: ['Dubstep', 'Hip Hop']
        },
        'Hip Hop',
        {
          name: '_ignore',
          playlists: ['Ambient']
        }
      ]
    },
    CommentTagParser: {
      name: 'My Tags',
      playlists: ['Dark', 'Energetic', 'Vocal']
    },
    Combiner: {
      name: DEFAULT_COMBINER_NAME,
      playlists: [
        'Techno & Dark',
        '(*House | Hip Hop) ~ [0-2]',
        '{Techno} & [128-135]'
      ]
    }
  });
}
