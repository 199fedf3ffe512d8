/**
 * Collection document storage
 *
 * A collection is a JSON document holding the track records and the playlist
 * tree. Track fields may be written as strings or numbers; they are read back
 * as strings.
 */

import * as fs from 'fs';
import * as path from 'path';
import type {
  CollectionDocument,
  CollectionTrack,
  PlaylistDocumentNode,
  PlaylistFolderDocument
} from '../types';
import { ConfigurationError } from '../errors';
import { asText, isRecord, isUnknownArray } from '../utils/guards';
import { log } from './log-service';

const SERVICE = 'CollectionStore';

export const DEFAULT_ROOT_NAME = 'ROOT';

function parseTrack(raw: unknown, position: number, source: string): CollectionTrack {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Track ${position} is not an object`, source);
  }

  const id = asText(raw.id);
  if (!id) {
    throw new ConfigurationError(`Track ${position} has no id`, source);
  }

  return {
    id,
    genre: asText(raw.genre) ?? '',
    comments: asText(raw.comments) ?? '',
    bpm: asText(raw.bpm) ?? '',
    rating: asText(raw.rating) ?? '0',
    location: asText(raw.location) ?? ''
  };
}

function parsePlaylistNode(raw: unknown, source: string): PlaylistDocumentNode {
  if (!isRecord(raw) || typeof raw.name !== 'string') {
    throw new ConfigurationError('Playlist node needs a "name"', source);
  }

  if (raw.type === 'folder') {
    return parseFolder(raw, source);
  }

  if (raw.type === 'playlist') {
    const trackIds: unknown = raw.trackIds ?? [];
    if (!isUnknownArray(trackIds)) {
      throw new ConfigurationError(`Playlist "${raw.name}" has invalid "trackIds"`, source);
    }
    return {
      type: 'playlist',
      name: raw.name,
      trackIds: trackIds.map(id => {
        const text = asText(id);
        if (text === undefined) {
          throw new ConfigurationError(`Playlist "${raw.name}" has an invalid track id`, source);
        }
        return text;
      })
    };
  }

  throw new ConfigurationError(`Playlist node "${raw.name}" has unknown type ${JSON.stringify(raw.type)}`, source);
}

function parseFolder(raw: Record<string, unknown>, source: string): PlaylistFolderDocument {
  const name = typeof raw.name === 'string' ? raw.name : DEFAULT_ROOT_NAME;
  const children: unknown = raw.children ?? [];
  if (!isUnknownArray(children)) {
    throw new ConfigurationError(`Folder "${name}" has invalid "children"`, source);
  }

  return {
    type: 'folder',
    name,
    children: children.map(child => parsePlaylistNode(child, source))
  };
}

export function parseCollectionDocument(raw: unknown, source: string = 'collection'): CollectionDocument {
  if (!isRecord(raw) || !isUnknownArray(raw.tracks)) {
    throw new ConfigurationError('Collection must be an object with a "tracks" list', source);
  }

  const tracks = raw.tracks.map((track, position) => parseTrack(track, position, source));

  let playlists: PlaylistFolderDocument = { type: 'folder', name: DEFAULT_ROOT_NAME, children: [] };
  if (raw.playlists !== undefined && raw.playlists !== null) {
    if (!isRecord(raw.playlists) || raw.playlists.type !== 'folder') {
      throw new ConfigurationError('Collection "playlists" must be a folder', source);
    }
    playlists = parseFolder(raw.playlists, source);
  }

  return { tracks, playlists };
}

export function readCollection(filePath: string): CollectionDocument {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError('Collection not found', filePath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not parse collection: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const document = parseCollectionDocument(raw, filePath);
  log.debug(SERVICE, `Read ${document.tracks.length} tracks`, { path: filePath });
  return document;
}

export function writeCollection(filePath: string, document: CollectionDocument): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`);
  log.info(SERVICE, `Wrote collection to ${filePath}`);
}

/**
 * "auto_<name>" beside the input collection
 */
export function defaultOutputPath(collectionPath: string): string {
  return path.join(path.dirname(collectionPath), `auto_${path.basename(collectionPath)}`);
}
