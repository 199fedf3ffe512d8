import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { CollectionDocument, CollectionTrack, PlaylistBuilderConfig } from '../types';
import { UnknownSelectorError } from '../errors';
import { logService } from '../services/log-service';
import { ComplexTrackFilter } from '../tree/playlist-filters';
import { AUTO_PLAYLISTS, applyToDocument, buildPlaylists } from './playlist-builder';

function track(overrides: Partial<CollectionTrack> & { id: string }): CollectionTrack {
  return {
    genre: '',
    comments: '',
    bpm: '128.00',
    rating: '0',
    location: `/music/${overrides.id}.mp3`,
    ...overrides
  };
}

function collection(children: CollectionDocument['playlists']['children'] = []): CollectionDocument {
  return {
    tracks: [
      track({ id: 'T1', genre: 'Techno', comments: '/* Dark */' }),
      track({ id: 'T2', genre: 'House', rating: '255' }),
      track({ id: 'T3', genre: 'Techno / Trance', comments: 'cue 2 /* Dark / Vocal */' }),
      track({ id: 'T4', genre: 'House', location: '' })
    ],
    playlists: { type: 'folder', name: 'ROOT', children }
  };
}

function config(expressions: string[]): PlaylistBuilderConfig {
  return {
    parsers: [
      { parser: 'GenreTagParser', taxonomy: { name: 'Genres', playlists: ['Techno', 'House'] } },
      { parser: 'CommentTagParser', taxonomy: { name: 'Tags', playlists: ['Dark'] } }
    ],
    combiner: { name: 'Combiner', playlists: expressions }
  };
}

beforeEach(() => {
  logService.setSilent(true);
});

afterEach(() => {
  logService.setLevel('info');
});

describe('buildPlaylists', () => {
  it('builds parser and combiner trees, latest first', () => {
    const result = buildPlaylists(collection(), config(['Techno & Dark', '{House} | [5]']), {
      remainder: 'folder'
    });

    expect(result.tree.toFolderDocument()).toEqual({
      type: 'folder',
      name: AUTO_PLAYLISTS,
      children: [
        {
          type: 'folder',
          name: 'Combiner',
          children: [
            { type: 'playlist', name: 'Techno & Dark', trackIds: ['T1', 'T3'] },
            { type: 'playlist', name: '{House} | [5]', trackIds: ['T2'] }
          ]
        },
        {
          type: 'folder',
          name: 'Tags',
          children: [
            { type: 'playlist', name: 'Dark', trackIds: ['T1', 'T3'] },
            {
              type: 'folder',
              name: 'Other',
              children: [{ type: 'playlist', name: 'Vocal', trackIds: ['T3'] }]
            }
          ]
        },
        {
          type: 'folder',
          name: 'Genres',
          children: [
            { type: 'playlist', name: 'Techno', trackIds: ['T1', 'T3'] },
            { type: 'playlist', name: 'House', trackIds: ['T2'] },
            {
              type: 'folder',
              name: 'Other',
              children: [{ type: 'playlist', name: 'Trance', trackIds: ['T3'] }]
            }
          ]
        }
      ]
    });
    expect(result.diagnostics).toEqual([]);
    expect([...(result.combinerResults.get('Techno & Dark') ?? [])]).toEqual(['T1', 'T3']);
    expect([...(result.parserIndexes.get('CommentTagParser')?.keys() ?? [])]).toEqual(['Dark', 'Vocal']);
  });

  it('resolves playlist selectors from the existing document', () => {
    const document = collection([{ type: 'playlist', name: 'Mine', trackIds: ['T2'] }]);

    const result = buildPlaylists(document, config(['{Mine} | Trance']));

    expect([...(result.combinerResults.get('{Mine} | Trance') ?? [])]).toEqual(['T2', 'T3']);
  });

  it('ignores playlists of a previous build when resolving selectors', () => {
    const document = collection([
      {
        type: 'folder',
        name: AUTO_PLAYLISTS,
        children: [{ type: 'playlist', name: 'Stale', trackIds: ['T1'] }]
      }
    ]);

    expect(() => buildPlaylists(document, config(['{Stale}']))).toThrow(UnknownSelectorError);
  });

  it('keeps building when a combiner expression is malformed', () => {
    const result = buildPlaylists(collection(), {
      parsers: config([]).parsers.slice(0, 1),
      combiner: { name: 'Combiner', playlists: ['Techno', 'Techno &'] }
    });

    expect(result.tree.toFolderDocument().children).toEqual([
      {
        type: 'folder',
        name: 'Combiner',
        children: [
          { type: 'playlist', name: 'Techno', trackIds: ['T1', 'T3'] },
          { type: 'playlist', name: 'Techno &', trackIds: [] }
        ]
      },
      {
        type: 'folder',
        name: 'Genres',
        children: [
          { type: 'playlist', name: 'Techno', trackIds: ['T1', 'T3'] },
          { type: 'playlist', name: 'House', trackIds: ['T2'] }
        ]
      }
    ]);
    expect(result.diagnostics.map(entry => [entry.level, entry.service, entry.message])).toEqual([
      ['error', 'Combiner', 'Invalid boolean expression: track sets: 0, tags: [Techno], operators: [&]: "Techno &"']
    ]);
  });

  it('runs playlist filters on tag and combiner playlists with every tag of a track', () => {
    const document: CollectionDocument = {
      ...collection(),
      tracks: [
        track({ id: 'T1', genre: 'Techno', comments: '/* Dark / Acid / Hypnotic */' }),
        track({ id: 'T3', genre: 'Techno / Trance', comments: '/* Dark / Vocal */' })
      ]
    };

    const result = buildPlaylists(
      document,
      {
        parsers: [{ parser: 'CommentTagParser', taxonomy: { name: 'Tags', playlists: ['Dark'] } }],
        combiner: { name: 'Complex Picks', playlists: ['Dark'] }
      },
      { filters: [new ComplexTrackFilter()] }
    );

    expect(result.tree.toFolderDocument().children).toEqual([
      {
        type: 'folder',
        name: 'Complex Picks',
        children: [{ type: 'playlist', name: 'Dark', trackIds: ['T1'] }]
      },
      {
        type: 'folder',
        name: 'Tags',
        children: [{ type: 'playlist', name: 'Dark', trackIds: ['T1', 'T3'] }]
      }
    ]);
  });

  it('reports logged problems as diagnostics', () => {
    const result = buildPlaylists(collection(), { parsers: config([]).parsers.slice(0, 1) }, {
      remainder: 'bucket'
    });

    expect(result.diagnostics.map(entry => [entry.level, entry.message])).toEqual([
      ['error', 'Invalid remainder type "bucket"']
    ]);
  });

  it('collects warnings while the console only shows errors', () => {
    logService.setLevel('error');
    const document: CollectionDocument = {
      ...collection(),
      tracks: [track({ id: 'T9', genre: 'Techno', rating: '7' })]
    };

    const result = buildPlaylists(document, config(['Techno & [5]']));

    expect(result.diagnostics.map(entry => [entry.level, entry.message])).toEqual([
      ['warn', 'Track T9 has an unknown rating value']
    ]);
  });
});

describe('applyToDocument', () => {
  it('replaces the previous build and keeps other playlists', () => {
    const document = collection([
      { type: 'folder', name: AUTO_PLAYLISTS, children: [] },
      { type: 'playlist', name: 'Mine', trackIds: ['T1'] }
    ]);
    const { tree } = buildPlaylists(document, config(['Techno']));

    const updated = applyToDocument(document, tree);

    expect(updated.playlists.children.map(child => child.name)).toEqual(['Mine', AUTO_PLAYLISTS]);
    expect(updated.playlists.children[1]).toEqual(tree.toFolderDocument());
    expect(document.playlists.children.map(child => child.name)).toEqual([AUTO_PLAYLISTS, 'Mine']);
    expect(updated.tracks).toBe(document.tracks);
  });
});
