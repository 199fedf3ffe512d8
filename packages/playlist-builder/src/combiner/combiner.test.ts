import { describe, it, expect, beforeEach } from 'vitest';
import type { CollectionTrack, TagTrackIndex } from '../types';
import { UnknownSelectorError } from '../errors';
import { logService } from '../services/log-service';
import { Combiner, mergeTagIndexes } from './combiner';

function track(id: string, rating: string): CollectionTrack {
  return { id, genre: '', comments: '', bpm: '126.00', rating, location: `/music/${id}.mp3` };
}

function indexOf(entries: Record<string, string[]>): TagTrackIndex {
  return new Map(
    Object.entries(entries).map(([tag, ids]) => [tag, new Map(ids.map(id => [id, [tag]]))])
  );
}

const tracks = [track('T1', '255'), track('T2', '204'), track('T3', '0')];

beforeEach(() => {
  logService.setSilent(true);
  logService.clear();
});

describe('Combiner', () => {
  it('subtracts a playlist selector from a group', () => {
    const expression = '(Techno | House) ~ {My Favorites}';
    const combiner = new Combiner({ name: 'Combiner', playlists: [expression] }, tracks);

    combiner.resolvePlaylistSelectors(name => (name === 'My Favorites' ? ['T1'] : undefined));
    const results = combiner.evaluate(indexOf({ Techno: ['T1', 'T2'], House: ['T3'] }));

    expect([...(results.get(expression) ?? [])]).toEqual(['T2', 'T3']);
  });

  it('filters by rating', () => {
    const combiner = new Combiner({ name: 'Combiner', playlists: ['Techno & [5]', 'Techno & [4-5]'] }, tracks);

    const results = combiner.evaluate(indexOf({ Techno: ['T1', 'T2', 'T3'] }));

    expect([...(results.get('Techno & [5]') ?? [])]).toEqual(['T1']);
    expect([...(results.get('Techno & [4-5]') ?? [])]).toEqual(['T1', 'T2']);
  });

  it('lists the playlist selectors it needs', () => {
    const combiner = new Combiner(
      { name: 'Combiner', playlists: ['{Warmup} | {Peak}', '{Peak} & Techno'] },
      tracks
    );

    expect(combiner.getPlaylistSelectors()).toEqual(['Warmup', 'Peak']);
  });

  it('throws for a playlist selector that names no playlist', () => {
    const combiner = new Combiner({ name: 'Combiner', playlists: ['{Missing} | Techno'] }, tracks);

    expect(() => combiner.resolvePlaylistSelectors(() => undefined)).toThrow(UnknownSelectorError);
    expect(() => combiner.resolvePlaylistSelectors(() => undefined)).toThrow('Missing not found');
  });

  it('logs a malformed expression and still evaluates the others', () => {
    const combiner = new Combiner({ name: 'Combiner', playlists: ['Techno', 'Techno &', 'House'] }, tracks);

    const results = combiner.evaluate(indexOf({ Techno: ['T1', 'T2'], House: ['T3'] }));

    expect([...results.keys()]).toEqual(['Techno', 'Techno &', 'House']);
    expect([...(results.get('Techno') ?? [])]).toEqual(['T1', 'T2']);
    expect(results.get('Techno &')?.size).toBe(0);
    expect([...(results.get('House') ?? [])]).toEqual(['T3']);
    expect(logService.getRecent(10, { level: 'error' }).map(entry => entry.message)).toEqual([
      'Invalid boolean expression: track sets: 0, tags: [Techno], operators: [&]: "Techno &"'
    ]);
  });

  it('keeps its own selectors when merging tags', () => {
    const combiner = new Combiner({ name: 'Combiner', playlists: ['[5]'] }, tracks);

    combiner.evaluate(indexOf({ '[5]': ['T3'], Techno: ['T2'] }));

    expect([...(combiner.getCombinerTracks().get('[5]')?.keys() ?? [])]).toEqual(['T1']);
    expect(combiner.getCombinerTracks().has('Techno')).toBe(true);
  });
});

describe('mergeTagIndexes', () => {
  it('unions the tracks of shared tags', () => {
    const merged = mergeTagIndexes([indexOf({ Dark: ['T1'], Techno: ['T2'] }), indexOf({ Dark: ['T3'] })]);

    expect([...(merged.get('Dark')?.keys() ?? [])]).toEqual(['T1', 'T3']);
    expect([...(merged.get('Techno')?.keys() ?? [])]).toEqual(['T2']);
  });
});
