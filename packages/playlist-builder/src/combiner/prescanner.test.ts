import { describe, it, expect, beforeEach } from 'vitest';
import type { CollectionTrack, TagTrackIndex } from '../types';
import { logService } from '../services/log-service';
import {
  decodeRating,
  indexNumericSelectors,
  parseNumericSelector,
  prescanExpressions,
  roundHalfEven
} from './prescanner';

function track(id: string, bpm: string, rating: string, location = `/music/${id}.mp3`): CollectionTrack {
  return { id, genre: '', comments: '', bpm, rating, location };
}

beforeEach(() => {
  logService.setSilent(true);
  logService.clear();
});

describe('prescanExpressions', () => {
  it('collects playlist and numeric selectors across expressions', () => {
    const result = prescanExpressions(['{Fav} & [5]', '[120-124, 128] | {Fav} | {Warmup}']);

    expect([...result.playlistNames]).toEqual(['Fav', 'Warmup']);
    expect([...result.numericSelectors.keys()]).toEqual(['[5]', '[120-124, 128]']);
  });
});

describe('parseNumericSelector', () => {
  it('treats 0-5 as ratings and larger numbers as BPMs', () => {
    const five = parseNumericSelector('5');
    const six = parseNumericSelector('6');

    expect([...five.ratings]).toEqual([5]);
    expect(five.bpms.size).toBe(0);
    expect([...six.bpms]).toEqual([6]);
    expect(six.ratings.size).toBe(0);
  });

  it('expands ranges and mixed lists', () => {
    const selector = parseNumericSelector('0, 2-3, 140, 124-122');

    expect(selector.literal).toBe('[0, 2-3, 140, 124-122]');
    expect([...selector.ratings]).toEqual([0, 2, 3]);
    expect([...selector.bpms]).toEqual([140, 122, 123, 124]);
  });

  it('rejects ranges that span ratings and BPMs', () => {
    const selector = parseNumericSelector('5-7');

    expect(selector.ratings.size).toBe(0);
    expect(selector.bpms.size).toBe(0);
    expect(logService.getRecent(1, { level: 'error' })[0]?.message).toBe(
      'Bad BPM or rating number range: 5-7'
    );
  });

  it('skips malformed parts and keeps the rest', () => {
    const selector = parseNumericSelector('fast, 128');

    expect([...selector.bpms]).toEqual([128]);
    expect(logService.getRecent(1, { level: 'error' })[0]?.message).toBe(
      'Malformed BPM or rating filter part: fast'
    );
  });
});

describe('roundHalfEven', () => {
  it('rounds halves to the even neighbour', () => {
    expect(roundHalfEven(127.5)).toBe(128);
    expect(roundHalfEven(128.5)).toBe(128);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(127.4)).toBe(127);
    expect(roundHalfEven(127.6)).toBe(128);
  });
});

describe('decodeRating', () => {
  it('maps encoded values to stars', () => {
    expect(decodeRating('0')).toBe(0);
    expect(decodeRating('153')).toBe(3);
    expect(decodeRating('255')).toBe(5);
    expect(decodeRating('100')).toBeUndefined();
  });
});

describe('indexNumericSelectors', () => {
  it('registers matching tracks under the selector literal', () => {
    const index: TagTrackIndex = new Map();
    const selectors = [parseNumericSelector('128'), parseNumericSelector('5')];
    const tracks = [
      track('T1', '127.50', '255'),
      track('T2', '128.5', '0'),
      track('T3', '128', '255', '')
    ];

    indexNumericSelectors(selectors, tracks, index);

    expect([...(index.get('[128]')?.keys() ?? [])]).toEqual(['T1', 'T2']);
    expect([...(index.get('[5]')?.keys() ?? [])]).toEqual(['T1']);
  });

  it('only warns about BPMs when a BPM selector is used', () => {
    const index: TagTrackIndex = new Map();

    indexNumericSelectors([parseNumericSelector('4-5')], [track('T1', 'n/a', '204')], index);

    expect(logService.getRecent(10, { level: 'warn' })).toEqual([]);
    expect([...(index.get('[4-5]')?.keys() ?? [])]).toEqual(['T1']);
  });

  it('warns about unknown ratings when a rating selector is used', () => {
    indexNumericSelectors([parseNumericSelector('3')], [track('T1', '120', '99')], new Map());

    expect(logService.getRecent(1, { level: 'warn' })[0]?.message).toBe(
      'Track T1 has an unknown rating value'
    );
  });
});
