import { describe, it, expect } from 'vitest';
import type { CollectionTrack } from '../types';
import { createTagParser, parseTags } from './tag-parsers';

function track(overrides: Partial<CollectionTrack> = {}): CollectionTrack {
  return {
    id: '1',
    genre: '',
    comments: '',
    bpm: '128.00',
    rating: '0',
    location: '/music/track.mp3',
    ...overrides
  };
}

const taxonomy = { name: 'Genres', playlists: ['Techno'] };

describe('GenreTagParser', () => {
  it('splits the genre on "/" and trims each tag', () => {
    const parser = createTagParser('GenreTagParser', taxonomy);

    expect(parseTags(parser, track({ genre: 'Techno / Minimal /Dub Techno' }))).toEqual([
      'Techno',
      'Minimal',
      'Dub Techno'
    ]);
  });

  it('uses a custom delimiter', () => {
    const parser = createTagParser('GenreTagParser', taxonomy, { genreDelimiter: ',' });

    expect(parseTags(parser, track({ genre: 'House, Disco' }))).toEqual(['House', 'Disco']);
  });

  it('adds a Pure tag when every tag contains the genre', () => {
    const parser = createTagParser('GenreTagParser', taxonomy, { pureGenrePlaylists: ['Techno'] });

    expect(parseTags(parser, track({ genre: 'Techno / acid techno' }))).toEqual([
      'Techno',
      'acid techno',
      'Pure Techno'
    ]);
    expect(parseTags(parser, track({ genre: 'Techno / House' }))).toEqual(['Techno', 'House']);
  });

  it('checks later pure genres against tags added by earlier ones', () => {
    const parser = createTagParser('GenreTagParser', taxonomy, {
      pureGenrePlaylists: ['Tech', 'Techno']
    });

    expect(parseTags(parser, track({ genre: 'Techno' }))).toEqual(['Techno', 'Pure Tech']);
  });

  it('yields a single empty tag for an empty genre', () => {
    const parser = createTagParser('GenreTagParser', taxonomy);

    expect(parseTags(parser, track({ genre: '' }))).toEqual(['']);
  });
});

describe('CommentTagParser', () => {
  const parser = createTagParser('CommentTagParser', taxonomy);

  it('reads the tag list between the comment markers', () => {
    expect(parseTags(parser, track({ comments: 'great intro /* Dark / Vocal */ check' }))).toEqual([
      'Dark',
      'Vocal'
    ]);
  });

  it('returns no tags without markers', () => {
    expect(parseTags(parser, track({ comments: 'Dark / Vocal' }))).toEqual([]);
  });

  it('ignores the genre field', () => {
    expect(parseTags(parser, track({ genre: 'Techno', comments: '/* Peak */' }))).toEqual(['Peak']);
  });
});
