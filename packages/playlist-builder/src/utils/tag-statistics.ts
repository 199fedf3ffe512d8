/**
 * Tag statistics for combiner playlists: how many of a playlist's tracks carry
 * each tag, split out by the tag parser that produced the tag.
 */

import type { TagTrackIndex } from '../types';
import { roundHalfEven } from '../combiner/prescanner';

export interface PlaylistTagStatistics {
  playlist: string;
  /** Parser name -> tag -> number of the playlist's tracks with that tag */
  parsers: Map<string, Map<string, number>>;
}

export function computeTagStatistics(
  playlists: Map<string, Set<string>>,
  parserIndexes: Map<string, TagTrackIndex>
): PlaylistTagStatistics[] {
  const trackTags = new Map<string, Set<string>>();
  for (const index of parserIndexes.values()) {
    for (const [tag, tracks] of index) {
      for (const trackId of tracks.keys()) {
        let tags = trackTags.get(trackId);
        if (!tags) {
          tags = new Set();
          trackTags.set(trackId, tags);
        }
        tags.add(tag);
      }
    }
  }

  const statistics: PlaylistTagStatistics[] = [];
  for (const [playlist, trackIds] of playlists) {
    if (trackIds.size === 0) continue;

    const counts = new Map<string, number>();
    for (const trackId of trackIds) {
      for (const tag of trackTags.get(trackId) ?? []) {
        counts.set(tag, (counts.get(tag) ?? 0) + 1);
      }
    }

    const parsers = new Map<string, Map<string, number>>();
    for (const [parser, index] of parserIndexes) {
      const parserCounts = new Map<string, number>();
      for (const tag of index.keys()) {
        const count = counts.get(tag) ?? 0;
        if (count > 0) parserCounts.set(tag, count);
      }
      parsers.set(parser, parserCounts);
    }

    statistics.push({ playlist, parsers });
  }

  return statistics;
}

/**
 * Scale counts so the largest becomes `maximum`
 */
export function scaleData(data: Map<string, number>, maximum: number = 25): Map<string, number> {
  const dataMax = Math.max(...data.values());
  const scaled = new Map<string, number>();
  for (const [key, value] of data) {
    scaled.set(key, roundHalfEven((value / dataMax) * maximum));
  }
  return scaled;
}

/**
 * Render counts as a vertical ASCII histogram with the keys along the bottom
 */
export function formatHistogram(data: Map<string, number>, maximum: number = 25): string {
  const nonZero = new Map([...data].filter(([, value]) => value > 0));
  if (nonZero.size === 0) return '';

  const widthPad = 1;
  const scaled = scaleData(nonZero, maximum);
  let row = Math.max(...scaled.values());
  let rowWidth = 0;
  let output = '';

  while (row > 0) {
    let line = '|';
    for (const key of nonZero.keys()) {
      const padding = ' '.repeat(widthPad + roundHalfEven(key.length / 2));
      line += padding + (row <= (scaled.get(key) ?? 0) ? '*' : ' ') + padding;
    }
    if (!rowWidth) rowWidth = line.length;
    output += `${line}\n`;
    row--;
  }

  output += `${'-'.repeat(rowWidth)}\n `;
  for (const key of nonZero.keys()) {
    output += `${' '.repeat(widthPad)}${key}${' '.repeat(widthPad + 1)}`;
  }

  return output;
}

export function formatTagStatistics(statistics: PlaylistTagStatistics[]): string {
  const sections: string[] = [];
  for (const { playlist, parsers } of statistics) {
    sections.push(`\n${playlist} tag statistics:`);
    for (const [parser, counts] of parsers) {
      sections.push(`\n${parser}:`);
      sections.push(formatHistogram(counts));
    }
  }
  return sections.join('\n');
}
