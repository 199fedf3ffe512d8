/**
 * Selector prescanning
 *
 * Collects the playlist selectors ({...}) and BPM / rating selectors ([...])
 * used by a set of combiner expressions, then indexes the collection's tracks
 * under each BPM / rating selector's literal text so the evaluator can look
 * them up like any other tag.
 *
 * Numbers in [0, 5] are ratings, anything above is a BPM:
 *   "[5]"          -> rating 5
 *   "[120-124]"    -> BPMs 120..124
 *   "[0, 2-5, 140]" -> ratings 0, 2, 3, 4, 5 and BPM 140
 */

import type { CollectionTrack, TagTrackIndex } from '../types';
import { log } from '../services/log-service';

const SERVICE = 'Prescanner';

const PLAYLIST_SELECTOR_PATTERN = /\{([^{}]*)\}/g;
const NUMERIC_SELECTOR_PATTERN = /\[([^[\]]*)\]/g;
const INTEGER_PATTERN = /^\d+$/;

export const MAX_RATING = 5;

/**
 * Encoded rating values as stored on tracks, mapped to 0-5 stars
 */
export const RATING_VALUES: ReadonlyMap<string, number> = new Map([
  ['0', 0],
  ['51', 1],
  ['102', 2],
  ['153', 3],
  ['204', 4],
  ['255', 5]
]);

export interface NumericSelector {
  /** Bracket literal exactly as written in the expression, e.g. "[5, 120-124]" */
  literal: string;
  bpms: Set<number>;
  ratings: Set<number>;
}

export interface PrescanResult {
  playlistNames: Set<string>;
  numericSelectors: Map<string, NumericSelector>;
}

export function prescanExpressions(expressions: string[]): PrescanResult {
  const playlistNames = new Set<string>();
  const numericSelectors = new Map<string, NumericSelector>();

  for (const expression of expressions) {
    for (const match of expression.matchAll(PLAYLIST_SELECTOR_PATTERN)) {
      playlistNames.add(match[1] ?? '');
    }
    for (const match of expression.matchAll(NUMERIC_SELECTOR_PATTERN)) {
      const literal = match[0];
      if (!numericSelectors.has(literal)) {
        numericSelectors.set(literal, parseNumericSelector(match[1] ?? ''));
      }
    }
  }

  return { playlistNames, numericSelectors };
}

/**
 * Parse the payload of one bracket literal. Malformed parts are logged and
 * skipped; the remaining parts still apply.
 */
export function parseNumericSelector(payload: string): NumericSelector {
  const selector: NumericSelector = {
    literal: `[${payload}]`,
    bpms: new Set(),
    ratings: new Set()
  };

  for (const rawPart of payload.split(',')) {
    const part = rawPart.trim();

    if (INTEGER_PATTERN.test(part)) {
      const value = parseInt(part, 10);
      (isRating(value) ? selector.ratings : selector.bpms).add(value);
      continue;
    }

    const bounds = part.split('-');
    if (bounds.length === 2 && bounds.every(bound => INTEGER_PATTERN.test(bound))) {
      const [first, second] = bounds.map(bound => parseInt(bound, 10));
      const low = Math.min(first ?? 0, second ?? 0);
      const high = Math.max(first ?? 0, second ?? 0);

      if (high <= MAX_RATING) {
        for (let value = low; value <= high; value++) selector.ratings.add(value);
      } else if (low > MAX_RATING) {
        for (let value = low; value <= high; value++) selector.bpms.add(value);
      } else {
        log.error(SERVICE, `Bad BPM or rating number range: ${part}`);
      }
      continue;
    }

    log.error(SERVICE, `Malformed BPM or rating filter part: ${part}`);
  }

  return selector;
}

function isRating(value: number): boolean {
  return value >= 0 && value <= MAX_RATING;
}

/**
 * Round half to even, e.g. 127.5 -> 128 and 128.5 -> 128
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function decodeRating(encoded: string): number | undefined {
  return RATING_VALUES.get(encoded.trim());
}

/**
 * Register every track matching a numeric selector under the selector's
 * literal text. Tracks without a location are skipped.
 */
export function indexNumericSelectors(
  selectors: Iterable<NumericSelector>,
  tracks: Iterable<CollectionTrack>,
  index: TagTrackIndex
): void {
  const selectorList = Array.from(selectors);
  const usesBpm = selectorList.some(selector => selector.bpms.size > 0);
  const usesRating = selectorList.some(selector => selector.ratings.size > 0);
  if (!usesBpm && !usesRating) return;

  for (const track of tracks) {
    if (!track.location) continue;

    const parsedBpm = parseFloat(track.bpm);
    const bpm = Number.isFinite(parsedBpm) ? roundHalfEven(parsedBpm) : undefined;
    const rating = decodeRating(track.rating);

    if (usesBpm && bpm === undefined) {
      log.warn(SERVICE, `Track ${track.id} has no usable BPM`, { bpm: track.bpm });
    }
    if (usesRating && rating === undefined) {
      log.warn(SERVICE, `Track ${track.id} has an unknown rating value`, { rating: track.rating });
    }

    for (const selector of selectorList) {
      const hit =
        (bpm !== undefined && selector.bpms.has(bpm)) ||
        (rating !== undefined && selector.ratings.has(rating));
      if (!hit) continue;

      let tracksForSelector = index.get(selector.literal);
      if (!tracksForSelector) {
        tracksForSelector = new Map();
        index.set(selector.literal, tracksForSelector);
      }
      tracksForSelector.set(track.id, []);
    }
  }
}
