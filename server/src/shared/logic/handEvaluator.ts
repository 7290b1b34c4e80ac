import { Card, HandValue } from './types.js';
import { getRankValue } from './deck.js';

const HAND_NAMES: Record<number, string> = {
  1: 'High Card',
  2: 'One Pair',
  3: 'Two Pair',
  4: 'Three of a Kind',
  5: 'Straight',
  6: 'Flush',
  7: 'Full House',
  8: 'Four of a Kind',
  9: 'Straight Flush',
};

// Hold'em: best 5 of the 2 hole cards plus the board, any mix
export function evaluateHoldemHand(holeCards: Card[], communityCards: Card[]): HandValue {
  if (holeCards.length !== 2 || communityCards.length < 3 || communityCards.length > 5) {
    throw new Error('Hold\'em requires 2 hole cards and 3 to 5 community cards');
  }
  return evaluateHand([...holeCards, ...communityCards]);
}

/**
 * Best five-card value out of 5 to 7 cards.
 */
export function evaluateHand(cards: Card[]): HandValue {
  if (cards.length < 5 || cards.length > 7) {
    throw new Error(`Cannot evaluate ${cards.length} cards`);
  }

  let best: HandValue | null = null;
  for (const combo of getCombinations(cards, 5)) {
    const value = evaluateFiveCardHand(combo);
    if (!best || compareHands(value, best) > 0) {
      best = value;
    }
  }
  // C(n,5) >= 1 for n >= 5
  return best ?? evaluateFiveCardHand(cards.slice(0, 5));
}

function getCombinations<T>(arr: T[], size: number): T[][] {
  const result: T[][] = [];

  function combine(start: number, combo: T[]) {
    if (combo.length === size) {
      result.push([...combo]);
      return;
    }
    for (let i = start; i < arr.length; i++) {
      combo.push(arr[i]);
      combine(i + 1, combo);
      combo.pop();
    }
  }

  combine(0, []);
  return result;
}

function evaluateFiveCardHand(cards: Card[]): HandValue {
  const values = cards.map(c => getRankValue(c.rank)).sort((a, b) => b - a);
  const isFlush = cards.every(c => c.suit === cards[0].suit);
  const straightHigh = getStraightHigh(values);
  const groups = getGroups(values);

  if (isFlush && straightHigh !== null) {
    return value(9, [straightHigh]);
  }
  if (groups[0].count === 4) {
    return value(8, [groups[0].value, groups[1].value]);
  }
  if (groups[0].count === 3 && groups[1].count === 2) {
    return value(7, [groups[0].value, groups[1].value]);
  }
  if (isFlush) {
    return value(6, values);
  }
  if (straightHigh !== null) {
    return value(5, [straightHigh]);
  }
  if (groups[0].count === 3) {
    return value(4, groups.map(g => g.value));
  }
  if (groups[0].count === 2 && groups[1].count === 2) {
    return value(3, groups.map(g => g.value));
  }
  if (groups[0].count === 2) {
    return value(2, groups.map(g => g.value));
  }
  return value(1, values);
}

function value(category: number, ranks: number[]): HandValue {
  return { category, name: HAND_NAMES[category], ranks };
}

/**
 * High card of the straight, or null. A-2-3-4-5 (wheel) is five-high.
 * Expects values sorted descending.
 */
function getStraightHigh(sorted: number[]): number | null {
  if (new Set(sorted).size !== 5) return null;
  if (sorted[0] - sorted[4] === 4) return sorted[0];

  const wheel = [14, 5, 4, 3, 2];
  if (sorted.every((v, i) => v === wheel[i])) return 5;

  return null;
}

// Grouped by count desc, then value desc: [trips, pair] / [pair, pair, kicker] ...
function getGroups(values: number[]): { value: number; count: number }[] {
  const counts = new Map<number, number>();
  for (const v of values) {
    counts.set(v, (counts.get(v) || 0) + 1);
  }

  const groups = Array.from(counts.entries()).map(([value, count]) => ({ value, count }));
  groups.sort((a, b) => {
    if (b.count !== a.count) return b.count - a.count;
    return b.value - a.value;
  });

  return groups;
}

/**
 * Positive when `a` beats `b`, negative when it loses, 0 on a split.
 */
export function compareHands(a: HandValue, b: HandValue): number {
  if (a.category !== b.category) return a.category - b.category;

  for (let i = 0; i < Math.min(a.ranks.length, b.ranks.length); i++) {
    if (a.ranks[i] !== b.ranks[i]) {
      return a.ranks[i] - b.ranks[i];
    }
  }

  return 0;
}
