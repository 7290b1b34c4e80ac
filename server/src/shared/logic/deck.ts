import { randomInt } from 'crypto';
import { Card, Rank, RandomSource, RANKS, SUITS } from './types.js';
import { DeckExhaustedError } from './errors.js';

export const defaultRandom: RandomSource = (maxExclusive) => randomInt(maxExclusive);

/**
 * 52 distinct rank x suit cards, ordered by suit then rank.
 */
export function createDeck(): Card[] {
  const deck: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      deck.push({ rank, suit });
    }
  }
  return deck;
}

/**
 * Fisher-Yates shuffle. Returns a new array; the input is left as is.
 */
export function shuffleDeck(deck: Card[], random: RandomSource = defaultRandom): Card[] {
  const shuffled = [...deck];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = random(i + 1);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Takes the top `count` cards.
 */
export function dealCards(deck: Card[], count: number): { cards: Card[]; remainingDeck: Card[] } {
  if (count > deck.length) {
    throw new DeckExhaustedError(count, deck.length);
  }
  return { cards: deck.slice(0, count), remainingDeck: deck.slice(count) };
}

export function getRankValue(rank: Rank): number {
  return RANKS.indexOf(rank) + 2;
}

export function formatCard(card: Card): string {
  return `${card.rank}${card.suit}`;
}

// "As", "AS", "td" all parse
export function parseCard(text: string): Card {
  if (text.length !== 2) {
    throw new Error(`Invalid card: ${text}`);
  }
  const rank = RANKS.find(r => r === text[0].toUpperCase());
  const suit = SUITS.find(s => s === text[1].toLowerCase());
  if (!rank || !suit) {
    throw new Error(`Invalid card: ${text}`);
  }
  return { rank, suit };
}

export function parseCards(text: string): Card[] {
  return text.split(/\s+/).filter(Boolean).map(parseCard);
}

export function isSameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}
