import { describe, it, expect } from 'vitest';
import { compareHands, evaluateHand, evaluateHoldemHand } from '../handEvaluator.js';
import { cards } from './testHelpers.js';

const evaluate = (text: string) => evaluateHand(cards(text));

describe('evaluateHand', () => {
  it.each([
    ['As Ks Qs Js Ts', 9, 'Straight Flush'],
    ['9c 9d 9h 9s 2d', 8, 'Four of a Kind'],
    ['Kc Kd Kh 4s 4d', 7, 'Full House'],
    ['2h 7h 9h Jh Ah', 6, 'Flush'],
    ['5c 6d 7h 8s 9d', 5, 'Straight'],
    ['Qc Qd Qh 7s 2d', 4, 'Three of a Kind'],
    ['Jc Jd 4h 4s Ad', 3, 'Two Pair'],
    ['Tc Td 8h 4s 2d', 2, 'One Pair'],
    ['Ac Jd 8h 4s 2d', 1, 'High Card'],
  ])('%s is %s', (hand, category, name) => {
    const value = evaluate(hand);
    expect(value.category).toBe(category);
    expect(value.name).toBe(name);
  });

  it('treats A-2-3-4-5 as a five-high straight', () => {
    const wheel = evaluate('Ad 2c 3h 4s 5d');
    expect(wheel).toEqual({ category: 5, name: 'Straight', ranks: [5] });
    expect(compareHands(evaluate('2c 3h 4s 5d 6c'), wheel)).toBeGreaterThan(0);
  });

  it('does not wrap straights around the ace', () => {
    expect(evaluate('Qd Kc Ah 2s 3d').category).toBe(1);
  });

  it('picks the best five of seven cards', () => {
    // board pairs do not matter once the flush is there
    const value = evaluate('Ah 9h 9c 9d 4h 7h 2h');
    expect(value.category).toBe(6);
    expect(value.ranks).toEqual([14, 9, 7, 4, 2]);
  });

  it('rejects fewer than five or more than seven cards', () => {
    expect(() => evaluate('As Ks Qs Js')).toThrow('Cannot evaluate 4 cards');
    expect(() => evaluate('As Ks Qs Js Ts 9s 8s 7s')).toThrow('Cannot evaluate 8 cards');
  });
});

describe('compareHands', () => {
  it('royal flush beats four of a kind', () => {
    expect(compareHands(evaluate('As Ks Qs Js Ts'), evaluate('Ac Ad Ah As Kd'))).toBeGreaterThan(0);
  });

  it('breaks ties on kickers', () => {
    const aceKicker = evaluate('Tc Td Ah 4s 2d');
    const kingKicker = evaluate('Th Ts Kh 4c 2c');
    expect(compareHands(aceKicker, kingKicker)).toBeGreaterThan(0);
    expect(compareHands(kingKicker, aceKicker)).toBeLessThan(0);
  });

  it('compares two pair by top pair, then bottom pair, then kicker', () => {
    expect(compareHands(evaluate('Kc Kd 2h 2s 3d'), evaluate('Qc Qd Jh Js Ad'))).toBeGreaterThan(0);
    expect(compareHands(evaluate('Kc Kd 5h 5s 3d'), evaluate('Kh Ks 5c 5d 9d'))).toBeLessThan(0);
  });

  it('returns 0 for equal hands of different suits', () => {
    expect(compareHands(evaluate('Ac Kd 8h 4s 2d'), evaluate('Ad Kc 8s 4h 2c'))).toBe(0);
  });
});

describe('evaluateHoldemHand', () => {
  it('may use both, one or none of the hole cards', () => {
    expect(evaluateHoldemHand(cards('Ah Kh'), cards('Qh Jh Th 2c 3d')).category).toBe(9);
    expect(evaluateHoldemHand(cards('2c 3d'), cards('Ah Kh Qh Jh Th')).category).toBe(9);
  });

  it('requires two hole cards and three to five community cards', () => {
    expect(() => evaluateHoldemHand(cards('Ah'), cards('Qh Jh Th'))).toThrow();
    expect(() => evaluateHoldemHand(cards('Ah Kh'), cards('Qh Jh'))).toThrow();
  });
});
