import test from "node:test";
import assert from "node:assert/strict";
import { parseCard, RANKS, SUITS, toCard } from "../src/engine/Card.js";
import { compareHands, evaluate, evaluateCards, handStrength } from "../src/engine/Evaluator.js";
import { makeHand, POSITIONS } from "../src/engine/Hand.js";
import { discardPositions } from "../src/engine/Strategy.js";
import { InvalidHandError, type InvalidHandKind } from "../src/model/errors.js";
import type { Position } from "../src/model/types.js";

const cards = (...labels: string[]) => labels.map(parseCard);

const handError = (kind: InvalidHandKind) => (e: unknown) =>
  e instanceof InvalidHandError && e.kind === kind;

test("evaluate:royal flush in any order", () => {
  const ev = evaluateCards(cards("AH", "10H", "KH", "QH", "JH"));
  assert.equal(ev.rank, "RoyalFlush");
  assert.equal(ev.name, "Royal Flush");
  assert.deepEqual(ev.keepers, [1, 2, 3, 4, 5]);
  assert.deepEqual(ev.tiebreakers, [14]);
});

test("evaluate:straight flush", () => {
  const ev = evaluateCards(cards("9S", "8S", "7S", "6S", "5S"));
  assert.equal(ev.rank, "StraightFlush");
  assert.deepEqual(ev.tiebreakers, [9]);
});

test("evaluate:wheel counts ace low", () => {
  const mixed = evaluateCards(cards("AH", "2D", "3C", "4S", "5H"));
  assert.equal(mixed.rank, "Straight");
  assert.deepEqual(mixed.tiebreakers, [5]);
  assert.deepEqual(mixed.keepers, [1, 2, 3, 4, 5]);

  const suited = evaluateCards(cards("3C", "AC", "5C", "2C", "4C"));
  assert.equal(suited.rank, "StraightFlush");
  assert.deepEqual(suited.tiebreakers, [5]);
});

test("evaluate:ace does not wrap around", () => {
  const ev = evaluateCards(cards("KH", "AD", "2C", "3S", "4H"));
  assert.equal(ev.rank, "HighCard");
  assert.deepEqual(ev.keepers, [2]);
  assert.deepEqual(ev.tiebreakers, [14, 13, 4, 3, 2]);
});

test("evaluate:four of a kind keeps the four", () => {
  const ev = evaluateCards(cards("9H", "2C", "9D", "9S", "9C"));
  assert.equal(ev.rank, "FourOfAKind");
  assert.deepEqual(ev.keepers, [1, 3, 4, 5]);
  assert.deepEqual(ev.tiebreakers, [9, 2]);
  assert.deepEqual(discardPositions(ev.rank, ev.keepers), []);
});

test("evaluate:full house", () => {
  const ev = evaluateCards(cards("KH", "KD", "4C", "4S", "KC"));
  assert.equal(ev.rank, "FullHouse");
  assert.deepEqual(ev.keepers, [1, 2, 3, 4, 5]);
  assert.deepEqual(ev.tiebreakers, [13, 4]);
});

test("evaluate:flush beats straight shape", () => {
  const ev = evaluateCards(cards("AH", "10H", "8H", "5H", "2H"));
  assert.equal(ev.rank, "Flush");
  assert.deepEqual(ev.tiebreakers, [14, 10, 8, 5, 2]);
});

test("evaluate:straight", () => {
  const ev = evaluateCards(cards("9H", "8D", "7C", "6S", "5H"));
  assert.equal(ev.rank, "Straight");
  assert.deepEqual(ev.tiebreakers, [9]);
});

test("evaluate:three of a kind", () => {
  const ev = evaluateCards(cards("7H", "7D", "7C", "2S", "9H"));
  assert.equal(ev.rank, "ThreeOfAKind");
  assert.deepEqual(ev.keepers, [1, 2, 3]);
  assert.deepEqual(ev.tiebreakers, [7, 9, 2]);
});

test("evaluate:two pair", () => {
  const ev = evaluateCards(cards("10H", "10D", "5C", "5S", "7H"));
  assert.equal(ev.rank, "TwoPair");
  assert.deepEqual(ev.keepers, [1, 2, 3, 4]);
  assert.deepEqual(ev.tiebreakers, [10, 5, 7]);
});

test("evaluate:one pair", () => {
  const ev = evaluateCards(cards("10H", "10D", "5C", "3S", "7H"));
  assert.equal(ev.rank, "Pair");
  assert.equal(ev.name, "One Pair");
  assert.deepEqual(ev.keepers, [1, 2]);
  assert.deepEqual(ev.tiebreakers, [10, 7, 5, 3]);
});

test("evaluate:high card keeps the highest", () => {
  const ev = evaluateCards(cards("2C", "KD", "9H", "4S", "7C"));
  assert.equal(ev.rank, "HighCard");
  assert.deepEqual(ev.keepers, [2]);
});

test("evaluate:rejects bad hands", () => {
  assert.throws(() => evaluateCards(cards("2C", "KD", "9H", "4S")), handError("InvalidHandLength"));
  assert.throws(() => evaluateCards(cards("2C", "KD", "9H", "4S", "KD")), handError("DuplicateCard"));
  const partial = makeHand([...cards("2C", "KD", "9H", "4S"), null]);
  assert.throws(() => evaluate(partial), handError("AmbiguousHandState"));
});

test("evaluate:keepers and discards partition positions outside four of a kind", () => {
  const hands = [
    cards("AH", "KH", "QH", "JH", "10H"),
    cards("7H", "7D", "7C", "2S", "9H"),
    cards("10H", "10D", "5C", "5S", "7H"),
    cards("10H", "10D", "5C", "3S", "7H"),
    cards("2C", "KD", "9H", "4S", "7C"),
    cards("AH", "2D", "3C", "4S", "5H"),
  ];
  for (const h of hands) {
    const ev = evaluate(makeHand(h));
    const discards = discardPositions(ev.rank, ev.keepers);
    const union = [...ev.keepers, ...discards].sort((a, b) => a - b);
    assert.deepEqual(union, [...POSITIONS], ev.name);
  }
});

test("evaluate:four of a kind leaves its kicker unclassified", () => {
  const ev = evaluate(makeHand(cards("9H", "2C", "9D", "9S", "9C")));
  const discards = discardPositions(ev.rank, ev.keepers);
  assert.deepEqual(ev.keepers, [1, 3, 4, 5]);
  assert.deepEqual<Position[]>(discards, []);
  assert.equal(ev.keepers.some((p) => discards.includes(p)), false);
});

test("compare:category then tiebreakers", () => {
  assert.equal(compareHands(cards("AH", "10H", "8H", "5H", "2H"), cards("9H", "8D", "7C", "6S", "5H")), 1);
  assert.equal(compareHands(cards("10H", "10D", "AC", "3S", "2H"), cards("10C", "10S", "KC", "3D", "2D")), 1);
  assert.equal(compareHands(cards("AH", "2D", "3C", "4S", "5H"), cards("2H", "3D", "4C", "5S", "6H")), -1);
  assert.equal(compareHands(cards("KH", "9D", "7C", "4S", "2H"), cards("KD", "9C", "7S", "4H", "2D")), 0);
});

test("compare:strength order", () => {
  assert.equal(handStrength("HighCard"), 0);
  assert.equal(handStrength("Straight"), 4);
  assert.equal(handStrength("RoyalFlush"), 9);
});

test("evaluate:every four of a kind stands pat", () => {
  for (const rank of RANKS) {
    const kicker = rank === 2 ? 3 : 2;
    const hand = [toCard(kicker, "S"), ...SUITS.map((s) => toCard(rank, s))];
    const ev = evaluateCards(hand);
    assert.equal(ev.rank, "FourOfAKind");
    assert.deepEqual(ev.keepers, [2, 3, 4, 5]);
    assert.deepEqual(discardPositions(ev.rank, ev.keepers), []);
  }
});

test("evaluate:every wheel is a straight", () => {
  for (const a of SUITS) {
    for (const b of SUITS) {
      const hand = [toCard(14, a), toCard(2, b), toCard(3, "C"), toCard(4, "C"), toCard(5, "C")];
      const expected = a === "C" && b === "C" ? "StraightFlush" : "Straight";
      assert.equal(evaluateCards(hand).rank, expected, `${a}${b}`);
    }
  }
});
