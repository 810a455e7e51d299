import { Card, Evaluation, Hand, HandRank, HAND_RANKS, Position, Rank } from "../model/types.js";
import { InvalidHandError } from "../model/errors.js";
import { cardToString, isValidCard, sameCard } from "./Card.js";
import { cardsOf, HAND_SIZE, POSITIONS, positionAt } from "./Hand.js";

export const HAND_NAMES: Record<HandRank, string> = {
  HighCard: "High Card",
  Pair: "One Pair",
  TwoPair: "Two Pair",
  ThreeOfAKind: "Three of a Kind",
  Straight: "Straight",
  Flush: "Flush",
  FullHouse: "Full House",
  FourOfAKind: "Four of a Kind",
  StraightFlush: "Straight Flush",
  RoyalFlush: "Royal Flush",
};

const WHEEL = [14, 5, 4, 3, 2];

/** 役の強さ（0=HighCard 〜 9=RoyalFlush） */
export function handStrength(rank: HandRank): number {
  return HAND_RANKS.indexOf(rank);
}

function validate(cards: readonly Card[]) {
  if (cards.length !== HAND_SIZE) {
    throw new InvalidHandError(
      "InvalidHandLength",
      `hand must contain exactly ${HAND_SIZE} cards (got ${cards.length})`,
    );
  }
  cards.forEach((c, i) => {
    if (!isValidCard(c)) throw new InvalidHandError("InvalidCard", `invalid card at position ${i + 1}`);
  });
  for (let i = 0; i < cards.length; i++) {
    for (let j = i + 1; j < cards.length; j++) {
      if (sameCard(cards[i], cards[j])) {
        throw new InvalidHandError(
          "DuplicateCard",
          `duplicate card ${cardToString(cards[i])} at positions ${i + 1} and ${j + 1}`,
        );
      }
    }
  }
}

/** ストレートならトップのランク（ホイールは 5）、違えば 0 */
function straightHigh(ranks: Rank[]): number {
  const uniq = Array.from(new Set(ranks)).sort((a, b) => b - a);
  if (uniq.length !== HAND_SIZE) return 0;
  if (uniq[0] - uniq[4] === 4) return uniq[0];
  if (uniq.every((r, i) => r === WHEEL[i])) return 5;
  return 0;
}

// ランクごとのポジション。枚数の多い順 → ランクの高い順
function groupByRank(cards: readonly Card[]): { rank: Rank; positions: Position[] }[] {
  const m = new Map<Rank, Position[]>();
  cards.forEach((c, i) => {
    const list = m.get(c.rank) ?? [];
    list.push(positionAt(i));
    m.set(c.rank, list);
  });
  return Array.from(m.entries())
    .map(([rank, positions]) => ({ rank, positions }))
    .sort((a, b) => b.positions.length - a.positions.length || b.rank - a.rank);
}

const ascending = (ps: Position[]) => [...ps].sort((a, b) => a - b);

function result(rank: HandRank, keepers: Position[], tiebreakers: number[]): Evaluation {
  return { rank, keepers: ascending(keepers), tiebreakers, name: HAND_NAMES[rank] };
}

/** 5枚のカード列を判定する。上位の役から順に、最初に一致したものを返す */
export function evaluateCards(cards: readonly Card[]): Evaluation {
  validate(cards);

  const ranks = cards.map((c) => c.rank);
  const desc = [...ranks].sort((a, b) => b - a);
  const flush = cards.every((c) => c.suit === cards[0].suit);
  const high = straightHigh(ranks);
  const groups = groupByRank(cards);
  const all = [...POSITIONS];

  const [first, second] = groups;
  const singles = groups.filter((g) => g.positions.length === 1).map((g) => g.rank);

  if (flush && high === 14) return result("RoyalFlush", all, [14]);
  if (flush && high > 0) return result("StraightFlush", all, [high]);

  if (first.positions.length === 4) {
    return result("FourOfAKind", first.positions, [first.rank, second.rank]);
  }
  if (first.positions.length === 3 && second.positions.length === 2) {
    return result("FullHouse", all, [first.rank, second.rank]);
  }
  if (flush) return result("Flush", all, desc);
  if (high > 0) return result("Straight", all, [high]);

  if (first.positions.length === 3) {
    return result("ThreeOfAKind", first.positions, [first.rank, ...singles]);
  }
  if (first.positions.length === 2 && second.positions.length === 2) {
    return result("TwoPair", [...first.positions, ...second.positions], [first.rank, second.rank, ...singles]);
  }
  if (first.positions.length === 2) {
    return result("Pair", first.positions, [first.rank, ...singles]);
  }

  // ハイカード：最も高いランク（同ランクなら若いポジション）を1枚だけ残す
  return result("HighCard", [first.positions[0]], desc);
}

/** 空スロットを含む手札は判定できない（AmbiguousHandState） */
export function evaluate(hand: Hand): Evaluation {
  return evaluateCards(cardsOf(hand));
}

/** a が強ければ 1、b が強ければ -1、同等 0 */
export function compareEvaluations(a: Evaluation, b: Evaluation): number {
  const sa = handStrength(a.rank), sb = handStrength(b.rank);
  if (sa !== sb) return sa > sb ? 1 : -1;
  const n = Math.min(a.tiebreakers.length, b.tiebreakers.length);
  for (let i = 0; i < n; i++) {
    if (a.tiebreakers[i] !== b.tiebreakers[i]) return a.tiebreakers[i] > b.tiebreakers[i] ? 1 : -1;
  }
  return 0;
}

export function compareHands(a: readonly Card[], b: readonly Card[]): number {
  return compareEvaluations(evaluateCards(a), evaluateCards(b));
}
