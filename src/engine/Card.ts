import { Card, Rank, Suit } from "../model/types.js";
import { InvalidHandError } from "../model/errors.js";

export const RANKS = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const satisfies readonly Rank[];
export const SUITS = ["H", "D", "C", "S"] as const satisfies readonly Suit[];

export const RANK_NAMES: Record<Rank, string> = {
  2: "2", 3: "3", 4: "4", 5: "5", 6: "6", 7: "7", 8: "8",
  9: "9", 10: "10", 11: "J", 12: "Q", 13: "K", 14: "A",
};

const RANK_WORDS: Record<Rank, string> = {
  2: "2", 3: "3", 4: "4", 5: "5", 6: "6", 7: "7", 8: "8",
  9: "9", 10: "10", 11: "Jack", 12: "Queen", 13: "King", 14: "Ace",
};

export const SUIT_NAMES: Record<Suit, string> = {
  H: "Hearts",
  D: "Diamonds",
  C: "Clubs",
  S: "Spades",
};

// "A","K","Q","J","T"/"10","9"…"2"
const LABEL_TO_RANK = new Map<string, Rank>([
  ...RANKS.map((r): [string, Rank] => [RANK_NAMES[r], r]),
  ["T", 10],
]);

function asRank(value: unknown): Rank | undefined {
  return RANKS.find((r) => r === value);
}

function asSuit(value: unknown): Suit | undefined {
  return SUITS.find((s) => s === value);
}

export function isValidCard(value: unknown): value is Card {
  if (typeof value !== "object" || value === null) return false;
  if (!("rank" in value) || !("suit" in value)) return false;
  return asRank(value.rank) !== undefined && asSuit(value.suit) !== undefined;
}

/** rank/suit を検証して Card を作る。範囲外は InvalidCard */
export function toCard(rank: unknown, suit: unknown): Card {
  const r = asRank(rank);
  const s = asSuit(suit);
  if (r === undefined || s === undefined) {
    throw new InvalidHandError("InvalidCard", `invalid card: rank=${String(rank)} suit=${String(suit)}`);
  }
  return { rank: r, suit: s };
}

/** "AH", "10d", "Ts" など（大文字小文字は問わない） */
export function parseCard(text: string): Card {
  const m = /^(10|[2-9TJQKA])([HDCS])$/.exec(text.trim().toUpperCase());
  const rank = m ? LABEL_TO_RANK.get(m[1]) : undefined;
  if (!m || rank === undefined) {
    throw new InvalidHandError("InvalidCard", `invalid card label: ${text}`);
  }
  return toCard(rank, m[2]);
}

export function sameCard(a: Card, b: Card): boolean {
  return a.rank === b.rank && a.suit === b.suit;
}

export function cardToString(card: Card): string {
  return `${RANK_NAMES[card.rank]}${card.suit}`;
}

export function cardToFullString(card: Card): string {
  return `${RANK_WORDS[card.rank]} of ${SUIT_NAMES[card.suit]}`;
}

// スート順（H→D→C→S）、各スート内は 2→A
export function createFullDeck(): Card[] {
  const d: Card[] = [];
  for (const suit of SUITS) for (const rank of RANKS) d.push({ rank, suit });
  return d;
}
