import { Card, Hand, Holder, Position } from "../model/types.js";
import { InvalidHandError } from "../model/errors.js";
import { isValidCard } from "./Card.js";

export const HAND_SIZE = 5;
export const POSITIONS = [1, 2, 3, 4, 5] as const satisfies readonly Position[];

const EMPTY: Holder = { kind: "empty" };

function toHolder(value: Card | null | undefined, position: Position): Holder {
  if (value === null || value === undefined) return EMPTY;
  if (!isValidCard(value)) {
    throw new InvalidHandError("InvalidCard", `invalid card at position ${position}`);
  }
  return { kind: "card", card: { rank: value.rank, suit: value.suit } };
}

/**
 * 5スロットの手札を作る唯一の入口。
 * null/undefined は空スロット。長さ5以外・不正カードはここで弾く
 */
export function makeHand(slots: readonly (Card | null | undefined)[]): Hand {
  if (slots.length !== HAND_SIZE) {
    throw new InvalidHandError(
      "InvalidHandLength",
      `hand must have exactly ${HAND_SIZE} positions (got ${slots.length})`,
    );
  }
  return [
    toHolder(slots[0], 1),
    toHolder(slots[1], 2),
    toHolder(slots[2], 3),
    toHolder(slots[3], 4),
    toHolder(slots[4], 5),
  ];
}

export function emptyHand(): Hand {
  return [EMPTY, EMPTY, EMPTY, EMPTY, EMPTY];
}

/** 0始まり index → ロボット用 1始まりポジション */
export function positionAt(index: number): Position {
  const p = POSITIONS.find((x) => x === index + 1);
  if (p === undefined) {
    throw new InvalidHandError("InvalidHandLength", `position index out of range: ${index}`);
  }
  return p;
}

export function emptyPositions(hand: Hand): Position[] {
  return POSITIONS.filter((p) => hand[p - 1].kind === "empty");
}

export function isComplete(hand: Hand): boolean {
  return hand.every((h) => h.kind === "card");
}

/** 全スロットが埋まっている前提でカード列を返す。空があれば AmbiguousHandState */
export function cardsOf(hand: Hand): Card[] {
  const cards: Card[] = [];
  for (const h of hand) {
    if (h.kind === "empty") {
      throw new InvalidHandError("AmbiguousHandState", "hand has empty positions");
    }
    cards.push(h.card);
  }
  return cards;
}

export function toSlots(hand: Hand): (Card | null)[] {
  return hand.map((h) => (h.kind === "card" ? h.card : null));
}
