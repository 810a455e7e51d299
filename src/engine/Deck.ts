import { Card } from "../model/types.js";
import { createFullDeck, sameCard } from "./Card.js";
import { HAND_SIZE } from "./Hand.js";

export type Rng = () => number;

// シード付き PRNG（同じ seed なら同じ引き）
export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export interface DeckOptions {
  seed?: number;
  rng?: Rng;   // seed より優先
}

/**
 * 52枚から重複なしで引く山札。
 * 使用済み（配った・捨てた）カードを覚えておき、reset で全戻し
 */
export class Deck {
  private readonly all: Card[] = createFullDeck();
  private used: Card[] = [];
  private readonly rng: Rng;

  constructor(opts: DeckOptions = {}) {
    this.rng = opts.rng ?? (opts.seed !== undefined ? mulberry32(opts.seed) : Math.random);
  }

  reset(): void {
    this.used = [];
  }

  /** 残りからランダムに1枚。尽きていれば undefined */
  drawCard(): Card | undefined {
    const available = this.all.filter((c) => this.isAvailable(c));
    if (available.length === 0) return undefined;
    const card = available[Math.floor(this.rng() * available.length)];
    this.used.push(card);
    return card;
  }

  /** 最大 count 枚（途中で尽きたらそこまで） */
  drawCards(count: number): Card[] {
    const out: Card[] = [];
    for (let i = 0; i < count; i++) {
      const card = this.drawCard();
      if (!card) break;
      out.push(card);
    }
    return out;
  }

  generateInitialHand(): Card[] {
    return this.drawCards(HAND_SIZE);
  }

  markUsed(card: Card): void {
    if (this.isAvailable(card)) this.used.push({ rank: card.rank, suit: card.suit });
  }

  markCardsUsed(cards: readonly Card[]): void {
    for (const c of cards) this.markUsed(c);
  }

  isAvailable(card: Card): boolean {
    return !this.used.some((u) => sameCard(u, card));
  }

  remainingCount(): number {
    return this.all.length - this.used.length;
  }

  usedCards(): Card[] {
    return [...this.used];
  }
}
