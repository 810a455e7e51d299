// === 共通カード型（rank: 2〜14, suit: H/D/C/S）=====================
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
export type Suit = "H" | "D" | "C" | "S";

export interface Card {
  readonly rank: Rank;   // 11=J, 12=Q, 13=K, 14=A
  readonly suit: Suit;
}

// ホルダー番号（ロボット側は 1 始まり）
export type Position = 1 | 2 | 3 | 4 | 5;

// 1スロット分の状態：カードあり / 空
export type Holder =
  | { readonly kind: "card"; readonly card: Card }
  | { readonly kind: "empty" };

// 5スロット固定（makeHand 経由でのみ生成）
export type Hand = readonly [Holder, Holder, Holder, Holder, Holder];

// === 役 ===========================================================
// 弱い順。index がそのまま強さ
export const HAND_RANKS = [
  "HighCard",
  "Pair",
  "TwoPair",
  "ThreeOfAKind",
  "Straight",
  "Flush",
  "FullHouse",
  "FourOfAKind",
  "StraightFlush",
  "RoyalFlush",
] as const;

export type HandRank = (typeof HAND_RANKS)[number];

export interface Evaluation {
  rank: HandRank;
  /** 役を構成するポジション（昇順） */
  keepers: Position[];
  /** 同じ役同士の比較用（大きい方が強い） */
  tiebreakers: number[];
  name: string;
}

// === ロボット命令 ==================================================
export type RobotAction =
  | { type: "takeCardAt"; slot: Position }
  | { type: "defaultPosition" }
  | { type: "dropHolding" }
  | { type: "takeDeck" }
  | { type: "placeAt"; slot: Position };

export type PlanMode = "fill" | "swap" | "stand";

// decide の結果（コマンド文字列込み）
export interface RobotPlan {
  mode: PlanMode;
  actions: RobotAction[];
  commands: string[];
  evaluation?: Evaluation;   // 5枚揃っている時だけ
  discards: Position[];
}

// === シミュレータ（テーブル）=======================================
export interface RobotTableState {
  id: string;
  holders: (Card | null)[];   // 長さ5
  holding: Card | null;       // アームが掴んでいるカード
  trash: Card[];
  fillRounds: number;
  swapRounds: number;
  history: string[];          // 実行済みコマンド
}

// クライアントに返す公開情報
export interface RobotTablePublicState {
  tableId: string;
  hand: (string | null)[];
  holding: string | null;
  trash: string[];
  remaining: number;
  fillRounds: number;
  swapRounds: number;
  evaluation?: Evaluation;
}
