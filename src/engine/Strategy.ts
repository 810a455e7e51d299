import { HandRank, Position } from "../model/types.js";
import { POSITIONS } from "./Hand.js";

function notIn(keepers: readonly Position[]): Position[] {
  return POSITIONS.filter((p) => !keepers.includes(p));
}

/**
 * 捨てるポジション（昇順）を返す。
 * ストレート以上はスタンド、それ未満は役になっているカードだけ残して引き直す
 */
export function discardPositions(rank: HandRank, keepers: readonly Position[]): Position[] {
  switch (rank) {
    case "RoyalFlush":
    case "StraightFlush":
    case "FourOfAKind":
    case "FullHouse":
    case "Flush":
    case "Straight":
      return [];
    case "ThreeOfAKind":
    case "TwoPair":
    case "Pair":
      return notIn(keepers);
    case "HighCard":
      // キーパーは最高ランクの1枚のみ
      return notIn(keepers.slice(0, 1));
    default: {
      const unreachable: never = rank;
      throw new Error(`no discard policy for ${String(unreachable)}`);
    }
  }
}
