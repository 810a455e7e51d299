import { Card, Hand, RobotAction, RobotPlan } from "../model/types.js";
import { compileFill, compileSwap, serializeActions } from "./Actions.js";
import { evaluate } from "./Evaluator.js";
import { isComplete, makeHand, toSlots } from "./Hand.js";
import { discardPositions } from "./Strategy.js";

type HandInput = Hand | readonly (Card | null | undefined)[];

// Hand（Holder 列）か、カード/null の配列を受ける。どちらも makeHand で検証し直す
function toHand(input: HandInput): Hand {
  return makeHand(isHand(input) ? toSlots(input) : input);
}

function isHand(input: HandInput): input is Hand {
  if (input.length !== 5) return false;
  for (const s of input) {
    if (s === null || s === undefined || !("kind" in s)) return false;
  }
  return true;
}

/**
 * 1ラウンド分の判断。
 * 空きがあれば補充だけ（判定しない）、5枚揃っていれば判定 → 捨て札 → 交換
 */
export function planRound(input: HandInput): RobotPlan {
  const hand = toHand(input);

  if (!isComplete(hand)) {
    const actions = compileFill(hand);
    return { mode: "fill", actions, commands: serializeActions(actions), discards: [] };
  }

  const evaluation = evaluate(hand);
  const discards = discardPositions(evaluation.rank, evaluation.keepers);
  const actions = compileSwap(hand, discards);
  return {
    mode: actions.length > 0 ? "swap" : "stand",
    actions,
    commands: serializeActions(actions),
    evaluation,
    discards,
  };
}

export function decideActions(input: HandInput): RobotAction[] {
  return planRound(input).actions;
}

/** 外部（Arduino 側）へ渡すコマンド文字列。空配列 = そのままでOK */
export function getRobotCommands(input: HandInput): string[] {
  return planRound(input).commands;
}
