import { Hand, Position, RobotAction } from "../model/types.js";
import { InvalidActionError, InvalidHandError } from "../model/errors.js";
import { emptyPositions, isComplete, POSITIONS } from "./Hand.js";

// ロボットに送るコマンド（位置は 1 始まり）
//   take card N / default position / drop holding / take deck / place at N

const DEFAULT: RobotAction = { type: "defaultPosition" };
const TAKE_DECK: RobotAction = { type: "takeDeck" };
const DROP: RobotAction = { type: "dropHolding" };

/** 空スロットを昇順に埋める：take deck → place at N、最後に default position */
export function compileFill(hand: Hand): RobotAction[] {
  const empties = emptyPositions(hand);
  if (empties.length === 0) {
    throw new InvalidHandError("AmbiguousHandState", "fill requested for a complete hand");
  }
  const out: RobotAction[] = [];
  for (const slot of empties) {
    out.push(TAKE_DECK, { type: "placeAt", slot });
  }
  out.push(DEFAULT);
  return out;
}

/**
 * 捨てるスロットごとに 5 手：
 * take card N → drop holding → default position → take deck → place at N
 * 全部終わったら default position。捨てなければ空配列（スタンド）
 */
export function compileSwap(hand: Hand, discards: readonly Position[]): RobotAction[] {
  if (!isComplete(hand)) {
    throw new InvalidHandError("AmbiguousHandState", "swap requested for a hand with empty positions");
  }
  const slots = POSITIONS.filter((p) => discards.includes(p));
  if (slots.length === 0) return [];

  const out: RobotAction[] = [];
  for (const slot of slots) {
    out.push({ type: "takeCardAt", slot }, DROP, DEFAULT, TAKE_DECK, { type: "placeAt", slot });
  }
  out.push(DEFAULT);
  return out;
}

export function serializeAction(action: RobotAction): string {
  switch (action.type) {
    case "takeCardAt": return `take card ${action.slot}`;
    case "defaultPosition": return "default position";
    case "dropHolding": return "drop holding";
    case "takeDeck": return "take deck";
    case "placeAt": return `place at ${action.slot}`;
  }
}

export function serializeActions(actions: readonly RobotAction[]): string[] {
  return actions.map(serializeAction);
}

function slotOf(raw: string, command: string): Position {
  const slot = POSITIONS.find((p) => String(p) === raw);
  if (slot === undefined) throw new InvalidActionError(command, `position out of range: ${command}`);
  return slot;
}

/** コマンド文字列 → RobotAction（大文字小文字・前後空白は無視） */
export function parseAction(command: string): RobotAction {
  const a = command.trim().toLowerCase().replace(/\s+/g, " ");

  if (a === "default position") return DEFAULT;
  if (a === "drop holding") return DROP;
  if (a === "take deck") return TAKE_DECK;

  const m = /^(take card|place at) (\S+)$/.exec(a);
  if (!m) throw new InvalidActionError(command);

  const slot = slotOf(m[2], command);
  return m[1] === "take card" ? { type: "takeCardAt", slot } : { type: "placeAt", slot };
}

export function countSwaps(commands: readonly string[]): number {
  return commands.filter((c) => parseAction(c).type === "takeCardAt").length;
}

/** take card の位置（出現順、重複なし） */
export function swapPositions(commands: readonly string[]): Position[] {
  const out: Position[] = [];
  for (const c of commands) {
    const a = parseAction(c);
    if (a.type === "takeCardAt" && !out.includes(a.slot)) out.push(a.slot);
  }
  return out;
}
