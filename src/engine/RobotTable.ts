import { Card, RobotAction, RobotPlan, RobotTablePublicState, RobotTableState } from "../model/types.js";
import { TableError } from "../model/errors.js";
import { parseAction } from "./Actions.js";
import { cardToString } from "./Card.js";
import { Deck } from "./Deck.js";
import { evaluateCards } from "./Evaluator.js";
import { HAND_SIZE } from "./Hand.js";
import { planRound } from "./Robot.js";
import { randomId } from "../utils/random.js";

// ロボット卓のシミュレータ（メモリ上）。実機の代わりにコマンドを実行する
interface TableEntry extends RobotTableState {
  deck: Deck;
}

const tables = new Map<string, TableEntry>();

function must(id: string): TableEntry {
  const t = tables.get(id);
  if (!t) throw new TableError("TableNotFound", "table not found");
  return t;
}

function fail(message: string): never {
  throw new TableError("InvalidCommand", message);
}

function step(t: TableEntry, a: RobotAction) {
  switch (a.type) {
    case "takeCardAt": {
      if (t.holding) fail(`arm already holding a card (take card ${a.slot})`);
      const card = t.holders[a.slot - 1];
      if (!card) fail(`no card at position ${a.slot}`);
      t.holding = card;
      t.holders[a.slot - 1] = null;
      return;
    }
    case "dropHolding":
      if (!t.holding) fail("nothing to drop");
      t.trash.push(t.holding);
      t.holding = null;
      return;
    case "takeDeck": {
      if (t.holding) fail("arm already holding a card (take deck)");
      const card = t.deck.drawCard();
      if (!card) throw new TableError("DeckExhausted", "deck is empty");
      t.holding = card;
      return;
    }
    case "placeAt":
      if (!t.holding) fail(`nothing to place at ${a.slot}`);
      if (t.holders[a.slot - 1]) fail(`position ${a.slot} is occupied`);
      t.holders[a.slot - 1] = t.holding;
      t.holding = null;
      return;
    case "defaultPosition":
      // アームを待機位置へ戻すだけ
      return;
  }
}

function pub(t: TableEntry): RobotTablePublicState {
  const cards = t.holders.filter((c): c is Card => c !== null);
  return {
    tableId: t.id,
    hand: t.holders.map((c) => (c ? cardToString(c) : null)),
    holding: t.holding ? cardToString(t.holding) : null,
    trash: t.trash.map(cardToString),
    remaining: t.deck.remainingCount(),
    fillRounds: t.fillRounds,
    swapRounds: t.swapRounds,
    ...(cards.length === HAND_SIZE ? { evaluation: evaluateCards(cards) } : {}),
  };
}

export const RobotTable = {
  /** 卓を作る（deal=true なら最初の5枚を配った状態） */
  createTable({ seed, deal = false }: { seed?: number; deal?: boolean } = {}) {
    const id = randomId("rbt_");
    const deck = new Deck({ seed });
    const holders: (Card | null)[] = deal
      ? deck.generateInitialHand()
      : Array.from({ length: HAND_SIZE }, () => null);

    tables.set(id, {
      id,
      deck,
      holders,
      holding: null,
      trash: [],
      fillRounds: 0,
      swapRounds: 0,
      history: [],
    });
    return id;
  },

  getPublicState(tableId: string): RobotTablePublicState {
    return pub(must(tableId));
  },

  /** 現在の手札に対する次の一手（実行はしない） */
  plan(tableId: string): RobotPlan {
    const t = must(tableId);
    if (t.holding) fail("arm is holding a card; finish the previous sequence first");
    return planRound(t.holders);
  },

  /**
   * コマンド列を順に実行する。
   * 全コマンドを先にパースし、実行中の違反はその時点で止まる（実機と同じ）
   */
  execute(tableId: string, commands: readonly string[]): RobotTablePublicState {
    const t = must(tableId);
    const actions = commands.map(parseAction);

    for (let i = 0; i < actions.length; i++) {
      step(t, actions[i]);
      t.history.push(commands[i]);
    }

    if (actions.some((a) => a.type === "takeCardAt")) t.swapRounds++;
    else if (actions.some((a) => a.type === "placeAt")) t.fillRounds++;

    return pub(t);
  },

  /** plan → execute を1回分 */
  playRound(tableId: string): { plan: RobotPlan; state: RobotTablePublicState } {
    const plan = RobotTable.plan(tableId);
    const state = RobotTable.execute(tableId, plan.commands);
    return { plan, state };
  },

  history(tableId: string): string[] {
    return [...must(tableId).history];
  },

  removeTable(tableId: string): boolean {
    return tables.delete(tableId);
  },
};
