import { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z, ZodError } from "zod";
import { Card } from "../model/types.js";
import { InvalidActionError, InvalidHandError, TableError } from "../model/errors.js";
import { parseAction, swapPositions } from "../engine/Actions.js";
import { cardToString, parseCard, toCard } from "../engine/Card.js";
import { evaluate } from "../engine/Evaluator.js";
import { makeHand } from "../engine/Hand.js";
import { planRound } from "../engine/Robot.js";
import { RobotTable } from "../engine/RobotTable.js";
import { discardPositions } from "../engine/Strategy.js";

// "AH", "10d", "Ts" などのラベル、または { rank, suit }。null は空スロット
const CardInputSchema = z.union([
  z.string(),
  z.object({ rank: z.number(), suit: z.string() }),
]);
const HandSchema = z.array(z.union([CardInputSchema, z.null()]));

type CardInput = z.infer<typeof CardInputSchema>;

function toCardValue(input: CardInput): Card {
  return typeof input === "string" ? parseCard(input) : toCard(input.rank, input.suit.toUpperCase());
}

function handFrom(raw: z.infer<typeof HandSchema>) {
  return makeHand(raw.map((c) => (c === null ? null : toCardValue(c))));
}

const TableIdBody = z.object({ tableId: z.string().min(1) });

export interface RouteOptions {
  prefix: string;
  deckSeed?: number;
}

function sendError(req: FastifyRequest, rep: FastifyReply, e: unknown) {
  if (e instanceof ZodError) {
    return rep.status(400).send({ message: "invalid request body", issues: e.issues });
  }
  if (e instanceof InvalidHandError) {
    return rep.status(400).send({ message: e.message, kind: e.kind });
  }
  if (e instanceof InvalidActionError) {
    return rep.status(400).send({ message: e.message, command: e.command });
  }
  if (e instanceof TableError) {
    return rep.status(e.code === "TableNotFound" ? 404 : 400).send({ message: e.message, kind: e.code });
  }
  req.log.error({ err: e }, "request failed");
  return rep.status(500).send({ message: e instanceof Error ? e.message : "internal error" });
}

export function registerRoutes(app: FastifyInstance, opts: RouteOptions) {
  const p = opts.prefix;

  // ヘルスチェック
  app.get(`${p}/health`, async () => ({ ok: true }));

  // ===== 判断（ステートレス）=====

  // 手札 → ロボットのコマンド列
  app.post(`${p}/actions`, async (req, rep) => {
    try {
      const body = z.object({ hand: HandSchema }).parse(req.body);
      return rep.send(planRound(handFrom(body.hand)));
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  // 5枚揃った手札の役判定と捨て札
  app.post(`${p}/evaluate`, async (req, rep) => {
    try {
      const body = z.object({ hand: HandSchema }).parse(req.body);
      const hand = handFrom(body.hand);
      const evaluation = evaluate(hand);
      return rep.send({
        hand: hand.map((h) => (h.kind === "card" ? cardToString(h.card) : null)),
        evaluation,
        discards: discardPositions(evaluation.rank, evaluation.keepers),
      });
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  // コマンド文字列の検証（デバッグ用）
  app.post(`${p}/parse`, async (req, rep) => {
    try {
      const body = z.object({ commands: z.array(z.string()) }).parse(req.body);
      const actions = body.commands.map(parseAction);
      const positions = swapPositions(body.commands);
      return rep.send({ actions, swaps: positions.length, positions });
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  // ===== シミュレータ卓 =====

  app.post(`${p}/table/new`, async (req, rep) => {
    try {
      const body = z.object({
        seed: z.number().int().optional(),
        deal: z.boolean().optional(),
      }).parse(req.body ?? {});
      const tableId = RobotTable.createTable({ seed: body.seed ?? opts.deckSeed, deal: body.deal });
      return rep.send({ tableId, state: RobotTable.getPublicState(tableId) });
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  app.post(`${p}/table/state`, async (req, rep) => {
    try {
      const { tableId } = TableIdBody.parse(req.body);
      return rep.send(RobotTable.getPublicState(tableId));
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  app.post(`${p}/table/plan`, async (req, rep) => {
    try {
      const { tableId } = TableIdBody.parse(req.body);
      return rep.send(RobotTable.plan(tableId));
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  // 任意のコマンド列を実行（実機の代わり）
  app.post(`${p}/table/execute`, async (req, rep) => {
    try {
      const body = TableIdBody.extend({ commands: z.array(z.string()) }).parse(req.body);
      return rep.send(RobotTable.execute(body.tableId, body.commands));
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  // 卓を片付ける（メモリ上の Map から削除）
  app.post(`${p}/table/remove`, async (req, rep) => {
    try {
      const { tableId } = TableIdBody.parse(req.body);
      if (!RobotTable.removeTable(tableId)) throw new TableError("TableNotFound", "table not found");
      return rep.send({ removed: true });
    } catch (e) {
      return sendError(req, rep, e);
    }
  });

  // plan → execute を1ラウンド
  app.post(`${p}/table/round`, async (req, rep) => {
    try {
      const { tableId } = TableIdBody.parse(req.body);
      return rep.send(RobotTable.playRound(tableId));
    } catch (e) {
      return sendError(req, rep, e);
    }
  });
}
