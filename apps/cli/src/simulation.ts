import type Logger from "bunyan";
import type { EndingType, GameEnding, PlayerSide, Scenario } from "@brinksmanship/core";
import { GameEngine, getPlayer, opponentOf } from "@brinksmanship/engine";
import { createPolicy, type Policy, type PolicyName } from "./policies";

export interface GameOptions {
  seed: string;
  policyA: PolicyName;
  policyB: PolicyName;
  scenario?: Scenario;
  maxTurns?: number;
  logger?: Logger;
}

export interface GameSummary {
  seed: string;
  ending: GameEnding;
  /** Base VP plus captured surplus */
  totalA: number;
  totalB: number;
  turnsPlayed: number;
  transcriptHash: string;
}

export interface BatchOptions extends Omit<GameOptions, "seed"> {
  games: number;
  seed: string;
}

export interface BatchReport {
  games: number;
  endings: Partial<Record<EndingType, number>>;
  meanTotalA: number;
  meanTotalB: number;
  meanTurns: number;
}

// Every game ends by turn 16; anything longer means the engine stopped advancing
const TURN_GUARD = 32;

export function runGame(opts: GameOptions): GameSummary {
  const engine = new GameEngine({
    seed: opts.seed,
    gameId: opts.seed,
    scenario: opts.scenario,
    maxTurns: opts.maxTurns,
    logger: opts.logger,
  });
  const policies: Record<PlayerSide, Policy> = {
    A: createPolicy(opts.policyA, `${opts.seed}:A`),
    B: createPolicy(opts.policyB, `${opts.seed}:B`),
  };

  const choose = (side: PlayerSide) =>
    policies[side].chooseAction({
      side,
      turn: engine.getState().turn,
      menu: engine.getActionMenu(side),
      opponentLastType: getPlayer(engine.getState(), opponentOf(side)).previousActionType,
    });

  for (let i = 0; i < TURN_GUARD; i++) {
    const result = engine.submitActions(choose("A"), choose("B"));
    if (!result.success) {
      throw new Error(`Game ${opts.seed}: policy chose an unavailable action. ${result.error}`);
    }
    if (result.ending) {
      return {
        seed: opts.seed,
        ending: result.ending,
        totalA: result.ending.vpA + result.ending.surplusA,
        totalB: result.ending.vpB + result.ending.surplusB,
        turnsPlayed: engine.getHistory().length,
        transcriptHash: engine.getTranscriptHash(),
      };
    }
  }
  throw new Error(`Game ${opts.seed} did not end within ${TURN_GUARD} turns`);
}

/** Games are seeded `<seed>-0`, `<seed>-1`, ... so a batch is reproducible. */
export function runBatch(opts: BatchOptions): BatchReport {
  if (!Number.isInteger(opts.games) || opts.games < 1) {
    throw new RangeError(`Game count must be a positive integer, got ${opts.games}`);
  }
  const endings: Partial<Record<EndingType, number>> = {};
  let sumA = 0;
  let sumB = 0;
  let sumTurns = 0;

  for (let i = 0; i < opts.games; i++) {
    const summary = runGame({ ...opts, seed: `${opts.seed}-${i}` });
    const type = summary.ending.endingType;
    endings[type] = (endings[type] ?? 0) + 1;
    sumA += summary.totalA;
    sumB += summary.totalB;
    sumTurns += summary.turnsPlayed;
  }

  return {
    games: opts.games,
    endings,
    meanTotalA: sumA / opts.games,
    meanTotalB: sumB / opts.games,
    meanTurns: sumTurns / opts.games,
  };
}

export interface DeterminismCheck {
  match: boolean;
  firstHash: string;
  secondHash: string;
}

export function checkDeterminism(opts: GameOptions): DeterminismCheck {
  const first = runGame(opts);
  const second = runGame(opts);
  return {
    match: first.transcriptHash === second.transcriptHash,
    firstHash: first.transcriptHash,
    secondHash: second.transcriptHash,
  };
}

export function formatReport(report: BatchReport): string[] {
  const lines = [`Games: ${report.games}`, "Endings:"];
  for (const [type, count] of Object.entries(report.endings).sort(([a], [b]) => a.localeCompare(b))) {
    if (count === undefined) continue;
    const share = ((count / report.games) * 100).toFixed(1);
    lines.push(`  ${type.padEnd(22)} ${String(count).padStart(5)}  ${share}%`);
  }
  lines.push(`Mean VP (incl. surplus): A ${report.meanTotalA.toFixed(1)}  B ${report.meanTotalB.toFixed(1)}`);
  lines.push(`Mean turns: ${report.meanTurns.toFixed(1)}`);
  return lines;
}
