import type Logger from "bunyan";
import {
  SeededRng,
  TranscriptBuilder,
  type Action,
  type ActionResult,
  type GameEnding,
  type GameState,
  type GameTranscript,
  type InformationState,
  type MatrixType,
  type PayoffMatrix,
  type PlayerSide,
  type Scenario,
  type TurnConfiguration,
  type TurnPhase,
  type TurnRecord,
} from "@brinksmanship/core";
import { buildMatrix } from "@brinksmanship/matrices";
import defaultLog from "./logger";
import { allActions, getActionMenu, validateActionAvailability, type ActionMenu, type MenuContext } from "./actions";
import { applyActionResult, createGameState, freezeState, getPlayer, restoreGameState } from "./state";
import { distributeSurplus } from "./surplus";
import { checkCrisisTermination, checkDeterministicEndings, checkNaturalEnding, createGameEnding } from "./endings";
import {
  applySignals,
  failedSettlement,
  resolveInspection,
  resolveMatrix,
  resolveReconnaissance,
  resolveSettlement,
  settlementConstraints,
} from "./resolution";
import {
  describeOffer,
  respondToOffer,
  settlementRoles,
  type SettlementOffer,
  type SettlementResponse,
} from "./negotiation";
import type { VpSplit } from "./variance";
import { defaultTurnConfiguration, turnKey } from "./scenario";
import { MAX_MAX_TURNS, MIN_MAX_TURNS } from "./rules";

export interface GameEngineOptions {
  seed: string | number;
  gameId?: string;
  scenario?: Scenario;
  /**
   * Game length in [12, 16]. Takes precedence over the scenario's length and
   * over a resumed state's own; otherwise drawn from the seed.
   */
  maxTurns?: number;
  /** Resume from a saved state instead of the defaults. Stats saturate on the way in. */
  initialState?: GameState;
  logger?: Logger;
}

export type PlayerErrors = Readonly<Partial<Record<PlayerSide, string>>>;

export type TurnResult =
  | {
      readonly success: true;
      readonly actionResult: ActionResult;
      readonly ending: GameEnding | null;
      readonly narrative: string;
      readonly pendingOffer: null;
    }
  | {
      /** The turn is on hold until the offer's recipient responds. */
      readonly success: true;
      readonly actionResult: null;
      readonly ending: null;
      readonly narrative: string;
      readonly pendingOffer: SettlementOffer;
    }
  | {
      readonly success: false;
      readonly error: string;
      readonly playerErrors: PlayerErrors;
      readonly narrative: string;
    };

export interface HistoryEntry {
  readonly record: TurnRecord;
  readonly actionA: Action;
  readonly actionB: Action;
  readonly result: ActionResult;
  /** Null when a special action replaced the matrix game. */
  readonly matrixType: MatrixType | null;
  readonly stateBefore: GameState;
  readonly stateAfter: GameState;
}

interface Negotiation {
  readonly offer: SettlementOffer;
  readonly actionA: Action;
  readonly actionB: Action;
  readonly agreedResult: ActionResult;
  readonly surplusShareA: number;
  readonly before: GameState;
  readonly config: TurnConfiguration;
}

function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.prototype.hasOwnProperty.call(record, key) ? record[key] : undefined;
}

function failure(error: string, playerErrors: PlayerErrors = {}): TurnResult {
  return { success: false, error, playerErrors, narrative: "" };
}

/**
 * Runs a single game: validates simultaneous actions, resolves them,
 * applies the result and checks endings. Every random draw comes from the
 * engine's own seeded generator, so a seed and a sequence of actions always
 * replay to the same transcript hash.
 */
export class GameEngine {
  readonly gameId: string;
  private readonly rng: SeededRng;
  private readonly scenario: Scenario | null;
  private readonly log: Logger;
  private readonly transcript: TranscriptBuilder;
  private readonly history: HistoryEntry[] = [];
  private readonly defaultMatrices = new Map<MatrixType, PayoffMatrix>();
  private state: GameState;
  private phase: TurnPhase = "briefing";
  private ending: GameEnding | null = null;
  private negotiation: Negotiation | null = null;
  private currentTurnKey: string;

  constructor(opts: GameEngineOptions) {
    this.rng = new SeededRng(opts.seed);
    this.gameId = opts.gameId ?? `game-${opts.seed}`;
    this.scenario = opts.scenario ?? null;
    this.log = (opts.logger ?? defaultLog).child({ gameId: this.gameId });

    if (opts.initialState) {
      this.state = restoreGameState({ ...opts.initialState, maxTurns: opts.maxTurns ?? opts.initialState.maxTurns });
    } else {
      const maxTurns =
        opts.maxTurns ?? this.scenario?.maxTurns ?? this.rng.nextIntBetween(MIN_MAX_TURNS, MAX_MAX_TURNS);
      this.state = createGameState({ maxTurns });
    }

    this.currentTurnKey =
      this.state.turn === 1 && this.scenario ? this.scenario.firstTurnKey : turnKey(this.state.turn);
    this.transcript = new TranscriptBuilder(this.gameId, this.state);
    this.log.debug({ maxTurns: this.state.maxTurns, scenario: this.scenario?.id }, "Game created");
  }

  getState(): GameState {
    return this.state;
  }

  getPhase(): TurnPhase {
    return this.phase;
  }

  getCurrentTurnKey(): string {
    return this.currentTurnKey;
  }

  getTurnConfiguration(): TurnConfiguration {
    const configured = this.scenario ? ownEntry(this.scenario.turns, this.currentTurnKey) : undefined;
    return configured ?? defaultTurnConfiguration(this.state.turn);
  }

  getBriefing(): string {
    return this.getTurnConfiguration().narrativeBriefing;
  }

  getActionMenu(side: PlayerSide): ActionMenu {
    return getActionMenu(this.menuContext(side));
  }

  getAvailableActions(side: PlayerSide): Action[] {
    return allActions(this.getActionMenu(side));
  }

  getInformationState(side: PlayerSide): InformationState {
    return getPlayer(this.state, side).information;
  }

  getHistory(): readonly HistoryEntry[] {
    return [...this.history];
  }

  getTranscript(): GameTranscript {
    return this.transcript.getTranscript();
  }

  getTranscriptHash(): string {
    return this.transcript.getCurrentHash();
  }

  /** The settlement offer awaiting a response, if any. */
  getPendingOffer(): SettlementOffer | null {
    return this.negotiation?.offer ?? null;
  }

  isOver(): boolean {
    return this.ending !== null;
  }

  getEnding(): GameEnding | null {
    return this.ending;
  }

  /**
   * Resolve one turn from both players' actions. Rejections leave the game
   * untouched; a successful call commits the new state in one step.
   */
  submitActions(submittedA: Action, submittedB: Action): TurnResult {
    if (this.ending) {
      this.log.debug("Submission after game over");
      return failure("Game is already over");
    }
    if (this.negotiation) {
      return failure(`Settlement offer awaiting a response from Player ${this.negotiation.offer.recipient}`);
    }
    const actionA = Object.freeze({ ...submittedA });
    const actionB = Object.freeze({ ...submittedB });

    this.phase = "decision";
    const playerErrors: Partial<Record<PlayerSide, string>> = {};
    const errorA = validateActionAvailability(actionA, this.menuContext("A"));
    const errorB = validateActionAvailability(actionB, this.menuContext("B"));
    if (errorA !== null) playerErrors.A = errorA;
    if (errorB !== null) playerErrors.B = errorB;
    if (errorA !== null || errorB !== null) {
      this.phase = "briefing";
      const error = Object.entries(playerErrors)
        .map(([side, message]) => `Player ${side}: ${message}`)
        .join("; ");
      this.log.debug({ playerErrors }, "Rejected submission");
      return failure(error, playerErrors);
    }

    const config = this.getTurnConfiguration();
    const before = this.state;
    this.phase = "resolution";

    if (actionA.category === "settlement" || actionB.category === "settlement") {
      const settlement = resolveSettlement(before, actionA, actionB, config);
      if (settlement.agreed) {
        const { proposer, recipient } = settlementRoles(before);
        const offeredVp = (proposer === "A" ? actionA : actionB).offeredVp;
        if (offeredVp === undefined) {
          return this.settle(actionA, actionB, settlement.result, settlement.split, settlement.surplusShareA, before);
        }
        const offer: SettlementOffer = { proposer, recipient, offeredVp, isCounter: false };
        this.negotiation = {
          offer,
          actionA,
          actionB,
          agreedResult: settlement.result,
          surplusShareA: settlement.surplusShareA,
          before,
          config,
        };
        return this.awaitResponse(offer);
      }
      return this.continueTurn(actionA, actionB, settlement.result, null, before, config);
    }

    if (actionA.category === "reconnaissance" || actionB.category === "reconnaissance") {
      const result = resolveReconnaissance(before, actionA, actionB);
      return this.continueTurn(actionA, actionB, result, null, before, config);
    }

    if (actionA.category === "inspection" || actionB.category === "inspection") {
      const result = resolveInspection(before, actionA, actionB);
      return this.continueTurn(actionA, actionB, result, null, before, config);
    }

    const matrix = this.matrixFor(config);
    const result = resolveMatrix(actionA, actionB, config, matrix);
    return this.continueTurn(actionA, actionB, result, matrix.matrixType, before, config);
  }

  /**
   * Answer the standing settlement offer. Acceptance ends the game on the
   * offered split; rejection plays the turn out as a failed settlement.
   */
  respondToSettlement(side: PlayerSide, response: SettlementResponse): TurnResult {
    if (this.ending) return failure("Game is already over");
    const pending = this.negotiation;
    if (!pending) return failure("No settlement offer is awaiting a response");

    const step = respondToOffer(pending.before, pending.offer, side, response);
    switch (step.kind) {
      case "invalid": {
        const playerErrors: Partial<Record<PlayerSide, string>> = {};
        playerErrors[side] = step.error;
        this.log.debug({ playerErrors }, "Rejected settlement response");
        return failure(`Player ${side}: ${step.error}`, playerErrors);
      }
      case "countered":
        this.negotiation = { ...pending, offer: step.offer };
        return this.awaitResponse(step.offer);
      case "accepted": {
        this.negotiation = null;
        const result = { ...pending.agreedResult, narrative: `Player ${side} accepted the settlement offer.` };
        return this.settle(pending.actionA, pending.actionB, result, step.split, pending.surplusShareA, pending.before);
      }
      case "rejected": {
        this.negotiation = null;
        const result = failedSettlement(pending.actionA, pending.actionB, pending.config);
        return this.continueTurn(pending.actionA, pending.actionB, result, null, pending.before, pending.config);
      }
    }
  }

  private awaitResponse(offer: SettlementOffer): TurnResult {
    this.phase = "negotiation";
    this.log.debug({ offer }, "Settlement offered");
    return { success: true, actionResult: null, ending: null, narrative: describeOffer(offer), pendingOffer: offer };
  }

  private settle(
    actionA: Action,
    actionB: Action,
    result: ActionResult,
    split: VpSplit,
    surplusShareA: number,
    before: GameState
  ): TurnResult {
    const after = freezeState({ ...before, ...distributeSurplus(before, surplusShareA) });
    const { vpA, vpB } = split;
    const ending = createGameEnding({
      endingType: "settlement",
      vpA,
      vpB,
      turn: before.turn,
      description: `Settlement reached. Player A: ${vpA.toFixed(1)} VP, Player B: ${vpB.toFixed(1)} VP`,
      surplusA: after.surplusCapturedA,
      surplusB: after.surplusCapturedB,
    });
    this.record(actionA, actionB, result, null, before, after);
    return this.finish(result, ending);
  }

  private continueTurn(
    actionA: Action,
    actionB: Action,
    resolved: ActionResult,
    matrixType: MatrixType | null,
    before: GameState,
    config: TurnConfiguration
  ): TurnResult {
    const result = applySignals(before, actionA, actionB, resolved);
    this.phase = "state_update";
    const after = applyActionResult(before, result);
    this.record(actionA, actionB, result, matrixType, before, after);

    this.phase = "check_deterministic";
    const deterministic = checkDeterministicEndings(after);
    if (deterministic) return this.finish(result, deterministic);

    this.phase = "check_crisis";
    const crisis = checkCrisisTermination(after, this.rng);
    if (crisis) return this.finish(result, crisis);

    this.phase = "check_natural";
    const natural = checkNaturalEnding(after, this.rng);
    if (natural) return this.finish(result, natural);

    this.phase = "advance";
    this.currentTurnKey = config.branches[result.outcomeCode] ?? config.defaultNext ?? turnKey(after.turn);
    this.phase = "briefing";
    return { success: true, actionResult: result, ending: null, narrative: result.narrative, pendingOffer: null };
  }

  private record(
    actionA: Action,
    actionB: Action,
    result: ActionResult,
    matrixType: MatrixType | null,
    before: GameState,
    after: GameState
  ): void {
    const record = this.transcript.addEntry(
      {
        turn: before.turn,
        turnKey: this.currentTurnKey,
        actionA: actionA.name,
        actionB: actionB.name,
        actionTypeA: result.actionA,
        actionTypeB: result.actionB,
        outcomeCode: result.outcomeCode,
        narrative: result.narrative,
      },
      after
    );
    this.history.push({ record, actionA, actionB, result, matrixType, stateBefore: before, stateAfter: after });
    this.state = after;
    this.log.debug(
      { turn: before.turn, turnKey: this.currentTurnKey, outcome: result.outcomeCode, riskLevel: after.riskLevel },
      "Turn resolved"
    );
  }

  private finish(result: ActionResult, ending: GameEnding): TurnResult {
    this.ending = ending;
    this.phase = "game_over";
    this.log.debug({ ending: ending.endingType, vpA: ending.vpA, vpB: ending.vpB, turn: ending.turn }, "Game over");
    return { success: true, actionResult: result, ending, narrative: result.narrative, pendingOffer: null };
  }

  private matrixFor(config: TurnConfiguration): PayoffMatrix {
    const built = this.scenario ? ownEntry(this.scenario.matrices, this.currentTurnKey) : undefined;
    if (built) return built;
    let matrix = this.defaultMatrices.get(config.matrixType);
    if (!matrix) {
      matrix = buildMatrix(config.matrixType, config.matrixParams);
      this.defaultMatrices.set(config.matrixType, matrix);
    }
    return matrix;
  }

  private menuContext(side: PlayerSide): MenuContext {
    const player = getPlayer(this.state, side);
    return {
      riskLevel: this.state.riskLevel,
      turn: this.state.turn,
      stability: this.state.stability,
      resources: player.resources,
      position: player.position,
      settlementAllowed: this.getTurnConfiguration().settlementAvailable,
      settlementRange: settlementConstraints(this.state, side),
    };
  }
}
