import { Command, Option } from "commander";
import config from "../config";
import log from "../logger";
import { formatReport, runBatch } from "../simulation";
import {
  loadOptionalScenario,
  parsePositiveInt,
  policyOption,
  toPolicyName,
  type GameCommandOptions,
} from "./options";

interface SimulateOptions extends GameCommandOptions {
  games: number;
}

export function registerSimulateCommand(program: Command): void {
  program
    .command("simulate")
    .description("Run a batch of seeded games between two fixed policies")
    .addOption(new Option("-n, --games <N>", "Number of games").argParser(parsePositiveInt).default(config.games))
    .option("-s, --seed <seed>", "Base seed; game i uses <seed>-i", config.seed)
    .addOption(policyOption("-a, --policy-a <policy>", "Policy for player A", "tit-for-tat"))
    .addOption(policyOption("-b, --policy-b <policy>", "Policy for player B", "random"))
    .option("--scenario <path>", "Scenario JSON file")
    .addOption(new Option("--max-turns <N>", "Fixed game length (12-16)").argParser(parsePositiveInt).default(config.maxTurns))
    .action(async (opts: SimulateOptions) => {
      const scenario = await loadOptionalScenario(opts.scenario);
      const started = Date.now();
      const report = runBatch({
        games: opts.games,
        seed: opts.seed,
        policyA: toPolicyName(opts.policyA),
        policyB: toPolicyName(opts.policyB),
        scenario,
        maxTurns: opts.maxTurns,
        logger: log,
      });
      log.info(
        { games: report.games, endings: report.endings, elapsedMs: Date.now() - started },
        "Batch complete"
      );
      console.log("");
      for (const line of formatReport(report)) console.log(line);
    });
}
