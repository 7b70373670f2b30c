import { Command, Option } from "commander";
import config from "../config";
import log from "../logger";
import { checkDeterminism } from "../simulation";
import {
  loadOptionalScenario,
  parsePositiveInt,
  policyOption,
  toPolicyName,
  type GameCommandOptions,
} from "./options";

export function registerCheckDeterminismCommand(program: Command): void {
  program
    .command("check-determinism")
    .description("Play the same seeded game twice and compare transcript hashes")
    .option("-s, --seed <seed>", "Game seed", config.seed)
    .addOption(policyOption("-a, --policy-a <policy>", "Policy for player A", "random"))
    .addOption(policyOption("-b, --policy-b <policy>", "Policy for player B", "random"))
    .option("--scenario <path>", "Scenario JSON file")
    .addOption(new Option("--max-turns <N>", "Fixed game length (12-16)").argParser(parsePositiveInt).default(config.maxTurns))
    .action(async (opts: GameCommandOptions) => {
      const scenario = await loadOptionalScenario(opts.scenario);
      const check = checkDeterminism({
        seed: opts.seed,
        policyA: toPolicyName(opts.policyA),
        policyB: toPolicyName(opts.policyB),
        scenario,
        maxTurns: opts.maxTurns,
        logger: log,
      });
      console.log(`First run:  ${check.firstHash}`);
      console.log(`Second run: ${check.secondHash}`);
      if (check.match) {
        console.log("Deterministic: transcripts match");
      } else {
        log.error({ seed: opts.seed }, "Transcript hashes differ between runs");
        process.exitCode = 1;
      }
    });
}
