import { Command } from "commander";
import { BrinksmanshipError } from "@brinksmanship/core";
import { loadScenarioFromFile } from "@brinksmanship/engine";
import log from "../logger";

export function registerValidateScenarioCommand(program: Command): void {
  program
    .command("validate-scenario")
    .description("Load a scenario file and build every matrix it names")
    .argument("<path>", "Scenario JSON file")
    .action(async (scenarioPath: string) => {
      try {
        const scenario = await loadScenarioFromFile(scenarioPath);
        const keys = Object.keys(scenario.turns);
        console.log(`${scenario.name} (${scenario.id})`);
        console.log(`  Max turns: ${scenario.maxTurns ?? "drawn from seed"}`);
        console.log(`  Turn definitions: ${keys.length}`);
        for (const key of keys) {
          const turn = scenario.turns[key];
          console.log(`    ${key.padEnd(20)} act ${turn.act}  ${turn.matrixType}`);
        }
        console.log("Scenario is valid");
      } catch (err) {
        if (!(err instanceof BrinksmanshipError)) throw err;
        log.error({ path: scenarioPath, error: err.name }, "Scenario rejected");
        console.error(`${err.name}: ${err.message}`);
        process.exitCode = 1;
      }
    });
}
