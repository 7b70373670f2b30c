import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import log from "./logger";
import { registerSimulateCommand } from "./commands/simulate";
import { registerCheckDeterminismCommand } from "./commands/checkDeterminism";
import { registerValidateScenarioCommand } from "./commands/validateScenario";
import { registerMatricesCommand } from "./commands/matrices";

program
  .name("brinksmanship")
  .description("Brinksmanship - simulate and inspect two-party crisis negotiations")
  .version("0.1.0", "-v, --version");

registerSimulateCommand(program);
registerCheckDeterminismCommand(program);
registerValidateScenarioCommand(program);
registerMatricesCommand(program);

program.parseAsync().catch((err: unknown) => {
  log.error({ err }, "Command failed");
  process.exit(1);
});
