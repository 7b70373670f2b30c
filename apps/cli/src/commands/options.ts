import { InvalidArgumentError, Option } from "commander";
import type { Scenario } from "@brinksmanship/core";
import { loadScenarioFromFile } from "@brinksmanship/engine";
import { POLICY_NAMES, isPolicyName, type PolicyName } from "../policies";

export interface GameCommandOptions {
  seed: string;
  policyA: string;
  policyB: string;
  scenario?: string;
  maxTurns?: number;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

export function policyOption(flag: string, description: string, fallback: PolicyName): Option {
  return new Option(flag, description).choices(POLICY_NAMES).default(fallback);
}

export function toPolicyName(name: string): PolicyName {
  if (!isPolicyName(name)) {
    throw new InvalidArgumentError(`Unknown policy "${name}". Choose from: ${POLICY_NAMES.join(", ")}`);
  }
  return name;
}

export async function loadOptionalScenario(scenarioPath: string | undefined): Promise<Scenario | undefined> {
  return scenarioPath ? loadScenarioFromFile(scenarioPath) : undefined;
}
