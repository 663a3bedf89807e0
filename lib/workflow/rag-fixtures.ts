import * as fs from "fs";
import * as path from "path";
import { ResolvedRagOutput, resolveRagOutput } from "./rag-input";

export const FIXTURE_ROOT = path.resolve(__dirname, "../../data/examples");

export type FixtureSet = "final-codes" | "chart";

/**
 * Reads `<dir>/<label lower-cased>.json` for each label, e.g. OpenAI → openai.json.
 */
export function loadRagFixtures(
  labels: string[],
  directory: string,
): Record<string, ResolvedRagOutput> {
  const fixtures: Record<string, ResolvedRagOutput> = {};
  for (const label of labels) {
    const file = path.join(directory, `${label.toLowerCase()}.json`);
    const raw: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
    fixtures[label] = resolveRagOutput(raw);
  }
  return fixtures;
}

export function fixtureDirectory(set: FixtureSet): string {
  return path.join(FIXTURE_ROOT, set);
}
