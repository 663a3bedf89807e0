import dotenv from "dotenv";
import * as path from "path";

/**
 * Loads `.env.local` then `.env` from the working directory. Values already
 * present in the process environment win, and the first file wins over the
 * second.
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, ".env.local") });
  dotenv.config({ path: path.join(cwd, ".env") });
}
