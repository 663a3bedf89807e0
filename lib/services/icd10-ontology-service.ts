/**
 * ICD-10 Ontology Service
 *
 * Read-only code → description lookup. The bundled table is a subset of
 * ICD-10-CM; a full release can be loaded from a file. Lookups never throw:
 * unknown or malformed codes map to the "Description not found" sentinel.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import icd10CodeData from "../../data/icd10-codes.json";
import {
  CodeDescriptions,
  DESCRIPTION_NOT_FOUND,
  ERROR_CODES,
  ProcessingErrorSeverity,
  WorkflowError,
} from "../agents/types";
import type { WorkflowLogger } from "../logging/logging";

export interface Icd10Entry {
  code: string;
  description: string;
}

export class Icd10TableError extends WorkflowError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ERROR_CODES.INVALID_ICD10_TABLE, message, ProcessingErrorSeverity.CRITICAL, context);
    this.name = "Icd10TableError";
  }
}

const icd10TableSchema = z.array(z.object({ code: z.string(), description: z.string() }));

// "A000    Cholera due to Vibrio cholerae 01, biovar cholerae"
const CODES_FILE_LINE = /^(\S+)\s+(\S.*)$/;

/**
 * Reads a code table from disk. `.json` files hold a list of
 * `{ code, description }`; anything else is read as the CMS
 * `icd10cm_codes_<year>.txt` layout, one code and its description per line.
 */
export function loadIcd10Table(filePath: string): Icd10Entry[] {
  let contents: string;
  try {
    contents = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new Icd10TableError(`Cannot read ICD-10 table ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  if (path.extname(filePath).toLowerCase() === ".json") {
    let payload: unknown;
    try {
      payload = JSON.parse(contents);
    } catch (error) {
      throw new Icd10TableError(`ICD-10 table ${filePath} is not valid JSON`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    const parsed = icd10TableSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Icd10TableError(`ICD-10 table ${filePath} must be a list of { code, description }`, {
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }

  const entries: Icd10Entry[] = [];
  for (const line of contents.split(/\r?\n/)) {
    const match = CODES_FILE_LINE.exec(line.trim());
    if (match) {
      entries.push({ code: match[1], description: match[2].trim() });
    }
  }
  if (entries.length === 0) {
    throw new Icd10TableError(`ICD-10 table ${filePath} contains no codes`);
  }
  return entries;
}

export interface Icd10Lookup {
  getDescription(code: string): string;
  getDescriptions(codes: string[]): CodeDescriptions;
}

export class Icd10OntologyService implements Icd10Lookup {
  private readonly descriptions = new Map<string, string>();

  constructor(entries: readonly Icd10Entry[] = icd10CodeData, private readonly logger?: WorkflowLogger) {
    for (const entry of entries) {
      const key = normalizeIcdCode(entry.code);
      if (key) {
        this.descriptions.set(key, entry.description);
      }
    }
  }

  get size(): number {
    return this.descriptions.size;
  }

  /**
   * Matches with or without the dot and in any letter case ("e119" finds E11.9).
   */
  getDescription(code: string): string {
    const key = normalizeIcdCode(code);
    const description = key ? this.descriptions.get(key) : undefined;
    if (description === undefined) {
      this.logger?.logDebug("Icd10OntologyService.getDescription", `No description for code ${code}`, { code });
      return DESCRIPTION_NOT_FOUND;
    }
    return description;
  }

  /**
   * Own-property record keyed by the codes as given; `fromEntries` keeps
   * keys such as "__proto__" as plain entries.
   */
  getDescriptions(codes: string[]): CodeDescriptions {
    return Object.fromEntries(codes.map((code) => [code, this.getDescription(code)]));
  }

  has(code: string): boolean {
    const key = normalizeIcdCode(code);
    return key !== null && this.descriptions.has(key);
  }
}

/**
 * Upper-cases and drops the dot, so "I63.9", "i639" and " I639 " share a key.
 * Returns null for anything that is not letter-then-digits shaped.
 */
export function normalizeIcdCode(code: string): string | null {
  const compact = code.trim().toUpperCase().replace(".", "");
  return /^[A-Z][0-9][0-9A-Z]{1,5}$/.test(compact) ? compact : null;
}

let defaultService: Icd10OntologyService | undefined;

/**
 * Shared instance over the bundled table, built on first use.
 */
export function getDefaultIcd10OntologyService(): Icd10OntologyService {
  if (!defaultService) {
    defaultService = new Icd10OntologyService();
  }
  return defaultService;
}

/**
 * Service over the table in `filePath`, or the shared bundled one when no
 * file is configured.
 */
export function createIcd10OntologyService(filePath?: string, logger?: WorkflowLogger): Icd10OntologyService {
  if (!filePath) {
    return getDefaultIcd10OntologyService();
  }
  const service = new Icd10OntologyService(loadIcd10Table(filePath), logger);
  logger?.logInfo("createIcd10OntologyService", "Loaded ICD-10 table", { filePath, codes: service.size });
  return service;
}
