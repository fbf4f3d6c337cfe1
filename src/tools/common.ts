/**
 * common.ts - Helpers shared by the tool definitions
 */

import type { z } from "zod";
import { ParseError, StateFetchError } from "../errors";
import type { ToolServices } from "../engine";
import type { Lookup } from "../state/provider";

/**
 * Validates raw CLI input against a tool's zod schema.
 *
 * @throws ParseError listing every invalid option
 */
export function parseToolInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown
): T {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(`Invalid input: ${issues}`);
  }
  return parsed.data;
}

/**
 * Unwraps a lookup whose absence ends the run.
 *
 * @throws StateFetchError with `message`
 */
export function requireFound<T>(lookup: Lookup<T>, message: string): T {
  if (!lookup.found) throw new StateFetchError(message);
  return lookup.value;
}

/**
 * The preset (CLI option) when given, else the operator's answer.
 * Returns undefined for an empty answer so the caller can abort.
 */
export async function presetOrAsk(
  services: ToolServices,
  preset: string | undefined,
  question: string,
  option: string,
  defaultValue?: string
): Promise<string | undefined> {
  const value = (preset?.trim() || (await services.decisions.ask(question, option, defaultValue))).trim();
  return value.length > 0 ? value : undefined;
}

const MANAGED_ACCOUNT = /^([a-z][a-z0-9-]{4,28}[a-z0-9])@([a-z][a-z0-9-]{4,28}[a-z0-9])\.iam\.gserviceaccount\.com$/;

export function serviceAccountEmail(name: string, project: string): string {
  return `${name}@${project}.iam.gserviceaccount.com`;
}

/**
 * Splits a user-managed service account email
 * (`NAME@PROJECT.iam.gserviceaccount.com`) into its parts; undefined for
 * Google-managed accounts such as the Compute Engine default account.
 */
export function parseManagedAccount(
  email: string
): { name: string; project: string } | undefined {
  const match = MANAGED_ACCOUNT.exec(email);
  return match ? { name: match[1], project: match[2] } : undefined;
}
