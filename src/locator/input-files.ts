/**
 * input-files.ts - Flat list files (roles.txt, projects.txt)
 *
 * One entry per line. Whitespace is trimmed; blank lines and lines starting
 * with `#` are ignored.
 */

import { readFileSync } from "fs";
import { ParseError } from "../errors";

export function parseList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Reads a list file.
 *
 * @param what - Used in errors, e.g. "roles"
 * @throws ParseError when the file is missing or has no entries
 */
export function readListFile(path: string, what: string): string[] {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`Cannot read ${what} file ${path}: ${message}`);
  }

  const entries = parseList(text);
  if (entries.length === 0) {
    throw new ParseError(`The ${what} file ${path} has no entries`);
  }
  return entries;
}
