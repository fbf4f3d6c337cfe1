import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { parseList, readListFile } from "./input-files";
import { ParseError } from "../errors";

describe("parseList", () => {
  it("trims entries and skips comments and blank lines", () => {
    const text = "# roles for the CI account\nroles/viewer\n\n  roles/storage.admin  \r\n   # indented comment\n";
    expect(parseList(text)).toEqual(["roles/viewer", "roles/storage.admin"]);
  });
});

describe("readListFile", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("reads entries from disk", () => {
    dir = mkdtempSync(join(tmpdir(), "lists-"));
    const path = join(dir, "projects.txt");
    writeFileSync(path, "project-a\nproject-b\n");

    expect(readListFile(path, "projects")).toEqual(["project-a", "project-b"]);
  });

  it("rejects a file with only comments", () => {
    dir = mkdtempSync(join(tmpdir(), "lists-"));
    const path = join(dir, "roles.txt");
    writeFileSync(path, "# nothing yet\n");

    expect(() => readListFile(path, "roles")).toThrow(`The roles file ${path} has no entries`);
  });

  it("turns a missing file into a ParseError", () => {
    expect(() => readListFile("/nonexistent/roles.txt", "roles")).toThrow(ParseError);
  });
});
