import {
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { InvalidArgumentError } from "../../../core/domain/errors.js";
import { EventLog } from "../../services/event-log.service.js";
import { ensureFolder, moveFile } from "../folder.utils.js";

describe("ensureFolder", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "folder-utils-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("empties an existing folder but keeps it", () => {
    const logDir = join(root, "logs");
    mkdirSync(join(logDir, "subdir"), { recursive: true });
    writeFileSync(join(logDir, "log1.txt"), "test1");
    writeFileSync(join(logDir, "log2.txt"), "test2");
    writeFileSync(join(logDir, "subdir", "subfile.txt"), "subtest");

    ensureFolder(logDir);

    expect(existsSync(logDir)).toBe(true);
    expect(readdirSync(logDir)).toEqual([]);
  });

  it("preserves contents when clearing is off", () => {
    const logDir = join(root, "logs");
    mkdirSync(logDir);
    writeFileSync(join(logDir, "log1.txt"), "test1");

    ensureFolder(logDir, false);

    expect(readFileSync(join(logDir, "log1.txt"), "utf-8")).toBe("test1");
  });

  it.each([true, false])("creates missing parents (clearExisting=%s)", (clear) => {
    const nested = join(root, "a", "b", "c");
    ensureFolder(nested, clear);
    expect(existsSync(nested)).toBe(true);
  });

  it("rejects an empty path", () => {
    expect(() => ensureFolder("")).toThrow(new InvalidArgumentError("Path cannot be empty"));
  });

  it("rejects a path that is a file", () => {
    const file = join(root, "not_a_dir");
    writeFileSync(file, "test");

    expect(() => ensureFolder(file)).toThrow(
      new InvalidArgumentError(`'${file}' is not a directory`),
    );
    expect(readFileSync(file, "utf-8")).toBe("test");
  });

  it("records what it did", () => {
    const log = new EventLog();
    const dir = join(root, "out");

    ensureFolder(dir, true, log);
    writeFileSync(join(dir, "x"), "");
    writeFileSync(join(dir, "y"), "");
    ensureFolder(dir, true, log);

    expect(log.export().rows.map((r) => [r.Function, r.Message])).toEqual([
      ["ensureFolder", `Created folder ${dir}`],
      ["ensureFolder", `Cleared 2 item(s) from ${dir}`],
    ]);
  });
});

describe("moveFile", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "move-file-"));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("moves the file and removes the source", () => {
    const source = join(root, "a.pdf");
    const target = join(root, "b.pdf");
    writeFileSync(source, "payload");

    moveFile(source, target);

    expect(existsSync(source)).toBe(false);
    expect(readFileSync(target, "utf-8")).toBe("payload");
  });

  it("throws when the source is gone", () => {
    expect(() => moveFile(join(root, "missing.pdf"), join(root, "b.pdf"))).toThrow(
      /ENOENT/,
    );
    expect(existsSync(join(root, "b.pdf"))).toBe(false);
  });
});
