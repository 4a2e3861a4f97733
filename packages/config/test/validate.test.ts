import * as fs from "node:fs/promises";
import * as path from "node:path";

import { Effect, Either } from "effect";
import { describe, expect, it } from "vitest";

import {
  DirectoryMissing,
  EmptyField,
  NotADirectory,
  NotReadable,
  NotWritable,
  WRITE_PROBE_FILE,
  isBlank,
  validateConfigurationInput,
  validateProjectsDirectory,
} from "../src";
import {
  leftOf,
  makeSystemError,
  overrideFileSystem,
  pathExists,
  runEither,
  runEitherWith,
  withTempRoot,
} from "./helpers";

describe("isBlank", () => {
  it("treats whitespace-only strings as blank", () => {
    expect(isBlank("")).toBe(true);
    expect(isBlank("   ")).toBe(true);
    expect(isBlank("\t\n ")).toBe(true);
  });

  it("accepts strings with visible characters", () => {
    expect(isBlank("code")).toBe(false);
    expect(isBlank("  vim  ")).toBe(false);
  });
});

describe("validateProjectsDirectory", () => {
  it("accepts an existing writable directory and removes the probe file", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const result = await runEither(validateProjectsDirectory(rootPath));

      expect(Either.isRight(result)).toBe(true);
      expect(await pathExists(path.join(rootPath, WRITE_PROBE_FILE))).toBe(false);
    });
  });

  it("claims the probe file name even when a file by that name already exists", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      await fs.writeFile(path.join(rootPath, WRITE_PROBE_FILE), "keep me", "utf8");

      const result = await runEither(validateProjectsDirectory(rootPath));

      expect(Either.isRight(result)).toBe(true);
      expect(await pathExists(path.join(rootPath, WRITE_PROBE_FILE))).toBe(false);
    });
  });

  it("reports EmptyField for blank paths", async () => {
    for (const candidate of ["", "   "]) {
      const fault = leftOf(await runEither(validateProjectsDirectory(candidate)));

      expect(fault).toBeInstanceOf(EmptyField);
      expect(fault instanceof EmptyField && fault.field).toBe("projects_directory");
    }
  });

  it("reports DirectoryMissing for a nonexistent path", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const missingPath = path.join(rootPath, "missing");
      const fault = leftOf(await runEither(validateProjectsDirectory(missingPath)));

      expect(fault).toBeInstanceOf(DirectoryMissing);
      expect(fault instanceof DirectoryMissing && fault.path).toBe(missingPath);
    });
  });

  it("reports DirectoryMissing, not a later fault, even when listing and writing would fail too", async () => {
    const layer = overrideFileSystem({
      readDirectory: (target) =>
        Effect.fail(makeSystemError("PermissionDenied", "readDirectory", target)),
      writeFile: (target) => Effect.fail(makeSystemError("PermissionDenied", "writeFile", target)),
    });

    const fault = leftOf(
      await runEitherWith(layer)(validateProjectsDirectory("/virtual/crateyard/projects")),
    );

    expect(fault).toBeInstanceOf(DirectoryMissing);
  });

  it("reports DirectoryMissing when a parent component is a regular file", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const filePath = path.join(rootPath, "notes.txt");
      await fs.writeFile(filePath, "hello", "utf8");

      const fault = leftOf(
        await runEither(validateProjectsDirectory(path.join(filePath, "child"))),
      );

      expect(fault).toBeInstanceOf(DirectoryMissing);
    });
  });

  it("reports NotADirectory for a regular file", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const filePath = path.join(rootPath, "notes.txt");
      await fs.writeFile(filePath, "hello", "utf8");

      const fault = leftOf(await runEither(validateProjectsDirectory(filePath)));

      expect(fault).toBeInstanceOf(NotADirectory);
      expect(fault instanceof NotADirectory && fault.path).toBe(filePath);
    });
  });

  it("reports NotReadable when the directory cannot be listed", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const layer = overrideFileSystem({
        readDirectory: (target) =>
          Effect.fail(makeSystemError("PermissionDenied", "readDirectory", target)),
      });

      const fault = leftOf(await runEitherWith(layer)(validateProjectsDirectory(rootPath)));

      expect(fault).toBeInstanceOf(NotReadable);
      expect(fault instanceof NotReadable && fault.path).toBe(rootPath);
    });
  });

  it("reports NotReadable when stat fails for a reason other than absence", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const layer = overrideFileSystem({
        stat: (target) => Effect.fail(makeSystemError("PermissionDenied", "stat", target)),
      });

      const fault = leftOf(await runEitherWith(layer)(validateProjectsDirectory(rootPath)));

      expect(fault).toBeInstanceOf(NotReadable);
    });
  });

  it("reports NotWritable when the probe file cannot be created", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const layer = overrideFileSystem({
        writeFile: (target) =>
          Effect.fail(makeSystemError("PermissionDenied", "writeFile", target)),
      });

      const fault = leftOf(await runEitherWith(layer)(validateProjectsDirectory(rootPath)));

      expect(fault).toBeInstanceOf(NotWritable);
      expect(fault instanceof NotWritable && fault.path).toBe(rootPath);
    });
  });

  it("does not fail when the probe file cannot be removed", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const layer = overrideFileSystem({
        remove: (target) => Effect.fail(makeSystemError("Busy", "remove", target)),
      });

      const result = await runEitherWith(layer)(validateProjectsDirectory(rootPath));

      expect(Either.isRight(result)).toBe(true);
    });
  });

  it("returns the same fault for the same filesystem state", async () => {
    await withTempRoot("crateyard-validate-", async (rootPath) => {
      const filePath = path.join(rootPath, "notes.txt");
      await fs.writeFile(filePath, "hello", "utf8");

      const first = leftOf(await runEither(validateProjectsDirectory(filePath)));
      const second = leftOf(await runEither(validateProjectsDirectory(filePath)));

      expect(first._tag).toBe("NotADirectory");
      expect(second._tag).toBe("NotADirectory");
    });
  });
});

describe("validateConfigurationInput", () => {
  it("checks the editor command before the directory", async () => {
    const fault = leftOf(await runEither(validateConfigurationInput("/does/not/exist", "  ")));

    expect(fault).toBeInstanceOf(EmptyField);
    expect(fault instanceof EmptyField && fault.field).toBe("editor_command");
  });

  it("runs the directory checks once the editor command is present", async () => {
    const fault = leftOf(await runEither(validateConfigurationInput("", "code")));

    expect(fault).toBeInstanceOf(EmptyField);
    expect(fault instanceof EmptyField && fault.field).toBe("projects_directory");
  });
});
