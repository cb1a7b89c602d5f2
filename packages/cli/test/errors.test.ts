/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import { StoreError } from "@ordtab/sdk";
import { CliError, formatCliError, mapErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should default to exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should carry a custom exit code and cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("not found", { exitCode: 2, cause });
      expect(err.exitCode).toBe(2);
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should use the exit code of a CliError", () => {
      expect(mapErrorToExitCode(new CliError("missing", { exitCode: 2 }))).toBe(2);
    });

    it("should map usage errors to 1", () => {
      expect(mapErrorToExitCode(new InvalidArgumentError("bad"))).toBe(1);
      expect(mapErrorToExitCode(new CommanderError(1, "commander.unknownOption", "bad"))).toBe(1);
    });

    it("should map help and version exits to 0", () => {
      const help = new CommanderError(0, "commander.helpDisplayed", "(outputHelp)");
      expect(mapErrorToExitCode(help)).toBe(0);
    });

    it("should map library and unknown errors to 1", () => {
      expect(mapErrorToExitCode(new StoreError("disk full"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should return the message", () => {
      expect(formatCliError(new Error("boom"))).toBe("boom");
      expect(formatCliError(42)).toBe("42");
    });

    it("should truncate long messages", () => {
      const message = formatCliError(new Error("x".repeat(2500)));
      expect(message).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should add the cause in verbose mode", () => {
      const err = new CliError("wrapper", { cause: new Error("inner") });
      err.stack = undefined;
      expect(formatCliError(err, true)).toBe("wrapper\n  Cause: inner");
      expect(formatCliError(err, false)).toBe("wrapper");
    });
  });
});
