/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { isVerbose, resolvePath } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalPath: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalPath = process.env.ORDTAB_PATH;
    originalDebug = process.env.ORDTAB_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalPath !== undefined) {
      process.env.ORDTAB_PATH = originalPath;
    } else {
      delete process.env.ORDTAB_PATH;
    }
    if (originalDebug !== undefined) {
      process.env.ORDTAB_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.ORDTAB_CLI_DEBUG;
    }
  });

  describe("resolvePath", () => {
    it("should use CLI option when provided", () => {
      process.env.ORDTAB_PATH = "/env/path";
      expect(resolvePath("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should use ORDTAB_PATH when CLI option not provided", () => {
      process.env.ORDTAB_PATH = "/env/path";
      expect(resolvePath()).toBe(path.resolve("/env/path"));
    });

    it("should use default ./data when neither provided", () => {
      delete process.env.ORDTAB_PATH;
      expect(resolvePath()).toBe(path.resolve("./data"));
    });

    it("should expand ~ to the home directory", () => {
      expect(resolvePath("~")).toBe(homedir());
      expect(resolvePath("~/db")).toBe(path.join(homedir(), "db"));
    });

    it("should leave ~user untouched", () => {
      expect(resolvePath("~someone/db")).toBe(path.resolve("~someone/db"));
    });
  });

  describe("isVerbose", () => {
    it("should follow the flag or ORDTAB_CLI_DEBUG=1", () => {
      delete process.env.ORDTAB_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
      expect(isVerbose(true)).toBe(true);
      process.env.ORDTAB_CLI_DEBUG = "1";
      expect(isVerbose(false)).toBe(true);
    });
  });
});
