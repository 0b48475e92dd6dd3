/**
 * Covers the environment readers and the settings resolved from them. Each
 * test restores the variables it touched.
 */
import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import {
  readBool,
  readEnum,
  readOptionalBool,
  readOptionalEnum,
  readOptionalString,
  readString,
} from "../../src/config/env.js";
import { ENV_KEYS, loadSettings } from "../../src/config/settings.js";

const touched = new Map<string, string | undefined>();

function setEnv(name: string, value: string | undefined): void {
  if (!touched.has(name)) {
    touched.set(name, process.env[name]);
  }
  if (value === undefined) {
    delete process.env[name];
  } else {
    process.env[name] = value;
  }
}

describe("config", () => {
  afterEach(() => {
    for (const [name, value] of touched) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    touched.clear();
  });

  describe("env readers", () => {
    it("interprets boolean flags case-insensitively", () => {
      setEnv("TEST_BOOL", "YES");
      expect(readBool("TEST_BOOL", false)).to.equal(true);

      setEnv("TEST_BOOL", "off");
      expect(readOptionalBool("TEST_BOOL")).to.equal(false);

      setEnv("TEST_BOOL", "  ");
      expect(readOptionalBool("TEST_BOOL")).to.equal(undefined);

      setEnv("TEST_BOOL", "maybe");
      expect(readBool("TEST_BOOL", true)).to.equal(true);
    });

    it("trims strings and treats blanks as unset", () => {
      setEnv("TEST_STRING", "  Deps ");
      expect(readString("TEST_STRING", "G")).to.equal("Deps");

      setEnv("TEST_STRING", "   ");
      expect(readOptionalString("TEST_STRING")).to.equal(undefined);
      expect(readString("TEST_STRING", "G")).to.equal("G");
    });

    it("matches enum literals case-insensitively", () => {
      const levels = ["debug", "info"] as const;
      setEnv("TEST_ENUM", "INFO");
      expect(readOptionalEnum("TEST_ENUM", levels)).to.equal("info");

      setEnv("TEST_ENUM", "verbose");
      expect(readOptionalEnum("TEST_ENUM", levels)).to.equal(undefined);
      expect(readEnum("TEST_ENUM", levels, "debug")).to.equal("debug");
    });
  });

  describe("loadSettings", () => {
    it("falls back to the documented defaults", () => {
      for (const key of Object.values(ENV_KEYS)) {
        setEnv(key, undefined);
      }

      expect(loadSettings()).to.deep.equal({
        logLevel: "warn",
        logFile: null,
        dotName: "G",
        ignoreSelfLoops: false,
      });
    });

    it("reads every override", () => {
      setEnv(ENV_KEYS.logLevel, "Debug");
      setEnv(ENV_KEYS.logFile, "/tmp/compact-digraph.log");
      setEnv(ENV_KEYS.dotName, "Deps");
      setEnv(ENV_KEYS.ignoreSelfLoops, "on");

      expect(loadSettings()).to.deep.equal({
        logLevel: "debug",
        logFile: "/tmp/compact-digraph.log",
        dotName: "Deps",
        ignoreSelfLoops: true,
      });
    });

    it("ignores a DOT name that is not a plain identifier", () => {
      setEnv(ENV_KEYS.dotName, "my graph");
      expect(loadSettings().dotName).to.equal("G");

      setEnv(ENV_KEYS.dotName, "9lives");
      expect(loadSettings().dotName).to.equal("G");
    });
  });
});
