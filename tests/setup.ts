/**
 * Mocha bootstrap loaded through `--file` before every suite.
 *
 * 1. fast-check runs from a seed derived from `TEST_RANDOM_SEED` so property
 *    failures replay identically on every machine.
 * 2. The `COMPACT_DIGRAPH_*` variables of the host shell are cleared for the
 *    duration of the run and restored afterwards, so configuration tests start
 *    from the documented defaults.
 */
import { after, before } from "mocha";
import * as fc from "fast-check";

import { ENV_KEYS } from "../src/config/settings.js";

/** Token hashed into the fast-check seed. */
export const DEFAULT_TEST_RANDOM_SEED = process.env.TEST_RANDOM_SEED ?? "compact-digraph::tests";

/** Folds the token into a strictly positive 31-bit integer. */
function deriveSeed(token: string): number {
  let hash = 0;
  for (let index = 0; index < token.length; index += 1) {
    hash = (hash * 31 + token.charCodeAt(index)) % 2147483647;
  }
  return hash === 0 ? 1 : hash;
}

const savedEnv = new Map<string, string | undefined>();

before(() => {
  fc.configureGlobal({ seed: deriveSeed(DEFAULT_TEST_RANDOM_SEED), numRuns: 100 });
  for (const key of Object.values(ENV_KEYS)) {
    savedEnv.set(key, process.env[key]);
    delete process.env[key];
  }
});

after(() => {
  fc.resetConfigureGlobal();
  for (const [key, value] of savedEnv) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});
