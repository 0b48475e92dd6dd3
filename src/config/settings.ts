import { isDotName } from "../export/dot.js";
import { LOG_LEVELS, type LogLevel } from "../logger.js";
import { readBool, readEnum, readOptionalString } from "./env.js";

/** Environment variables recognised by the CLI. */
export const ENV_KEYS = {
  logLevel: "COMPACT_DIGRAPH_LOG_LEVEL",
  logFile: "COMPACT_DIGRAPH_LOG_FILE",
  dotName: "COMPACT_DIGRAPH_DOT_NAME",
  ignoreSelfLoops: "COMPACT_DIGRAPH_IGNORE_SELF_LOOPS",
} as const;

export interface GraphSettings {
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
  /**
   * Graph name used by the DOT export when the input does not carry one.
   * Values that are not plain identifiers fall back to `G`.
   */
  readonly dotName: string;
  readonly ignoreSelfLoops: boolean;
}

export function loadSettings(): GraphSettings {
  const dotName = readOptionalString(ENV_KEYS.dotName);
  return {
    logLevel: readEnum(ENV_KEYS.logLevel, LOG_LEVELS, "warn"),
    logFile: readOptionalString(ENV_KEYS.logFile) ?? null,
    dotName: dotName !== undefined && isDotName(dotName) ? dotName : "G",
    ignoreSelfLoops: readBool(ENV_KEYS.ignoreSelfLoops, false),
  };
}
