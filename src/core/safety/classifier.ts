/**
 * Static risk classification of tool source.
 *
 * A lexical scan for references to native capabilities and to ways out of the
 * script context. It cannot see names built at run time (`this["wri" + "te_file"]`),
 * so it only feeds a human approval step; it is not a sandbox.
 */

import { NATIVE_CAPABILITY_NAMES, NativeCapabilityName } from "../tools/capabilityNames";

export type RiskLevel = "Safe" | "LowRisk" | "MediumRisk" | "HighRisk";

export const RISK_LEVELS: readonly RiskLevel[] = ["Safe", "LowRisk", "MediumRisk", "HighRisk"];

/**
 * Capabilities with a known tier. Any other native capability is HighRisk.
 */
const CAPABILITY_TIERS: Partial<Record<NativeCapabilityName, RiskLevel>> = {
  list_tools: "LowRisk",
  inspect_tool: "LowRisk",
  send_message: "LowRisk",
  read_file: "MediumRisk",
  scrape_url: "MediumRisk",
  write_file: "HighRisk",
};

/**
 * Tokens that reach the host process from inside a script context.
 */
const HOST_ESCAPE_PATTERNS: ReadonlyArray<{ token: string; pattern: RegExp }> = [
  { token: "require", pattern: /(?<![\w$])require\s*\(/ },
  { token: "import", pattern: /(?<![\w$.])import\s*\(/ },
  { token: "process", pattern: /(?<![\w$.])process\s*[.[]/ },
  { token: "child_process", pattern: /child_process/ },
  { token: "globalThis", pattern: /(?<![\w$])globalThis(?![\w$])/ },
  { token: "eval", pattern: /(?<![\w$.])eval\s*\(/ },
  { token: "Function", pattern: /(?<![\w$.])Function\s*\(/ },
  { token: "constructor", pattern: /\.\s*constructor(?![\w$])|\[\s*["'`]constructor["'`]\s*\]/ },
];

export interface RiskAssessment {
  level: RiskLevel;
  /** Native capabilities referenced, in declaration order */
  capabilities: NativeCapabilityName[];
  /** Host-escape tokens found */
  escapes: string[];
}

export function compareRisk(a: RiskLevel, b: RiskLevel): number {
  return RISK_LEVELS.indexOf(a) - RISK_LEVELS.indexOf(b);
}

export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return compareRisk(a, b) >= 0 ? a : b;
}

function referencesName(source: string, name: string): boolean {
  return new RegExp(`(?<![\\w$])${name}(?![\\w$])`).test(source);
}

export function assess(source: string): RiskAssessment {
  const capabilities = NATIVE_CAPABILITY_NAMES.filter((name) => referencesName(source, name));
  const escapes = HOST_ESCAPE_PATTERNS.filter(({ pattern }) => pattern.test(source)).map(({ token }) => token);

  let level: RiskLevel = "Safe";
  for (const capability of capabilities) {
    level = maxRisk(level, CAPABILITY_TIERS[capability] ?? "HighRisk");
  }
  if (escapes.length > 0) {
    level = "HighRisk";
  }

  return { level, capabilities, escapes };
}

export function classify(source: string): RiskLevel {
  return assess(source).level;
}
