/**
 * Markers a conversational agent writes into its replies:
 *
 *   [TOOL: square(7)]            run a tool with one argument
 *   [TOOL: list_tools()]         run a tool with none
 *   ```js                        define (or overwrite) a tool
 *   // filename: square
 *   function square(x) { ... }
 *   ```
 */

import { describeThrown } from "../errors";

export interface ToolInvocation {
  name: string;
  args: [] | [string];
}

export interface ToolDefinition {
  name: string;
  source: string;
}

const INVOCATION = /\[TOOL:\s*([A-Za-z_$][A-Za-z0-9_$]*)\s*\(([\s\S]*?)\)\s*\]/g;
const CODE_BLOCK = /```(?:js|javascript)[ \t]*\r?\n([\s\S]*?)```/g;
const FILENAME = /^\s*\/\/\s*filename:\s*([A-Za-z_$][A-Za-z0-9_$]*)(?:\.js)?\s*$/m;

function stripQuotes(value: string): string {
  const match = /^(["'`])([\s\S]*)\1$/.exec(value);
  return match ? match[2] : value;
}

export function parseToolInvocations(text: string): ToolInvocation[] {
  const invocations: ToolInvocation[] = [];
  for (const match of text.matchAll(INVOCATION)) {
    const raw = match[2].trim();
    invocations.push({ name: match[1], args: raw === "" ? [] : [stripQuotes(raw)] });
  }
  return invocations;
}

/**
 * Fenced js/javascript blocks that name their tool. Blocks without a
 * `// filename:` line are ignored.
 */
export function parseToolDefinitions(text: string): ToolDefinition[] {
  const definitions: ToolDefinition[] = [];
  for (const match of text.matchAll(CODE_BLOCK)) {
    const source = match[1];
    const filename = FILENAME.exec(source);
    if (filename) {
      definitions.push({ name: filename[1], source });
    }
  }
  return definitions;
}

export interface MarkerTarget {
  createTool(name: string, source: string): Promise<unknown>;
  execute(name: string, args: readonly unknown[]): Promise<string>;
}

export type MarkerOutcome =
  | { kind: "create"; name: string; ok: true }
  | { kind: "invoke"; name: string; ok: true; output: string }
  | { kind: "create" | "invoke"; name: string; ok: false; error: string };

/**
 * Create every defined tool, then run every invocation, in reply order.
 * A failing step is reported and does not stop the rest.
 */
export async function applyMarkers(target: MarkerTarget, text: string): Promise<MarkerOutcome[]> {
  const outcomes: MarkerOutcome[] = [];

  for (const { name, source } of parseToolDefinitions(text)) {
    try {
      await target.createTool(name, source);
      outcomes.push({ kind: "create", name, ok: true });
    } catch (error: unknown) {
      outcomes.push({ kind: "create", name, ok: false, error: describeThrown(error).message });
    }
  }

  for (const { name, args } of parseToolInvocations(text)) {
    try {
      const output = await target.execute(name, args);
      outcomes.push({ kind: "invoke", name, ok: true, output });
    } catch (error: unknown) {
      outcomes.push({ kind: "invoke", name, ok: false, error: describeThrown(error).message });
    }
  }

  return outcomes;
}
