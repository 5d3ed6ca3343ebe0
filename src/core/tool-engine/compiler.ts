/**
 * Script compiler: turns one tool's source into a compiled unit.
 *
 * Compiling only parses. Nothing runs until a unit is evaluated inside a
 * namespace, so a failed compile never touches the published namespace.
 */

import vm from "vm";
import Ajv from "ajv";
import { CompileError, SourceLocation, describeThrown } from "../errors";
import { isNativeCapabilityName } from "../tools/capabilityNames";
import { TOOL_FILE_EXTENSION } from "../storage/toolStore";

export const MAX_SOURCE_LENGTH = 20_000;
export const MAX_NAME_LENGTH = 64;

export interface CompiledUnit {
  readonly name: string;
  readonly filename: string;
  readonly script: vm.Script;
}

const ajv = new Ajv({ allErrors: true });

const toolDefinitionSchema = {
  type: "object",
  properties: {
    name: { type: "string", pattern: "^[A-Za-z_$][A-Za-z0-9_$]*$", maxLength: MAX_NAME_LENGTH },
    source: { type: "string", maxLength: MAX_SOURCE_LENGTH },
  },
  required: ["name", "source"],
  additionalProperties: false,
};

/**
 * Globals every namespace context starts with, Object.prototype members
 * (`__proto__`, `constructor`, ...) and the injected console. A tool under one
 * of these names would replace it for every other tool.
 */
const contextGlobal: object = vm.runInNewContext("this");
const RESERVED_NAMES: ReadonlySet<string> = new Set([
  ...Object.getOwnPropertyNames(contextGlobal),
  ...Object.getOwnPropertyNames(Object.prototype),
  "console",
]);

export function isReservedName(name: string): boolean {
  return RESERVED_NAMES.has(name);
}

const validateDefinition = ajv.compile<{ name: string; source: string }>(toolDefinitionSchema);

/**
 * Check name and source shape before any parsing.
 * @throws CompileError
 */
export function validateToolDefinition(name: string, source: string): void {
  const filename = `${name}${TOOL_FILE_EXTENSION}`;
  if (!validateDefinition({ name, source })) {
    throw new CompileError({ file: filename }, `invalid tool definition: ${ajv.errorsText(validateDefinition.errors)}`);
  }
  if (isNativeCapabilityName(name)) {
    throw new CompileError({ file: filename }, `"${name}" is a native capability and cannot be redefined`);
  }
  if (isReservedName(name)) {
    throw new CompileError({ file: filename }, `"${name}" is a built-in global of the tool context`);
  }
}

/**
 * Pull file and line out of a V8 syntax error. V8 decorates the stack with
 * `<filename>:<line>` on its first line.
 */
function locate(filename: string, stack: string | undefined): SourceLocation {
  const firstLine = stack?.split("\n", 1)[0] ?? "";
  const match = /^(.*):(\d+)$/.exec(firstLine);
  if (match && match[1] === filename) {
    return { file: filename, line: Number(match[2]) };
  }
  return { file: filename };
}

/**
 * @throws CompileError on an invalid definition or a syntax error
 */
export function compile(name: string, source: string): CompiledUnit {
  validateToolDefinition(name, source);

  const filename = `${name}${TOOL_FILE_EXTENSION}`;
  try {
    const script = new vm.Script(source, { filename });
    return { name, filename, script };
  } catch (error: unknown) {
    const thrown = describeThrown(error);
    throw new CompileError(locate(filename, thrown.stack), `${thrown.name}: ${thrown.message}`);
  }
}
