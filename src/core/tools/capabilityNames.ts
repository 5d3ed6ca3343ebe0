/**
 * Names of the built-in operations injected into every tool namespace.
 */
export const NATIVE_CAPABILITY_NAMES = [
  "list_tools",
  "inspect_tool",
  "remove_tool",
  "read_file",
  "write_file",
  "search",
  "scrape_url",
  "clone_agent",
  "send_message",
] as const;

export type NativeCapabilityName = (typeof NATIVE_CAPABILITY_NAMES)[number];

export function isNativeCapabilityName(name: string): name is NativeCapabilityName {
  return (NATIVE_CAPABILITY_NAMES as readonly string[]).includes(name);
}
