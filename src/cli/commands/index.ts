import { Command } from "commander";
import { RuntimeRunner, withRuntime } from "../utils/runtime";
import { toolsListCommand } from "./toolsList";
import { toolsInspectCommand } from "./toolsInspect";
import { toolsCreateCommand } from "./toolsCreate";
import { toolsRemoveCommand } from "./toolsRemove";
import { toolsRunCommand } from "./toolsRun";
import { pendingApproveCommand, pendingListCommand, pendingRejectCommand } from "./pending";
import { cloneCommand, sendCommand, shareCommand } from "./peer";
import { markerCommand } from "./marker";

/**
 * Every command that works against a runtime, in help order.
 */
export function runtimeCommands(run: RuntimeRunner = withRuntime): Command[] {
  return [
    toolsListCommand(run),
    toolsInspectCommand(run),
    toolsCreateCommand(run),
    toolsRemoveCommand(run),
    toolsRunCommand(run),
    pendingListCommand(run),
    pendingApproveCommand(run),
    pendingRejectCommand(run),
    sendCommand(run),
    shareCommand(run),
    cloneCommand(run),
    markerCommand(run),
  ];
}
