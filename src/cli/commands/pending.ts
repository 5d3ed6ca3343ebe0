/**
 * forge pending:list | pending:approve <name> | pending:reject <name>
 */

import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { RuntimeRunner, withRuntime } from "../utils/runtime";

export function pendingListCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("pending:list");
  cmd.description("List tool proposals waiting for approval").action(() =>
    run(async ({ runtime }) => {
      const rows = runtime
        .listPending()
        .map((p) => [p.name, p.riskLevel, p.senderId, new Date(p.receivedAt).toISOString(), p.reasons.join(", ")]);
      printTable(["NAME", "RISK", "SENDER", "RECEIVED", "REASONS"], rows, "No pending proposals");
    })
  );
  return cmd;
}

export function pendingApproveCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("pending:approve");
  cmd
    .description("Install a pending proposal")
    .argument("<name>", "proposed tool name")
    .option("--sender <id>", "pick the proposal from this sender")
    .action((name: string, opts: { sender?: string }) =>
      run(async ({ runtime }) => {
        const proposal = await runtime.approve(name, opts.sender);
        console.log(`Approved ${proposal.name} from ${proposal.senderId} (${proposal.riskLevel})`);
      })
    );
  return cmd;
}

export function pendingRejectCommand(run: RuntimeRunner = withRuntime): Command {
  const cmd = new Command("pending:reject");
  cmd
    .description("Discard a pending proposal")
    .argument("<name>", "proposed tool name")
    .option("--sender <id>", "pick the proposal from this sender")
    .action((name: string, opts: { sender?: string }) =>
      run(async ({ runtime }) => {
        const proposal = await runtime.reject(name, opts.sender);
        console.log(`Rejected ${proposal.name} from ${proposal.senderId}`);
      })
    );
  return cmd;
}
