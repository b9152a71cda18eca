import { RunStatus } from "../types.js";

const allowedTransitions: Record<RunStatus, RunStatus[]> = {
  pending: ["running", "cancelled"],
  running: ["passed", "failed", "cancelled"],
  passed: [],
  failed: [],
  cancelled: []
};

export const terminalRunStatuses: RunStatus[] = ["passed", "failed", "cancelled"];

export function isTerminalRunStatus(status: RunStatus): boolean {
  return terminalRunStatuses.includes(status);
}

export function assertRunTransition(currentStatus: RunStatus, nextStatus: RunStatus): void {
  if (!allowedTransitions[currentStatus].includes(nextStatus)) {
    throw new Error(`Invalid transition: ${currentStatus} -> ${nextStatus}`);
  }
}
