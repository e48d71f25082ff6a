import type { ExecutionSummary } from "./types.js";
import { defaultColors, type Colors } from "./format.js";

export function renderExecutionSummary(
  summary: ExecutionSummary,
  colors: Colors = defaultColors
): string[] {
  const lines = [
    "",
    "┌──────────────────────────┐",
    "│   VM EXECUTION RESULTS   │",
    "└──────────────────────────┘",
    `Cycles Used:          ${summary.cyclesUsed}`,
    `Computation Gas Used: ${summary.computationalGasUsed}`,
    `Contracts Used:       ${summary.contractsUsed}`,
  ];

  if (summary.revertReason !== undefined) {
    lines.push("", colors.bgRed(`[!] Revert Reason:    ${summary.revertReason}`));
  }

  lines.push("════════════════════════════");
  return lines;
}
