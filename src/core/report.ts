import type { AgentRunResult } from "./strategies/common.js";

const RULE = "=".repeat(60);

const MODE_TITLES: Record<AgentRunResult["mode"], string> = {
  traditional: "TRADITIONAL MODE",
  discovery: "DISCOVERY MODE",
  code: "CODE MODE",
};

function fmt(n: number): string {
  return n.toLocaleString("en-US");
}

export function totalTokens(result: AgentRunResult): number {
  return result.usage.promptTokens + result.usage.completionTokens;
}

/** Token usage summary printed at the end of a run. */
export function formatRunSummary(result: AgentRunResult): string {
  const lines = [
    RULE,
    `${MODE_TITLES[result.mode]} TOKEN USAGE:`,
    `   Total Turns: ${result.chatRequests} (max ${result.maxTurns})`,
    `   Input Tokens: ${fmt(result.usage.promptTokens)}`,
    `   Output Tokens: ${fmt(result.usage.completionTokens)}`,
    `   Total Tokens: ${fmt(totalTokens(result))}`,
    `   Tools in Context: ${result.toolsInContext}`,
    `   Tool Calls: ${result.toolCallCount}`,
  ];
  if (result.selection) {
    lines.push(`   Selected Tool: ${result.selection.serverName}/${result.selection.toolName}`);
  }
  if (result.estimatedCost !== null) {
    lines.push(`   Estimated Cost: $${result.estimatedCost.toFixed(6)}`);
  }
  if (result.stopReason !== "final_answer") {
    lines.push(`   Stopped: ${result.stopReason}`);
  }
  lines.push(RULE);
  return lines.join("\n");
}

/** Side-by-side table with savings relative to the traditional run. */
export function formatComparison(results: AgentRunResult[]): string {
  const baseline = results.find((r) => r.mode === "traditional");
  const header = ["Mode", "Turns", "Input", "Output", "Total", "Tools", "vs traditional"];
  const rows = results.map((r) => [
    MODE_TITLES[r.mode].replace(" MODE", "").toLowerCase(),
    String(r.chatRequests),
    fmt(r.usage.promptTokens),
    fmt(r.usage.completionTokens),
    fmt(totalTokens(r)),
    String(r.toolsInContext),
    baseline && r !== baseline ? savings(totalTokens(baseline), totalTokens(r)) : "-",
  ]);

  const widths = header.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col]?.length ?? 0)));
  const render = (cells: string[]) => cells.map((c, col) => c.padEnd(widths[col] ?? 0)).join("  ").trimEnd();

  return [
    RULE,
    "TOKEN USAGE COMPARISON",
    RULE,
    render(header),
    render(widths.map((w) => "-".repeat(w))),
    ...rows.map(render),
    RULE,
  ].join("\n");
}

/** "-42.0%" style change from baseline to value; "n/a" without a baseline. */
export function savings(baseline: number, value: number): string {
  if (baseline === 0) return "n/a";
  const change = ((value - baseline) / baseline) * 100;
  return `${change > 0 ? "+" : ""}${change.toFixed(1)}%`;
}
