import { dim, log, red, yellow } from "@slipway/lib/ui.ts";
import type { PreflightIssue, VerificationReport } from "@slipway/lib/types.ts";

export function printPreflightIssues(issues: readonly PreflightIssue[]): void {
  for (const issue of issues) {
    const marker = issue.severity === "fatal" ? red("✖") : yellow("⚠");
    log(`${marker} ${issue.message}`);
    if (issue.detail) {
      for (const line of issue.detail.split("\n")) log(dim(`    ${line}`));
    }
  }
}

export function printVerificationReport(report: VerificationReport): void {
  for (const issue of report.issues) {
    const detail = issue.detail === undefined ? "" : dim(` (${issue.detail})`);
    log(`${red("✖")} ${issue.check}: ${issue.message}${detail}`);
  }
}
