/**
 * Report generation for evaluation runs.
 *
 * Generates markdown and JSON reports from a SetRunResult.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { coerceScore } from '../scorer/aggregator.js';
import type { EvaluationResult, RunResult, SetRunResult } from '../types.js';

export interface ReportMetadata {
  evalSetPath: string;
  entrypoint: string;
  judgeModel: string;
  workers: number;
  resumed?: boolean;
}

export interface EvaluationReport {
  timestamp: string;
  metadata?: ReportMetadata;
  summary: ReportSummary;
  run: SetRunResult;
}

export interface ReportSummary {
  totalItems: number;
  successfulItems: number;
  faultedItems: number;
  suspendedItems: number;
  score: number;
  totalExecutionTimeMs: number;
}

export interface ReportOptions {
  outputPath?: string;
  metadata?: ReportMetadata;
  /** Max characters of agent output shown per item */
  outputTruncation?: number;
}

export function computeSummary(run: SetRunResult): ReportSummary {
  const count = (status: RunResult['status']) => run.items.filter((item) => item.status === status).length;
  return {
    totalItems: run.items.length,
    successfulItems: count('successful'),
    faultedItems: count('faulted'),
    suspendedItems: count('suspended'),
    score: run.score,
    totalExecutionTimeMs: run.items.reduce((sum, item) => sum + item.executionTimeMs, 0),
  };
}

export function formatScore(result: Pick<EvaluationResult, 'score' | 'scoreType'>): string {
  if (result.scoreType === 'error') return 'error';
  if (typeof result.score === 'boolean') return result.score ? 'pass' : 'fail';
  return coerceScore(result).toFixed(2);
}

function formatOutput(output: unknown, limit: number): string {
  if (output === null || output === undefined) return '(no output)';
  const text = typeof output === 'string' ? output : JSON.stringify(output, null, 2) ?? '';
  if (!text) return '(no output)';
  return text.length > limit ? `${text.slice(0, limit)}\n...(truncated)` : text;
}

function detailText(result: EvaluationResult): string {
  if (result.details === undefined) return '';
  const text = typeof result.details === 'string' ? result.details : JSON.stringify(result.details);
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ').slice(0, 200);
}

/**
 * Render the markdown report.
 */
export function renderMarkdownReport(run: SetRunResult, options: Omit<ReportOptions, 'outputPath'> = {}): string {
  const summary = computeSummary(run);
  const limit = options.outputTruncation ?? 2000;
  const metadata = options.metadata;

  let metaSection = '';
  if (metadata) {
    const metaLines = [
      `**Evaluation Set:** \`${metadata.evalSetPath}\``,
      `**Entrypoint:** \`${metadata.entrypoint}\``,
      `**Judge Model:** ${metadata.judgeModel}`,
      `**Workers:** ${metadata.workers}`,
    ];
    if (metadata.resumed) metaLines.push('**Resumed:** yes');
    metaSection = metaLines.join('\n') + '\n';
  }

  let report = `# Evaluation Report: ${run.evalSetName}

**Run:** ${run.runId}
**Started:** ${run.startedAt}
**Finished:** ${run.finishedAt}
**Status:** ${run.status}
${metaSection}
---

## Summary

| Metric | Value |
|--------|-------|
| **Items** | ${summary.totalItems} |
| **Successful** | ${summary.successfulItems} |
| **Faulted** | ${summary.faultedItems} |
| **Suspended** | ${summary.suspendedItems} |
| **Score** | ${summary.score.toFixed(2)} |
| **Total Execution Time** | ${(summary.totalExecutionTimeMs / 1000).toFixed(1)}s |

## Evaluators

| Evaluator | Average | Items |
|-----------|---------|-------|
`;

  for (const avg of run.evaluatorAverages) {
    report += `| ${avg.evaluatorName} | ${avg.averageScore.toFixed(2)} | ${avg.count} |\n`;
  }

  if (run.triggers.length > 0) {
    report += `\n## Pending Triggers\n\n`;
    for (const trigger of run.triggers) {
      report += `- \`${trigger.type}\`${trigger.key ? ` (${trigger.key})` : ''}\n`;
    }
  }

  report += `\n---\n\n## Item Details\n\n`;

  run.items.forEach((item, i) => {
    report += `### Item ${i + 1}: ${item.itemId}

**Name:** ${item.itemName}
**Status:** ${item.status}
**Score:** ${item.score.toFixed(2)}
`;

    if (item.error) {
      report += `\n**Error:** ${item.error.title}: ${item.error.detail}\n`;
    }

    if (item.evaluatorResults.length > 0) {
      report += `\n| Evaluator | Score | Details |\n|-----------|-------|---------|\n`;
      for (const r of item.evaluatorResults) {
        report += `| ${r.evaluatorName} | ${formatScore(r.result)} | ${detailText(r.result)} |\n`;
      }
    }

    report += `
<details>
<summary>Agent Output (click to expand)</summary>

\`\`\`
${formatOutput(item.output, limit)}
\`\`\`

</details>

**Execution Time:** ${(item.executionTimeMs / 1000).toFixed(1)}s

---

`;
  });

  return report;
}

/**
 * Generate a markdown report, writing it when an output path is given.
 */
export async function generateReport(run: SetRunResult, options: ReportOptions = {}): Promise<string> {
  const report = renderMarkdownReport(run, options);

  if (options.outputPath) {
    await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
    await fs.writeFile(options.outputPath, report);
    console.log(`Report saved to: ${options.outputPath}`);
  }

  return report;
}

/**
 * Generate JSON report for programmatic analysis.
 */
export async function generateJsonResults(run: SetRunResult, options: ReportOptions = {}): Promise<EvaluationReport> {
  const report: EvaluationReport = {
    timestamp: new Date().toISOString(),
    metadata: options.metadata,
    summary: computeSummary(run),
    run,
  };

  if (options.outputPath) {
    await fs.mkdir(path.dirname(options.outputPath), { recursive: true });
    await fs.writeFile(options.outputPath, JSON.stringify(report, null, 2));
    console.log(`JSON results saved to: ${options.outputPath}`);
  }

  return report;
}
