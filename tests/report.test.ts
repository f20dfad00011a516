import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  computeSummary,
  formatScore,
  generateJsonResults,
  generateReport,
  renderMarkdownReport,
} from '../src/report/report.js';
import type { SetRunResult } from '../src/types.js';

const run: SetRunResult = {
  runId: 'run-1',
  evalSetId: 'weather',
  evalSetName: 'Weather agent',
  status: 'faulted',
  success: false,
  score: 0.5,
  evaluatorAverages: [{ evaluatorId: 'exact', evaluatorName: 'Exact', averageScore: 0.5, count: 2 }],
  items: [
    {
      itemId: 'lisbon',
      itemName: 'Lisbon',
      status: 'successful',
      success: true,
      score: 1,
      inputs: { city: 'Lisbon' },
      output: 'x'.repeat(30),
      evaluatorResults: [
        {
          evaluatorId: 'exact',
          evaluatorName: 'Exact',
          result: { score: true, scoreType: 'boolean', details: 'a|b', evaluationTimeMs: 1 },
        },
      ],
      triggers: [],
      executionTimeMs: 1500,
      logs: [],
    },
    {
      itemId: 'porto',
      itemName: 'Porto',
      status: 'faulted',
      success: false,
      score: 0,
      inputs: { city: 'Porto' },
      output: null,
      evaluatorResults: [
        {
          evaluatorId: 'exact',
          evaluatorName: 'Exact',
          result: { score: 0, scoreType: 'error', evaluationTimeMs: 0 },
        },
      ],
      triggers: [],
      executionTimeMs: 500,
      error: { code: 'AGENT_TIMEOUT', title: 'Agent execution timed out', detail: 'Item porto timed out after 10ms' },
      logs: [],
    },
  ],
  triggers: [],
  startedAt: '2026-01-01T00:00:00.000Z',
  finishedAt: '2026-01-01T00:00:02.000Z',
};

describe('computeSummary', () => {
  it('counts items by status', () => {
    expect(computeSummary(run)).toEqual({
      totalItems: 2,
      successfulItems: 1,
      faultedItems: 1,
      suspendedItems: 0,
      score: 0.5,
      totalExecutionTimeMs: 2000,
    });
  });
});

describe('formatScore', () => {
  it('formats each score type', () => {
    expect(formatScore({ score: true, scoreType: 'boolean' })).toBe('pass');
    expect(formatScore({ score: false, scoreType: 'boolean' })).toBe('fail');
    expect(formatScore({ score: 0.666, scoreType: 'numerical' })).toBe('0.67');
    expect(formatScore({ score: 0, scoreType: 'error' })).toBe('error');
  });
});

describe('renderMarkdownReport', () => {
  const report = renderMarkdownReport(run, { outputTruncation: 10 });
  const lines = report.split('\n');

  it('summarizes the run', () => {
    expect(lines[0]).toBe('# Evaluation Report: Weather agent');
    expect(lines).toContain('| **Score** | 0.50 |');
    expect(lines).toContain('| **Total Execution Time** | 2.0s |');
    expect(lines).toContain('| Exact | 0.50 | 2 |');
  });

  it('lists item results with escaped details', () => {
    expect(lines).toContain('| Exact | pass | a\\|b |');
    expect(lines).toContain('| Exact | error |  |');
    expect(lines).toContain('**Error:** Agent execution timed out: Item porto timed out after 10ms');
  });

  it('truncates long output', () => {
    expect(report).toContain('xxxxxxxxxx\n...(truncated)');
    expect(report).toContain('(no output)');
  });

  it('includes metadata when given', () => {
    const withMetadata = renderMarkdownReport(run, {
      metadata: { evalSetPath: 'sets/weather.yaml', entrypoint: 'agent.ts', judgeModel: 'openai:judge', workers: 4, resumed: true },
    });
    expect(withMetadata).toContain('**Workers:** 4\n**Resumed:** yes\n');
  });
});

describe('report files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'report-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes markdown and JSON reports', async () => {
    const mdPath = path.join(dir, 'out', 'report.md');
    const jsonPath = path.join(dir, 'out', 'results.json');

    const markdown = await generateReport(run, { outputPath: mdPath });
    const json = await generateJsonResults(run, { outputPath: jsonPath });

    expect(await fs.readFile(mdPath, 'utf-8')).toBe(markdown);
    expect(JSON.parse(await fs.readFile(jsonPath, 'utf-8'))).toEqual(json);
    expect(json.summary.totalItems).toBe(2);
    expect(json.run.runId).toBe('run-1');
  });
});
