/**
 * Prints one progress line per lifecycle event.
 */

import type { EventBus, RunCreatedEvent, RunUpdatedEvent, SetRunCreatedEvent, SetRunUpdatedEvent } from './event-bus.js';

export class ConsoleProgressReporter {
  constructor(private readonly verbose = false) {}

  attach(bus: EventBus): () => void {
    const unsubscribers = [
      bus.subscribe('set-run-created', (event) => this.onSetRunCreated(event)),
      bus.subscribe('run-created', (event) => this.onRunCreated(event)),
      bus.subscribe('run-updated', (event) => this.onRunUpdated(event)),
      bus.subscribe('set-run-updated', (event) => this.onSetRunUpdated(event)),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  onSetRunCreated(event: SetRunCreatedEvent): void {
    console.log(
      `Evaluating ${event.evalSetName} (${event.itemIds.length} item(s), evaluators: ${event.evaluatorIds.join(', ') || 'none'})`,
    );
  }

  onRunCreated(event: RunCreatedEvent): void {
    console.log(`Running item ${event.itemId}: ${event.itemName.slice(0, 60)}`);
  }

  onRunUpdated(event: RunUpdatedEvent): void {
    if (event.error) {
      console.error(`  ${event.itemId} ERROR: ${event.error.detail}`);
    } else {
      console.log(
        `  ${event.itemId} ${event.status} | score ${event.score.toFixed(2)} | ${(event.executionTimeMs / 1000).toFixed(1)}s`,
      );
    }

    if (this.verbose) {
      for (const r of event.evaluatorResults) {
        const score = typeof r.result.score === 'boolean' ? String(r.result.score) : r.result.score.toFixed(2);
        console.log(`    ${r.evaluatorName}: ${score} (${r.result.scoreType})`);
      }
      for (const log of event.logs) {
        console.log(`    [${log.level}] ${log.message}`);
      }
    }
  }

  onSetRunUpdated(event: SetRunUpdatedEvent): void {
    console.log(`Run ${event.runId} ${event.status} | score ${event.score.toFixed(2)}`);
  }
}
