import type { ContainerNode } from './declaration-nodes.js';
import type { Diagnostic } from './diagnostics.js';

/** Containers keyed by name: a name keeps its first position and holds the latest container built under it. */
export interface ContainerCollector {
  readonly containers: ContainerNode[];
  readonly diagnostics: Diagnostic[];
}

/** State of the collector when a unit of execution started. */
export interface CollectorCheckpoint {
  readonly containers: readonly ContainerNode[];
  readonly diagnostics: number;
}

export function createCollector(): ContainerCollector {
  return {
    containers: [],
    diagnostics: [],
  };
}

export function collectContainer(collector: ContainerCollector, container: ContainerNode): void {
  const index = collector.containers.findIndex((entry) => entry.name === container.name);
  if (index === -1) {
    collector.containers.push(container);
    return;
  }
  collector.containers[index] = container;
  emitDiagnostic(collector, {
    code: 'CONTAINER_REPLACED',
    path: container.name,
    severity: 'warning',
    message: `Container '${container.name}' was declared again; the later declaration replaces the earlier one.`,
  });
}

export function emitDiagnostic(collector: ContainerCollector | undefined, diagnostic: Diagnostic): void {
  if (collector === undefined) return;
  collector.diagnostics.push(diagnostic);
}

export function checkpointCollector(collector: ContainerCollector): CollectorCheckpoint {
  return { containers: [...collector.containers], diagnostics: collector.diagnostics.length };
}

/** Containers added or replaced since `checkpoint`. */
export function collectedSince(collector: ContainerCollector, checkpoint: CollectorCheckpoint): number {
  const before = new Set(checkpoint.containers);
  return collector.containers.filter((container) => !before.has(container)).length;
}

/**
 * Restores the containers and diagnostics recorded at `checkpoint`, including any container a later
 * declaration replaced; returns how many added or replacing containers were discarded.
 */
export function rollbackCollector(collector: ContainerCollector, checkpoint: CollectorCheckpoint): number {
  const dropped = collectedSince(collector, checkpoint);
  collector.containers.splice(0, collector.containers.length, ...checkpoint.containers);
  collector.diagnostics.splice(checkpoint.diagnostics);
  return dropped;
}
