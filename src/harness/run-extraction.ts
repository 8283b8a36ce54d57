import { writeFileSync } from 'node:fs';

import type ts from 'typescript';

import { bindAmbientGlobals } from '../config/ambient-globals.js';
import type { ExtractionConfig } from '../config/extraction-config-types.js';
import { createCapabilityResolver } from '../kernel/capability-resolver.js';
import {
  checkpointCollector,
  collectContainer,
  collectedSince,
  createCollector,
  emitDiagnostic,
  rollbackCollector,
  type ContainerCollector,
} from '../kernel/collector.js';
import type { ContainerNode } from '../kernel/declaration-nodes.js';
import { createDeclarationRegistry } from '../kernel/declaration-registry.js';
import type { Diagnostic } from '../kernel/diagnostics.js';
import { describeThrown, isExtractionError, isFatalExtractionError } from '../kernel/extraction-error.js';
import { serializeContainers } from '../kernel/graph-serializer.js';
import { Interpreter } from '../kernel/interpreter.js';
import { validateDocumentFile, type OutputValidationResult } from '../kernel/output-validator.js';
import type { ExtractionDocument } from '../kernel/schemas-document.js';
import { Scope } from '../kernel/scope.js';
import { discoverEntryPoints, type EntryPoint } from '../source/entry-points.js';
import { loadExtractionSource, type SourceText } from '../source/load-extraction-source.js';
import { buildNameBindings, type NameBindingTable } from '../source/name-bindings.js';
import { neutralizeSource } from '../source/neutralize-source.js';
import { assertSupportedSyntax } from '../source/syntax-support.js';
import { transpileSource } from '../source/transpile-source.js';
import { RunLogger } from './logger.js';

export type RunPhase = 'idle' | 'loading' | 'transpiling' | 'executing' | 'collected' | 'serialized' | 'validated' | 'failed';

const NEXT_PHASES: Readonly<Record<RunPhase, readonly RunPhase[]>> = {
  idle: ['loading', 'transpiling', 'failed'],
  loading: ['transpiling', 'failed'],
  transpiling: ['executing', 'failed'],
  executing: ['collected', 'failed'],
  collected: ['serialized', 'failed'],
  serialized: ['validated', 'failed'],
  validated: [],
  failed: [],
};

/** Everything about a run except where its files live. */
export type ExtractionSettings = Pick<
  ExtractionConfig,
  'domain' | 'entryPoints' | 'nameBindings' | 'variants' | 'containers' | 'tables' | 'globals' | 'placeholder'
>;

export interface UnitOutcome {
  readonly unit: string;
  readonly ok: boolean;
  /** Containers the unit left in the collector. */
  readonly containers: number;
  readonly message?: string;
}

export interface ExtractionSummary {
  readonly containers: number;
  readonly children: number;
  readonly childrenWithRequirement: number;
}

export interface ExtractionReport {
  readonly domain: string;
  readonly fileName: string;
  readonly phases: RunPhase[];
  removedModuleStatements: number;
  readonly statements: UnitOutcome[];
  readonly entryPoints: UnitOutcome[];
  readonly diagnostics: Diagnostic[];
  summary: ExtractionSummary;
  validation?: OutputValidationResult;
  outputPath?: string;
}

export interface ExtractionResult {
  readonly document: ExtractionDocument;
  readonly containers: readonly ContainerNode[];
  readonly report: ExtractionReport;
}

export interface ExtractDeclarationsOptions {
  readonly settings: ExtractionSettings;
  readonly companion?: SourceText;
  readonly logger?: RunLogger;
}

class PhaseTracker {
  constructor(
    private readonly phases: RunPhase[],
    private readonly logger: RunLogger,
  ) {}

  get current(): RunPhase {
    return this.phases[this.phases.length - 1] ?? 'idle';
  }

  enter(next: RunPhase): void {
    if (!NEXT_PHASES[this.current].includes(next)) {
      throw new Error(`Illegal run transition ${this.current} -> ${next}.`);
    }
    this.phases.push(next);
    this.logger.debug(`phase ${next}`);
  }
}

function summarize(document: ExtractionDocument): ExtractionSummary {
  let children = 0;
  let childrenWithRequirement = 0;
  for (const container of document) {
    for (const child of container.children) {
      children += 1;
      if (typeof child !== 'object' || child === null || Array.isArray(child)) continue;
      const requirement = child.requirement;
      if (requirement !== undefined && requirement !== null) {
        childrenWithRequirement += 1;
      }
    }
  }
  return { containers: document.length, children, childrenWithRequirement };
}

const statementLabel = (sourceFile: ts.SourceFile, statement: ts.Statement): string =>
  `${sourceFile.fileName}:${sourceFile.getLineAndCharacterOfPosition(statement.getStart(sourceFile)).line + 1}`;

interface UnitRunner {
  run(unit: string, code: 'STATEMENT_EXECUTION_FAILED' | 'ENTRY_POINT_EXECUTION_FAILED', body: () => void): UnitOutcome;
}

function createUnitRunner(collector: ContainerCollector, logger: RunLogger): UnitRunner {
  return {
    run(unit, code, body) {
      const checkpoint = checkpointCollector(collector);
      try {
        body();
        return { unit, ok: true, containers: collectedSince(collector, checkpoint) };
      } catch (error) {
        if (isFatalExtractionError(error)) {
          throw error;
        }
        const dropped = rollbackCollector(collector, checkpoint);
        const message = describeThrown(error);
        emitDiagnostic(collector, {
          code,
          path: unit,
          severity: 'warning',
          message: isExtractionError(error) ? `${error.code}: ${message}` : message,
        });
        logger.warn(`${unit} failed: ${message}${dropped > 0 ? ` (${dropped} container(s) discarded)` : ''}`);
        return { unit, ok: false, containers: 0, message };
      }
    },
  };
}

function invokeEntryPoint(interpreter: Interpreter, scope: Scope, entry: EntryPoint): void {
  if (entry.owner === undefined) {
    interpreter.callValue(scope.lookup(entry.name), undefined, [], entry.qualifiedName);
    return;
  }
  // An owner missing here failed to declare; resolving it would only yield a capability.
  if (!scope.has(entry.owner)) {
    throw new Error(`${entry.owner} is not defined.`);
  }
  const owner = scope.lookup(entry.owner);
  interpreter.callValue(interpreter.getMember(owner, entry.name), owner, [], entry.qualifiedName);
}

function runExtractionPipeline(
  target: SourceText,
  options: ExtractDeclarationsOptions,
  tracker: PhaseTracker,
  report: ExtractionReport,
  logger: RunLogger,
): ExtractionResult {
  const { settings } = options;

  tracker.enter('transpiling');
  const neutralized = neutralizeSource(target.text, target.fileName);
  report.removedModuleStatements = neutralized.removed;
  const transpiled = transpileSource(neutralized.text, target.fileName);
  assertSupportedSyntax(transpiled.sourceFile);
  const entryPoints = discoverEntryPoints(neutralized.text, target.fileName, new RegExp(settings.entryPoints.pattern));
  logger.info(`Found ${entryPoints.length} entry point(s) in ${target.fileName}`);

  tracker.enter('executing');
  const collector = createCollector();
  const registry = createDeclarationRegistry({
    tables: settings.tables,
    requirements: settings.variants.requirements,
    quests: settings.variants.quests,
    suffixes: settings.variants.suffixes,
    containers: settings.containers,
    collect: (container) => collectContainer(collector, container),
  });

  const { companion } = options;
  const nameBindings = (): NameBindingTable => {
    if (companion === undefined) {
      return new Map<string, string>();
    }
    const table = buildNameBindings(companion.text, settings.nameBindings.constructors, companion.fileName);
    logger.info(`Loaded ${table.size} name binding(s) from ${companion.fileName}`);
    return table;
  };
  const resolver = createCapabilityResolver({
    placeholder: settings.placeholder,
    nameBindings,
    structuralMatch: (name) => registry.structuralMatch(name),
  });

  const scope = Scope.createGlobal((root, name) => resolver.resolve(root, name));
  for (const [name, constructor] of registry.bindings) {
    scope.declare(name, constructor, 'var');
  }
  const guestLogger = logger.child('guest');
  bindAmbientGlobals(scope, {
    globals: settings.globals,
    placeholder: settings.placeholder,
    log: (message) => guestLogger.debug(message),
  });

  const interpreter = new Interpreter(transpiled.sourceFile, {
    missingMember: (target, key) => registry.missingMember(target, key),
  });
  const units = createUnitRunner(collector, logger);
  const statements = transpiled.sourceFile.statements;
  interpreter.hoist(statements, scope);

  for (const statement of statements) {
    const outcome = units.run(statementLabel(transpiled.sourceFile, statement), 'STATEMENT_EXECUTION_FAILED', () => {
      const completion = interpreter.execute(statement, scope);
      if (completion.kind !== 'normal') {
        throw new Error(`Unexpected ${completion.kind} at top level.`);
      }
    });
    report.statements.push(outcome);
  }

  for (const entry of entryPoints) {
    const outcome = units.run(entry.qualifiedName, 'ENTRY_POINT_EXECUTION_FAILED', () =>
      invokeEntryPoint(interpreter, scope, entry),
    );
    if (outcome.ok) {
      logger.debug(`${entry.qualifiedName} produced ${outcome.containers} container(s)`);
    }
    report.entryPoints.push(outcome);
  }
  report.diagnostics.push(...collector.diagnostics);

  tracker.enter('collected');
  logger.info(`Collected ${collector.containers.length} container(s)`);

  const document = serializeContainers(collector.containers);
  tracker.enter('serialized');
  report.summary = summarize(document);
  logger.info(`Serialized ${report.summary.containers} container(s)`);
  logger.info(`Total children: ${report.summary.children}`);
  logger.info(`Children with requirements: ${report.summary.childrenWithRequirement}`);

  return { document, containers: collector.containers, report };
}

function createReport(domain: string, fileName: string): ExtractionReport {
  return {
    domain,
    fileName,
    phases: ['idle'],
    removedModuleStatements: 0,
    statements: [],
    entryPoints: [],
    diagnostics: [],
    summary: { containers: 0, children: 0, childrenWithRequirement: 0 },
  };
}

/** Serialized text of an extraction document, as written to disk. */
export const formatDocument = (document: ExtractionDocument): string => `${JSON.stringify(document, null, 2)}\n`;

/**
 * Executes declaration source in memory and returns the serialized containers.
 * Stops at `serialized`; nothing is written or validated.
 */
export function extractDeclarations(target: SourceText, options: ExtractDeclarationsOptions): ExtractionResult {
  const logger = options.logger ?? RunLogger.scope(options.settings.domain);
  const report = createReport(options.settings.domain, target.fileName);
  const tracker = new PhaseTracker(report.phases, logger);
  try {
    return runExtractionPipeline(target, options, tracker, report, logger);
  } catch (error) {
    if (tracker.current !== 'failed') {
      tracker.enter('failed');
    }
    throw error;
  }
}

export interface RunExtractionOptions {
  readonly logger?: RunLogger;
  /** Overrides `config.output`. */
  readonly outputPath?: string;
}

/** Full run for one configured domain: load, execute, write the document, then validate it. */
export function runExtraction(config: ExtractionConfig, options: RunExtractionOptions = {}): ExtractionResult {
  const logger = options.logger ?? RunLogger.scope(config.domain);
  const outputPath = options.outputPath ?? config.output;
  const report = createReport(config.domain, config.source);
  const tracker = new PhaseTracker(report.phases, logger);

  try {
    tracker.enter('loading');
    logger.info(`Loading ${config.source}`);
    const source = loadExtractionSource(config.source, config.companion);
    const result = runExtractionPipeline(
      source.target,
      source.companion === undefined ? { settings: config } : { settings: config, companion: source.companion },
      tracker,
      report,
      logger,
    );

    const text = formatDocument(result.document);
    writeFileSync(outputPath, text, 'utf8');
    report.outputPath = outputPath;
    logger.info(`Output written to ${outputPath}`);

    const validation = validateDocumentFile(outputPath);
    report.validation = validation;
    report.diagnostics.push(...validation.diagnostics);
    if (validation.ok) {
      logger.info('Output validation passed');
    } else {
      logger.error(`Output validation failed: ${validation.error ?? 'unknown error'}`);
    }
    tracker.enter('validated');
    return result;
  } catch (error) {
    if (tracker.current !== 'failed') {
      tracker.enter('failed');
    }
    logger.error(describeThrown(error));
    throw error;
  }
}
