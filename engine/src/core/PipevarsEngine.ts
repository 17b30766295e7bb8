/**
 * Pipevars Engine - Main Public API
 *
 * Orchestrates one resolution: parse the invocation, derive the standard
 * context, evaluate expressions, merge and project. Each call is
 * independent; nothing is kept between resolutions.
 *
 * @module core
 */

import { ErrorSeverity } from '../errors/ErrorCodes.js';
import { ExpressionError } from '../errors/ExpressionError.js';
import { OutputCollision } from '../errors/OutputErrors.js';
import type { PipevarsError } from '../errors/PipevarsError.js';
import { DispatchDetector, type DispatchReferences } from '../context/DispatchDetector.js';
import { detectTrigger } from '../context/PipelineContext.js';
import { StandardContextResolver, type CatalogDescription } from '../context/StandardContextResolver.js';
import { ExpressionEvaluator } from '../expression/ExpressionEvaluator.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { CandidateTable } from '../merge/CandidateTable.js';
import { CoalescingMerger } from '../merge/CoalescingMerger.js';
import { ResolutionScope } from '../merge/ResolutionScope.js';
import { EXPRESSION_OUTPUTS, OutputProjector, type Projection } from '../output/OutputProjector.js';
import { AssignmentParser } from '../parser/AssignmentParser.js';
import { InvocationParser, type InvocationConfig } from '../parser/InvocationParser.js';
import {
  VariableSource,
  type JsonObject,
  type PipelineContext,
  type ResolvedVariable,
  type ResultSet,
  type ScalarValue,
  type TriggerType,
} from '../types/core-types.js';
import { LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import type { EngineLogger } from './EngineLogger.js';
import { toLogLevel } from './EngineLogger.js';
import {
  applyConfigDefaults,
  validateConfig,
  type PipevarsEngineConfig,
  type ResolvedEngineConfig,
} from './EngineConfig.js';

/**
 * Everything one resolution produced
 */
export interface ResolutionOutcome {
  invocation: InvocationConfig;
  trigger: TriggerType;
  resultSet: ResultSet;
  projection: Projection;
  /** Every recovered problem, in the order it was found */
  diagnostics: PipevarsError[];
  /** References found in dispatch inputs (empty when auto-detection did not run) */
  dispatch: DispatchReferences;
  /** Whether the host should fail the step */
  failed: boolean;
}

const discard = (): void => undefined;

/**
 * Pipevars Engine
 *
 * @example
 * ```ts
 * const engine = new PipevarsEngine({ nullability: 'strict' });
 * const outcome = await engine.resolve(
 *   { static_inputs: 'username=alice', jinja_inputs: "greeting='hi ' ~ username" },
 *   { eventName: 'push', payload: {}, ref: 'refs/heads/main' }
 * );
 * outcome.projection.outputs.get('greeting'); // 'hi alice'
 * ```
 */
export class PipevarsEngine {
  private readonly config: ResolvedEngineConfig;
  private readonly logger: EngineLogger;
  private readonly standard: StandardContextResolver;

  constructor(config: PipevarsEngineConfig = {}) {
    validateConfig(config);
    this.config = applyConfigDefaults(config);
    this.logger = this.setupLogger(config);
    this.standard = new StandardContextResolver({
      catalog: this.config.catalog,
      nullability: this.config.nullability,
    });

    this.logger.debug('Pipevars engine created', {
      nullability: this.config.nullability,
      catalogVersion: this.standard.catalogVersion,
      fetcher: this.config.fetcher !== undefined,
    }, 'system', 'PipevarsEngine');
  }

  /**
   * Resolve raw step inputs against a pipeline context
   *
   * @param inputs - Step input name to raw value (canonical or alias names)
   * @throws {InvocationError} If an input is structurally invalid
   * @throws {NullabilityViolation} In strict mode
   */
  async resolve(inputs: Record<string, unknown>, context: PipelineContext): Promise<ResolutionOutcome> {
    return this.resolveInvocation(InvocationParser.parse(inputs), context);
  }

  /**
   * Resolve an already parsed invocation
   */
  async resolveInvocation(invocation: InvocationConfig, context: PipelineContext): Promise<ResolutionOutcome> {
    const diagnostics: PipevarsError[] = [];

    const statics = AssignmentParser.parse(invocation.staticInputs, 'static_inputs', 'static');
    const expressions = AssignmentParser.parse(invocation.jinjaInputs, 'jinja_inputs', 'expression');
    diagnostics.push(...statics.errors, ...expressions.errors);

    const table = new CandidateTable();
    for (const assignment of statics.assignments) {
      table.addUser(assignment.name, assignment.rawValue, VariableSource.STATIC);
    }

    let trigger = detectTrigger(context.eventName);
    let dispatch: DispatchReferences = {};
    if (invocation.standardCiVars) {
      const overlay = new Map<string, ScalarValue>();
      const { fetcher } = this.config;
      if (invocation.autoDetect && fetcher && hasDispatchInputs(context.payload)) {
        const detector = new DispatchDetector({ fetcher, timeoutMs: invocation.fetchTimeoutMs });
        const detection = await detector.detect(context.payload);
        dispatch = detection.references;
        detection.overlay.forEach((value, name) => overlay.set(name, value));
        diagnostics.push(...detection.errors);
      }

      const standard = this.standard.resolve(context, overlay);
      trigger = standard.trigger;
      diagnostics.push(...standard.violations);
      standard.values.forEach((value, name) => table.addStandard(name, value));
    }

    const scope = new ResolutionScope(table, context.payload);
    for (const assignment of expressions.assignments) {
      const value = this.evaluate(assignment.rawValue, scope, `jinja_inputs:${assignment.line}`, diagnostics);
      table.addUser(assignment.name, value, VariableSource.EXPRESSION);
    }

    const fixed: ResolvedVariable[] = [];
    const supplied = new Set<string>();
    for (const name of EXPRESSION_OUTPUTS) {
      const expression = invocation.expressions[name];
      if (expression === undefined) continue;
      supplied.add(name);
      const value = this.evaluate(expression, scope, name, diagnostics);
      fixed.push({
        name,
        value,
        source: VariableSource.EXPRESSION,
        candidates: [{ value, source: VariableSource.EXPRESSION, declaredAs: name }],
      });
    }

    const merged = CoalescingMerger.merge(table, fixed);
    diagnostics.push(...merged.diagnostics);

    const projection = OutputProjector.project(merged.resultSet, {
      userNames: new Set(table.userNames()),
      suppliedExpressions: supplied,
    });
    diagnostics.push(...projection.diagnostics);

    const failed = invocation.failOnError && diagnostics.some(isValueError);
    this.logger.info(`Resolved ${merged.resultSet.size} variable(s)`, {
      trigger,
      user: table.userNames().length,
      diagnostics: diagnostics.length,
      failed,
    }, 'system', 'PipevarsEngine');

    return {
      invocation,
      trigger,
      resultSet: merged.resultSet,
      projection,
      diagnostics,
      dispatch,
      failed,
    };
  }

  /**
   * Standard-context definitions known to this engine
   */
  describeCatalog(): CatalogDescription[] {
    return this.standard.describeCatalog();
  }

  getCatalogVersion(): number {
    return this.standard.catalogVersion;
  }

  /**
   * Get engine configuration
   */
  getConfig(): Readonly<ResolvedEngineConfig> {
    return this.config;
  }

  private evaluate(
    expression: string,
    scope: ResolutionScope,
    location: string,
    diagnostics: PipevarsError[]
  ): ScalarValue {
    if (expression === '') {
      return '';
    }
    try {
      return ExpressionEvaluator.evaluate(expression, scope);
    } catch (error) {
      if (!(error instanceof ExpressionError)) {
        throw error;
      }
      const located = error.at(location);
      this.logger.warn(located.message, { code: located.code, path: location }, 'analysis', 'PipevarsEngine');
      diagnostics.push(located);
      return null;
    }
  }

  /**
   * Initialize the shared logger, or reconfigure it when a host already did
   */
  private setupLogger(config: PipevarsEngineConfig): EngineLogger {
    const level = toLogLevel(this.config.logLevel);
    const sink = level === null ? discard : this.config.logSink;

    if (!LoggerManager.isReady()) {
      const loggerConfig: Partial<EngineLoggerConfig> = {
        level: level ?? LogLevel.FATAL,
        format: this.config.logFormat,
        source: 'PipevarsEngine',
      };
      if (sink) loggerConfig.sink = sink;
      return LoggerManager.initialize(loggerConfig);
    }

    const logger = LoggerManager.getLogger();
    if (config.logLevel !== undefined || config.verbose) {
      logger.setLevel(level ?? LogLevel.FATAL);
    }
    if (config.logFormat !== undefined) {
      logger.setFormat(this.config.logFormat);
    }
    if (sink) {
      logger.setSink(sink);
    }
    return logger;
  }
}

function hasDispatchInputs(payload: JsonObject): boolean {
  const inputs = payload.inputs;
  return typeof inputs === 'object' && inputs !== null && !Array.isArray(inputs);
}

/**
 * Problems with a value (as opposed to reserved-name notices) that fail the
 * step under `fail_on_error`
 */
function isValueError(diagnostic: PipevarsError): boolean {
  if (diagnostic instanceof OutputCollision) {
    return false;
  }
  return diagnostic.severity === ErrorSeverity.ERROR || diagnostic.severity === ErrorSeverity.WARNING;
}
