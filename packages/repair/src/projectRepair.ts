import {
  Category,
  type Diagnostic,
  ErrorHandler,
  type ErrorSummaryType,
  Severity,
  autoFix,
  toErrorDict,
} from '@terrakit/diagnostics'
import { type Logger, makeLogger } from '@terrakit/logger'
import { PropertyValidator, type SchemaRegistry } from '@terrakit/nodes'
import { deepClone, errorMessage, formatValue, isNumber, isRecord } from '@terrakit/utils'
import {
  type ConnectionType,
  StructureValidator,
  type TerrainNodeType,
  UNFIXABLE_STRUCTURE_ERRORS,
  WorkflowExtractor,
  applyWorkflowToDocument,
} from '@terrakit/workflow'
import type {
  AnalyzeOutcome,
  FailureType,
  OptimizeOutcome,
  RepairOptions,
  RepairOutcome,
} from './types.js'
import { normalizeWorkflow } from './workflowValidator.js'

export const COLORIZATION_TYPES: ReadonlySet<string> = new Set([
  'SatMap',
  'CLUTer',
  'SuperColor',
  'Weathering',
])

// Below this many nodes a missing colour pass is not worth mentioning.
const COLORIZATION_MIN_NODES = 4

export const MAX_EROSION_DURATION = 0.1
export const MAX_RIVER_HEADWATERS = 200
const DEFAULT_COMBINE_RATIO = 0.5

export function healthScore(
  summary: Pick<ErrorSummaryType, 'critical' | 'errors' | 'warnings'>,
): number {
  return Math.max(0, 100 - 25 * summary.critical - 10 * summary.errors - 3 * summary.warnings)
}

interface OptimizedGraph {
  optimizations: string[]
  nodes: TerrainNodeType[]
  connections: ConnectionType[]
}

function failure(error: string): FailureType {
  return { success: false, error }
}

export interface ProjectRepairOptions {
  extractor?: WorkflowExtractor
  structure?: StructureValidator
  logger?: Logger
}

/**
 * Whole-project analysis, repair and optimisation. Every entry point works
 * on copies and reports malformed input as `{ success: false, error }`.
 */
export class ProjectRepair {
  private readonly extractor: WorkflowExtractor
  private readonly structure: StructureValidator
  private readonly validator: PropertyValidator
  private readonly logger: Logger

  constructor(
    private readonly registry: SchemaRegistry,
    options: ProjectRepairOptions = {},
  ) {
    this.logger = options.logger ?? makeLogger('ProjectRepair')
    this.extractor = options.extractor ?? new WorkflowExtractor()
    this.structure = options.structure ?? new StructureValidator()
    this.validator = new PropertyValidator(registry, this.logger)
  }

  analyze(document: unknown): AnalyzeOutcome {
    try {
      const { nodes, connections } = this.extractor.extract(document)
      const handler = new ErrorHandler(this.registry, this.validator, this.logger)

      this.checkStructure(document, handler)
      handler.validateNodes(nodes)
      handler.validateConnections(nodes, connections)
      handler.checkPerformance(nodes, connections)
      for (const d of this.checkBestPractices(nodes)) handler.add(d)

      const summary = handler.summary()
      return {
        success: true,
        analysis: {
          node_count: nodes.length,
          connection_count: connections.length,
          errors: summary,
          can_auto_fix: summary.auto_fixable > 0,
          health_score: healthScore(summary),
        },
        errors: handler.all().map(toErrorDict),
      }
    } catch (err) {
      this.logger.error(`Project analysis failed: ${errorMessage(err)}`)
      return failure(errorMessage(err))
    }
  }

  repair(document: unknown, options: RepairOptions = {}): RepairOutcome {
    const { autoFix: fix = true, backup = true } = options
    if (!isRecord(document)) return failure('Project data must be an object')

    const original = this.analyze(document)
    if (!original.success) return original

    try {
      const fixes: string[] = []
      let repaired = deepClone(document)

      if (fix) {
        const shape = this.structure.validate(document)
        if (!shape.valid || shape.warnings.length > 0) {
          const fixed = this.structure.fix(document)
          repaired = fixed.document
          fixes.push(...fixed.fixes)
        }

        const { nodes, connections } = this.extractor.extract(repaired)
        const auto = autoFix(nodes, connections, this.registry)
        fixes.push(...auto.fixesApplied)
        const kept = this.removeOrphans(auto.nodes, auto.connections, fixes)
        const filled = this.fillDefaults(kept, fixes)
        repaired = applyWorkflowToDocument(
          repaired,
          { nodes: filled, connections: auto.connections },
          this.extractor,
        )
      }

      this.logger.info('project repaired', { fixes: fixes.length })
      return {
        success: true,
        original_analysis: original,
        post_repair_analysis: this.analyze(repaired),
        fixes_applied: fixes,
        backup_available: backup,
        ...(backup ? { backup_data: deepClone(document) } : {}),
        repaired_document: repaired,
      }
    } catch (err) {
      this.logger.error(`Project repair failed: ${errorMessage(err)}`)
      return failure(errorMessage(err))
    }
  }

  /**
   * Caps erosion duration and river headwaters, and drops Combine nodes that
   * only pass a single input through at the default ratio. Accepts a project
   * document or a plain `{nodes, connections}` workflow.
   */
  optimize(input: unknown): OptimizeOutcome {
    try {
      if (isRecord(input) && Array.isArray(input.nodes)) {
        const { nodes, connections } = normalizeWorkflow(input)
        const result = this.optimizeGraph(nodes, connections)
        return {
          success: true,
          optimizations_applied: result.optimizations,
          optimization_count: result.optimizations.length,
          workflow: { nodes: result.nodes, connections: result.connections },
        }
      }
      if (!isRecord(input)) return failure('Project data must be an object')

      const { nodes, connections } = this.extractor.extract(input)
      const result = this.optimizeGraph(nodes, connections)
      return {
        success: true,
        optimizations_applied: result.optimizations,
        optimization_count: result.optimizations.length,
        optimized_document: applyWorkflowToDocument(
          input,
          { nodes: result.nodes, connections: result.connections },
          this.extractor,
        ),
      }
    } catch (err) {
      this.logger.error(`Project optimization failed: ${errorMessage(err)}`)
      return failure(errorMessage(err))
    }
  }

  private checkStructure(document: unknown, handler: ErrorHandler): void {
    const { errors, warnings } = this.structure.validate(document)
    const suggestion = 'Run repair to restore the missing project structure'
    for (const message of errors) {
      handler.add({
        message,
        severity: Severity.CRITICAL,
        category: Category.STRUCTURE,
        suggestion,
        fix: UNFIXABLE_STRUCTURE_ERRORS.has(message) ? 'none' : 'default-fill',
      })
    }
    for (const message of warnings) {
      handler.add({
        message,
        severity: Severity.WARNING,
        category: Category.STRUCTURE,
        suggestion,
        fix: 'default-fill',
      })
    }
  }

  private checkBestPractices(nodes: readonly TerrainNodeType[]): Diagnostic[] {
    const found: Diagnostic[] = []
    const hasColor = nodes.some((n) => COLORIZATION_TYPES.has(n.type))
    if (!hasColor && nodes.length >= COLORIZATION_MIN_NODES) {
      found.push({
        message: 'Project has no colorization nodes',
        severity: Severity.INFO,
        category: Category.STRUCTURE,
        suggestion: 'Consider adding SatMap or CLUTer for realistic colors',
        fix: 'none',
      })
    }
    if (!nodes.some((n) => this.registry.isTerminalType(n.type))) {
      found.push({
        message: 'Project has no export nodes',
        severity: Severity.WARNING,
        category: Category.STRUCTURE,
        suggestion: 'Add Export node to save terrain output',
        fix: 'none',
      })
    }
    return found
  }

  // Generators and outputs are kept even when nothing connects to them.
  private removeOrphans(
    nodes: readonly TerrainNodeType[],
    connections: readonly ConnectionType[],
    fixes: string[],
  ): TerrainNodeType[] {
    const connected = new Set<number>()
    for (const c of connections) {
      connected.add(c.from_node)
      connected.add(c.to_node)
    }
    return nodes.filter((node) => {
      if (connected.has(node.id)) return true
      if (this.registry.isGeneratorType(node.type) || this.registry.isTerminalType(node.type)) {
        return true
      }
      fixes.push(`Removed orphaned ${node.type} node: ${node.name}`)
      return false
    })
  }

  private fillDefaults(nodes: readonly TerrainNodeType[], fixes: string[]): TerrainNodeType[] {
    return nodes.map((node) => {
      if (!this.registry.hasNodeSpecificProperties(node.type)) return node
      const { properties, added } = this.validator.applyDefaults(node.type, node.properties)
      for (const { property, value } of added) {
        fixes.push(`Added default ${property}=${formatValue(value)} to ${node.name}`)
      }
      return { ...node, properties }
    })
  }

  private optimizeGraph(
    nodes: readonly TerrainNodeType[],
    connections: readonly ConnectionType[],
  ): OptimizedGraph {
    const optimizations: string[] = []
    const tuned = deepClone([...nodes])

    for (const node of tuned) {
      const { Duration: duration, Headwaters: headwaters } = node.properties
      if (node.type === 'Erosion' || node.type === 'Erosion2') {
        if (isNumber(duration) && duration > MAX_EROSION_DURATION) {
          node.properties.Duration = MAX_EROSION_DURATION
          optimizations.push(
            `Reduced ${node.name} duration from ${duration} to ${MAX_EROSION_DURATION} ` +
              'for better performance',
          )
        }
      } else if (node.type === 'Rivers') {
        if (isNumber(headwaters) && headwaters > MAX_RIVER_HEADWATERS) {
          node.properties.Headwaters = MAX_RIVER_HEADWATERS
          optimizations.push(
            `Reduced ${node.name} headwaters from ${headwaters} to ${MAX_RIVER_HEADWATERS}`,
          )
        }
      }
    }

    const redundant = new Set(
      tuned
        .filter((n) => n.type === 'Combine')
        .filter((n) => (n.properties.Ratio ?? DEFAULT_COMBINE_RATIO) === DEFAULT_COMBINE_RATIO)
        .filter((n) => connections.filter((c) => c.to_node === n.id).length === 1)
        .map((n) => n.id),
    )
    if (redundant.size > 0) optimizations.push(`Removed ${redundant.size} redundant nodes`)

    return {
      optimizations,
      nodes: tuned.filter((n) => !redundant.has(n.id)),
      connections: connections.filter(
        (c) => !redundant.has(c.from_node) && !redundant.has(c.to_node),
      ),
    }
  }
}
