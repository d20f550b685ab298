import { ResultCache } from '@terrakit/keystore'
import {
  type DirectoryAnalysis,
  KnowledgeGraph,
  type NodeSuggestions,
  type SuggestionContext,
  SuggestionEngine,
  WorkflowAnalyzer,
} from '@terrakit/knowledge'
import { type Logger, makeLogger } from '@terrakit/logger'
import { type PropertyTable, SchemaRegistry } from '@terrakit/nodes'
import { errorMessage } from '@terrakit/utils'
import { readProjectFile, writeProjectFile } from '@terrakit/workflow'
import { ProjectRepair } from './projectRepair.js'
import type {
  AnalyzeOutcome,
  FailureType,
  OpenCheckResult,
  OptimizeOutcome,
  ProjectOpenChecker,
  RepairFileOutcome,
  RepairOptions,
  RepairOutcome,
  ValidateAndFixResultType,
} from './types.js'
import { WorkflowValidator } from './workflowValidator.js'

export interface TerrainServiceDeps {
  registry?: SchemaRegistry
  knowledge?: KnowledgeGraph
  analyzer?: WorkflowAnalyzer
  cache?: ResultCache
  openChecker?: ProjectOpenChecker
  logger?: Logger
}

export type PatternAnalysisOutcome = ({ success: true } & DirectoryAnalysis) | FailureType

/**
 * Entry point for hosts: every tool-level operation, with the shared
 * registry, knowledge graph and analyzer wired in once. Deterministic
 * read-only calls go through the result cache when one is supplied.
 */
export class TerrainService {
  readonly registry: SchemaRegistry
  readonly knowledge: KnowledgeGraph
  readonly analyzer: WorkflowAnalyzer
  private readonly repairer: ProjectRepair
  private readonly validator: WorkflowValidator
  private readonly suggestions: SuggestionEngine
  private readonly cache?: ResultCache
  private readonly openChecker?: ProjectOpenChecker
  private readonly logger: Logger

  constructor(deps: TerrainServiceDeps = {}) {
    this.logger = deps.logger ?? makeLogger('TerrainService')
    this.registry = deps.registry ?? SchemaRegistry.bundled()
    this.knowledge = deps.knowledge ?? KnowledgeGraph.bundled()
    this.analyzer = deps.analyzer ?? new WorkflowAnalyzer()
    this.cache = deps.cache
    this.openChecker = deps.openChecker
    this.repairer = new ProjectRepair(this.registry)
    this.validator = new WorkflowValidator(this.registry)
    this.suggestions = new SuggestionEngine(this.knowledge, this.analyzer)
  }

  async validateAndFix(workflow: unknown, strictMode = false): Promise<ValidateAndFixResultType> {
    return this.cached('validate_and_fix', { workflow, strictMode }, () =>
      this.validator.validateAndFix(workflow, strictMode),
    )
  }

  async analyzeProject(document: unknown): Promise<AnalyzeOutcome> {
    return this.cached(
      'analyze_project',
      { document },
      () => this.repairer.analyze(document),
      (result) => result.success,
    )
  }

  repairProject(document: unknown, options: RepairOptions = {}): RepairOutcome {
    return this.repairer.repair(document, options)
  }

  async analyzeProjectFile(path: string): Promise<AnalyzeOutcome> {
    try {
      return await this.analyzeProject(await readProjectFile(path))
    } catch (err) {
      this.logger.error(`Project analysis failed for ${path}: ${errorMessage(err)}`)
      return { success: false, error: errorMessage(err) }
    }
  }

  /**
   * Repairs a project file in place. With `backup` on (the default) the
   * original is first copied to `<path>.backup`.
   */
  async repairProjectFile(path: string, options: RepairOptions = {}): Promise<RepairFileOutcome> {
    try {
      const document = await readProjectFile(path)
      const result = this.repairer.repair(document, options)
      if (!result.success) return result

      let backupPath: string | undefined
      if (options.backup ?? true) {
        backupPath = `${path}.backup`
        await writeProjectFile(backupPath, document)
      }
      await writeProjectFile(path, result.repaired_document)
      this.logger.info('project file repaired', { path, fixes: result.fixes_applied.length })
      return {
        ...result,
        saved_path: path,
        ...(backupPath ? { backup_path: backupPath } : {}),
      }
    } catch (err) {
      this.logger.error(`Project repair failed for ${path}: ${errorMessage(err)}`)
      return { success: false, error: errorMessage(err) }
    }
  }

  optimizeProject(input: unknown): OptimizeOutcome {
    return this.repairer.optimize(input)
  }

  async optimizeProjectFile(path: string): Promise<OptimizeOutcome> {
    try {
      return this.repairer.optimize(await readProjectFile(path))
    } catch (err) {
      this.logger.error(`Project optimization failed for ${path}: ${errorMessage(err)}`)
      return { success: false, error: errorMessage(err) }
    }
  }

  // Learned suggestions change as the analyzer ingests projects, so these are never cached.
  suggestNodes(types: readonly string[], context: SuggestionContext = {}): NodeSuggestions {
    return this.suggestions.suggest(types, context)
  }

  getNodeProperties(type: string): PropertyTable {
    return this.registry.getPropertyDefinitions(type)
  }

  isValidNodeType(type: string): boolean {
    return this.registry.isValidNodeType(type)
  }

  async analyzeWorkflowPatterns(directory: string): Promise<PatternAnalysisOutcome> {
    try {
      const summary = await this.analyzer.analyzeDirectory(directory)
      return { success: true, ...summary }
    } catch (err) {
      this.logger.error(`Pattern analysis failed: ${errorMessage(err)}`)
      return { success: false, error: errorMessage(err) }
    }
  }

  async verifyProjectOpens(path: string): Promise<OpenCheckResult> {
    if (!this.openChecker) {
      return { success: false, error: 'No project-open checker configured' }
    }
    try {
      return await this.openChecker.canOpen(path)
    } catch (err) {
      this.logger.error(`Open check failed for ${path}: ${errorMessage(err)}`)
      return { success: false, error: errorMessage(err) }
    }
  }

  private async cached<T>(
    operation: string,
    params: unknown,
    compute: () => T,
    keep?: (value: T) => boolean,
  ): Promise<T> {
    if (!this.cache) return compute()
    return this.cache.remember(operation, params, compute, keep)
  }
}
