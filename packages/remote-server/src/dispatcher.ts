import { z } from 'zod'
import { type Logger, makeLogger } from '@terrakit/logger'
import type { TerrainService } from '@terrakit/repair'
import { errorMessage } from '@terrakit/utils'
import type { IssueSchemaType } from './schemas/common.js'
import type { ToolInfoType } from './schemas/tools.js'
import { TOOLS, type Tool } from './tools.js'

export type DispatchResult =
  | { status: 200; body: { success: true; tool: string; result: unknown } }
  | { status: 400; body: { success: false; error: 'ValidationError'; issues: IssueSchemaType[] } }
  | { status: 404 | 500; body: { success: false; error: string } }

/** Looks tools up by name, validates their parameters and runs them against the service. */
export class ToolDispatcher {
  private readonly tools = new Map<string, Tool>()
  private readonly logger: Logger

  constructor(
    private readonly service: TerrainService,
    tools: readonly Tool[] = TOOLS,
    logger?: Logger,
  ) {
    this.logger = logger ?? makeLogger('ToolDispatcher')
    for (const tool of tools) this.tools.set(tool.name, tool)
  }

  get size(): number {
    return this.tools.size
  }

  has(name: string): boolean {
    return this.tools.has(name)
  }

  list(): ToolInfoType[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: z.toJSONSchema(tool.parameters, { io: 'input' }),
    }))
  }

  async execute(name: string, parameters: unknown): Promise<DispatchResult> {
    const tool = this.tools.get(name)
    if (!tool) {
      return { status: 404, body: { success: false, error: `Unknown tool: ${name}` } }
    }

    const call = tool.parse(parameters)
    if (!call.success) {
      this.logger.warn('invalid tool parameters', { tool: name, issues: call.issues })
      return {
        status: 400,
        body: { success: false, error: 'ValidationError', issues: call.issues },
      }
    }

    try {
      const result = await call.run(this.service)
      this.logger.trace('tool executed', { tool: name })
      return { status: 200, body: { success: true, tool: name, result } }
    } catch (err) {
      this.logger.error(`Tool ${name} failed: ${errorMessage(err)}`)
      return { status: 500, body: { success: false, error: errorMessage(err) } }
    }
  }
}
