import type { ConditionScore, Detection } from "@pavewise/contracts";

import {
  defectStatistics,
  estimatedCost,
  priorityList,
  severityBreakdown,
  suggestedTimeline,
} from "../scoring/derivedMetrics";
import type { PavementTables } from "../scoring/tables";

export type ToolContext = {
  detections: ReadonlyArray<Detection>;
  conditionScore: ConditionScore;
  tables: Readonly<PavementTables>;
};

export type AgentTool<Result = unknown> = {
  name: string;
  description: string;
  execute: (context: ToolContext) => Promise<Result>;
};

export type ToolDescriptor = Pick<AgentTool, "name" | "description">;

export class ToolRegistry {
  private readonly tools = new Map<string, AgentTool>();

  register<Result>(tool: AgentTool<Result>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  describe(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description }) => ({ name, description }));
  }

  async invoke(name: string, context: ToolContext): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new Error(`Unknown tool: ${name}`);
    }

    return tool.execute(context);
  }

  /** Runs every registered tool in registration order, keyed by tool name. */
  async invokeAll(context: ToolContext): Promise<Record<string, unknown>> {
    const results: Record<string, unknown> = {};
    for (const name of this.tools.keys()) {
      results[name] = await this.invoke(name, context);
    }
    return results;
  }
}

export const createMetricsToolRegistry = (): ToolRegistry => {
  const registry = new ToolRegistry();

  registry.register({
    name: "severity_breakdown",
    description: "Count detections per defect type and severity.",
    execute: async ({ detections }) => severityBreakdown(detections),
  });

  registry.register({
    name: "defect_statistics",
    description: "Total detections with counts by defect type and by severity.",
    execute: async ({ detections }) => defectStatistics(detections),
  });

  registry.register({
    name: "estimated_cost",
    description: "Estimated repair cost in USD with a low/high uncertainty range.",
    execute: async ({ detections, tables }) => estimatedCost(detections, tables),
  });

  registry.register({
    name: "priority_list",
    description: "Detections to repair first, ordered by severity then extent.",
    execute: async ({ detections, tables }) => priorityList(detections, tables),
  });

  registry.register({
    name: "suggested_timeline",
    description: "Repair horizon and re-assessment cadence for the condition rating.",
    execute: async ({ conditionScore, tables }) => suggestedTimeline(conditionScore, tables),
  });

  return registry;
};
