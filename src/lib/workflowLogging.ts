import type { WorkflowEvent } from "../../engine/ai/workflowEngine";

export function logWorkflowEvent(event: WorkflowEvent): void {
  const { type, ...payload } = event;
  if (type === "stage_failed") {
    console.warn("workflow_stage_failed", payload);
    return;
  }
  console.info(`workflow_${type}`, payload);
}
