import { agentRoles, AgentRole, WorkflowPointer, WorkflowState } from "../types";

export type AccumulatorKey = Exclude<keyof WorkflowState, "next" | "projectId" | "pending">;

export type WorkflowPatch = Partial<Pick<WorkflowState, AccumulatorKey>>;

export const pipelineOrder: readonly AgentRole[] = agentRoles;

export const transitions: Record<AgentRole, readonly AgentRole[]> = {
  project_manager: ["developer", "ui_ux", "integration", "testing", "documentation"],
  developer: ["testing"],
  ui_ux: ["integration"],
  integration: ["testing"],
  testing: ["documentation", "error_handling"],
  documentation: ["project_manager"],
  error_handling: [...agentRoles]
};

export const createInitialWorkflowState = (projectId?: string): WorkflowState => ({
  tasks: [],
  implementations: [],
  ui_implementations: [],
  integrated_systems: [],
  test_reports: [],
  documentation: [],
  error_handling_results: [],
  next: "project_manager",
  projectId
});

export const isAllowedTransition = (from: AgentRole, to: WorkflowPointer): boolean =>
  to === "end" || to === "error_handling" || transitions[from].includes(to);

export const mergeWorkflowState = (state: WorkflowState, patch: WorkflowPatch, next: WorkflowPointer): WorkflowState => ({
  ...state,
  tasks: [...state.tasks, ...(patch.tasks ?? [])],
  implementations: [...state.implementations, ...(patch.implementations ?? [])],
  ui_implementations: [...state.ui_implementations, ...(patch.ui_implementations ?? [])],
  integrated_systems: [...state.integrated_systems, ...(patch.integrated_systems ?? [])],
  test_reports: [...state.test_reports, ...(patch.test_reports ?? [])],
  documentation: [...state.documentation, ...(patch.documentation ?? [])],
  error_handling_results: [...state.error_handling_results, ...(patch.error_handling_results ?? [])],
  next
});

/**
 * Picks the role that runs next. The requested role keeps the turn when it has unread mail;
 * otherwise the first role in pipeline order with unread mail runs, and the workflow parks at
 * "end" when every mailbox is drained.
 */
export const resolveNextPointer = (requested: WorkflowPointer, hasUnread: (role: AgentRole) => boolean): WorkflowPointer => {
  if (requested !== "end" && hasUnread(requested)) return requested;
  return pipelineOrder.find((role) => hasUnread(role)) ?? "end";
};
