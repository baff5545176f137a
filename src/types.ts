import type { ErrorRecord, ProjectRecord, TaskRecord } from "./schemas/records";

export const agentRoles = [
  "project_manager",
  "developer",
  "ui_ux",
  "integration",
  "testing",
  "documentation",
  "error_handling"
] as const;

export type AgentRole = (typeof agentRoles)[number];

export const workflowPointers = [...agentRoles, "end"] as const;

export type WorkflowPointer = (typeof workflowPointers)[number];

export const messageTypes = [
  "requirements",
  "task",
  "implementation",
  "ui_implementation",
  "integrated_system",
  "tested_implementation",
  "documentation",
  "error",
  "error_resolution",
  "broadcast"
] as const;

export type MessageType = (typeof messageTypes)[number];

export const agentStatuses = ["idle", "working", "blocked", "error"] as const;
export type AgentStatus = (typeof agentStatuses)[number];

export const systemStatuses = ["initializing", "running", "paused", "completed", "error"] as const;
export type SystemStatus = (typeof systemStatuses)[number];

export const projectStatuses = ["created", "active", "completed"] as const;
export type ProjectStatus = (typeof projectStatuses)[number];

export const taskStatuses = ["created", "assigned", "in_progress", "completed", "blocked", "error"] as const;
export type TaskStatus = (typeof taskStatuses)[number];

export const errorStatuses = ["open", "resolved"] as const;
export type ErrorStatus = (typeof errorStatuses)[number];

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type Artifact = Record<string, unknown>;

export interface Message {
  readonly id: string;
  readonly senderId: string;
  readonly receiverId: string;
  readonly content: unknown;
  readonly messageType: MessageType;
  readonly taskId?: string;
  readonly projectId?: string;
  readonly metadata: Record<string, unknown>;
  readonly timestamp: string;
  read: boolean;
  processed: boolean;
}

export interface MessageRecord {
  id: string;
  senderId: string;
  receiverId: string;
  messageType: MessageType;
  taskId: string | null;
  projectId: string | null;
  content: JsonValue;
  metadata: JsonObject;
  timestamp: string;
  read: boolean;
  processed: boolean;
  error?: string;
}

export interface MessageHistoryFilters {
  taskId?: string;
  projectId?: string;
  senderId?: string;
  receiverId?: string;
}

export interface AgentState {
  agentId: string;
  agentType: AgentRole;
  status: AgentStatus;
  currentTaskId?: string;
  taskHistory: string[];
  lastActive: string;
  error?: string;
}

export interface AgentStateSnapshot {
  agentId: string;
  agentType: AgentRole;
  status: AgentStatus;
  currentTaskId: string | null;
  taskHistory: string[];
  lastActive: string;
  error: string | null;
}

export type {
  AgentOutputRecord,
  CheckpointRecord,
  ErrorHandlingResult,
  ErrorRecord,
  IntegrationComponent,
  PendingMessage,
  ProjectRecord,
  TaskRecord,
  TestCase,
  TestCaseResult,
  TestExecution,
  TestReport,
  TestSuite,
  WorkflowState
} from "./schemas/records";

export interface SystemStateSnapshot {
  projectId: string | null;
  agents: Record<string, AgentStateSnapshot>;
  tasks: Record<string, TaskRecord>;
  messages: MessageRecord[];
  errors: ErrorRecord[];
  status: SystemStatus;
  currentPhase: string;
  startedAt: string;
  updatedAt: string;
  checkpointId: string | null;
}

export interface RunFailureSnapshot {
  projectId: string | null;
  status: SystemStatus;
  error: string;
}

export type RunResult = SystemStateSnapshot | RunFailureSnapshot;

export interface ProjectStatusSummary {
  project: ProjectRecord;
  tasks: {
    total: number;
    created: number;
    assigned: number;
    inProgress: number;
    completed: number;
    blocked: number;
    error: number;
    completionPercentage: number;
  };
  errors: {
    total: number;
    open: number;
    resolved: number;
  };
  agentStatus: Record<
    string,
    {
      type: AgentRole;
      status: AgentStatus;
      currentTask: string | null;
      lastActive: string;
    }
  >;
  systemStatus: SystemStatus | "unknown";
}

export interface ProjectStatusFailure {
  projectId: string;
  error: string;
}

export type ProjectStatusResult = ProjectStatusSummary | ProjectStatusFailure;

export interface ErrorPattern {
  errorType: string;
  count: number;
  agents: Record<string, number>;
  recurring: boolean;
  priority: "normal" | "high";
}
