import { randomUUID } from "node:crypto";
import { OrchestratorError } from "../errors";
import {
  agentRoles,
  AgentRole,
  AgentState,
  AgentStateSnapshot,
  AgentStatus,
  ErrorRecord,
  Message,
  MessageRecord,
  SystemStateSnapshot,
  SystemStatus,
  TaskRecord
} from "../types";
import { toMessageRecord } from "./messageBus";

export const createAgentId = (role: AgentRole): string => `${role}_${randomUUID().replace(/-/g, "").slice(0, 8)}`;

/** Resolves the role encoded in an agent id. Roles contain underscores, so the longest matching prefix wins. */
export const roleFromAgentId = (agentId: string): AgentRole | undefined =>
  [...agentRoles].sort((a, b) => b.length - a.length).find((role) => agentId.startsWith(`${role}_`));

const now = (): string => new Date().toISOString();

const toAgentSnapshot = (agent: AgentState): AgentStateSnapshot => ({
  agentId: agent.agentId,
  agentType: agent.agentType,
  status: agent.status,
  currentTaskId: agent.currentTaskId ?? null,
  taskHistory: [...agent.taskHistory],
  lastActive: agent.lastActive,
  error: agent.error ?? null
});

const toSafeMessageRecord = (message: Message): MessageRecord => {
  try {
    return toMessageRecord(message);
  } catch (error: unknown) {
    return {
      id: message.id,
      senderId: message.senderId,
      receiverId: message.receiverId,
      messageType: message.messageType,
      taskId: message.taskId ?? null,
      projectId: message.projectId ?? null,
      content: null,
      metadata: {},
      timestamp: message.timestamp,
      read: message.read,
      processed: message.processed,
      error: error instanceof Error ? error.message : String(error)
    };
  }
};

export class SystemState {
  private readonly agents = new Map<string, AgentState>();
  private readonly agentIdsByRole = new Map<AgentRole, string>();
  private tasks = new Map<string, TaskRecord>();
  private readonly messages: Message[] = [];
  private readonly errors: ErrorRecord[] = [];
  private statusValue: SystemStatus = "initializing";
  private phase = "setup";
  private checkpoint?: string;
  private updated: string;
  readonly startedAt: string;

  constructor(readonly projectId?: string) {
    this.startedAt = now();
    this.updated = this.startedAt;
  }

  get status(): SystemStatus {
    return this.statusValue;
  }

  get currentPhase(): string {
    return this.phase;
  }

  get checkpointId(): string | undefined {
    return this.checkpoint;
  }

  get updatedAt(): string {
    return this.updated;
  }

  registerAgent(role: AgentRole, agentId = createAgentId(role)): AgentState {
    if (this.agentIdsByRole.has(role)) {
      throw new OrchestratorError("ConflictError", `An agent is already registered for role ${role}`);
    }
    if (this.agents.has(agentId)) {
      throw new OrchestratorError("ConflictError", `Agent id ${agentId} is already registered`);
    }

    const agent: AgentState = {
      agentId,
      agentType: role,
      status: "idle",
      taskHistory: [],
      lastActive: now()
    };
    this.agents.set(agentId, agent);
    this.agentIdsByRole.set(role, agentId);
    this.touch();
    return { ...agent, taskHistory: [...agent.taskHistory] };
  }

  getAgent(agentId: string): AgentState | undefined {
    const agent = this.agents.get(agentId);
    return agent ? { ...agent, taskHistory: [...agent.taskHistory] } : undefined;
  }

  getAgentByType(role: AgentRole): AgentState | undefined {
    const agentId = this.agentIdsByRole.get(role);
    return agentId ? this.getAgent(agentId) : undefined;
  }

  listAgents(): AgentState[] {
    return [...this.agents.values()].map((agent) => ({ ...agent, taskHistory: [...agent.taskHistory] }));
  }

  updateAgentStatus(agentId: string, status: AgentStatus, error?: string): boolean {
    const agent = this.agents.get(agentId);
    if (!agent) return false;

    agent.status = status;
    agent.lastActive = now();
    if (error !== undefined) agent.error = error;
    this.touch();
    return true;
  }

  assignTaskToAgent(agentId: string, taskId: string): boolean {
    const agent = this.agents.get(agentId);
    if (!agent) return false;

    agent.currentTaskId = taskId;
    agent.taskHistory.push(taskId);
    agent.status = "working";
    agent.lastActive = now();
    this.touch();
    return true;
  }

  getTasks(): TaskRecord[] {
    return [...this.tasks.values()].map((task) => ({ ...task }));
  }

  setTasks(tasks: TaskRecord[]): void {
    this.tasks = new Map(tasks.map((task) => [task.id, { ...task }]));
    this.touch();
  }

  addMessage(message: Message): void {
    this.messages.push({ ...message, metadata: { ...message.metadata } });
    this.touch();
  }

  addError(record: ErrorRecord): void {
    this.errors.push({ ...record });
    this.touch();
  }

  getErrors(): ErrorRecord[] {
    return this.errors.map((record) => ({ ...record }));
  }

  setStatus(status: SystemStatus): void {
    this.statusValue = status;
    this.touch();
  }

  setPhase(phase: string): void {
    this.phase = phase;
    this.touch();
  }

  setCheckpoint(checkpointId: string): void {
    this.checkpoint = checkpointId;
    this.touch();
  }

  toSnapshot(): SystemStateSnapshot {
    return {
      projectId: this.projectId ?? null,
      agents: Object.fromEntries([...this.agents.entries()].map(([agentId, agent]) => [agentId, toAgentSnapshot(agent)])),
      tasks: Object.fromEntries([...this.tasks.entries()].map(([taskId, task]) => [taskId, { ...task }])),
      messages: this.messages.map(toSafeMessageRecord),
      errors: this.errors.map((record) => ({ ...record })),
      status: this.statusValue,
      currentPhase: this.phase,
      startedAt: this.startedAt,
      updatedAt: this.updated,
      checkpointId: this.checkpoint ?? null
    };
  }

  private touch(): void {
    this.updated = now();
  }
}
