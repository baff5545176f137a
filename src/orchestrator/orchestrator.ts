import { randomUUID } from "node:crypto";
import { createStubAgents } from "../agents";
import { config } from "../config";
import { describeError, OrchestratorError } from "../errors";
import { componentLogger, Logger } from "../logger";
import { createMessage, MessageBus, SendMessageInput } from "../services/messageBus";
import { PersistenceStore } from "../services/persistenceStore";
import { SystemState } from "../services/systemState";
import {
  agentRoles,
  AgentRole,
  AgentState,
  ErrorPattern,
  ErrorRecord,
  JsonObject,
  Message,
  MessageHistoryFilters,
  PendingMessage,
  ProjectStatusResult,
  RunResult,
  TaskStatus,
  WorkflowState
} from "../types";
import { withRetries } from "../utils/async";
import { safeSerialize, toJsonObject } from "../utils/serialize";
import { AgentSuite, AgentSuiteFactory } from "./agentContracts";
import { AgentTurnRunner } from "./agentTurn";
import { createInitialWorkflowState, isAllowedTransition, mergeWorkflowState, resolveNextPointer } from "./workflow";

export interface OrchestratorOptions {
  store: PersistenceStore;
  createAgents?: AgentSuiteFactory;
  agentTimeoutMs?: number;
  checkpointRetries?: number;
  maxRunSteps?: number;
  logger?: Logger;
}

interface Runtime {
  system: SystemState;
  bus: MessageBus;
  agents: AgentSuite;
  turns: AgentTurnRunner;
}

const asStepCount = (value: unknown, max: number): number => {
  if (typeof value !== "number" || !Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(Math.trunc(value), max));
};

const safeMetadata = (metadata: Record<string, unknown>): JsonObject => {
  try {
    return toJsonObject(metadata);
  } catch (error: unknown) {
    return { error: error instanceof Error ? error.message : String(error) };
  }
};

export class Orchestrator {
  private readonly store: PersistenceStore;
  private readonly createAgents: AgentSuiteFactory;
  private readonly agentTimeoutMs: number;
  private readonly checkpointRetries: number;
  private readonly maxRunSteps: number;
  private readonly log: Logger;
  private runtime: Runtime;
  private activeRun = false;
  private cancelReason?: string;

  constructor(options: OrchestratorOptions) {
    this.store = options.store;
    this.createAgents = options.createAgents ?? ((store) => createStubAgents(store));
    this.agentTimeoutMs = options.agentTimeoutMs ?? config.agentTimeoutMs;
    this.checkpointRetries = Math.max(0, options.checkpointRetries ?? config.checkpointRetries);
    this.maxRunSteps = options.maxRunSteps ?? config.maxRunSteps;
    this.log = options.logger ?? componentLogger("orchestrator");
    this.runtime = this.createRuntime();
  }

  get systemState(): SystemState {
    return this.runtime.system;
  }

  get messageBus(): MessageBus {
    return this.runtime.bus;
  }

  isRunning(): boolean {
    return this.activeRun;
  }

  async initializeProject(name: string, description: string, requirements: string): Promise<string> {
    this.assertIdle();
    const existing = (await this.store.getAllProjects()).find((project) => project.name === name);
    const projectId = existing?.id ?? (await this.store.createProject(name, description));

    this.runtime = this.createRuntime(projectId);
    const { system } = this.runtime;
    const projectManager = this.requireAgent("project_manager");
    await this.deliver({
      senderId: "system",
      receiverId: projectManager.agentId,
      content: requirements,
      messageType: "requirements",
      projectId
    });
    await this.store.updateProject(projectId, { status: "active" });

    const checkpointId = await this.persistCheckpoint({
      ...createInitialWorkflowState(projectId),
      pending: this.pendingSnapshot()
    });
    system.setCheckpoint(checkpointId);
    system.setTasks(await this.store.getTasksByProject(projectId));
    this.log.info({ projectId, name, reused: Boolean(existing) }, "project initialized");
    return projectId;
  }

  async reset(projectId?: string): Promise<void> {
    this.assertIdle();
    let scoped = projectId;
    if (scoped && !(await this.store.getProject(scoped))) {
      this.log.warn({ projectId: scoped }, "reset requested for unknown project; starting empty");
      scoped = undefined;
    }
    this.runtime = this.createRuntime(scoped);
    if (scoped) {
      this.runtime.system.setTasks(await this.store.getTasksByProject(scoped));
    }
  }

  async resumeProject(projectId: string): Promise<WorkflowState> {
    this.assertIdle();
    const project = await this.store.getProject(projectId);
    if (!project) {
      throw new OrchestratorError("ValidationError", `Project not found: ${projectId}`);
    }

    this.runtime = this.createRuntime(projectId);
    const { system, bus } = this.runtime;
    const checkpoint = await this.store.getLatestCheckpoint(projectId);
    const state = checkpoint?.data ?? createInitialWorkflowState(projectId);

    let restored = 0;
    for (const pending of state.pending ?? []) {
      const receiver = system.getAgentByType(pending.receiverRole);
      if (!receiver) continue;
      const sender = pending.senderRole ? system.getAgentByType(pending.senderRole) : undefined;
      bus.restore({
        id: pending.id,
        senderId: sender?.agentId ?? pending.senderId,
        receiverId: receiver.agentId,
        content: pending.content,
        messageType: pending.messageType,
        taskId: pending.taskId,
        projectId: pending.projectId,
        metadata: pending.metadata,
        timestamp: pending.timestamp,
        read: false,
        processed: false
      });
      restored += 1;
    }

    if (checkpoint) system.setCheckpoint(checkpoint.id);
    system.setTasks(await this.store.getTasksByProject(projectId));
    system.setStatus("paused");
    this.log.info({ projectId, checkpointId: checkpoint?.id, restored }, "project resumed");
    return state;
  }

  async run(steps: number = config.defaultRunSteps): Promise<RunResult> {
    const projectId = this.runtime.system.projectId;
    if (!projectId) {
      throw new OrchestratorError("ValidationError", "No project initialized. Call initializeProject first.");
    }
    if (this.activeRun) {
      throw new OrchestratorError("ConflictError", "A run is already in progress.");
    }

    const count = asStepCount(steps, this.maxRunSteps);
    if (count === 0) {
      this.log.debug({ projectId, steps }, "run requested with no steps");
      return this.snapshot();
    }

    this.activeRun = true;
    this.cancelReason = undefined;
    try {
      await this.runLoop(projectId, count);
    } finally {
      this.activeRun = false;
      this.cancelReason = undefined;
    }
    return this.snapshot();
  }

  cancel(reason = "Run cancelled by request."): boolean {
    if (!this.activeRun) return false;
    this.cancelReason = reason;
    this.log.info({ projectId: this.runtime.system.projectId, reason }, "run cancel requested");
    return true;
  }

  saveCheckpoint(state: WorkflowState): Promise<string> {
    return this.store.storeCheckpoint(state);
  }

  async loadCheckpoint(checkpointId?: string): Promise<WorkflowState> {
    const projectId = this.runtime.system.projectId;
    const record =
      (checkpointId ? await this.store.getCheckpoint(checkpointId) : undefined) ??
      (await this.store.getLatestCheckpoint(projectId));
    return record?.data ?? createInitialWorkflowState(projectId);
  }

  async getProjectStatus(projectId: string): Promise<ProjectStatusResult> {
    try {
      const project = await this.store.getProject(projectId);
      if (!project) return { projectId, error: "Project not found" };

      const tasks = await this.store.getTasksByProject(projectId);
      const count = (status: TaskStatus): number => tasks.filter((task) => task.status === status).length;
      const completed = count("completed");
      const errors = (await Promise.all(tasks.map((task) => this.store.getErrorsByTask(task.id)))).flat();

      const { system } = this.runtime;
      const live = system.projectId === projectId;
      return {
        project,
        tasks: {
          total: tasks.length,
          created: count("created"),
          assigned: count("assigned"),
          inProgress: count("in_progress"),
          completed,
          blocked: count("blocked"),
          error: count("error"),
          completionPercentage: tasks.length === 0 ? 0 : Math.round((completed / tasks.length) * 100)
        },
        errors: {
          total: errors.length,
          open: errors.filter((record) => record.status === "open").length,
          resolved: errors.filter((record) => record.status === "resolved").length
        },
        agentStatus: live
          ? Object.fromEntries(
              system.listAgents().map((agent) => [
                agent.agentId,
                {
                  type: agent.agentType,
                  status: agent.status,
                  currentTask: agent.currentTaskId ?? null,
                  lastActive: agent.lastActive
                }
              ])
            )
          : {},
        systemStatus: live ? system.status : "unknown"
      };
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      this.log.error({ projectId, error: message }, "project status unavailable");
      return { projectId, error: message };
    }
  }

  getMessageHistory(filters: MessageHistoryFilters = {}): Message[] {
    return this.runtime.bus.getMessageHistory(filters);
  }

  async analyzeErrorPatterns(): Promise<ErrorPattern[]> {
    const errors = await this.store.getAllErrors();
    return (await this.runtime.agents.errorHandling.trackErrorPatterns?.(errors)) ?? [];
  }

  private async runLoop(projectId: string, steps: number): Promise<void> {
    const { system } = this.runtime;

    let state: WorkflowState;
    try {
      state = await this.loadCheckpoint(system.checkpointId);
    } catch (error: unknown) {
      await this.recordRunFailure(error);
      return;
    }

    system.setStatus("running");
    for (let step = 1; step <= steps; step += 1) {
      if (this.cancelReason !== undefined) {
        system.setStatus("paused");
        system.setPhase("cancelled");
        this.log.info({ projectId, step, reason: this.cancelReason }, "run cancelled between steps");
        return;
      }

      try {
        state = await this.step(projectId, state);
        if (state.next === "end" && (await this.isProjectComplete(projectId))) {
          system.setStatus("completed");
          system.setPhase("done");
          await this.store.updateProject(projectId, { status: "completed" });
          this.log.info({ projectId, step }, "project completed");
          return;
        }
      } catch (error: unknown) {
        await this.recordRunFailure(error);
        return;
      }
    }
  }

  private async step(projectId: string, state: WorkflowState): Promise<WorkflowState> {
    const { system, turns } = this.runtime;
    const hasUnread = (role: AgentRole): boolean => this.hasUnread(role);
    const role = state.next === "end" ? resolveNextPointer("end", hasUnread) : state.next;

    let merged: WorkflowState;
    if (role === "end") {
      system.setPhase("awaiting_messages");
      merged = { ...state, next: "end" };
    } else {
      system.setPhase(role);
      const outcome = await turns.execute(role);
      let requested = outcome.next ?? "end";
      if (outcome.next && !isAllowedTransition(role, outcome.next)) {
        this.log.warn({ from: role, to: outcome.next }, "transition outside the workflow; rescheduling");
        requested = "end";
      }
      merged = mergeWorkflowState(state, outcome.patch, resolveNextPointer(requested, hasUnread));
    }
    this.runtime.bus.clearProcessedMessages();

    const next: WorkflowState = { ...merged, projectId, pending: this.pendingSnapshot() };
    const checkpointId = await this.persistCheckpoint(next);
    system.setCheckpoint(checkpointId);
    system.setTasks(await this.store.getTasksByProject(projectId));
    return next;
  }

  private async isProjectComplete(projectId: string): Promise<boolean> {
    const tasks = await this.store.getTasksByProject(projectId);
    return tasks.length > 0 && tasks.every((task) => task.status === "completed");
  }

  private async persistCheckpoint(state: WorkflowState): Promise<string> {
    return withRetries(
      () => this.store.storeCheckpoint(state),
      this.checkpointRetries,
      (error, attempt) => {
        this.log.warn({ attempt, error: error instanceof Error ? error.message : String(error) }, "checkpoint write failed; retrying");
      }
    );
  }

  private async recordRunFailure(error: unknown): Promise<void> {
    const { system } = this.runtime;
    const described = describeError(error);

    let record: ErrorRecord | undefined;
    try {
      const errorId = await this.store.storeError(
        undefined,
        "system",
        described.errorType,
        described.errorMessage,
        described.stackTrace
      );
      record = await this.store.getError(errorId);
    } catch (storeError: unknown) {
      this.log.error(
        { error: storeError instanceof Error ? storeError.message : String(storeError) },
        "run failure could not be persisted"
      );
    }

    const failure: ErrorRecord = record ?? {
      id: randomUUID(),
      agentId: "system",
      errorType: described.errorType,
      errorMessage: described.errorMessage,
      stackTrace: described.stackTrace,
      status: "open",
      createdAt: new Date().toISOString()
    };
    system.addError(failure);
    system.setStatus("error");
    system.setPhase("failed");

    const handler = system.getAgentByType("error_handling");
    if (handler) {
      try {
        await this.deliver({
          senderId: "system",
          receiverId: handler.agentId,
          content: { error: failure, context: { source: "run_loop" } },
          messageType: "error",
          projectId: system.projectId
        });
      } catch (sendError: unknown) {
        this.log.error(
          { error: sendError instanceof Error ? sendError.message : String(sendError) },
          "run failure could not be routed to error handling"
        );
      }
    }

    this.log.error({ projectId: system.projectId, errorType: described.errorType }, described.errorMessage);
  }

  private snapshot(): RunResult {
    const { system } = this.runtime;
    try {
      return system.toSnapshot();
    } catch (error: unknown) {
      return {
        projectId: system.projectId ?? null,
        status: system.status,
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  private pendingSnapshot(): PendingMessage[] {
    const { system, bus } = this.runtime;
    return bus.listPending().flatMap((message): PendingMessage[] => {
      const receiverRole = system.getAgent(message.receiverId)?.agentType;
      if (!receiverRole) return [];
      return [
        {
          id: message.id,
          senderId: message.senderId,
          senderRole: system.getAgent(message.senderId)?.agentType,
          receiverRole,
          messageType: message.messageType,
          taskId: message.taskId,
          projectId: message.projectId,
          content: safeSerialize(message.content, (error) => ({
            error: error instanceof Error ? error.message : String(error)
          })),
          metadata: safeMetadata(message.metadata),
          timestamp: message.timestamp,
          read: message.read
        }
      ];
    });
  }

  private async deliver(input: SendMessageInput): Promise<void> {
    const message = createMessage(input);
    await this.runtime.bus.deliver(message);
    this.runtime.system.addMessage(message);
  }

  private hasUnread(role: AgentRole): boolean {
    const agent = this.runtime.system.getAgentByType(role);
    return agent ? this.runtime.bus.hasUnread(agent.agentId) : false;
  }

  private requireAgent(role: AgentRole): AgentState {
    const agent = this.runtime.system.getAgentByType(role);
    if (!agent) {
      throw new OrchestratorError("ValidationError", `No agent registered for role ${role}`);
    }
    return agent;
  }

  private assertIdle(): void {
    if (this.activeRun) {
      throw new OrchestratorError("ConflictError", "Cannot change project state while a run is in progress.");
    }
  }

  private createRuntime(projectId?: string): Runtime {
    const system = new SystemState(projectId);
    for (const role of agentRoles) {
      system.registerAgent(role);
    }
    const bus = new MessageBus(this.store, this.log.child({ component: "message-bus" }));
    const agents = this.createAgents(this.store);
    const turns = new AgentTurnRunner({
      system,
      bus,
      store: this.store,
      agents,
      agentTimeoutMs: this.agentTimeoutMs,
      log: this.log.child({ component: "agent-turn" })
    });
    return { system, bus, agents, turns };
  }
}
