import { describeError, OrchestratorError, PersistenceError, TestFailureError } from "../errors";
import { Logger } from "../logger";
import {
  documentationPayloadSchema,
  errorPayloadSchema,
  errorResolutionPayloadSchema,
  implementationPayloadSchema,
  integratedSystemPayloadSchema,
  parsePayload,
  requirementsPayloadSchema,
  taskPayloadSchema,
  testedImplementationPayloadSchema,
  uiImplementationPayloadSchema
} from "../schemas/payloads";
import { createMessage, MessageBus, SendMessageInput } from "../services/messageBus";
import { PersistenceStore } from "../services/persistenceStore";
import { roleFromAgentId, SystemState } from "../services/systemState";
import {
  AgentRole,
  AgentState,
  Artifact,
  ErrorRecord,
  IntegrationComponent,
  Message,
  MessageType,
  TaskRecord,
  WorkflowPointer
} from "../types";
import { withTimeout } from "../utils/async";
import { AgentSuite } from "./agentContracts";
import { WorkflowPatch } from "./workflow";

export interface TurnOutcome {
  role: AgentRole;
  agentId: string;
  processed: number;
  patch: WorkflowPatch;
  next?: WorkflowPointer;
  error?: ErrorRecord;
}

export interface AgentTurnDeps {
  system: SystemState;
  bus: MessageBus;
  store: PersistenceStore;
  agents: AgentSuite;
  agentTimeoutMs: number;
  log: Logger;
}

interface HandlerResult {
  patch: WorkflowPatch;
  next?: WorkflowPointer;
}

type RoleHandler = (agent: AgentState, messages: Message[]) => Promise<HandlerResult>;

const taskSummary = (task: TaskRecord): Artifact => ({
  taskId: task.id,
  title: task.title,
  description: task.description
});

export class AgentTurnRunner {
  private readonly handlers: Record<AgentRole, RoleHandler>;

  constructor(private readonly deps: AgentTurnDeps) {
    this.handlers = {
      project_manager: this.runProjectManager.bind(this),
      developer: this.runDeveloper.bind(this),
      ui_ux: this.runUiUx.bind(this),
      integration: this.runIntegration.bind(this),
      testing: this.runTesting.bind(this),
      documentation: this.runDocumentation.bind(this),
      error_handling: this.runErrorHandling.bind(this)
    };
  }

  async execute(role: AgentRole): Promise<TurnOutcome> {
    const { system, bus, log } = this.deps;
    const agent = this.agentFor(role);

    system.updateAgentStatus(agent.agentId, "working");
    const messages = bus.getUnreadMessages(agent.agentId);
    if (messages.length === 0) {
      system.updateAgentStatus(agent.agentId, "idle");
      return { role, agentId: agent.agentId, processed: 0, patch: {} };
    }

    try {
      const result = await this.handlers[role](agent, messages);
      for (const message of messages) {
        bus.markProcessed(message.id);
      }
      system.updateAgentStatus(agent.agentId, "idle");
      log.info({ role, agentId: agent.agentId, processed: messages.length, next: result.next }, "agent turn completed");
      return { role, agentId: agent.agentId, processed: messages.length, ...result };
    } catch (error: unknown) {
      return this.failTurn(role, agent, messages, error);
    }
  }

  private async runProjectManager(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { store, log } = this.deps;
    const tasks: TaskRecord[] = [];
    let next: WorkflowPointer | undefined;

    for (const message of messages) {
      switch (message.messageType) {
        case "requirements": {
          const requirements = parsePayload(requirementsPayloadSchema, message);
          const planned = await this.planTasks(agent, requirements);
          tasks.push(...planned);
          next = planned.some((task) => task.assignedAgent === "developer") ? "developer" : planned[0]?.assignedAgent ?? next;
          break;
        }
        case "documentation": {
          const payload = parsePayload(documentationPayloadSchema, message);
          await store.updateTask(payload.task.id, { status: "completed" });
          log.info({ taskId: payload.task.id }, "task completed");
          break;
        }
        case "error_resolution": {
          const payload = parsePayload(errorResolutionPayloadSchema, message);
          if (message.taskId) {
            await store.updateTask(message.taskId, { status: "in_progress" });
          }
          log.info({ errorId: payload.errorHandlingResults.errorId, taskId: message.taskId }, "error resolution acknowledged");
          break;
        }
        default:
          log.debug({ messageType: message.messageType }, "project manager ignored message");
      }
    }

    return { patch: { tasks }, next };
  }

  private async planTasks(agent: AgentState, requirements: string): Promise<TaskRecord[]> {
    const { store, system, agents } = this.deps;
    const projectId = this.projectId();
    const parsed = await this.call("project_manager.parseRequirements", () => agents.projectManager.parseRequirements(requirements));
    const drafts = await this.call("project_manager.createTaskBreakdown", () => agents.projectManager.createTaskBreakdown(parsed));
    const assigned = await this.call("project_manager.assignTasksToAgents", () => agents.projectManager.assignTasksToAgents(drafts));

    const tasks: TaskRecord[] = [];
    for (const draft of assigned) {
      const taskId = await store.createTask(projectId, draft.title, draft.description, draft.assignedAgent);
      await store.updateTask(taskId, { status: "assigned" });
      const task = await store.getTask(taskId);
      if (!task) {
        throw new PersistenceError(`Task ${taskId} was not persisted`);
      }
      tasks.push(task);

      const receiver = system.getAgentByType(task.assignedAgent);
      if (!receiver) continue;
      await this.send({
        senderId: agent.agentId,
        receiverId: receiver.agentId,
        content: task,
        messageType: "task",
        taskId,
        metadata: {
          draftId: draft.draftId,
          priority: draft.priority,
          estimatedEffort: draft.estimatedEffort,
          dependencies: draft.dependencies
        }
      });
    }
    return tasks;
  }

  private async runDeveloper(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { agents } = this.deps;
    const implementations: Artifact[] = [];

    for (const message of messages) {
      if (message.messageType !== "task") continue;
      const task = parsePayload(taskPayloadSchema, message);
      await this.startTask(agent, task);

      const analysis = await this.call("developer.analyzeTaskRequirements", () => agents.developer.analyzeTaskRequirements(task));
      const code = await this.call("developer.generateImplementationCode", () =>
        agents.developer.generateImplementationCode(task, analysis)
      );
      const implementation = await this.call("developer.documentCode", () => agents.developer.documentCode(code));

      await this.sendToRole(agent, "testing", "implementation", { implementation, requirements: task }, task.id);
      implementations.push(implementation);
    }

    return { patch: { implementations }, next: implementations.length > 0 ? "testing" : undefined };
  }

  private async runUiUx(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { agents } = this.deps;
    const uiImplementations: Artifact[] = [];

    for (const message of messages) {
      if (message.messageType !== "task") continue;
      const task = parsePayload(taskPayloadSchema, message);
      await this.startTask(agent, task);

      const design = await this.call("ui_ux.designInterfaceComponents", () => agents.uiUx.designInterfaceComponents(task));
      const responsive = await this.call("ui_ux.implementResponsiveDesign", () => agents.uiUx.implementResponsiveDesign(design));
      const uiImplementation = await this.call("ui_ux.ensureAccessibilityCompliance", () =>
        agents.uiUx.ensureAccessibilityCompliance(responsive)
      );

      await this.sendToRole(agent, "integration", "ui_implementation", { uiImplementation, task }, task.id);
      uiImplementations.push(uiImplementation);
    }

    return {
      patch: { ui_implementations: uiImplementations },
      next: uiImplementations.length > 0 ? "integration" : undefined
    };
  }

  private async runIntegration(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { agents } = this.deps;
    const groups = new Map<string, { task: TaskRecord; components: IntegrationComponent[] }>();
    const collect = (task: TaskRecord, component: IntegrationComponent): void => {
      const group = groups.get(task.id) ?? { task, components: [] };
      group.components.push(component);
      groups.set(task.id, group);
    };

    for (const message of messages) {
      switch (message.messageType) {
        case "implementation": {
          const payload = parsePayload(implementationPayloadSchema, message);
          collect(payload.requirements, { source: "implementation", senderId: message.senderId, content: payload.implementation });
          break;
        }
        case "ui_implementation": {
          const payload = parsePayload(uiImplementationPayloadSchema, message);
          collect(payload.task, { source: "ui_implementation", senderId: message.senderId, content: payload.uiImplementation });
          break;
        }
        case "task": {
          const task = parsePayload(taskPayloadSchema, message);
          await this.startTask(agent, task);
          collect(task, { source: "task", senderId: message.senderId, content: taskSummary(task) });
          break;
        }
        default:
          break;
      }
    }

    const integratedSystems: Artifact[] = [];
    for (const { task, components } of groups.values()) {
      const analysis = await this.call("integration.analyzeComponentInterfaces", () =>
        agents.integration.analyzeComponentInterfaces(components)
      );
      const dataFlow = await this.call("integration.implementDataFlow", () => agents.integration.implementDataFlow(analysis, task));
      const apiConnectors = await this.call("integration.createApiConnectors", () =>
        agents.integration.createApiConnectors(analysis, task)
      );

      const integratedSystem: Artifact = {
        taskId: task.id,
        components: components.length,
        analysis,
        dataFlow,
        apiConnectors
      };
      await this.sendToRole(agent, "testing", "integrated_system", { integratedSystem, task }, task.id);
      integratedSystems.push(integratedSystem);
    }

    return {
      patch: { integrated_systems: integratedSystems },
      next: integratedSystems.length > 0 ? "testing" : undefined
    };
  }

  private async runTesting(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { agents, store, system } = this.deps;
    const testReports: Artifact[] = [];
    let failures = 0;
    let passes = 0;

    for (const message of messages) {
      let subject: { artifact: Artifact; task: TaskRecord } | undefined;
      switch (message.messageType) {
        case "implementation": {
          const payload = parsePayload(implementationPayloadSchema, message);
          subject = { artifact: payload.implementation, task: payload.requirements };
          break;
        }
        case "integrated_system": {
          const payload = parsePayload(integratedSystemPayloadSchema, message);
          subject = { artifact: payload.integratedSystem, task: payload.task };
          break;
        }
        case "task": {
          const task = parsePayload(taskPayloadSchema, message);
          await this.startTask(agent, task);
          subject = { artifact: taskSummary(task), task };
          break;
        }
        default:
          break;
      }
      if (!subject) continue;

      const { artifact, task } = subject;
      const suite = await this.call("testing.generateTestCases", () => agents.testing.generateTestCases(artifact, task));
      const execution = await this.call("testing.executeTests", () => agents.testing.executeTests(suite));
      const report = await this.call("testing.generateTestReport", () => agents.testing.generateTestReport(execution));
      testReports.push(report);

      if (report.summary.failedTests > 0) {
        failures += 1;
        const errorId = await store.storeError(
          task.id,
          message.senderId,
          "TestFailure",
          new TestFailureError(report.summary.failedTests).message,
          JSON.stringify(report.failedTests)
        );
        const record = await store.getError(errorId);
        if (!record) {
          throw new PersistenceError(`Error record ${errorId} was not persisted`);
        }
        system.addError(record);
        await store.updateTask(task.id, { status: "error" });
        await this.sendToRole(
          agent,
          "error_handling",
          "error",
          { error: record, context: { testReport: report, implementation: artifact } },
          task.id
        );
      } else {
        passes += 1;
        await this.sendToRole(
          agent,
          "documentation",
          "tested_implementation",
          { implementation: artifact, testReport: report, task },
          task.id
        );
      }
    }

    const next: WorkflowPointer | undefined = failures > 0 ? "error_handling" : passes > 0 ? "documentation" : undefined;
    return { patch: { test_reports: testReports }, next };
  }

  private async runDocumentation(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { agents } = this.deps;
    const documentation: Artifact[] = [];

    for (const message of messages) {
      let subject: { artifact: Artifact; task: TaskRecord } | undefined;
      if (message.messageType === "tested_implementation") {
        const payload = parsePayload(testedImplementationPayloadSchema, message);
        subject = { artifact: payload.implementation, task: payload.task };
      } else if (message.messageType === "task") {
        const task = parsePayload(taskPayloadSchema, message);
        await this.startTask(agent, task);
        subject = { artifact: taskSummary(task), task };
      }
      if (!subject) continue;

      const { artifact, task } = subject;
      const analysis = await this.call("documentation.analyzeCodebase", () => agents.documentation.analyzeCodebase(artifact));
      const technicalDocs = await this.call("documentation.generateTechnicalDocumentation", () =>
        agents.documentation.generateTechnicalDocumentation(analysis, task)
      );
      const userGuides = await this.call("documentation.createUserGuides", () =>
        agents.documentation.createUserGuides(task, technicalDocs)
      );

      await this.sendToRole(agent, "project_manager", "documentation", { documentation: { technicalDocs, userGuides }, task }, task.id);
      documentation.push({ taskId: task.id, technicalDocs, userGuides });
    }

    return { patch: { documentation }, next: documentation.length > 0 ? "project_manager" : undefined };
  }

  private async runErrorHandling(agent: AgentState, messages: Message[]): Promise<HandlerResult> {
    const { agents, store, log } = this.deps;
    const results: Artifact[] = [];
    let next: WorkflowPointer | undefined;

    for (const message of messages) {
      if (message.messageType !== "error") continue;
      const { error, context } = parsePayload(errorPayloadSchema, message);
      const handled = await this.call("error_handling.handleError", () => agents.errorHandling.handleError(error, context));

      const resolved = await store.updateErrorStatus(error.id, "resolved", handled.fix.description, handled.handledAt);
      if (!resolved) {
        log.warn({ errorId: error.id }, "error record not found in store; resolution not recorded");
      }

      const taskId = message.taskId ?? error.taskId;
      const senderRole = this.roleOf(message.senderId);
      const recipients = new Set<AgentRole>(["project_manager"]);
      if (senderRole && senderRole !== "error_handling") recipients.add(senderRole);
      for (const role of recipients) {
        await this.sendToRole(agent, role, "error_resolution", { errorHandlingResults: handled }, taskId);
      }

      results.push(handled);
      next = senderRole && senderRole !== "error_handling" ? senderRole : "project_manager";
    }

    return { patch: { error_handling_results: results }, next };
  }

  private async failTurn(role: AgentRole, agent: AgentState, messages: Message[], error: unknown): Promise<TurnOutcome> {
    const { store, system, log } = this.deps;
    const described = describeError(error);
    const taskId = messages.find((message) => message.taskId)?.taskId;

    const errorId = await store.storeError(taskId, agent.agentId, described.errorType, described.errorMessage, described.stackTrace);
    const record: ErrorRecord = (await store.getError(errorId)) ?? {
      id: errorId,
      taskId,
      agentId: agent.agentId,
      errorType: described.errorType,
      errorMessage: described.errorMessage,
      stackTrace: described.stackTrace,
      status: "open",
      createdAt: new Date().toISOString()
    };
    system.addError(record);
    system.updateAgentStatus(agent.agentId, "error", described.errorMessage);
    if (taskId) {
      await store.updateTask(taskId, { status: "error" });
    }

    if (role !== "error_handling") {
      await this.sendToRole(
        agent,
        "error_handling",
        "error",
        { error: record, context: { role, messageIds: messages.map((message) => message.id) } },
        taskId
      );
    }

    log.error({ role, agentId: agent.agentId, errorType: described.errorType, errorId }, described.errorMessage);
    return {
      role,
      agentId: agent.agentId,
      processed: 0,
      patch: {},
      next: "error_handling",
      error: record
    };
  }

  private async startTask(agent: AgentState, task: TaskRecord): Promise<void> {
    this.deps.system.assignTaskToAgent(agent.agentId, task.id);
    await this.deps.store.updateTask(task.id, { status: "in_progress" });
  }

  private async sendToRole(
    sender: AgentState,
    role: AgentRole,
    messageType: MessageType,
    content: unknown,
    taskId?: string
  ): Promise<void> {
    const receiver = this.deps.system.getAgentByType(role);
    if (!receiver) {
      this.deps.log.warn({ role, messageType }, "no agent registered for role; message dropped");
      return;
    }
    await this.send({ senderId: sender.agentId, receiverId: receiver.agentId, content, messageType, taskId });
  }

  private async send(input: SendMessageInput): Promise<void> {
    const message = createMessage({ ...input, projectId: input.projectId ?? this.deps.system.projectId });
    await this.deps.bus.deliver(message);
    this.deps.system.addMessage(message);
  }

  private roleOf(agentId: string): AgentRole | undefined {
    return this.deps.system.getAgent(agentId)?.agentType ?? roleFromAgentId(agentId);
  }

  private agentFor(role: AgentRole): AgentState {
    const agent = this.deps.system.getAgentByType(role);
    if (!agent) {
      throw new OrchestratorError("ValidationError", `No agent registered for role ${role}`);
    }
    return agent;
  }

  private projectId(): string {
    const { projectId } = this.deps.system;
    if (!projectId) {
      throw new OrchestratorError("ValidationError", "No project is loaded");
    }
    return projectId;
  }

  private call<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withTimeout(operation(), this.deps.agentTimeoutMs, label);
  }
}
