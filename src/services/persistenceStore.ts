import { randomUUID } from "node:crypto";
import { workflowStateSchema } from "../schemas/records";
import {
  AgentOutputRecord,
  AgentRole,
  CheckpointRecord,
  ErrorRecord,
  ErrorStatus,
  ProjectRecord,
  ProjectStatus,
  TaskRecord,
  TaskStatus,
  WorkflowState
} from "../types";
import { toJsonValue } from "../utils/serialize";

export interface ProjectUpdate {
  name?: string;
  description?: string;
  status?: ProjectStatus;
}

export interface TaskUpdate {
  title?: string;
  description?: string;
  assignedAgent?: AgentRole;
  status?: TaskStatus;
}

export interface PersistenceStore {
  createProject(name: string, description?: string): Promise<string>;
  getProject(projectId: string): Promise<ProjectRecord | undefined>;
  getAllProjects(): Promise<ProjectRecord[]>;
  updateProject(projectId: string, fields: ProjectUpdate): Promise<boolean>;
  createTask(projectId: string, title: string, description: string, assignedAgent: AgentRole): Promise<string>;
  getTask(taskId: string): Promise<TaskRecord | undefined>;
  getTasksByProject(projectId: string): Promise<TaskRecord[]>;
  updateTask(taskId: string, fields: TaskUpdate): Promise<boolean>;
  storeAgentOutput(taskId: string | undefined, agentId: string, outputType: string, content: unknown): Promise<string>;
  getAgentOutputs(filters?: { taskId?: string; agentId?: string }): Promise<AgentOutputRecord[]>;
  storeError(
    taskId: string | undefined,
    agentId: string,
    errorType: string,
    errorMessage: string,
    stackTrace?: string
  ): Promise<string>;
  getError(errorId: string): Promise<ErrorRecord | undefined>;
  getErrorsByTask(taskId: string): Promise<ErrorRecord[]>;
  getAllErrors(status?: ErrorStatus): Promise<ErrorRecord[]>;
  updateErrorStatus(errorId: string, status: ErrorStatus, resolution?: string, resolvedAt?: string): Promise<boolean>;
  storeCheckpoint(data: WorkflowState): Promise<string>;
  getLatestCheckpoint(projectId?: string): Promise<CheckpointRecord | undefined>;
  getCheckpoint(checkpointId: string): Promise<CheckpointRecord | undefined>;
}

export interface PersistenceTables {
  projects: ProjectRecord[];
  tasks: TaskRecord[];
  agentOutputs: AgentOutputRecord[];
  errors: ErrorRecord[];
  checkpoints: CheckpointRecord[];
  checkpointSequence: number;
}

export const emptyTables = (): PersistenceTables => ({
  projects: [],
  tasks: [],
  agentOutputs: [],
  errors: [],
  checkpoints: [],
  checkpointSequence: 0
});

const now = (): string => new Date().toISOString();

export class InMemoryPersistenceStore implements PersistenceStore {
  protected tables: PersistenceTables = emptyTables();

  protected async load(): Promise<void> {}

  protected async commit(): Promise<void> {}

  async createProject(name: string, description = ""): Promise<string> {
    await this.load();
    const timestamp = now();
    const project: ProjectRecord = {
      id: randomUUID(),
      name,
      description,
      status: "created",
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.tables.projects.push(project);
    await this.commit();
    return project.id;
  }

  async getProject(projectId: string): Promise<ProjectRecord | undefined> {
    await this.load();
    const project = this.tables.projects.find((item) => item.id === projectId);
    return project ? structuredClone(project) : undefined;
  }

  async getAllProjects(): Promise<ProjectRecord[]> {
    await this.load();
    return this.tables.projects.map((project) => structuredClone(project));
  }

  async updateProject(projectId: string, fields: ProjectUpdate): Promise<boolean> {
    await this.load();
    const project = this.tables.projects.find((item) => item.id === projectId);
    if (!project) return false;

    if (fields.name !== undefined) project.name = fields.name;
    if (fields.description !== undefined) project.description = fields.description;
    if (fields.status !== undefined) project.status = fields.status;
    project.updatedAt = now();
    await this.commit();
    return true;
  }

  async createTask(projectId: string, title: string, description: string, assignedAgent: AgentRole): Promise<string> {
    await this.load();
    const timestamp = now();
    const task: TaskRecord = {
      id: randomUUID(),
      projectId,
      title,
      description,
      assignedAgent,
      status: "created",
      createdAt: timestamp,
      updatedAt: timestamp
    };
    this.tables.tasks.push(task);
    await this.commit();
    return task.id;
  }

  async getTask(taskId: string): Promise<TaskRecord | undefined> {
    await this.load();
    const task = this.tables.tasks.find((item) => item.id === taskId);
    return task ? structuredClone(task) : undefined;
  }

  async getTasksByProject(projectId: string): Promise<TaskRecord[]> {
    await this.load();
    return this.tables.tasks.filter((task) => task.projectId === projectId).map((task) => structuredClone(task));
  }

  async updateTask(taskId: string, fields: TaskUpdate): Promise<boolean> {
    await this.load();
    const task = this.tables.tasks.find((item) => item.id === taskId);
    if (!task) return false;

    if (fields.title !== undefined) task.title = fields.title;
    if (fields.description !== undefined) task.description = fields.description;
    if (fields.assignedAgent !== undefined) task.assignedAgent = fields.assignedAgent;
    if (fields.status !== undefined) task.status = fields.status;
    task.updatedAt = now();
    await this.commit();
    return true;
  }

  async storeAgentOutput(taskId: string | undefined, agentId: string, outputType: string, content: unknown): Promise<string> {
    await this.load();
    const output: AgentOutputRecord = {
      id: randomUUID(),
      taskId,
      agentId,
      outputType,
      content: toJsonValue(content),
      createdAt: now()
    };
    this.tables.agentOutputs.push(output);
    await this.commit();
    return output.id;
  }

  async getAgentOutputs(filters: { taskId?: string; agentId?: string } = {}): Promise<AgentOutputRecord[]> {
    await this.load();
    return this.tables.agentOutputs
      .filter((output) => filters.taskId === undefined || output.taskId === filters.taskId)
      .filter((output) => filters.agentId === undefined || output.agentId === filters.agentId)
      .map((output) => structuredClone(output));
  }

  async storeError(
    taskId: string | undefined,
    agentId: string,
    errorType: string,
    errorMessage: string,
    stackTrace?: string
  ): Promise<string> {
    await this.load();
    const record: ErrorRecord = {
      id: randomUUID(),
      taskId,
      agentId,
      errorType,
      errorMessage,
      stackTrace,
      status: "open",
      createdAt: now()
    };
    this.tables.errors.push(record);
    await this.commit();
    return record.id;
  }

  async getError(errorId: string): Promise<ErrorRecord | undefined> {
    await this.load();
    const record = this.tables.errors.find((item) => item.id === errorId);
    return record ? structuredClone(record) : undefined;
  }

  async getErrorsByTask(taskId: string): Promise<ErrorRecord[]> {
    await this.load();
    return this.tables.errors.filter((record) => record.taskId === taskId).map((record) => structuredClone(record));
  }

  async getAllErrors(status?: ErrorStatus): Promise<ErrorRecord[]> {
    await this.load();
    return this.tables.errors
      .filter((record) => status === undefined || record.status === status)
      .map((record) => structuredClone(record));
  }

  async updateErrorStatus(errorId: string, status: ErrorStatus, resolution?: string, resolvedAt?: string): Promise<boolean> {
    await this.load();
    const record = this.tables.errors.find((item) => item.id === errorId);
    if (!record) return false;

    record.status = status;
    if (resolution !== undefined) record.resolution = resolution;
    if (status === "resolved") record.resolvedAt = resolvedAt ?? now();
    await this.commit();
    return true;
  }

  async storeCheckpoint(data: WorkflowState): Promise<string> {
    await this.load();
    const normalized = workflowStateSchema.parse(toJsonValue(data));
    this.tables.checkpointSequence += 1;
    const checkpoint: CheckpointRecord = {
      id: randomUUID(),
      sequence: this.tables.checkpointSequence,
      timestamp: now(),
      projectId: normalized.projectId,
      data: normalized
    };
    this.tables.checkpoints.push(checkpoint);
    await this.commit();
    return checkpoint.id;
  }

  async getLatestCheckpoint(projectId?: string): Promise<CheckpointRecord | undefined> {
    await this.load();
    const latest = this.tables.checkpoints
      .filter((checkpoint) => projectId === undefined || checkpoint.projectId === projectId)
      .reduce<CheckpointRecord | undefined>(
        (best, checkpoint) => (!best || checkpoint.sequence > best.sequence ? checkpoint : best),
        undefined
      );
    return latest ? structuredClone(latest) : undefined;
  }

  async getCheckpoint(checkpointId: string): Promise<CheckpointRecord | undefined> {
    await this.load();
    const checkpoint = this.tables.checkpoints.find((item) => item.id === checkpointId);
    return checkpoint ? structuredClone(checkpoint) : undefined;
  }
}
