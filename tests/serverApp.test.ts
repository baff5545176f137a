import { afterEach, describe, expect, it, vi } from "vitest";
import { createStubAgents } from "../src/agents";
import { OrchestratorError } from "../src/errors";
import { Orchestrator } from "../src/orchestrator/orchestrator";
import { createInitialWorkflowState } from "../src/orchestrator/workflow";
import { buildApp } from "../src/serverApp";
import { createMessage } from "../src/services/messageBus";
import { InMemoryPersistenceStore } from "../src/services/persistenceStore";
import { ErrorPattern, Message, ProjectStatusResult, RunResult, WorkflowState } from "../src/types";

const createTestApp = () => {
  const store = new InMemoryPersistenceStore();
  const message = createMessage({
    senderId: "system",
    receiverId: "project_manager_0000aaaa",
    content: "Build a todo app",
    messageType: "requirements",
    taskId: "task-1"
  });
  const orchestrator = {
    initializeProject: vi.fn(async () => "project-1"),
    resumeProject: vi.fn(async (projectId: string): Promise<WorkflowState> => ({
      ...createInitialWorkflowState(projectId),
      next: "developer"
    })),
    run: vi.fn(async (): Promise<RunResult> => {
      throw new OrchestratorError("ConflictError", "A run is already in progress.");
    }),
    cancel: vi.fn(() => false),
    isRunning: vi.fn(() => false),
    getProjectStatus: vi.fn(
      async (projectId: string): Promise<ProjectStatusResult> => ({ projectId, error: "Project not found" })
    ),
    getMessageHistory: vi.fn((): Message[] => [message]),
    analyzeErrorPatterns: vi.fn(async (): Promise<ErrorPattern[]> => [])
  };

  const app = buildApp({ orchestrator, store });
  return { app, store, orchestrator, message };
};

describe("serverApp", () => {
  const apps = new Set<ReturnType<typeof createTestApp>["app"]>();

  afterEach(async () => {
    for (const app of apps) {
      await app.close();
    }
    apps.clear();
  });

  it("reports health", async () => {
    const { app } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "GET", url: "/api/health" });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ ok: true, running: false });
  });

  it("validates project creation input", async () => {
    const { app, orchestrator } = createTestApp();
    apps.add(app);

    const invalid = await app.inject({ method: "POST", url: "/api/projects", payload: { name: "" } });
    expect(invalid.statusCode).toBe(400);
    expect(orchestrator.initializeProject).not.toHaveBeenCalled();

    const created = await app.inject({
      method: "POST",
      url: "/api/projects",
      payload: { name: "todo", requirements: "Build a todo app" }
    });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toEqual({ projectId: "project-1" });
    expect(orchestrator.initializeProject).toHaveBeenCalledWith("todo", "", "Build a todo app");
  });

  it("returns 404 for unknown project status", async () => {
    const { app } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "GET", url: "/api/projects/missing/status" });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ projectId: "missing", error: "Project not found" });
  });

  it("resumes stored projects only", async () => {
    const { app, store, orchestrator } = createTestApp();
    apps.add(app);

    const missing = await app.inject({ method: "POST", url: "/api/projects/missing/resume" });
    expect(missing.statusCode).toBe(404);

    const projectId = await store.createProject("todo");
    const resumed = await app.inject({ method: "POST", url: `/api/projects/${projectId}/resume` });
    expect(resumed.statusCode).toBe(200);
    expect(resumed.json()).toEqual({ projectId, next: "developer", pending: 0 });
    expect(orchestrator.resumeProject).toHaveBeenCalledWith(projectId);
  });

  it("maps orchestrator conflicts to 409", async () => {
    const { app } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "POST", url: "/api/run", payload: { steps: 2 } });

    expect(response.statusCode).toBe(409);
    expect(response.json()).toEqual({ error: "A run is already in progress.", errorType: "ConflictError" });
  });

  it("rejects invalid step counts", async () => {
    const { app, orchestrator } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "POST", url: "/api/run", payload: { steps: 0 } });

    expect(response.statusCode).toBe(400);
    expect(orchestrator.run).not.toHaveBeenCalled();
  });

  it("reports whether a cancel request took effect", async () => {
    const { app, orchestrator } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "POST", url: "/api/run/cancel", payload: { reason: "stop" } });

    expect(response.json()).toEqual({ cancelled: false });
    expect(orchestrator.cancel).toHaveBeenCalledWith("stop");
  });

  it("returns message history as JSON records", async () => {
    const { app, orchestrator, message } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "GET", url: "/api/messages?taskId=task-1" });

    expect(response.statusCode).toBe(200);
    expect(orchestrator.getMessageHistory).toHaveBeenCalledWith({ taskId: "task-1" });
    expect(response.json().messages).toEqual([
      {
        id: message.id,
        senderId: "system",
        receiverId: "project_manager_0000aaaa",
        messageType: "requirements",
        taskId: "task-1",
        projectId: null,
        content: "Build a todo app",
        metadata: {},
        timestamp: message.timestamp,
        read: false,
        processed: false
      }
    ]);
  });

  it("filters stored errors by status", async () => {
    const { app, store } = createTestApp();
    apps.add(app);
    const errorId = await store.storeError("task-1", "testing_0000aaaa", "TestFailure", "1 test failed");
    await store.storeError("task-2", "developer_0000aaaa", "TypeError", "bad input");
    await store.updateErrorStatus(errorId, "resolved", "patched");

    const resolved = await app.inject({ method: "GET", url: "/api/errors?status=resolved" });
    expect(resolved.statusCode).toBe(200);
    expect(resolved.json().errors.map((record: { id: string }) => record.id)).toEqual([errorId]);

    const invalid = await app.inject({ method: "GET", url: "/api/errors?status=closed" });
    expect(invalid.statusCode).toBe(400);
  });

  it("returns 404 when no checkpoint exists", async () => {
    const { app } = createTestApp();
    apps.add(app);

    const response = await app.inject({ method: "GET", url: "/api/checkpoints/latest" });

    expect(response.statusCode).toBe(404);
  });

  it("runs a project end to end through the API", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = new Orchestrator({ store, createAgents: (agentStore) => createStubAgents(agentStore, {}) });
    const app = buildApp({ orchestrator, store });
    apps.add(app);

    const created = await app.inject({
      method: "POST",
      url: "/api/projects",
      payload: { name: "todo", requirements: "Build a todo app with a React frontend and a backend API." }
    });
    const { projectId } = created.json();

    const run = await app.inject({ method: "POST", url: "/api/run", payload: { steps: 50 } });
    expect(run.statusCode).toBe(200);
    expect(run.json().status).toBe("completed");

    const status = await app.inject({ method: "GET", url: `/api/projects/${projectId}/status` });
    expect(status.json().tasks).toMatchObject({ total: 6, completed: 6, completionPercentage: 100 });

    const checkpoint = await app.inject({ method: "GET", url: `/api/checkpoints/latest?projectId=${projectId}` });
    expect(checkpoint.json().checkpoint.sequence).toBe(11);
    expect(checkpoint.json().checkpoint.data.next).toBe("end");
  });
});
