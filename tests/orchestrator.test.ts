import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { createStubAgents } from "../src/agents";
import { OrchestratorError, PersistenceError } from "../src/errors";
import { Orchestrator, OrchestratorOptions } from "../src/orchestrator/orchestrator";
import { FilePersistenceStore } from "../src/services/filePersistenceStore";
import { InMemoryPersistenceStore } from "../src/services/persistenceStore";
import { AgentSuite } from "../src/orchestrator/agentContracts";
import { WorkflowState } from "../src/types";

const requirements = "Build a todo app with a React frontend and a backend API.";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

const makeOrchestrator = (
  store = new InMemoryPersistenceStore(),
  overrides: (stubs: AgentSuite) => Partial<AgentSuite> = () => ({}),
  options: Partial<OrchestratorOptions> = {}
): Orchestrator =>
  new Orchestrator({
    store,
    createAgents: (agentStore) => {
      const stubs = createStubAgents(agentStore, {});
      return { ...stubs, ...overrides(stubs) };
    },
    agentTimeoutMs: 1000,
    checkpointRetries: 0,
    ...options
  });

class FlakyCheckpointStore extends InMemoryPersistenceStore {
  failCheckpoints = false;
  failedAttempts = 0;

  override async storeCheckpoint(data: WorkflowState): Promise<string> {
    if (this.failCheckpoints) {
      this.failedAttempts += 1;
      throw new PersistenceError("disk full");
    }
    return super.storeCheckpoint(data);
  }
}

describe("Orchestrator", () => {
  it("refuses to run before a project is initialized", async () => {
    const orchestrator = makeOrchestrator();

    await expect(orchestrator.run(1)).rejects.toMatchObject({ kind: "ValidationError" });
    await expect(orchestrator.resumeProject("missing")).rejects.toBeInstanceOf(OrchestratorError);
    expect(await orchestrator.getProjectStatus("missing")).toEqual({ projectId: "missing", error: "Project not found" });
  });

  it("registers one agent per role and reuses projects by name", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store);

    const first = await orchestrator.initializeProject("todo", "A todo app", requirements);
    const second = await orchestrator.initializeProject("todo", "A todo app", requirements);

    expect(second).toBe(first);
    expect(await store.getAllProjects()).toHaveLength(1);
    expect(orchestrator.systemState.listAgents().map((agent) => agent.agentType)).toEqual([
      "project_manager",
      "developer",
      "ui_ux",
      "integration",
      "testing",
      "documentation",
      "error_handling"
    ]);
  });

  it("plans and assigns tasks on the first step", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store);
    const projectId = await orchestrator.initializeProject("todo", "A todo app", requirements);

    expect(await store.getTasksByProject(projectId)).toEqual([]);
    expect((await store.getProject(projectId))?.status).toBe("active");

    const result = await orchestrator.run(1);

    expect(result.status).toBe("running");
    const tasks = await store.getTasksByProject(projectId);
    expect(tasks.map((task) => [task.title, task.assignedAgent])).toEqual([
      ["Implement frontend component", "ui_ux"],
      ["Implement backend component", "developer"],
      ["Implement api component", "integration"],
      ["Implement core functionality feature", "developer"],
      ["Create test plan", "testing"],
      ["Write project documentation", "documentation"]
    ]);
    expect(tasks.every((task) => task.status === "assigned")).toBe(true);

    const projectManager = orchestrator.systemState.getAgentByType("project_manager");
    expect(projectManager && orchestrator.messageBus.hasUnread(projectManager.agentId)).toBe(false);
    expect((await orchestrator.loadCheckpoint()).next).toBe("developer");
  });

  it("takes no step when asked for zero or fewer steps", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store);
    const projectId = await orchestrator.initializeProject("todo", "A todo app", requirements);

    for (const steps of [0, -3, Number.NaN]) {
      const result = await orchestrator.run(steps);
      expect(result.projectId).toBe(projectId);
    }

    expect(await store.getTasksByProject(projectId)).toEqual([]);
    expect((await store.getLatestCheckpoint(projectId))?.sequence).toBe(1);
    expect(orchestrator.getMessageHistory()).toHaveLength(1);
    expect(orchestrator.isRunning()).toBe(false);
  });

  it("sweeps processed messages out of mailboxes after each step", async () => {
    const orchestrator = makeOrchestrator();
    await orchestrator.initializeProject("todo", "A todo app", requirements);

    await orchestrator.run(1);

    const projectManager = orchestrator.systemState.getAgentByType("project_manager");
    const developer = orchestrator.systemState.getAgentByType("developer");
    expect(orchestrator.messageBus.getMessages(projectManager?.agentId ?? "", false)).toEqual([]);
    expect(orchestrator.messageBus.getMessages(developer?.agentId ?? "", false)).toHaveLength(2);
    expect(orchestrator.getMessageHistory()).toHaveLength(7);
  });

  it("falls back to the latest checkpoint for an unknown checkpoint id", async () => {
    const orchestrator = makeOrchestrator();
    await orchestrator.initializeProject("todo", "A todo app", requirements);
    await orchestrator.run(2);

    const state = await orchestrator.loadCheckpoint("unknown-checkpoint");

    expect(state.next).toBe("testing");
    expect(state.tasks).toHaveLength(6);
    expect(state).toEqual(await orchestrator.loadCheckpoint());
  });

  it("routes failed test runs through error handling instead of documentation", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = new Orchestrator({
      store,
      createAgents: (agentStore) => createStubAgents(agentStore, { simulateFailures: true }),
      agentTimeoutMs: 1000,
      checkpointRetries: 0
    });
    await orchestrator.initializeProject("todo", "A todo app", requirements);
    const testingId = orchestrator.systemState.getAgentByType("testing")?.agentId ?? "";
    const errorHandlingId = orchestrator.systemState.getAgentByType("error_handling")?.agentId ?? "";
    const projectManagerId = orchestrator.systemState.getAgentByType("project_manager")?.agentId ?? "";

    await orchestrator.run(3);

    const failures = await store.getAllErrors();
    expect(failures).toHaveLength(3);
    expect(failures.every((record) => record.errorType === "TestFailure" && record.status === "open")).toBe(true);
    expect(failures[0].errorMessage).toBe("Test failures detected: 1 tests failed");

    const fromTesting = orchestrator.getMessageHistory({ senderId: testingId });
    expect(fromTesting.map((message) => message.messageType)).toEqual(["error", "error", "error"]);
    expect(fromTesting.every((message) => message.receiverId === errorHandlingId)).toBe(true);
    expect(orchestrator.getMessageHistory().filter((message) => message.messageType === "tested_implementation")).toEqual([]);

    const afterTesting = await orchestrator.loadCheckpoint();
    expect(afterTesting.next).toBe("error_handling");
    expect(afterTesting.test_reports).toHaveLength(3);

    await orchestrator.run(1);

    expect(await store.getAllErrors("resolved")).toHaveLength(3);
    const fromErrorHandling = orchestrator.getMessageHistory({ senderId: errorHandlingId });
    expect(fromErrorHandling).toHaveLength(6);
    expect(fromErrorHandling.every((message) => message.messageType === "error_resolution")).toBe(true);
    expect(fromErrorHandling.filter((message) => message.receiverId === projectManagerId)).toHaveLength(3);
    expect(fromErrorHandling.filter((message) => message.receiverId === testingId)).toHaveLength(3);

    const afterHandling = await orchestrator.loadCheckpoint();
    expect(afterHandling.next).toBe("testing");
    expect(afterHandling.error_handling_results).toHaveLength(3);
  });

  it("drives a project to completion", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store);
    const projectId = await orchestrator.initializeProject("todo", "A todo app", requirements);

    const result = await orchestrator.run(50);

    expect(result.status).toBe("completed");
    expect(orchestrator.systemState.currentPhase).toBe("done");
    expect((await store.getProject(projectId))?.status).toBe("completed");

    const status = await orchestrator.getProjectStatus(projectId);
    expect(status).toMatchObject({
      tasks: { total: 6, completed: 6, completionPercentage: 100 },
      errors: { total: 0, open: 0, resolved: 0 },
      systemStatus: "completed"
    });

    const checkpoint = await store.getLatestCheckpoint(projectId);
    expect(checkpoint?.sequence).toBe(11);
    expect(checkpoint?.data.next).toBe("end");
    expect(checkpoint?.data.pending).toEqual([]);
    expect(checkpoint?.data.tasks).toHaveLength(6);
    expect(checkpoint?.data.implementations).toHaveLength(2);
    expect(checkpoint?.data.ui_implementations).toHaveLength(1);
    expect(checkpoint?.data.integrated_systems).toHaveLength(2);
    expect(checkpoint?.data.test_reports).toHaveLength(5);
    expect(checkpoint?.data.documentation).toHaveLength(6);
    expect(checkpoint?.data.error_handling_results).toEqual([]);
  });

  it("isolates a failing agent and routes the error to error handling", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store, (stubs) => ({
      developer: {
        analyzeTaskRequirements: async () => {
          throw new TypeError("task payload is missing a title");
        },
        generateImplementationCode: (task, analysis) => stubs.developer.generateImplementationCode(task, analysis),
        documentCode: (implementation) => stubs.developer.documentCode(implementation)
      }
    }));
    const projectId = await orchestrator.initializeProject("todo", "A todo app", requirements);

    await orchestrator.run(2);

    const developer = orchestrator.systemState.getAgentByType("developer");
    expect(developer?.status).toBe("error");
    expect(developer?.error).toBe("task payload is missing a title");
    const [failure] = orchestrator.systemState.getErrors();
    expect(failure).toMatchObject({ errorType: "TypeError", agentId: developer?.agentId, status: "open" });
    const failedTask = failure.taskId ? await store.getTask(failure.taskId) : undefined;
    expect(failedTask).toMatchObject({ title: "Implement backend component", status: "error" });
    expect((await orchestrator.loadCheckpoint()).next).toBe("error_handling");

    const result = await orchestrator.run(3);

    expect(result.status).toBe("running");
    expect(orchestrator.systemState.getAgentByType("developer")?.status).toBe("idle");
    expect((await store.getTask(failedTask?.id ?? ""))?.status).toBe("in_progress");
    const status = await orchestrator.getProjectStatus(projectId);
    expect(status).toMatchObject({ errors: { total: 1, open: 0, resolved: 1 } });

    const checkpoint = await orchestrator.loadCheckpoint();
    expect(checkpoint.error_handling_results).toHaveLength(1);
    expect(checkpoint.next).toBe("ui_ux");
  });

  it("parks when every mailbox is drained without finishing the project", async () => {
    const orchestrator = makeOrchestrator(undefined, (stubs) => ({
      projectManager: {
        parseRequirements: (text) => stubs.projectManager.parseRequirements(text),
        createTaskBreakdown: async () => [],
        assignTasksToAgents: (tasks) => stubs.projectManager.assignTasksToAgents(tasks)
      }
    }));
    await orchestrator.initializeProject("empty", "", requirements);

    const first = await orchestrator.run(1);
    const second = await orchestrator.run(1);

    expect(first.status).toBe("running");
    expect(second.status).toBe("running");
    expect(orchestrator.systemState.currentPhase).toBe("awaiting_messages");
    expect(orchestrator.getMessageHistory()).toHaveLength(1);
    expect((await orchestrator.loadCheckpoint()).next).toBe("end");
  });

  it("stops between steps when cancelled", async () => {
    const orchestrator: Orchestrator = makeOrchestrator(undefined, (stubs) => ({
      developer: {
        analyzeTaskRequirements: async (task) => {
          orchestrator.cancel("stop after this step");
          return stubs.developer.analyzeTaskRequirements(task);
        },
        generateImplementationCode: (task, analysis) => stubs.developer.generateImplementationCode(task, analysis),
        documentCode: (implementation) => stubs.developer.documentCode(implementation)
      }
    }));
    await orchestrator.initializeProject("todo", "A todo app", requirements);

    expect(orchestrator.cancel()).toBe(false);

    const result = await orchestrator.run(10);

    expect(result.status).toBe("paused");
    expect(orchestrator.systemState.currentPhase).toBe("cancelled");
    expect(orchestrator.isRunning()).toBe(false);
    const checkpoint = await orchestrator.loadCheckpoint();
    expect(checkpoint.implementations).toHaveLength(2);
    expect(checkpoint.next).toBe("testing");
  });

  it("round-trips checkpoints through save and load", async () => {
    const orchestrator = makeOrchestrator();
    await orchestrator.initializeProject("todo", "A todo app", requirements);
    await orchestrator.run(1);

    const state = await orchestrator.loadCheckpoint();
    const checkpointId = await orchestrator.saveCheckpoint(state);

    expect(await orchestrator.loadCheckpoint(checkpointId)).toEqual(state);
    expect(state.pending).toHaveLength(6);
  });

  it("fails the run when checkpoints cannot be written", async () => {
    const store = new FlakyCheckpointStore();
    const orchestrator = makeOrchestrator(store, undefined, { checkpointRetries: 1 });
    await orchestrator.initializeProject("todo", "A todo app", requirements);
    store.failCheckpoints = true;

    const result = await orchestrator.run(3);

    expect(result.status).toBe("error");
    expect(store.failedAttempts).toBe(2);
    expect(orchestrator.systemState.currentPhase).toBe("failed");
    const errors = await store.getAllErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ agentId: "system", errorType: "PersistenceError", errorMessage: "disk full" });
    const handler = orchestrator.systemState.getAgentByType("error_handling");
    expect(handler && orchestrator.messageBus.hasUnread(handler.agentId)).toBe(true);
  });

  it("resumes a project from its latest checkpoint in a new process", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "devcrew-resume-"));
    tempDirs.push(dir);

    const first = makeOrchestrator(new FilePersistenceStore(dir));
    const projectId = await first.initializeProject("todo", "A todo app", requirements);
    await first.run(1);

    const store = new FilePersistenceStore(dir);
    const second = makeOrchestrator(store);
    const state = await second.resumeProject(projectId);

    expect(state.next).toBe("developer");
    expect(state.pending).toHaveLength(6);
    expect(second.systemState.status).toBe("paused");
    expect(second.systemState.getTasks()).toHaveLength(6);

    const result = await second.run(50);

    expect(result.status).toBe("completed");
    expect((await store.getTasksByProject(projectId)).every((task) => task.status === "completed")).toBe(true);
  });

  it("rejects a second run while one is active", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const orchestrator = makeOrchestrator(undefined, (stubs) => ({
      projectManager: {
        parseRequirements: async (text) => {
          await gate;
          return stubs.projectManager.parseRequirements(text);
        },
        createTaskBreakdown: (parsed) => stubs.projectManager.createTaskBreakdown(parsed),
        assignTasksToAgents: (tasks) => stubs.projectManager.assignTasksToAgents(tasks)
      }
    }));
    await orchestrator.initializeProject("todo", "A todo app", requirements);

    const running = orchestrator.run(1);

    expect(orchestrator.isRunning()).toBe(true);
    await expect(orchestrator.run(1)).rejects.toMatchObject({ kind: "ConflictError" });
    await expect(orchestrator.initializeProject("other", "", requirements)).rejects.toMatchObject({ kind: "ConflictError" });

    release();
    expect((await running).status).toBe("running");
    expect(orchestrator.isRunning()).toBe(false);
  });

  it("resets to a stored project or to an empty runtime", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store);
    const projectId = await orchestrator.initializeProject("todo", "A todo app", requirements);
    await orchestrator.run(1);

    await orchestrator.reset(projectId);
    expect(orchestrator.systemState.projectId).toBe(projectId);
    expect(orchestrator.systemState.getTasks()).toHaveLength(6);
    expect(orchestrator.getMessageHistory()).toEqual([]);

    await orchestrator.reset("missing");
    expect(orchestrator.systemState.projectId).toBeUndefined();
    await expect(orchestrator.run(1)).rejects.toMatchObject({ kind: "ValidationError" });
  });

  it("summarizes stored errors into patterns", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(store);
    for (const agentId of ["testing_0000aaaa", "testing_0000aaaa", "testing_0000bbbb"]) {
      await store.storeError("task-1", agentId, "TestFailure", "1 test failed");
    }

    expect(await orchestrator.analyzeErrorPatterns()).toEqual([
      {
        errorType: "TestFailure",
        count: 3,
        agents: { testing_0000aaaa: 2, testing_0000bbbb: 1 },
        recurring: true,
        priority: "normal"
      }
    ]);
  });

  it("records an agent call that exceeds its timeout", async () => {
    const store = new InMemoryPersistenceStore();
    const orchestrator = makeOrchestrator(
      store,
      (stubs) => ({
        projectManager: {
          parseRequirements: () => new Promise(() => undefined),
          createTaskBreakdown: (parsed) => stubs.projectManager.createTaskBreakdown(parsed),
          assignTasksToAgents: (tasks) => stubs.projectManager.assignTasksToAgents(tasks)
        }
      }),
      { agentTimeoutMs: 20 }
    );
    await orchestrator.initializeProject("todo", "A todo app", requirements);

    const result = await orchestrator.run(1);

    expect(result.status).toBe("running");
    const errors = await store.getAllErrors();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      errorType: "TimeoutError",
      errorMessage: "project_manager.parseRequirements timed out after 20ms"
    });
    expect(orchestrator.systemState.getAgentByType("project_manager")?.status).toBe("error");
    expect((await orchestrator.loadCheckpoint()).next).toBe("error_handling");
  });
});
