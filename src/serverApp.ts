import fastify, { FastifyError, FastifyInstance } from "fastify";
import { z } from "zod";
import { config } from "./config";
import { OrchestratorError } from "./errors";
import { PersistenceStore } from "./services/persistenceStore";
import { errorStatuses, ErrorPattern, Message, MessageHistoryFilters, ProjectStatusResult, RunResult, WorkflowState } from "./types";
import { toMessageRecord } from "./services/messageBus";

export interface OrchestratorLike {
  initializeProject(name: string, description: string, requirements: string): Promise<string>;
  resumeProject(projectId: string): Promise<WorkflowState>;
  run(steps?: number): Promise<RunResult>;
  cancel(reason?: string): boolean;
  isRunning(): boolean;
  getProjectStatus(projectId: string): Promise<ProjectStatusResult>;
  getMessageHistory(filters?: MessageHistoryFilters): Message[];
  analyzeErrorPatterns(): Promise<ErrorPattern[]>;
}

export interface ServerDeps {
  orchestrator: OrchestratorLike;
  store: PersistenceStore;
}

const projectCreateSchema = z.object({
  name: z.string().min(1).max(200),
  description: z.string().max(2000).default(""),
  requirements: z.string().min(1).max(20_000)
});

const runSchema = z.object({
  steps: z.number().int().min(1).max(config.maxRunSteps).optional()
});

const cancelSchema = z.object({
  reason: z.string().min(1).max(500).optional()
});

const messageQuerySchema = z.object({
  taskId: z.string().min(1).optional(),
  projectId: z.string().min(1).optional(),
  senderId: z.string().min(1).optional(),
  receiverId: z.string().min(1).optional()
});

const errorQuerySchema = z.object({
  status: z.enum(errorStatuses).optional()
});

const checkpointQuerySchema = z.object({
  projectId: z.string().min(1).optional()
});

const projectParamsSchema = z.object({
  id: z.string().min(1)
});

const statusCodeFor = (error: OrchestratorError): number => {
  if (error.kind === "ValidationError") return 400;
  if (error.kind === "ConflictError") return 409;
  return 500;
};

export const buildApp = (deps: ServerDeps): FastifyInstance => {
  const app = fastify({ logger: { level: config.logLevel } });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error instanceof OrchestratorError ? statusCodeFor(error) : (error.statusCode ?? 500);
    if (statusCode >= 500) {
      request.log.error({ err: error }, "request failed");
    }
    return reply.code(statusCode).send({
      error: error.message,
      errorType: error instanceof OrchestratorError ? error.kind : "UnknownError"
    });
  });

  app.get("/api/health", async () => ({ ok: true, running: deps.orchestrator.isRunning() }));

  app.get("/api/projects", async () => ({ projects: await deps.store.getAllProjects() }));

  app.post("/api/projects", async (request, reply) => {
    const parsed = projectCreateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const { name, description, requirements } = parsed.data;
    const projectId = await deps.orchestrator.initializeProject(name, description, requirements);
    return reply.code(201).send({ projectId });
  });

  app.get("/api/projects/:id/status", async (request, reply) => {
    const params = projectParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }

    const status = await deps.orchestrator.getProjectStatus(params.data.id);
    if ("error" in status) {
      return reply.code(status.error === "Project not found" ? 404 : 503).send(status);
    }
    return status;
  });

  app.post("/api/projects/:id/resume", async (request, reply) => {
    const params = projectParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.code(400).send({ error: params.error.flatten() });
    }

    const project = await deps.store.getProject(params.data.id);
    if (!project) {
      return reply.code(404).send({ error: "Project not found" });
    }

    const state = await deps.orchestrator.resumeProject(project.id);
    return { projectId: project.id, next: state.next, pending: state.pending?.length ?? 0 };
  });

  app.post("/api/run", async (request, reply) => {
    const parsed = runSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    return deps.orchestrator.run(parsed.data.steps);
  });

  app.post("/api/run/cancel", async (request, reply) => {
    const parsed = cancelSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    return { cancelled: deps.orchestrator.cancel(parsed.data.reason) };
  });

  app.get("/api/messages", async (request, reply) => {
    const parsed = messageQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const messages = deps.orchestrator.getMessageHistory(parsed.data);
    return {
      messages: messages.map((message) => {
        try {
          return toMessageRecord(message);
        } catch (error: unknown) {
          return {
            id: message.id,
            messageType: message.messageType,
            error: error instanceof Error ? error.message : String(error)
          };
        }
      })
    };
  });

  app.get("/api/errors", async (request, reply) => {
    const parsed = errorQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }
    return { errors: await deps.store.getAllErrors(parsed.data.status) };
  });

  app.get("/api/errors/patterns", async () => ({ patterns: await deps.orchestrator.analyzeErrorPatterns() }));

  app.get("/api/checkpoints/latest", async (request, reply) => {
    const parsed = checkpointQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const checkpoint = await deps.store.getLatestCheckpoint(parsed.data.projectId);
    if (!checkpoint) {
      return reply.code(404).send({ error: "No checkpoint stored" });
    }
    return { checkpoint };
  });

  return app;
};
