import { z } from "zod";
import { errorKinds } from "../errors";
import {
  agentRoles,
  errorStatuses,
  JsonValue,
  messageTypes,
  projectStatuses,
  taskStatuses,
  workflowPointers
} from "../types";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const artifactSchema = z.record(z.unknown());

export const projectRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  status: z.enum(projectStatuses),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1)
});

export const taskRecordSchema = z.object({
  id: z.string().min(1),
  projectId: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  assignedAgent: z.enum(agentRoles),
  status: z.enum(taskStatuses),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1)
});

export const agentOutputRecordSchema = z.object({
  id: z.string().min(1),
  taskId: z.string().optional(),
  agentId: z.string().min(1),
  outputType: z.string().min(1),
  content: jsonValueSchema,
  createdAt: z.string().min(1)
});

export const errorRecordSchema = z.object({
  id: z.string().min(1),
  taskId: z.string().optional(),
  agentId: z.string().min(1),
  errorType: z.string().min(1),
  errorMessage: z.string(),
  stackTrace: z.string().optional(),
  status: z.enum(errorStatuses),
  createdAt: z.string().min(1),
  resolvedAt: z.string().optional(),
  resolution: z.string().optional()
});

const testTypeSchema = z.enum(["unit", "integration", "end_to_end"]);

export const testCaseSchema = z.object({
  id: z.string().min(1),
  type: testTypeSchema,
  description: z.string()
});

export const testSuiteSchema = z.object({
  taskId: z.string().optional(),
  unitTests: z.array(testCaseSchema),
  integrationTests: z.array(testCaseSchema),
  endToEndTests: z.array(testCaseSchema)
});

export const testCaseResultSchema = z.object({
  testId: z.string().min(1),
  type: testTypeSchema,
  status: z.enum(["passed", "failed"]),
  executionTimeMs: z.number().min(0),
  failureReason: z.string().optional()
});

export const testSummarySchema = z.object({
  totalTests: z.number().int().min(0),
  passedTests: z.number().int().min(0),
  failedTests: z.number().int().min(0)
});

export const testExecutionSchema = z.object({
  taskId: z.string().optional(),
  executedAt: z.string().min(1),
  results: z.array(testCaseResultSchema),
  summary: testSummarySchema
});

export const testReportSchema = z.object({
  taskId: z.string().optional(),
  summary: testSummarySchema,
  passRate: z.number().min(0).max(100),
  failedTests: z.array(testCaseResultSchema),
  recommendations: z.array(z.string()),
  generatedAt: z.string().min(1)
});

export const errorHandlingResultSchema = z.object({
  errorId: z.string().min(1),
  errorKind: z.enum(errorKinds),
  analysis: artifactSchema,
  rootCause: artifactSchema,
  fix: z.object({
    fixType: z.string().min(1),
    description: z.string().min(1),
    changes: z.array(artifactSchema)
  }),
  recovery: z.object({
    strategy: z.enum(["fix_and_retry", "retry", "fallback"]),
    steps: z.array(z.string())
  }),
  status: z.enum(["completed", "pending"]),
  handledAt: z.string().min(1)
});

export const integrationComponentSchema = z.object({
  source: z.enum(["implementation", "ui_implementation", "task"]),
  senderId: z.string().min(1),
  content: artifactSchema
});

export const pendingMessageSchema = z.object({
  id: z.string().min(1),
  senderId: z.string().min(1),
  senderRole: z.enum(agentRoles).optional(),
  receiverRole: z.enum(agentRoles),
  messageType: z.enum(messageTypes),
  taskId: z.string().optional(),
  projectId: z.string().optional(),
  content: jsonValueSchema,
  metadata: z.record(jsonValueSchema).default({}),
  timestamp: z.string().min(1),
  read: z.boolean().default(false)
});

export const workflowStateSchema = z.object({
  tasks: z.array(taskRecordSchema).default([]),
  implementations: z.array(artifactSchema).default([]),
  ui_implementations: z.array(artifactSchema).default([]),
  integrated_systems: z.array(artifactSchema).default([]),
  test_reports: z.array(artifactSchema).default([]),
  documentation: z.array(artifactSchema).default([]),
  error_handling_results: z.array(artifactSchema).default([]),
  next: z.enum(workflowPointers).default("project_manager"),
  projectId: z.string().optional(),
  pending: z.array(pendingMessageSchema).optional()
});

export const checkpointRecordSchema = z.object({
  id: z.string().min(1),
  sequence: z.number().int().min(1),
  timestamp: z.string().min(1),
  projectId: z.string().optional(),
  data: workflowStateSchema
});

export type ProjectRecord = z.infer<typeof projectRecordSchema>;
export type TaskRecord = z.infer<typeof taskRecordSchema>;
export type AgentOutputRecord = z.infer<typeof agentOutputRecordSchema>;
export type ErrorRecord = z.infer<typeof errorRecordSchema>;
export type TestCase = z.infer<typeof testCaseSchema>;
export type TestSuite = z.infer<typeof testSuiteSchema>;
export type TestCaseResult = z.infer<typeof testCaseResultSchema>;
export type TestExecution = z.infer<typeof testExecutionSchema>;
export type TestReport = z.infer<typeof testReportSchema>;
export type ErrorHandlingResult = z.infer<typeof errorHandlingResultSchema>;
export type IntegrationComponent = z.infer<typeof integrationComponentSchema>;
export type PendingMessage = z.infer<typeof pendingMessageSchema>;
export type WorkflowState = z.infer<typeof workflowStateSchema>;
export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>;
