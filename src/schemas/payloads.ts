import { z } from "zod";
import { OrchestratorError } from "../errors";
import { Message } from "../types";
import {
  artifactSchema,
  errorHandlingResultSchema,
  errorRecordSchema,
  taskRecordSchema,
  testReportSchema
} from "./records";

export const requirementsPayloadSchema = z.union([
  z.string().min(1),
  z.object({ requirements: z.string().min(1) }).transform((value) => value.requirements)
]);

export const taskPayloadSchema = taskRecordSchema;

export const implementationPayloadSchema = z.object({
  implementation: artifactSchema,
  requirements: taskRecordSchema
});

export const uiImplementationPayloadSchema = z.object({
  uiImplementation: artifactSchema,
  task: taskRecordSchema
});

export const integratedSystemPayloadSchema = z.object({
  integratedSystem: artifactSchema,
  task: taskRecordSchema
});

export const testedImplementationPayloadSchema = z.object({
  implementation: artifactSchema,
  testReport: testReportSchema.optional(),
  task: taskRecordSchema
});

export const documentationPayloadSchema = z.object({
  documentation: z.object({
    technicalDocs: artifactSchema,
    userGuides: artifactSchema
  }),
  task: taskRecordSchema
});

export const errorPayloadSchema = z.object({
  error: errorRecordSchema,
  context: artifactSchema.default({})
});

export const errorResolutionPayloadSchema = z.object({
  errorHandlingResults: errorHandlingResultSchema
});

export const parsePayload = <T extends z.ZodTypeAny>(schema: T, message: Message): z.output<T> => {
  const parsed = schema.safeParse(message.content);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
    throw new OrchestratorError(
      "ValidationError",
      `Invalid ${message.messageType} payload from ${message.senderId}: ${issues}`
    );
  }
  return parsed.data;
};
