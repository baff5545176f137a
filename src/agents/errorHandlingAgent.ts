import { ErrorKind, toErrorKind } from "../errors";
import { ErrorHandlingAgentLike } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { Artifact, ErrorHandlingResult, ErrorPattern, ErrorRecord } from "../types";
import { recordOutput } from "./agentOutput";

interface ErrorRule {
  category: string;
  severity: "low" | "medium" | "high";
  rootCause: string;
  fixType: string;
  fix: string;
  strategy: ErrorHandlingResult["recovery"]["strategy"];
}

const errorRules: Record<ErrorKind, ErrorRule> = {
  TypeError: {
    category: "code",
    severity: "medium",
    rootCause: "A value had an unexpected type",
    fixType: "code_change",
    fix: "Validate input types before use",
    strategy: "fix_and_retry"
  },
  ReferenceError: {
    category: "code",
    severity: "medium",
    rootCause: "An undefined reference was used",
    fixType: "code_change",
    fix: "Declare or import the missing reference",
    strategy: "fix_and_retry"
  },
  RangeError: {
    category: "code",
    severity: "medium",
    rootCause: "A value fell outside its allowed range",
    fixType: "code_change",
    fix: "Clamp or validate the value range",
    strategy: "fix_and_retry"
  },
  SyntaxError: {
    category: "code",
    severity: "high",
    rootCause: "Source or data could not be parsed",
    fixType: "code_change",
    fix: "Correct the malformed source or payload",
    strategy: "fix_and_retry"
  },
  TestFailure: {
    category: "quality",
    severity: "high",
    rootCause: "Implementation does not satisfy its tests",
    fixType: "code_change",
    fix: "Update the implementation to satisfy the failing tests",
    strategy: "fix_and_retry"
  },
  PersistenceError: {
    category: "infrastructure",
    severity: "high",
    rootCause: "The persistence store was unavailable",
    fixType: "configuration",
    fix: "Check store availability and retry the operation",
    strategy: "retry"
  },
  SerializationError: {
    category: "data",
    severity: "low",
    rootCause: "A value could not be reduced to JSON",
    fixType: "code_change",
    fix: "Remove cyclic or non-serializable values from the payload",
    strategy: "fallback"
  },
  TimeoutError: {
    category: "infrastructure",
    severity: "medium",
    rootCause: "An agent call exceeded its time budget",
    fixType: "configuration",
    fix: "Raise the agent timeout or reduce the work per call",
    strategy: "retry"
  },
  ValidationError: {
    category: "data",
    severity: "medium",
    rootCause: "A message payload did not match its schema",
    fixType: "code_change",
    fix: "Send payloads that match the message contract",
    strategy: "fix_and_retry"
  },
  ConflictError: {
    category: "workflow",
    severity: "low",
    rootCause: "Two operations competed for the same resource",
    fixType: "workflow",
    fix: "Serialize the competing operations",
    strategy: "retry"
  },
  UnknownError: {
    category: "unknown",
    severity: "medium",
    rootCause: "Unclassified failure",
    fixType: "investigation",
    fix: "Investigate the stack trace and add handling",
    strategy: "fallback"
  }
};

const recurringThreshold = 3;
const highPriorityThreshold = 5;

export class ErrorHandlingAgent implements ErrorHandlingAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly agentId = "error_handling"
  ) {}

  async handleError(error: ErrorRecord, context: Artifact): Promise<ErrorHandlingResult> {
    const errorKind = toErrorKind(error.errorType);
    const rule = errorRules[errorKind];

    const result: ErrorHandlingResult = {
      errorId: error.id,
      errorKind,
      analysis: {
        category: rule.category,
        severity: rule.severity,
        agentId: error.agentId,
        message: error.errorMessage,
        contextKeys: Object.keys(context).sort()
      },
      rootCause: {
        description: rule.rootCause,
        evidence: error.stackTrace ? error.stackTrace.split("\n")[0] : error.errorMessage
      },
      fix: {
        fixType: rule.fixType,
        description: rule.fix,
        changes: []
      },
      recovery: {
        strategy: rule.strategy,
        steps:
          rule.strategy === "fallback"
            ? ["Switch to the fallback path", "Record the incident"]
            : ["Apply the fix", "Re-run the failed step"]
      },
      status: "completed",
      handledAt: new Date().toISOString()
    };
    await recordOutput(this.store, error.taskId, this.agentId, "error_handling_result", result);
    return result;
  }

  async trackErrorPatterns(errors: ErrorRecord[]): Promise<ErrorPattern[]> {
    const patterns = new Map<string, ErrorPattern>();
    for (const error of errors) {
      const pattern: ErrorPattern = patterns.get(error.errorType) ?? {
        errorType: error.errorType,
        count: 0,
        agents: {},
        recurring: false,
        priority: "normal"
      };
      pattern.count += 1;
      pattern.agents[error.agentId] = (pattern.agents[error.agentId] ?? 0) + 1;
      pattern.recurring = pattern.count >= recurringThreshold;
      pattern.priority = pattern.count >= highPriorityThreshold ? "high" : "normal";
      patterns.set(error.errorType, pattern);
    }
    return [...patterns.values()].sort((a, b) => b.count - a.count);
  }
}
