import { PersistenceStore } from "../services/persistenceStore";
import {
  AgentRole,
  Artifact,
  ErrorHandlingResult,
  ErrorPattern,
  ErrorRecord,
  IntegrationComponent,
  TaskRecord,
  TestExecution,
  TestReport,
  TestSuite
} from "../types";

export interface ParsedRequirements {
  rawText: string;
  components: string[];
  features: string[];
  technologies: string[];
  constraints: string[];
}

export type TaskAspect = "component" | "feature" | "testing" | "documentation";

export interface TaskDraft {
  draftId: string;
  title: string;
  description: string;
  aspect: TaskAspect;
  component?: string;
  feature?: string;
  priority: "high" | "medium" | "low";
  estimatedEffort: "small" | "medium" | "large";
  dependencies: string[];
}

export interface AssignedTaskDraft extends TaskDraft {
  assignedAgent: AgentRole;
}

export interface ProjectManagerAgentLike {
  parseRequirements(requirements: string): Promise<ParsedRequirements>;
  createTaskBreakdown(parsed: ParsedRequirements): Promise<TaskDraft[]>;
  assignTasksToAgents(tasks: TaskDraft[]): Promise<AssignedTaskDraft[]>;
}

export interface DeveloperAgentLike {
  analyzeTaskRequirements(task: TaskRecord): Promise<Artifact>;
  generateImplementationCode(task: TaskRecord, analysis: Artifact): Promise<Artifact>;
  documentCode(implementation: Artifact): Promise<Artifact>;
}

export interface UiUxAgentLike {
  designInterfaceComponents(task: TaskRecord): Promise<Artifact>;
  implementResponsiveDesign(design: Artifact): Promise<Artifact>;
  ensureAccessibilityCompliance(implementation: Artifact): Promise<Artifact>;
}

export interface IntegrationAgentLike {
  analyzeComponentInterfaces(components: IntegrationComponent[]): Promise<Artifact>;
  implementDataFlow(analysis: Artifact, task: TaskRecord): Promise<Artifact>;
  createApiConnectors(analysis: Artifact, task: TaskRecord): Promise<Artifact>;
}

export interface TestingAgentLike {
  generateTestCases(implementation: Artifact, task: TaskRecord): Promise<TestSuite>;
  executeTests(suite: TestSuite): Promise<TestExecution>;
  generateTestReport(execution: TestExecution): Promise<TestReport>;
}

export interface DocumentationAgentLike {
  analyzeCodebase(implementation: Artifact): Promise<Artifact>;
  generateTechnicalDocumentation(analysis: Artifact, task: TaskRecord): Promise<Artifact>;
  createUserGuides(task: TaskRecord, technicalDocs: Artifact): Promise<Artifact>;
}

export interface ErrorHandlingAgentLike {
  handleError(error: ErrorRecord, context: Artifact): Promise<ErrorHandlingResult>;
  trackErrorPatterns?(errors: ErrorRecord[]): Promise<ErrorPattern[]>;
}

export interface AgentSuite {
  projectManager: ProjectManagerAgentLike;
  developer: DeveloperAgentLike;
  uiUx: UiUxAgentLike;
  integration: IntegrationAgentLike;
  testing: TestingAgentLike;
  documentation: DocumentationAgentLike;
  errorHandling: ErrorHandlingAgentLike;
}

export type AgentSuiteFactory = (store: PersistenceStore) => AgentSuite;
