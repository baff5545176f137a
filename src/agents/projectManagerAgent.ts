import { AgentRole } from "../types";
import { PersistenceStore } from "../services/persistenceStore";
import {
  AssignedTaskDraft,
  ParsedRequirements,
  ProjectManagerAgentLike,
  TaskDraft
} from "../orchestrator/agentContracts";
import { recordOutput } from "./agentOutput";

const componentKeywords = ["database", "frontend", "backend", "ui", "api", "authentication", "storage"];
const featureKeywords = ["login", "signup", "search", "dashboard", "analytics", "profile", "settings"];
const technologyKeywords = ["typescript", "javascript", "react", "node", "sql", "nosql", "rest", "graphql"];

const defaultComponents = ["frontend", "backend", "database"];
const defaultFeatures = ["core functionality"];

const uiComponents = new Set(["frontend", "ui", "interface"]);
const integrationComponents = new Set(["integration", "api", "connection"]);

const containsWord = (text: string, word: string): boolean => new RegExp(`\\b${word}\\b`, "i").test(text);

export const assignRole = (draft: TaskDraft): AgentRole => {
  if (draft.aspect === "testing") return "testing";
  if (draft.aspect === "documentation") return "documentation";
  if (draft.component && uiComponents.has(draft.component)) return "ui_ux";
  if (draft.component && integrationComponents.has(draft.component)) return "integration";
  return "developer";
};

export class ProjectManagerAgent implements ProjectManagerAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly agentId = "project_manager"
  ) {}

  async parseRequirements(requirements: string): Promise<ParsedRequirements> {
    const components = componentKeywords.filter((keyword) => containsWord(requirements, keyword));
    const features = featureKeywords.filter((keyword) => containsWord(requirements, keyword));
    const technologies = technologyKeywords.filter((keyword) => containsWord(requirements, keyword));
    const constraints = requirements
      .split(/[.\n]+/)
      .map((sentence) => sentence.trim())
      .filter((sentence) => /\b(must|should)\b/i.test(sentence));

    const parsed: ParsedRequirements = {
      rawText: requirements,
      components: components.length > 0 ? components : [...defaultComponents],
      features: features.length > 0 ? features : [...defaultFeatures],
      technologies,
      constraints
    };
    await recordOutput(this.store, undefined, this.agentId, "parsed_requirements", parsed);
    return parsed;
  }

  async createTaskBreakdown(parsed: ParsedRequirements): Promise<TaskDraft[]> {
    const componentTasks: TaskDraft[] = parsed.components.map((component, index) => ({
      draftId: `component-${index + 1}`,
      title: `Implement ${component} component`,
      description: `Build the ${component} component covering: ${parsed.features.join(", ")}.`,
      aspect: "component",
      component,
      priority: "high",
      estimatedEffort: "medium",
      dependencies: []
    }));

    const featureTasks: TaskDraft[] = parsed.features.map((feature, index) => ({
      draftId: `feature-${index + 1}`,
      title: `Implement ${feature} feature`,
      description: `Deliver the ${feature} feature end to end.`,
      aspect: "feature",
      feature,
      priority: "medium",
      estimatedEffort: "medium",
      dependencies: componentTasks.map((task) => task.draftId)
    }));

    const buildIds = [...componentTasks, ...featureTasks].map((task) => task.draftId);
    const drafts: TaskDraft[] = [
      ...componentTasks,
      ...featureTasks,
      {
        draftId: "testing-1",
        title: "Create test plan",
        description: "Plan unit, integration and end-to-end coverage for the project.",
        aspect: "testing",
        priority: "medium",
        estimatedEffort: "small",
        dependencies: buildIds
      },
      {
        draftId: "documentation-1",
        title: "Write project documentation",
        description: "Produce technical documentation and user guides for the project.",
        aspect: "documentation",
        priority: "low",
        estimatedEffort: "small",
        dependencies: buildIds
      }
    ];
    await recordOutput(this.store, undefined, this.agentId, "task_breakdown", drafts);
    return drafts;
  }

  async assignTasksToAgents(tasks: TaskDraft[]): Promise<AssignedTaskDraft[]> {
    const assigned = tasks.map((task) => ({ ...task, assignedAgent: assignRole(task) }));
    await recordOutput(this.store, undefined, this.agentId, "task_assignments", assigned);
    return assigned;
  }
}
