import { DeveloperAgentLike } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { Artifact, TaskRecord } from "../types";
import { readFilePaths, readString, recordOutput, slugify } from "./agentOutput";

export class DeveloperAgent implements DeveloperAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly agentId = "developer"
  ) {}

  async analyzeTaskRequirements(task: TaskRecord): Promise<Artifact> {
    const analysis = {
      taskId: task.id,
      title: task.title,
      language: "typescript",
      modules: [slugify(task.title)],
      complexity: task.description.length > 200 ? "high" : "medium",
      analyzedAt: new Date().toISOString()
    };
    await recordOutput(this.store, task.id, this.agentId, "requirements_analysis", analysis);
    return analysis;
  }

  async generateImplementationCode(task: TaskRecord, analysis: Artifact): Promise<Artifact> {
    const moduleName = slugify(task.title);
    const implementation = {
      taskId: task.id,
      language: readString(analysis, "language") ?? "typescript",
      files: [
        {
          path: `src/${moduleName}.ts`,
          content: `export const ${moduleName.replace(/-([a-z0-9])/g, (_, char: string) => char.toUpperCase())} = () => "${task.title}";\n`
        },
        {
          path: `tests/${moduleName}.test.ts`,
          content: `// covers ${task.title}\n`
        }
      ]
    };
    await recordOutput(this.store, task.id, this.agentId, "implementation", implementation);
    return implementation;
  }

  async documentCode(implementation: Artifact): Promise<Artifact> {
    const files = readFilePaths(implementation);
    const documented = {
      ...implementation,
      documentation: {
        summary: `Implementation spans ${files.length} file(s).`,
        files
      }
    };
    await recordOutput(this.store, readString(implementation, "taskId"), this.agentId, "documented_implementation", documented);
    return documented;
  }
}
