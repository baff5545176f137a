import { DocumentationAgentLike } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { Artifact, TaskRecord } from "../types";
import { readFilePaths, readString, recordOutput } from "./agentOutput";

export class DocumentationAgent implements DocumentationAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly agentId = "documentation"
  ) {}

  async analyzeCodebase(implementation: Artifact): Promise<Artifact> {
    const files = readFilePaths(implementation);
    const analysis = {
      taskId: readString(implementation, "taskId"),
      files,
      fileCount: files.length,
      language: readString(implementation, "language") ?? "unknown"
    };
    await recordOutput(this.store, analysis.taskId, this.agentId, "codebase_analysis", analysis);
    return analysis;
  }

  async generateTechnicalDocumentation(analysis: Artifact, task: TaskRecord): Promise<Artifact> {
    const files = Array.isArray(analysis.files) ? analysis.files.filter((file): file is string => typeof file === "string") : [];
    const docs = {
      taskId: task.id,
      title: `${task.title}: technical reference`,
      sections: [
        { heading: "Overview", body: task.description },
        { heading: "Files", body: files.length > 0 ? files.join("\n") : "No source files recorded." }
      ]
    };
    await recordOutput(this.store, task.id, this.agentId, "technical_documentation", docs);
    return docs;
  }

  async createUserGuides(task: TaskRecord, technicalDocs: Artifact): Promise<Artifact> {
    const guide = {
      taskId: task.id,
      title: `Using ${task.title}`,
      reference: readString(technicalDocs, "title") ?? task.title,
      steps: ["Open the application.", `Navigate to ${task.title}.`, "Follow the on-screen prompts."]
    };
    await recordOutput(this.store, task.id, this.agentId, "user_guide", guide);
    return guide;
  }
}
