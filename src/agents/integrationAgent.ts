import { IntegrationAgentLike } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { Artifact, IntegrationComponent, TaskRecord } from "../types";
import { recordOutput, slugify } from "./agentOutput";

export class IntegrationAgent implements IntegrationAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly agentId = "integration"
  ) {}

  async analyzeComponentInterfaces(components: IntegrationComponent[]): Promise<Artifact> {
    const analysis = {
      componentCount: components.length,
      interfaces: components.map((component, index) => ({
        name: `${component.source}-${index + 1}`,
        source: component.source,
        owner: component.senderId,
        exposes: Object.keys(component.content).sort()
      }))
    };
    await recordOutput(this.store, undefined, this.agentId, "interface_analysis", analysis);
    return analysis;
  }

  async implementDataFlow(analysis: Artifact, task: TaskRecord): Promise<Artifact> {
    const interfaces = Array.isArray(analysis.interfaces) ? analysis.interfaces.length : 0;
    const dataFlow = {
      taskId: task.id,
      flows: Array.from({ length: Math.max(interfaces - 1, 0) }, (_, index) => ({
        from: `interface-${index + 1}`,
        to: `interface-${index + 2}`
      })),
      transport: "in-process"
    };
    await recordOutput(this.store, task.id, this.agentId, "data_flow", dataFlow);
    return dataFlow;
  }

  async createApiConnectors(analysis: Artifact, task: TaskRecord): Promise<Artifact> {
    const resource = slugify(task.title);
    const connectors = {
      taskId: task.id,
      componentCount: typeof analysis.componentCount === "number" ? analysis.componentCount : 0,
      endpoints: [
        { method: "GET", path: `/api/${resource}` },
        { method: "POST", path: `/api/${resource}` }
      ]
    };
    await recordOutput(this.store, task.id, this.agentId, "api_connectors", connectors);
    return connectors;
  }
}
