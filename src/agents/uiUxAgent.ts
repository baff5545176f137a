import { UiUxAgentLike } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { Artifact, TaskRecord } from "../types";
import { readString, recordOutput, slugify } from "./agentOutput";

export class UiUxAgent implements UiUxAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly agentId = "ui_ux"
  ) {}

  async designInterfaceComponents(task: TaskRecord): Promise<Artifact> {
    const base = slugify(task.title);
    const design = {
      taskId: task.id,
      components: [
        { name: `${base}-page`, kind: "page" },
        { name: `${base}-form`, kind: "form" },
        { name: `${base}-list`, kind: "list" }
      ],
      layout: "single-column",
      palette: { primary: "#2f6fed", surface: "#ffffff", text: "#1a1a1a" }
    };
    await recordOutput(this.store, task.id, this.agentId, "interface_design", design);
    return design;
  }

  async implementResponsiveDesign(design: Artifact): Promise<Artifact> {
    const responsive = {
      ...design,
      breakpoints: { mobile: 480, tablet: 768, desktop: 1200 },
      layout: "responsive-grid"
    };
    await recordOutput(this.store, readString(design, "taskId"), this.agentId, "responsive_design", responsive);
    return responsive;
  }

  async ensureAccessibilityCompliance(implementation: Artifact): Promise<Artifact> {
    const compliant = {
      ...implementation,
      accessibility: {
        wcagLevel: "AA",
        checks: ["color-contrast", "keyboard-navigation", "aria-labels", "focus-order"]
      }
    };
    await recordOutput(this.store, readString(implementation, "taskId"), this.agentId, "accessible_design", compliant);
    return compliant;
  }
}
