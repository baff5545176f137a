import { config } from "../config";
import { AgentSuite } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { DeveloperAgent } from "./developerAgent";
import { DocumentationAgent } from "./documentationAgent";
import { ErrorHandlingAgent } from "./errorHandlingAgent";
import { IntegrationAgent } from "./integrationAgent";
import { ProjectManagerAgent } from "./projectManagerAgent";
import { TestingAgent, TestingAgentOptions } from "./testingAgent";
import { UiUxAgent } from "./uiUxAgent";

export const createStubAgents = (
  store?: PersistenceStore,
  options: TestingAgentOptions = { simulateFailures: config.simulateTestFailures }
): AgentSuite => ({
  projectManager: new ProjectManagerAgent(store),
  developer: new DeveloperAgent(store),
  uiUx: new UiUxAgent(store),
  integration: new IntegrationAgent(store),
  testing: new TestingAgent(store, options),
  documentation: new DocumentationAgent(store),
  errorHandling: new ErrorHandlingAgent(store)
});
