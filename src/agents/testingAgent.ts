import { TestingAgentLike } from "../orchestrator/agentContracts";
import { PersistenceStore } from "../services/persistenceStore";
import { Artifact, TaskRecord, TestCase, TestCaseResult, TestExecution, TestReport, TestSuite } from "../types";
import { readFilePaths, recordOutput } from "./agentOutput";

export interface TestingAgentOptions {
  simulateFailures?: boolean;
}

const executionTimeByType: Record<TestCase["type"], number> = {
  unit: 5,
  integration: 20,
  end_to_end: 50
};

export class TestingAgent implements TestingAgentLike {
  constructor(
    private readonly store?: PersistenceStore,
    private readonly options: TestingAgentOptions = {},
    private readonly agentId = "testing"
  ) {}

  async generateTestCases(implementation: Artifact, task: TaskRecord): Promise<TestSuite> {
    const files = readFilePaths(implementation);
    const targets = files.length > 0 ? files : [task.title];
    const suite: TestSuite = {
      taskId: task.id,
      unitTests: targets.map((target, index) => ({
        id: `unit-${index + 1}`,
        type: "unit",
        description: `validates ${target}`
      })),
      integrationTests: [1, 2, 3].map((index) => ({
        id: `integration-${index}`,
        type: "integration",
        description: `exercises ${task.title} with its collaborators (${index})`
      })),
      endToEndTests: [
        {
          id: "e2e-1",
          type: "end_to_end",
          description: `walks through ${task.title} as a user`
        }
      ]
    };
    await recordOutput(this.store, task.id, this.agentId, "test_cases", suite);
    return suite;
  }

  async executeTests(suite: TestSuite): Promise<TestExecution> {
    const results: TestCaseResult[] = [
      ...suite.unitTests.map((test) => this.pass(test)),
      ...suite.integrationTests.map((test, index) =>
        this.options.simulateFailures && index % 3 === 0
          ? { ...this.pass(test), status: "failed" as const, failureReason: `Simulated failure in ${test.id}` }
          : this.pass(test)
      ),
      ...suite.endToEndTests.map((test) => this.pass(test))
    ];
    const failedTests = results.filter((result) => result.status === "failed").length;
    const execution: TestExecution = {
      taskId: suite.taskId,
      executedAt: new Date().toISOString(),
      results,
      summary: {
        totalTests: results.length,
        passedTests: results.length - failedTests,
        failedTests
      }
    };
    await recordOutput(this.store, suite.taskId, this.agentId, "test_execution", execution);
    return execution;
  }

  async generateTestReport(execution: TestExecution): Promise<TestReport> {
    const { summary } = execution;
    const report: TestReport = {
      taskId: execution.taskId,
      summary,
      passRate: summary.totalTests === 0 ? 100 : Math.round((summary.passedTests / summary.totalTests) * 100),
      failedTests: execution.results.filter((result) => result.status === "failed"),
      recommendations:
        summary.failedTests > 0
          ? [`Fix ${summary.failedTests} failing test(s) before release.`]
          : ["All tests passed."],
      generatedAt: new Date().toISOString()
    };
    await recordOutput(this.store, execution.taskId, this.agentId, "test_report", report);
    return report;
  }

  private pass(test: TestCase): TestCaseResult {
    return {
      testId: test.id,
      type: test.type,
      status: "passed",
      executionTimeMs: executionTimeByType[test.type]
    };
  }
}
