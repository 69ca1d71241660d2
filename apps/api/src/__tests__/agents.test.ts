import { describe, it, expect } from "vitest";
import { DeveloperAgent } from "../agents/developer.js";
import { ErrorAnalyzerAgent } from "../agents/errorAnalyzer.js";
import { ExecutorAgent } from "../agents/executor.js";
import { PlannerAgent } from "../agents/planner.js";
import { createDefaultAgentRegistry, AgentRegistry } from "../agents/registry.js";
import { ResearcherAgent } from "../agents/researcher.js";
import type { AgentDeps } from "../agents/types.js";
import { VerifierAgent } from "../agents/verifier.js";
import { ScriptedProvider } from "./helpers/fakeProvider.js";
import { planJson, testLogger } from "./helpers/testData.js";

const FENCE = "```";

function depsFor(provider: ScriptedProvider, timeoutMs = 1000): AgentDeps {
  return {
    provider,
    projectContext: { name: "todo-cli", language: "python", description: "A todo CLI" },
    logger: testLogger(),
    maxTokens: 4000,
    timeoutMs,
  };
}

describe("PlannerAgent", () => {
  it("normalizes the tasks of a parsed plan", async () => {
    const provider = new ScriptedProvider().script("planner", {
      content: planJson([
        { title: "Research", agent_type: "researcher", estimated_tokens: 800 },
        { title: "", agent_type: "wizard" },
      ]),
      tokensUsed: 120,
    });
    const result = await new PlannerAgent(depsFor(provider)).execute("Build a todo CLI");

    expect(result.success).toBe(true);
    expect(result.tokens_used).toBe(120);
    expect(result.metadata.fallback_used).toBe(false);
    expect(result.tasks_generated).toHaveLength(2);

    const [first, second] = result.tasks_generated;
    expect(first).toMatchObject({ title: "Research", agent_type: "researcher", order: 1, estimated_tokens: 800 });
    expect(second).toMatchObject({ title: "Task 2", agent_type: "developer", order: 2, estimated_tokens: 500 });
    expect(second.status).toBe("pending");
    expect(second.id).toMatch(/^task-[0-9a-f]{8}$/);
  });

  it("substitutes the five-step fallback plan for unparseable output", async () => {
    const provider = new ScriptedProvider().script("planner", { content: "I would start by researching." });
    const result = await new PlannerAgent(depsFor(provider)).execute("Build a todo CLI");

    expect(result.success).toBe(true);
    expect(result.metadata.fallback_used).toBe(true);
    expect(result.tasks_generated.map((t) => [t.agent_type, t.estimated_tokens])).toEqual([
      ["researcher", 800],
      ["developer", 1500],
      ["developer", 2000],
      ["test_designer", 1000],
      ["verifier", 500],
    ]);
  });

  it("turns a provider failure into an unsuccessful result", async () => {
    const provider = new ScriptedProvider().script("planner", { error: "connection reset" });
    const result = await new PlannerAgent(depsFor(provider)).execute("Build a todo CLI");

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["connection reset"]);
    expect(result.tasks_generated).toEqual([]);
  });

  it("turns a timeout into an unsuccessful result", async () => {
    const provider = new ScriptedProvider().script("planner", { hang: true });
    const result = await new PlannerAgent(depsFor(provider, 20)).execute("Build a todo CLI");

    expect(result.success).toBe(false);
    expect(result.errors).toEqual(["Planner timed out after 20ms"]);
    expect(provider.calls[0].request.signal?.aborted).toBe(true);
  });
});

describe("prompt context", () => {
  it("includes project info, the last three outputs, file paths and errors", async () => {
    const provider = new ScriptedProvider();
    await new DeveloperAgent(depsFor(provider)).execute("Add a delete command", {
      previous_outputs: [
        { agent: "researcher", summary: "first" },
        { agent: "developer", summary: "second" },
        { agent: "developer", summary: "third" },
        { agent: "test_designer", summary: "fourth" },
      ],
      existing_files: [{ path: "todo.py", content: "print(1)" }],
      errors: ["NameError: x"],
    });

    const prompt = provider.calls[0].request.prompt;
    expect(prompt).toContain("Name: todo-cli");
    expect(prompt).toContain("Language: python");
    expect(prompt).not.toContain("first");
    expect(prompt).toContain("### test_designer\nfourth");
    expect(prompt).toContain("- todo.py");
    expect(prompt).toContain("## Errors to Address\n- NameError: x");
    expect(prompt.endsWith("## Task\nAdd a delete command")).toBe(true);
    expect(provider.calls[0].request.systemPrompt).toContain("You are an expert python developer");
  });
});

describe("DeveloperAgent", () => {
  it("extracts generated files", async () => {
    const provider = new ScriptedProvider().script("developer", {
      content: `### todo.py\n${FENCE}python\nprint("todo")\n${FENCE}`,
      tokensUsed: 300,
    });
    const result = await new DeveloperAgent(depsFor(provider)).execute("Write the CLI");

    expect(result.files_created).toEqual([{ path: "todo.py", content: 'print("todo")' }]);
    expect(result.metadata.files).toEqual(["todo.py"]);
  });
});

describe("ResearcherAgent", () => {
  it("counts markdown sections", async () => {
    const provider = new ScriptedProvider().script("researcher", { content: "## Libraries\nargparse\n## Pitfalls\nnone" });
    const result = await new ResearcherAgent(depsFor(provider)).execute("Research CLIs");
    expect(result.metadata.sections_found).toBe(2);
  });
});

describe("ExecutorAgent", () => {
  it("returns the validated execution plan", async () => {
    const provider = new ScriptedProvider().script("executor", {
      content: '{"language": "python", "main_file": "todo.py", "run_command": "python todo.py"}',
    });
    const result = await new ExecutorAgent(depsFor(provider)).execute("How do I run it?");

    expect(result.success).toBe(true);
    expect(result.metadata.plan_parsed).toBe(true);
    expect(result.metadata.execution_plan).toMatchObject({ main_file: "todo.py", run_command: "python todo.py" });
  });

  it("still succeeds with raw text when the plan does not parse", async () => {
    const provider = new ScriptedProvider().script("executor", { content: "Just run it." });
    const result = await new ExecutorAgent(depsFor(provider)).execute("How do I run it?");
    expect(result.success).toBe(true);
    expect(result.content).toBe("Just run it.");
    expect(result.metadata.plan_parsed).toBe(false);
  });
});

describe("VerifierAgent", () => {
  it("reports the verdict in metadata", async () => {
    const provider = new ScriptedProvider().script("verifier", { content: "Complete.\nVERDICT: PASS" });
    const result = await new VerifierAgent(depsFor(provider)).execute("Verify", { original_requirements: "A todo CLI" });

    expect(result.metadata).toEqual({ verification_passed: true, verdict: "PASS" });
    expect(provider.calls[0].request.prompt).toContain("## Original Requirements\nA todo CLI");
  });
});

describe("ErrorAnalyzerAgent", () => {
  it("turns fix tasks into pending tasks ordered by priority", async () => {
    const provider = new ScriptedProvider().script("error_analyzer", {
      content: JSON.stringify({
        errors_found: [
          { category: "IMPORT", message: "No module named rich" },
          { category: "SYNTAX", message: "invalid syntax" },
          { category: "IMPORT", message: "No module named click" },
        ],
        fix_tasks: [
          { agent: "developer", priority: 2, description: "Add missing dependencies", files_affected: ["requirements.txt"] },
          { agent: "planner", priority: 1, description: "Fix syntax in todo.py", files_affected: ["todo.py"] },
        ],
        can_auto_fix: true,
      }),
    });
    const result = await new ErrorAnalyzerAgent(depsFor(provider)).execute("Analyze the build", {
      build_logs: "SyntaxError: invalid syntax",
    });

    expect(result.tasks_generated.map((t) => [t.agent_type, t.title, t.deliverables])).toEqual([
      ["debugger", "Fix syntax in todo.py", ["todo.py"]],
      ["developer", "Add missing dependencies", ["requirements.txt"]],
    ]);
    expect(result.metadata).toMatchObject({
      errors_found: 3,
      can_auto_fix: true,
      requires_user_input: false,
      error_categories: ["IMPORT", "SYNTAX"],
    });
    expect(provider.calls[0].request.prompt).toContain("## Build Logs\n```\nSyntaxError: invalid syntax\n```");
  });
});

describe("executeStreaming", () => {
  it("yields chunks in generation order", async () => {
    const provider = new ScriptedProvider().script("researcher", { content: "one two three" });
    const chunks: string[] = [];
    for await (const chunk of new ResearcherAgent(depsFor(provider)).executeStreaming("Research")) {
      chunks.push(chunk);
    }
    expect(chunks).toEqual(["one ", "two ", "three "]);
  });

  it("stops when the consumer closes the stream", async () => {
    const provider = new ScriptedProvider().script("researcher", { content: "one two three" });
    const chunks: string[] = [];
    for await (const chunk of new ResearcherAgent(depsFor(provider)).executeStreaming("Research")) {
      chunks.push(chunk);
      break;
    }
    expect(chunks).toEqual(["one "]);
  });
});

describe("AgentRegistry", () => {
  it("lists every default agent", () => {
    expect(createDefaultAgentRegistry().list().map((a) => a.id)).toEqual([
      "planner",
      "researcher",
      "developer",
      "test_designer",
      "executor",
      "debugger",
      "verifier",
      "error_analyzer",
    ]);
  });

  it("falls back to the developer for unregistered types", () => {
    const registry = new AgentRegistry().register("developer", DeveloperAgent);
    const agent = registry.create("verifier", depsFor(new ScriptedProvider()));
    expect(agent.type).toBe("developer");
  });
});
