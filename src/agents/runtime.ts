import { createOpenAI } from "@ai-sdk/openai";
import { Agent } from "@mastra/core/agent";
import { InboxDrafterError, ModelError, QuotaError } from "../errors.js";
import type { AgentConfig } from "./configs.js";
import { renderInstructions } from "./configs.js";
import type { TaskDescription } from "./tasks.js";

/**
 * The single capability the pipeline needs from an agent framework:
 * run one agent on one task and return its text.
 *
 * Implementations fail with ModelError or QuotaError and do not retry.
 */
export interface AgentRuntime {
  run(config: AgentConfig, task: TaskDescription, input: string): Promise<string>;
}

const QUOTA_PATTERN = /quota|rate.?limit|too many requests|insufficient_quota|billing|credit/i;

function causes(error: unknown): Error[] {
  const chain: Error[] = [];
  let current: unknown = error;
  while (current instanceof Error && chain.length < 5) {
    chain.push(current);
    current = current.cause;
  }
  return chain;
}

/**
 * Classify a provider/framework error into ModelError or QuotaError.
 * Looks through the cause chain, since frameworks wrap provider errors.
 */
export function classifyModelError(error: unknown): InboxDrafterError {
  if (error instanceof InboxDrafterError) {
    return error;
  }

  const chain = causes(error);
  if (chain.length === 0) {
    return new ModelError(`Model error: ${String(error)}`);
  }

  for (const err of chain) {
    const status: unknown = Reflect.get(err, "statusCode");
    if (status === 429 || QUOTA_PATTERN.test(err.message)) {
      return new QuotaError(`Model provider quota exhausted: ${err.message}`, {
        cause: error,
      });
    }
  }

  return new ModelError(`Model error: ${chain[0].message}`, { cause: error });
}

/**
 * Build the user prompt for a task: the task description, the input, and the
 * expected output format.
 */
export function renderPrompt(task: TaskDescription, input: string): string {
  return [
    task.description,
    "",
    "--- Input ---",
    input,
    "--- End of input ---",
    "",
    "Expected output:",
    task.expectedOutput,
  ].join("\n");
}

export interface MastraRuntimeOptions {
  apiKey: string;
  /** OpenAI model id, e.g. "gpt-4o" */
  model: string;
}

/**
 * AgentRuntime backed by Mastra agents on an OpenAI model.
 * One Mastra Agent is created per config name and reused for the run.
 */
export class MastraAgentRuntime implements AgentRuntime {
  private readonly agents = new Map<string, Agent>();
  private readonly options: MastraRuntimeOptions;

  constructor(options: MastraRuntimeOptions) {
    this.options = options;
  }

  private agentFor(config: AgentConfig): Agent {
    const existing = this.agents.get(config.name);
    if (existing) return existing;

    const openai = createOpenAI({ apiKey: this.options.apiKey });
    const agent = new Agent({
      name: config.role,
      instructions: renderInstructions(config),
      model: openai(this.options.model),
    });
    this.agents.set(config.name, agent);
    return agent;
  }

  async run(config: AgentConfig, task: TaskDescription, input: string): Promise<string> {
    const agent = this.agentFor(config);

    let text: string;
    try {
      const result = await agent.generate(renderPrompt(task, input));
      text = result.text;
    } catch (error) {
      throw classifyModelError(error);
    }

    if (!text.trim()) {
      throw new ModelError(`Agent "${config.name}" returned no text.`);
    }
    return text;
  }
}
