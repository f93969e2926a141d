/**
 * Declarative description of an agent. The runtime turns these fields into
 * the instructions the model sees; nothing here executes on its own.
 */
export interface AgentConfig {
  /** Stable identifier, also used to cache the runtime's agent instance */
  name: string;
  role: string;
  goal: string;
  backstory: string;
}

export const analysisAgent: AgentConfig = Object.freeze({
  name: "email-analyst",
  role: "Email Reader",
  goal:
    "Read and analyze emails to extract key information, sender details, subject, and content",
  backstory:
    "You are an expert email analyst with years of experience in understanding email " +
    "communications. You excel at extracting important information from emails, " +
    "identifying the sender's intent, and summarizing the key points that need to be " +
    "addressed in a response.",
});

export const draftingAgent: AgentConfig = Object.freeze({
  name: "email-drafter",
  role: "Email Draft Writer",
  goal:
    "Generate professional, clear, and appropriate email draft responses based on the original email content",
  backstory:
    "You are a professional email communication expert with extensive experience in " +
    "crafting clear, concise, and professional email responses. You understand tone, " +
    "context, and the importance of addressing all points raised in the original email " +
    "while maintaining professionalism.",
});

/**
 * Render an agent config as system instructions.
 */
export function renderInstructions(config: AgentConfig): string {
  return [
    `You are the ${config.role}.`,
    `Your goal: ${config.goal}`,
    "",
    config.backstory,
  ].join("\n");
}
