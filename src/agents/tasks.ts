import type { FetchedMessage } from "../imap/types.js";
import type { AnalysisResult } from "./analysis.js";

export interface TaskDescription {
  description: string;
  expectedOutput: string;
}

export const analysisTask: TaskDescription = Object.freeze({
  description: [
    "Read and analyze the email provided as input.",
    "",
    "Extract and summarize:",
    "1. Who is the sender?",
    "2. What is the main purpose of this email?",
    "3. What are the key points that need to be addressed?",
    "4. What is the tone and urgency level?",
  ].join("\n"),
  expectedOutput: [
    "A single JSON object and nothing else, with these fields:",
    '  "summary": string — two or three sentences',
    '  "keyPoints": string[] — points a reply must address, in order of importance',
    '  "senderIntent": string — what the sender wants',
    '  "tone": string — e.g. formal, friendly, frustrated',
    '  "urgency": "low" | "normal" | "high"',
  ].join("\n"),
});

export const draftingTask: TaskDescription = Object.freeze({
  description: [
    "Based on the email analysis provided as input, write a reply to the original email.",
    "",
    "The draft should:",
    "1. Be professional and appropriate in tone",
    "2. Address all key points from the original email",
    "3. Be clear and concise",
    "4. Include a proper greeting and closing",
    "5. Match the urgency level of the original email",
  ].join("\n"),
  expectedOutput:
    "A complete email reply ready to send: a first line \"Subject: ...\", then a blank line, then the greeting, body, and closing.",
});

/**
 * The message as the analysis agent sees it.
 */
export function formatMessageInput(message: FetchedMessage): string {
  const sender = message.fromName
    ? `${message.fromName} <${message.from}>`
    : message.from || "Unknown";
  return [
    `From: ${sender}`,
    `Subject: ${message.subject}`,
    `Date: ${message.date.toISOString()}`,
    "",
    "Content:",
    message.body || "No content",
  ].join("\n");
}

/**
 * The original message plus its analysis, as the drafting agent sees it.
 */
export function formatDraftingInput(
  message: FetchedMessage,
  analysis: AnalysisResult
): string {
  const keyPoints = analysis.keyPoints.length
    ? analysis.keyPoints.map((point, i) => `${i + 1}. ${point}`).join("\n")
    : "(none)";
  return [
    "Email analysis:",
    `Summary: ${analysis.summary}`,
    `Sender intent: ${analysis.senderIntent}`,
    `Tone: ${analysis.tone}`,
    `Urgency: ${analysis.urgency}`,
    "Key points:",
    keyPoints,
    "",
    "Original email:",
    formatMessageInput(message),
  ].join("\n");
}
