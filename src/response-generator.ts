// Patient Dialogue Engine - Response Generator
// Turns a GenerationRequest from the dialogue policy into one short spoken
// reply via OpenAI chat completions. The policy decides *whether* to call the
// model and with which act; this module only phrases the prompt, enforces the
// deadline and cleans the output.

import type { GenerationConfig } from "./config.js";
import { CollaboratorError, errorMessage } from "./errors.js";
import { DialogueAct, type ConversationExchange, type GenerationRequest } from "./types.js";
import { splitSentences } from "./utils.js";

// ─── OpenAI client interface (for testability / dependency injection) ────────────

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Minimal interface for the OpenAI chat completions API surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(
        params: {
          model: string;
          messages: ChatMessage[];
          temperature?: number;
          max_tokens?: number;
        },
        options?: { signal?: AbortSignal },
      ): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

/** Reply generator contract consumed by the conversation session. */
export interface ReplyGenerator {
  generate(request: GenerationRequest, options?: { signal?: AbortSignal }): Promise<string>;
}

// ─── Prompt ─────────────────────────────────────────────────────────────────────

const SYSTEM_PROMPT = `You are a warm, unhurried conversation partner for an older adult.
The person may speak slowly, pause for a long time, lose a word, or trail off mid-sentence. That is normal; never point it out and never rush them.

How to reply:
- Plain spoken English, short sentences, no lists, no emojis.
- Acknowledge in a few words, then add something new that moves the conversation forward.
- Do not restate or summarise what the person just said. Never open with "It sounds like", "That sounds like" or "It must be".
- Never ask more than one question in a reply.
- Do not ask for names, addresses, phone numbers or other identifying details.
- Do not give medical advice; turn gently back to memories and everyday life.
- If the person seems frustrated, apologise briefly and move to something else.`;

function actInstruction(request: GenerationRequest): string {
  if (request.hint === DialogueAct.ASK) {
    return "DIALOGUE ACT: ASK. You may end with one short, open, easy question.";
  }
  return "DIALOGUE ACT: CONFIRM. Reply with a warm acknowledgement or observation only. Do not ask any question.";
}

/** Runtime directives appended to the system prompt for one turn. */
export function buildTurnDirectives(request: GenerationRequest): string {
  const lines = [actInstruction(request), `MAX SENTENCES: ${request.maxSentences}`];

  if (request.questionBudgetRemaining !== null) {
    lines.push(`QUESTIONS LEFT THIS CONVERSATION: ${request.questionBudgetRemaining}`);
  }
  if (request.constraints.banned.length > 0) {
    lines.push(`AVOID THESE TOPICS ENTIRELY: ${request.constraints.banned.join(", ")}`);
  }
  if (request.constraints.discussed.length > 0) {
    lines.push(`ALREADY DISCUSSED (do not ask about them again): ${request.constraints.discussed.join(", ")}`);
  }
  if (request.changeTopic) {
    lines.push("TOPIC: this topic has run its course. Gently bring up a different everyday subject.");
  }
  if (request.summary) {
    lines.push(`WHAT THE PERSON HAS SHARED SO FAR: ${request.summary}`);
  }
  return lines.join("\n");
}

export function buildMessages(request: GenerationRequest): ChatMessage[] {
  const history: ChatMessage[] = request.history.map((e: ConversationExchange) => ({
    role: e.role,
    content: e.content,
  }));
  return [
    { role: "system", content: `${SYSTEM_PROMPT}\n\n${buildTurnDirectives(request)}` },
    ...history,
    { role: "user", content: request.text },
  ];
}

// ─── Output clean-up ────────────────────────────────────────────────────────────

const PARROTING_PREFIXES = [
  /^it sounds like\b/i,
  /^that sounds like\b/i,
  /^it seems like\b/i,
  /^that seems like\b/i,
  /^it must be\b/i,
  /^that must be\b/i,
  /^it appears that\b/i,
];

/**
 * Strip a restating opener ("It sounds like ...") and re-capitalize what is
 * left. Returns the input unchanged when nothing would remain.
 */
export function filterParroting(reply: string): string {
  const text = reply.trim();
  for (const pattern of PARROTING_PREFIXES) {
    const match = pattern.exec(text);
    if (!match) continue;
    const rest = text.slice(match[0].length).replace(/^[\s,;:-]+/, "");
    if (!rest) return text;
    return rest.charAt(0).toUpperCase() + rest.slice(1);
  }
  return text;
}

/**
 * Keep the reply within the act's limits: at most `maxSentences` sentences,
 * no question for CONFIRM (when a statement remains) and at most one
 * question for ASK.
 */
export function enforceReplyShape(reply: string, hint: GenerationRequest["hint"], maxSentences: number): string {
  let sentences = splitSentences(reply);
  if (sentences.length === 0) return "";

  if (hint === DialogueAct.CONFIRM) {
    const statements = sentences.filter((s) => !s.endsWith("?"));
    if (statements.length > 0) sentences = statements;
  } else {
    const firstQuestion = sentences.findIndex((s) => s.endsWith("?"));
    if (firstQuestion >= 0) sentences = sentences.slice(0, firstQuestion + 1);
  }

  if (sentences.length > maxSentences) {
    // Keep the ending: for ASK that is the question.
    const question = sentences[sentences.length - 1].endsWith("?") ? sentences[sentences.length - 1] : null;
    sentences = question
      ? [...sentences.slice(0, Math.max(0, maxSentences - 1)), question]
      : sentences.slice(0, maxSentences);
  }
  return sentences.join(" ");
}

// ─── ResponseGenerator ──────────────────────────────────────────────────────────

export class ResponseGenerator implements ReplyGenerator {
  private readonly openai: OpenAIChatClient;
  private readonly config: GenerationConfig;

  constructor(openaiClient: OpenAIChatClient, config: GenerationConfig) {
    this.openai = openaiClient;
    this.config = config;
  }

  /**
   * Generate one reply. The call is abandoned after `timeoutMs` or when
   * `options.signal` aborts.
   * @throws CollaboratorError with `timedOut` set when the deadline passed.
   */
  async generate(request: GenerationRequest, options: { signal?: AbortSignal } = {}): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);
    const onOuterAbort = () => controller.abort();
    options.signal?.addEventListener("abort", onOuterAbort, { once: true });

    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.config.model,
          messages: buildMessages(request),
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal: controller.signal },
      );

      const content = response.choices[0]?.message?.content;
      if (!content || content.trim().length === 0) {
        throw new CollaboratorError("llm", "LLM returned empty response");
      }
      const reply = enforceReplyShape(filterParroting(content), request.hint, request.maxSentences);
      if (!reply) {
        throw new CollaboratorError("llm", "LLM reply was empty after clean-up");
      }
      return reply;
    } catch (err) {
      if (err instanceof CollaboratorError) throw err;
      if (timedOut) {
        throw new CollaboratorError("llm", `LLM call exceeded ${this.config.timeoutMs}ms`, {
          timedOut: true,
          cause: err,
        });
      }
      throw new CollaboratorError("llm", `LLM call failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onOuterAbort);
    }
  }
}
