/**
 * Decision-makers for the agent loop.
 *
 * Real model back ends live outside this package; they plug in through
 * `ModelProvider`. Two providers ship here:
 *   - MockModelProvider: keyword matching on the query, for demos and dry runs
 *   - ScriptedModelProvider: replays recorded wire responses from a file
 */

import { readFileSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import type { ModelResponse, ScreenContext } from "@sidescreen/shared";

import { parseModelResponse } from "../protocol.js";
import type { CompactUIElement } from "../sanitizer.js";

export interface ModelProvider {
  readonly providerName: string;
  /** Whether responses may carry actions, not just chat. The loop refuses chat-only providers. */
  readonly supportsAgentMode: boolean;
  /**
   * `elements` are the scored interactive elements of the primary display,
   * best first; empty while a virtual display is active.
   */
  processQuery(
    query: string,
    context?: ScreenContext,
    elements?: readonly CompactUIElement[]
  ): Promise<ModelResponse>;
}

function reply(message: string, extra: Partial<ModelResponse> = {}): ModelResponse {
  return {
    message,
    isComplete: false,
    needsConfirmation: false,
    needsTakeover: false,
    ...extra,
  };
}

// ===========================================
// Mock provider
// ===========================================

const GREETINGS = [
  "Hello! What would you like me to do on the device?",
  "Hi there. Give me a task and I will drive the screen for you.",
  "Hello! Ready when you are.",
];

const ACKNOWLEDGEMENTS = [
  "Okay, let me take care of that.",
  "Understood, working out the next step.",
  "Got it, analysing the request...",
  "Sure, I will do my best with this one.",
];

const THINKING = [
  "Reading the request...",
  "Working out the goal...",
  "Planning the next step...",
  "Preparing an action...",
];

interface KeywordRule {
  keywords: string[];
  build: (query: string, elements: readonly CompactUIElement[]) => ModelResponse;
}

/** True when `keyword` appears in `query` on its own (CJK keywords match anywhere). */
function mentions(query: string, keyword: string): boolean {
  if (!/^[a-z]+$/.test(keyword)) return query.includes(keyword);
  return new RegExp(`\\b${keyword}\\b`).test(query);
}

/** Removes the trigger words from a query and returns what is left. */
export function stripKeywords(query: string, keywords: string[]): string {
  let result = query;
  for (const keyword of keywords) {
    result = result.replace(new RegExp(keyword, "gi"), "");
  }
  return result.replace(/\s+/g, " ").trim();
}

/** The tappable element whose label the phrase mentions; the longest label wins. */
export function findNamedElement(
  phrase: string,
  elements: readonly CompactUIElement[]
): CompactUIElement | undefined {
  const wanted = phrase.toLowerCase();
  if (!wanted) return undefined;
  let best: CompactUIElement | undefined;
  for (const el of elements) {
    const label = el.text.toLowerCase();
    if (!label || el.action !== "tap" || !wanted.includes(label)) continue;
    if (!best || label.length > best.text.length) best = el;
  }
  return best;
}

export interface MockModelOptions {
  /** Source of randomness for picking canned phrases. */
  random?: () => number;
  /** Simulated thinking time. */
  latencyMs?: number;
}

export class MockModelProvider implements ModelProvider {
  readonly providerName = "mock";
  readonly supportsAgentMode = true;

  private readonly random: () => number;
  private readonly latencyMs: number;
  private readonly rules: KeywordRule[];

  constructor(options: MockModelOptions = {}) {
    this.random = options.random ?? Math.random;
    this.latencyMs = options.latencyMs ?? 0;

    const launchWords = ["打开", "启动", "open", "launch"];
    const typeWords = ["输入", "type", "写"];
    const tapWords = ["点击", "click", "tap"];

    this.rules = [
      {
        keywords: ["你好", "hello", "hi"],
        build: () => reply(this.pick(GREETINGS), { rationale: "The user is greeting me" }),
      },
      {
        keywords: launchWords,
        build: (query) => {
          const app = stripKeywords(query, launchWords) || "Settings";
          return reply(`Opening ${app}.`, {
            rationale: `The user wants ${app} in the foreground`,
            action: { actionType: "LAUNCH_APP", targetApp: app },
          });
        },
      },
      {
        keywords: tapWords,
        build: (query, elements) => {
          const target = findNamedElement(stripKeywords(query, tapWords), elements);
          if (target) {
            return reply(`Tapping "${target.text}"...`, {
              rationale: `"${target.text}" is on screen`,
              action: { actionType: "TAP", points: [target.center] },
            });
          }
          return reply("Tapping...", {
            rationale: "Tapping the middle of the screen",
            action: { actionType: "TAP", points: [[540, 960]] },
          });
        },
      },
      {
        keywords: typeWords,
        build: (query) => {
          const text = stripKeywords(query, typeWords) || "hello";
          return reply(`Typing: ${text}`, {
            rationale: "The user wants text entered",
            action: { actionType: "TYPE", text },
          });
        },
      },
      {
        keywords: ["返回", "back"],
        build: () =>
          reply("Going back...", {
            rationale: "The user wants the previous screen",
            action: { actionType: "BACK" },
          }),
      },
      {
        keywords: ["滑动", "swipe", "scroll"],
        build: () =>
          reply("Swiping up...", {
            rationale: "The user wants to see more content",
            action: { actionType: "SWIPE", points: [[540, 1500], [540, 500]] },
          }),
      },
    ];
  }

  async processQuery(
    query: string,
    _context?: ScreenContext,
    elements: readonly CompactUIElement[] = []
  ): Promise<ModelResponse> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    }

    const lower = query.toLowerCase();
    const rule = this.rules.find((r) => r.keywords.some((k) => mentions(lower, k)));
    if (rule) return rule.build(query, elements);
    return reply(this.pick(ACKNOWLEDGEMENTS), { rationale: this.pick(THINKING) });
  }

  private pick(options: readonly string[]): string {
    const index = Math.min(options.length - 1, Math.floor(this.random() * options.length));
    return options[index];
  }
}

// ===========================================
// Scripted provider
// ===========================================

/**
 * Returns the given responses in order, then reports completion.
 */
export class ScriptedModelProvider implements ModelProvider {
  readonly providerName = "scripted";
  readonly supportsAgentMode = true;
  private index = 0;

  constructor(private readonly responses: readonly ModelResponse[]) {}

  /** Reads a JSON array of wire responses. Throws on an unusable entry. */
  static fromFile(path: string): ScriptedModelProvider {
    const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error(`Script ${path} must contain a JSON array of responses`);
    }
    const responses = raw.map((entry, i) => {
      const response = parseModelResponse(entry);
      if (!response) {
        throw new Error(`Script ${path}: entry ${i} is not a valid response`);
      }
      return response;
    });
    return new ScriptedModelProvider(responses);
  }

  get remaining(): number {
    return this.responses.length - this.index;
  }

  async processQuery(): Promise<ModelResponse> {
    const next = this.responses[this.index];
    if (!next) {
      return reply("Script finished", { isComplete: true });
    }
    this.index++;
    return next;
  }
}
