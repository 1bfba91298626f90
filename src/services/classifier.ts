/**
 * LLM classifier adapter
 *
 * Generates the question for a control and classifies a free-text answer.
 * The assessment core never calls this directly: the service classifies first
 * and hands the session a finished ClassifiedResponse.
 */
import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { Control } from '../models/control.js';
import type { Classification } from '../models/shared.js';
import type { ClassificationResult } from '../models/assessment.js';
import { ClassifierFailure, errorMessage } from '../errors.js';
import { clock } from '../utils/clock.js';
import { lookupClassification } from './scoring.js';
import { createLogger } from '../utils/logger.js';
import {
  QUESTION_SYSTEM_PROMPT,
  buildClassificationPrompt,
  buildClassificationSystemPrompt,
  buildQuestionPrompt,
} from './prompts.js';

const log = createLogger('classifier');

export interface Classifier {
  classify(control: Control, userResponse: string): Promise<ClassificationResult>;
}

export interface QuestionGenerator {
  generateQuestion(control: Control): Promise<string>;
}

export type LLMCaller = (systemPrompt: string, userPrompt: string) => Promise<string>;

export interface AnthropicCallerConfig {
  apiKey: string;
  model: string;
  temperature: number;
  maxTokens: number;
}

/** Create an LLMCaller backed by the Anthropic SDK. */
export function createAnthropicCaller(cfg: AnthropicCallerConfig): LLMCaller {
  const client = new Anthropic({ apiKey: cfg.apiKey });

  return async (systemPrompt, userPrompt) => {
    const response = await client.messages.create({
      model: cfg.model,
      max_tokens: cfg.maxTokens,
      temperature: cfg.temperature,
      system: systemPrompt,
      messages: [{ role: 'user', content: userPrompt }],
    });

    const parts: string[] = [];
    for (const block of response.content) {
      if (block.type === 'text') parts.push(block.text);
    }
    if (parts.length === 0) {
      throw new ClassifierFailure('LLM response contained no text');
    }
    return parts.join('\n');
  };
}

export const MAX_INPUT_LENGTH = 2000;

const SUSPICIOUS_PATTERNS: RegExp[] = [
  /ignore\s+(all\s+)?previous\s+instructions/i,
  /disregard\s+(all\s+)?previous/i,
  /forget\s+(all\s+)?previous/i,
  /new\s+instructions/i,
  /system\s*:/i,
  /assistant\s*:/i,
];

/** Collapse whitespace and cap the length in code points. Suspicious phrasing is logged, not blocked. */
export function sanitizeInput(userInput: string): string {
  let sanitized = userInput.trim().replace(/\s+/g, ' ');

  const chars = Array.from(sanitized);
  if (chars.length > MAX_INPUT_LENGTH) {
    log.warn(`User input truncated from ${chars.length} to ${MAX_INPUT_LENGTH} chars`);
    sanitized = chars.slice(0, MAX_INPUT_LENGTH).join('');
  }

  for (const pattern of SUSPICIOUS_PATTERNS) {
    if (pattern.test(sanitized)) {
      log.warn(`Potential prompt injection detected: ${pattern.source}`);
    }
  }
  return sanitized;
}

/** Strip markdown code fences and parse. */
export function parseJsonResponse(raw: string): unknown {
  let cleaned = raw.trim();
  if (cleaned.startsWith('```')) {
    const firstNewline = cleaned.indexOf('\n');
    if (firstNewline !== -1) {
      cleaned = cleaned.slice(firstNewline + 1);
    }
    if (cleaned.endsWith('```')) {
      cleaned = cleaned.slice(0, -3).trimEnd();
    }
  }
  return JSON.parse(cleaned);
}

const LlmClassificationSchema = z.object({
  classification: z.string(),
  explanation: z.string().default(''),
  remediation: z.string().nullish(),
  confidence: z.number().min(0).max(1).default(0.5),
});

/** Read an LLM label such as "NON-COMPLIANT" or "Partially compliant". */
export function interpretLabel(label: string): Classification {
  const known = lookupClassification(label.trim().replace(/[\s-]+/g, '_'));
  if (known) return known;

  const upper = label.toUpperCase();
  if (upper.includes('PARTIAL')) return 'partial';
  if (upper.includes('NON') || upper.includes('NOT')) return 'non_compliant';
  return 'partial';
}

/** Keyword reading of a reply that is not JSON. */
export function parseClassificationText(text: string): ClassificationResult {
  const upper = text.toUpperCase();
  let classification: Classification = 'partial';
  if (upper.includes('NON_COMPLIANT') || upper.includes('NON-COMPLIANT') || upper.includes('NOT COMPLIANT')) {
    classification = 'non_compliant';
  } else if (upper.includes('PARTIAL')) {
    classification = 'partial';
  } else if (upper.includes('COMPLIANT')) {
    classification = 'compliant';
  }

  const sentences = text.split('.').map((s) => s.trim()).filter((s) => s.length > 0);
  const explanation = sentences.length > 0 ? `${sentences.slice(0, 2).join('. ')}.` : text;

  return {
    classification,
    explanation: explanation.slice(0, 500),
    remediation: 'Please review this control manually for accurate assessment.',
    confidence: 0.5,
  };
}

export class LlmAssessmentAgent implements Classifier, QuestionGenerator {
  constructor(private readonly caller: LLMCaller) {}

  async generateQuestion(control: Control): Promise<string> {
    const question = await this.caller(QUESTION_SYSTEM_PROMPT, buildQuestionPrompt(control));
    return question.trim();
  }

  async classify(control: Control, userResponse: string): Promise<ClassificationResult> {
    const sanitized = sanitizeInput(userResponse);
    const started = clock.now();

    let raw: string;
    try {
      raw = await this.caller(
        buildClassificationSystemPrompt(control),
        buildClassificationPrompt(control, sanitized),
      );
    } catch (err: unknown) {
      throw new ClassifierFailure(`LLM call failed: ${errorMessage(err)}`, { cause: err });
    }

    let result: ClassificationResult;
    try {
      const parsed = LlmClassificationSchema.parse(parseJsonResponse(raw));
      result = {
        classification: interpretLabel(parsed.classification),
        explanation: parsed.explanation,
        remediation: parsed.remediation ?? undefined,
        confidence: parsed.confidence,
      };
    } catch {
      log.warn('LLM response not valid JSON, using keyword parsing');
      result = parseClassificationText(raw);
    }

    log.info(`Classified ${control.controlId} as ${result.classification} in ${clock.elapsedMs(started)}ms`);
    return result;
  }
}

/** Used when no API key is configured: every call fails and takes the fallback path. */
export class OfflineClassifier implements Classifier, QuestionGenerator {
  async classify(control: Control): Promise<ClassificationResult> {
    throw new ClassifierFailure(`No classifier configured for ${control.controlId}`);
  }

  async generateQuestion(control: Control): Promise<string> {
    throw new ClassifierFailure(`No question generator configured for ${control.controlId}`);
  }
}

export const FALLBACK_CLASSIFICATION: Readonly<ClassificationResult> = Object.freeze({
  classification: 'partial',
  explanation: 'Unable to fully assess response. Manual review recommended.',
  remediation: 'Please provide more detailed information about your implementation.',
  confidence: 0.3,
});

export function fallbackQuestion(control: Control): string {
  return `Do you have documented policies and procedures for ${control.title}? Please describe your implementation.`;
}

/** Never rejects: a failing classifier yields FALLBACK_CLASSIFICATION. */
export async function classifyWithFallback(
  classifier: Classifier,
  control: Control,
  userResponse: string,
): Promise<ClassificationResult> {
  try {
    return await classifier.classify(control, userResponse);
  } catch (err: unknown) {
    log.error(`Error classifying response for ${control.controlId}: ${errorMessage(err)}`);
    return { ...FALLBACK_CLASSIFICATION };
  }
}

/** Never rejects: a failing generator yields the template question. */
export async function questionWithFallback(generator: QuestionGenerator, control: Control): Promise<string> {
  try {
    const question = await generator.generateQuestion(control);
    return question.length > 0 ? question : fallbackQuestion(control);
  } catch (err: unknown) {
    log.warn(`Error generating question for ${control.controlId}: ${errorMessage(err)}`);
    return fallbackQuestion(control);
  }
}
