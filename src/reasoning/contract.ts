import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import type { ReasoningPayload } from './payload.js';

export const DEFAULT_PROMPT_PATH = 'prompts/relationship-validator.md';

export interface AssessmentRequest {
  system: string;
  user: string;
}

export interface Assessment {
  confidenceScore: number;
  explanationBullets: string[];
}

export type AssessmentResult = { ok: true; assessment: Assessment } | { ok: false; error: string };

const ResponseSchema = z.object({
  confidence_score: z.number().min(0).max(100).transform((n) => Math.round(n)),
  explanation_bullets: z.array(z.string()),
});

const prompts = new Map<string, string>();

function readPrompt(promptPath: string) {
  const file = path.resolve(process.cwd(), promptPath);
  const hit = prompts.get(file);
  if (hit !== undefined) return hit;
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (e) {
    throw new ConfigurationError(`System prompt not readable at ${file}`, { cause: e });
  }
  prompts.set(file, text);
  return text;
}

/** Messages for the confidence scorer. Nothing is sent from here. */
export function buildAssessmentRequest(payload: ReasoningPayload, promptPath = DEFAULT_PROMPT_PATH): AssessmentRequest {
  return {
    system: readPrompt(promptPath),
    user: `Please assess this account relationship:\n\n${JSON.stringify(payload, null, 2)}`,
  };
}

/**
 * Parse the scorer's reply. Accepts a bare JSON object or one embedded in
 * surrounding prose or a code fence; never throws.
 */
export function parseAssessmentResponse(text: string | null | undefined): AssessmentResult {
  const raw = (text ?? '').trim();
  if (!raw) return { ok: false, error: 'empty response' };

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    const m = raw.match(/\{[\s\S]*\}/);
    if (!m) return { ok: false, error: 'no JSON object found in response' };
    try {
      json = JSON.parse(m[0]);
    } catch (e) {
      return { ok: false, error: `invalid JSON in response: ${e instanceof Error ? e.message : String(e)}` };
    }
  }

  const parsed = ResponseSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'response'}: ${i.message}`).join('; ');
    return { ok: false, error: `unexpected response shape: ${detail}` };
  }
  return {
    ok: true,
    assessment: {
      confidenceScore: parsed.data.confidence_score,
      explanationBullets: parsed.data.explanation_bullets,
    },
  };
}
