// src/oracle/OpenAiOracle.ts
// Judgment Oracle backed by an OpenAI chat model.
//
// All repair and retry logic for model output lives here:
// - transient API failures (throttling, 5xx, timeouts) are retried with exponential delay
// - malformed JSON and schema violations are retried up to `maxAttempts`
// - anything left over becomes an OracleError, and the caller falls back

import OpenAI from 'openai';
import { APIConnectionError, APIError } from 'openai/error';
import { z } from 'zod';
import type { Clock } from '../clock';
import { systemClock } from '../clock';
import { ConfigError, OracleError } from '../errors';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { Quadrant } from '../model';
import { QUADRANTS, isDomain } from '../model';
import type {
  DomainOpinion,
  DomainQuestion,
  DuplicateOpinion,
  DuplicateQuestion,
  HierarchyOpinion,
  HierarchyQuestion,
  JudgmentOracle,
  StrategicOpinion,
  StrategicQuestion,
  TechnologyOpinion,
  TechnologyQuestion,
} from './JudgmentOracle';
import type { Prompt } from './prompts';
import { domainPrompt, duplicatePrompt, hierarchyPrompt, strategicPrompt, technologyPrompt } from './prompts';

// ============================================================================
// TRANSPORT
// ============================================================================

export interface ChatRequest {
  model: string;
  temperature: number;
  maxTokens: number;
  system: string;
  user: string;
}

/** Sends one chat request and returns the assistant's text. Swappable in tests. */
export interface ChatTransport {
  complete(request: ChatRequest, timeoutMs: number): Promise<string | null>;
}

export function createOpenAiTransport(args: { apiKey: string; baseURL?: string }): ChatTransport {
  const client = new OpenAI({
    apiKey: args.apiKey,
    baseURL: args.baseURL,
    maxRetries: 0, // Retries are handled by OpenAiOracle
  });

  return {
    async complete(request, timeoutMs) {
      const completion = await client.chat.completions.create(
        {
          model: request.model,
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: request.system },
            { role: 'user', content: request.user },
          ],
        },
        { timeout: timeoutMs }
      );
      return completion.choices[0]?.message.content ?? null;
    },
  };
}

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

export function normalizeQuadrant(value: number | string): Quadrant | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 && value < QUADRANTS.length ? QUADRANTS[value] : null;
  }
  const wanted = value.trim().toLowerCase().replace(/\band\b/, '&');
  return QUADRANTS.find((quadrant) => quadrant.toLowerCase() === wanted) ?? null;
}

const Label = z.string().default('unknown');

const QuadrantField = z.union([z.number(), z.string()]).transform((value, ctx): Quadrant => {
  const quadrant = normalizeQuadrant(value);
  if (quadrant === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown quadrant '${value}'` });
    return z.NEVER;
  }
  return quadrant;
});

const TechnologySchema = z
  .object({
    quadrant: QuadrantField,
    description: z.string().min(1),
    confidence: Label,
  })
  .transform((r): TechnologyOpinion => r);

const StrategicSchema = z
  .object({
    strategic_value: z.preprocess(
      (v) => (typeof v === 'string' ? v.trim().toLowerCase() : v),
      z.enum(['high', 'medium', 'low'])
    ),
    reason: z.string().default(''),
    confidence: Label,
  })
  .transform(
    (r): StrategicOpinion => ({ strategicValue: r.strategic_value, reason: r.reason, confidence: r.confidence })
  );

const DuplicateSchema = z
  .object({
    are_duplicates: z.boolean(),
    canonical_name: z.string().nullable().default(null),
    merge_candidates: z.array(z.string()).default([]),
    reason: z.string().default(''),
    confidence: Label,
  })
  .transform(
    (r): DuplicateOpinion => ({
      areDuplicates: r.are_duplicates,
      canonicalName: r.canonical_name,
      mergeCandidates: r.merge_candidates,
      reason: r.reason,
      confidence: r.confidence,
    })
  );

const HierarchySchema = z
  .object({
    should_consolidate: z.boolean(),
    reason: z.string().default(''),
    confidence: Label,
  })
  .transform(
    (r): HierarchyOpinion => ({ shouldConsolidate: r.should_consolidate, reason: r.reason, confidence: r.confidence })
  );

const DomainSchema = z
  .object({
    domain: z.string(),
    confidence: z.number().min(0).max(1).default(0.5),
    reasoning: z.string().default(''),
  })
  .transform((r): DomainOpinion => {
    const domain = r.domain.trim().toLowerCase();
    return { domain: isDomain(domain) ? domain : 'unknown', confidence: r.confidence, reasoning: r.reasoning };
  });

/**
 * Pulls the first JSON object out of model text, tolerating markdown fences and
 * surrounding prose.
 */
export function extractJsonObject(text: string): string | null {
  const unfenced = text.replace(/```(?:json)?/gi, '').trim();
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) return null;
  return unfenced.slice(start, end + 1);
}

type ParseOutcome<T> = { ok: true; value: T } | { ok: false; problem: string };

function parseOpinion<S extends z.ZodTypeAny>(text: string | null, schema: S): ParseOutcome<z.output<S>> {
  if (text === null || text.trim() === '') {
    return { ok: false, problem: 'empty response' };
  }
  const candidate = extractJsonObject(text);
  if (candidate === null) {
    return { ok: false, problem: 'no JSON object in response' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch (error) {
    return { ok: false, problem: `invalid JSON (${error instanceof Error ? error.message : String(error)})` };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return { ok: false, problem: `schema mismatch (${issues.join('; ')})` };
  }
  return { ok: true, value: result.data };
}

// ============================================================================
// ORACLE
// ============================================================================

const RETRIABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export interface OpenAiOracleOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  maxAttempts?: number;
  timeoutMs?: number;
  apiKey?: string;
  baseURL?: string;
  transport?: ChatTransport;
  clock?: Clock;
  logger?: Logger;
}

export class OpenAiOracle implements JudgmentOracle {
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly maxAttempts: number;
  private readonly timeoutMs: number;
  private readonly transport: ChatTransport;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private calls = 0;

  constructor(options: OpenAiOracleOptions = {}) {
    this.model = options.model ?? 'gpt-4o-mini';
    this.temperature = options.temperature ?? 0.3;
    this.maxTokens = options.maxTokens ?? 1000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
      if (!apiKey) {
        throw new ConfigError('OpenAI API key is required. Set OPENAI_API_KEY or run with --no-ai.');
      }
      this.transport = createOpenAiTransport({ apiKey, baseURL: options.baseURL });
    }
  }

  get callCount(): number {
    return this.calls;
  }

  describeTechnology(question: TechnologyQuestion): Promise<TechnologyOpinion> {
    return this.ask(`description of ${question.name}`, technologyPrompt(question), TechnologySchema);
  }

  assessStrategicValue(question: StrategicQuestion): Promise<StrategicOpinion> {
    return this.ask(`strategic value of ${question.name}`, strategicPrompt(question), StrategicSchema);
  }

  judgeDuplicates(question: DuplicateQuestion): Promise<DuplicateOpinion> {
    const names = question.names.map((n) => n.name).join(', ');
    return this.ask(`duplicate check for ${names}`, duplicatePrompt(question), DuplicateSchema);
  }

  judgeHierarchy(question: HierarchyQuestion): Promise<HierarchyOpinion> {
    return this.ask(`hierarchy check for ${question.parent.name}`, hierarchyPrompt(question), HierarchySchema);
  }

  classifyDomain(question: DomainQuestion): Promise<DomainOpinion> {
    return this.ask(`domain of ${question.repository}`, domainPrompt(question), DomainSchema);
  }

  private async ask<S extends z.ZodTypeAny>(subject: string, prompt: Prompt, schema: S): Promise<z.output<S>> {
    let lastProblem = 'no attempts made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      this.calls += 1;

      let text: string | null;
      try {
        text = await this.transport.complete(
          {
            model: this.model,
            temperature: this.temperature,
            maxTokens: this.maxTokens,
            system: prompt.system,
            user: prompt.user,
          },
          this.timeoutMs
        );
      } catch (error) {
        if (!isRetryable(error) || attempt === this.maxAttempts) {
          throw wrapError(subject, error);
        }
        const delayMs = retryDelayMs(attempt);
        this.logger.debug(`[Oracle] ${subject}: transient failure, retrying in ${delayMs}ms`);
        await this.clock.sleep(delayMs);
        lastProblem = error instanceof Error ? error.message : String(error);
        continue;
      }

      const outcome = parseOpinion(text, schema);
      if (outcome.ok) {
        return outcome.value;
      }
      lastProblem = outcome.problem;
      this.logger.debug(`[Oracle] ${subject}: ${outcome.problem} (attempt ${attempt}/${this.maxAttempts})`);
    }

    throw new OracleError(`No usable answer for ${subject} after ${this.maxAttempts} attempts: ${lastProblem}`);
  }
}

function isRetryable(error: unknown): boolean {
  if (error instanceof APIConnectionError) return true;
  if (error instanceof APIError) {
    return error.status !== undefined && RETRIABLE_STATUS_CODES.has(error.status);
  }
  if (error instanceof Error) {
    return error.message.toLowerCase().includes('timeout') || error.message.includes('ETIMEDOUT');
  }
  return false;
}

function retryDelayMs(attempt: number): number {
  const capped = Math.min(attempt, 5);
  return 250 * 2 ** (capped - 1);
}

function wrapError(subject: string, error: unknown): OracleError {
  if (error instanceof APIError) {
    const status = error.status ?? 'unknown';
    const hint =
      status === 401 || status === 403
        ? ' Check OPENAI_API_KEY and permissions.'
        : status === 429
          ? ' Rate limited by OpenAI.'
          : '';
    return new OracleError(`OpenAI request for ${subject} failed (status ${status}): ${error.message}${hint}`, error);
  }
  if (error instanceof Error) {
    return new OracleError(`OpenAI request for ${subject} failed: ${error.message}`, error);
  }
  return new OracleError(`OpenAI request for ${subject} failed due to an unknown error`, error);
}
