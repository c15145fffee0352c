import { describe, expect, it } from 'vitest';
import { ConfigError, OracleError } from '../errors';
import { FakeClock } from '../testing/fakes';
import type { ChatRequest, ChatTransport } from './OpenAiOracle';
import { OpenAiOracle, extractJsonObject, normalizeQuadrant } from './OpenAiOracle';

type Reply = string | null | Error;

class ScriptedTransport implements ChatTransport {
  readonly requests: ChatRequest[] = [];

  constructor(private readonly replies: Reply[]) {}

  async complete(request: ChatRequest): Promise<string | null> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('no scripted reply left');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

const TECHNOLOGY = {
  name: 'Terraform',
  ring: 'Adopt' as const,
  reposCount: 6,
  totalRepos: 10,
  usagePercentage: 60,
  trend: 'GROWING' as const,
  exampleRepos: ['infra-0'],
};

function oracleWith(replies: Reply[]) {
  const transport = new ScriptedTransport(replies);
  const clock = new FakeClock();
  const oracle = new OpenAiOracle({ transport, clock, model: 'test-model' });
  return { oracle, transport, clock };
}

describe('response parsing', () => {
  it('extracts the JSON object from fenced or chatty output', () => {
    expect(extractJsonObject('```json\n{"a": 1}\n```')).toBe('{"a": 1}');
    expect(extractJsonObject('Sure! {"a": {"b": 2}} Hope that helps.')).toBe('{"a": {"b": 2}}');
    expect(extractJsonObject('no json here')).toBeNull();
  });

  it('normalizes quadrant names and indexes', () => {
    expect(normalizeQuadrant('languages and frameworks')).toBe('Languages & Frameworks');
    expect(normalizeQuadrant(' tools ')).toBe('Tools');
    expect(normalizeQuadrant(2)).toBe('Platforms');
    expect(normalizeQuadrant(7)).toBeNull();
    expect(normalizeQuadrant('Gadgets')).toBeNull();
  });
});

describe('OpenAiOracle', () => {
  it('parses a fenced technology opinion', async () => {
    const { oracle, transport } = oracleWith([
      '```json\n{"quadrant": "tools", "description": "Infrastructure as code.", "confidence": "high"}\n```',
    ]);

    const opinion = await oracle.describeTechnology(TECHNOLOGY);

    expect(opinion).toEqual({ quadrant: 'Tools', description: 'Infrastructure as code.', confidence: 'high' });
    expect(transport.requests[0].model).toBe('test-model');
    expect(transport.requests[0].user).toContain('Technology: Terraform');
    expect(oracle.callCount).toBe(1);
  });

  it('asks again after a malformed answer', async () => {
    const { oracle } = oracleWith([
      '{"quadrant": "tools", "description": ',
      '{"strategic_value": "HIGH", "reason": "Core platform"}',
    ]);

    const opinion = await oracle.assessStrategicValue({
      name: 'Kafka',
      quadrant: 'Platforms',
      ring: 'Trial',
      reposCount: 3,
      usagePercentage: 30,
      description: 'Event streaming.',
    });

    expect(opinion).toEqual({ strategicValue: 'high', reason: 'Core platform', confidence: 'unknown' });
    expect(oracle.callCount).toBe(2);
  });

  it('fails with OracleError once attempts are exhausted', async () => {
    const { oracle } = oracleWith(['', 'not json', '{"should_consolidate": "maybe"}']);

    const failure = oracle.judgeHierarchy({
      parent: { name: 'AWS', reposCount: 5 },
      children: [{ name: 'AWS Lambda', reposCount: 2 }],
    });

    await expect(failure).rejects.toBeInstanceOf(OracleError);
    await expect(failure).rejects.toThrow(/after 3 attempts: schema mismatch/);
    expect(oracle.callCount).toBe(3);
  });

  it('retries transient transport failures with a growing delay', async () => {
    const { oracle, clock } = oracleWith([
      new Error('Request timeout'),
      new Error('Request timeout'),
      '{"are_duplicates": true, "canonical_name": "React", "merge_candidates": ["React.js"]}',
    ]);

    const opinion = await oracle.judgeDuplicates({
      names: [
        { name: 'React', reposCount: 8 },
        { name: 'React.js', reposCount: 2 },
      ],
    });

    expect(opinion).toEqual({
      areDuplicates: true,
      canonicalName: 'React',
      mergeCandidates: ['React.js'],
      reason: '',
      confidence: 'unknown',
    });
    expect(clock.sleeps).toEqual([250, 500]);
  });

  it('does not retry failures that are not transient', async () => {
    const { oracle, transport } = oracleWith([new Error('invalid request'), '{}']);

    await expect(oracle.describeTechnology(TECHNOLOGY)).rejects.toThrow(
      'OpenAI request for description of Terraform failed: invalid request'
    );
    expect(transport.requests).toHaveLength(1);
  });

  it('maps unknown domains to unknown', async () => {
    const { oracle } = oracleWith(['{"domain": "Gaming", "confidence": 0.4, "reasoning": "Unity project"}']);

    const opinion = await oracle.classifyDomain({
      repository: 'acme/game',
      description: null,
      topics: [],
      languages: ['C#'],
      technologies: [],
      rootEntries: [],
    });

    expect(opinion).toEqual({ domain: 'unknown', confidence: 0.4, reasoning: 'Unity project' });
  });

  it('requires an API key without a transport', () => {
    expect(() => new OpenAiOracle({ apiKey: '' })).toThrow(ConfigError);
  });
});
