// src/oracle/prompts.ts
// Prompt text for each oracle question. Every prompt asks for a single JSON object.

import { DOMAINS, QUADRANTS } from '../model';
import type {
  DomainQuestion,
  DuplicateQuestion,
  HierarchyQuestion,
  StrategicQuestion,
  TechnologyQuestion,
} from './JudgmentOracle';

export interface Prompt {
  system: string;
  user: string;
}

const SYSTEM =
  'You are a pragmatic engineering advisor curating an organisation-wide technology radar. ' +
  'Answer with one JSON object and nothing else.';

export function technologyPrompt(q: TechnologyQuestion): Prompt {
  const lines = [
    `Technology: ${q.name}`,
    `Used in ${q.reposCount} of ${q.totalRepos} repositories (${q.usagePercentage}%).`,
    `Adoption trend: ${q.trend}. Ring already chosen from usage data: ${q.ring}.`,
  ];
  if (q.exampleRepos.length > 0) {
    lines.push(`Example repositories: ${q.exampleRepos.join(', ')}`);
  }
  lines.push(
    '',
    `Pick the radar quadrant (one of: ${QUADRANTS.join(', ')}) and write a one or two sentence`,
    'description of what the technology is and why it sits in that ring.',
    'Respond as {"quadrant": string, "description": string, "confidence": "high" | "medium" | "low"}.'
  );
  return { system: SYSTEM, user: lines.join('\n') };
}

export function strategicPrompt(q: StrategicQuestion): Prompt {
  return {
    system: SYSTEM,
    user: [
      `Technology: ${q.name} (${q.quadrant}, ring ${q.ring})`,
      `Used in ${q.reposCount} repositories (${q.usagePercentage}%).`,
      `Description: ${q.description}`,
      '',
      'Does this deserve a place on the radar? Libraries, frameworks, platforms and practices that',
      'shape architecture are high value; incidental utilities and helper packages are low value.',
      'Respond as {"strategic_value": "high" | "medium" | "low", "reason": string, "confidence": "high" | "medium" | "low"}.',
    ].join('\n'),
  };
}

export function duplicatePrompt(q: DuplicateQuestion): Prompt {
  const names = q.names.map((n) => `- ${n.name} (${n.reposCount} repos)`).join('\n');
  return {
    system: SYSTEM,
    user: [
      'Do these names refer to the same technology?',
      names,
      '',
      'If they do, choose the canonical name (one of the names above) and list the others to merge into it.',
      'Respond as {"are_duplicates": boolean, "canonical_name": string | null, "merge_candidates": string[], "reason": string, "confidence": "high" | "medium" | "low"}.',
    ].join('\n'),
  };
}

export function hierarchyPrompt(q: HierarchyQuestion): Prompt {
  const children = q.children.map((c) => `- ${c.name} (${c.reposCount} repos)`).join('\n');
  return {
    system: SYSTEM,
    user: [
      `Parent technology: ${q.parent.name} (${q.parent.reposCount} repos)`,
      'Candidate sub-features:',
      children,
      '',
      'Should the sub-features be folded into the parent entry rather than listed separately?',
      'Respond as {"should_consolidate": boolean, "reason": string, "confidence": "high" | "medium" | "low"}.',
    ].join('\n'),
  };
}

export function domainPrompt(q: DomainQuestion): Prompt {
  return {
    system: SYSTEM,
    user: [
      `Repository: ${q.repository}`,
      `Description: ${q.description ?? '(none)'}`,
      `Topics: ${q.topics.join(', ') || '(none)'}`,
      `Languages: ${q.languages.join(', ') || '(none)'}`,
      `Detected technologies: ${q.technologies.join(', ') || '(none)'}`,
      `Top-level files: ${q.rootEntries.slice(0, 40).join(', ') || '(none)'}`,
      '',
      `Classify the repository's engineering domain as one of: ${DOMAINS.join(', ')}.`,
      'Respond as {"domain": string, "confidence": number between 0 and 1, "reasoning": string}.',
    ].join('\n'),
  };
}
