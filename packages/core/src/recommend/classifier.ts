/**
 * Best-effort keyword classifier.
 *
 * Tags, project types and complexity are inferred from plain text with fixed
 * regex tables. The results are hints for ranking, not an authoritative
 * taxonomy: anything implementing `CapabilityClassifier` can replace it.
 */

import type { ProjectType } from '../types.js';
import { clamp } from '../utils.js';

export interface CapabilityClassifier {
  /** Sorted, deduplicated tech-stack tags found in the text. */
  extractTags(text: string): string[];
  inferProjectType(text: string): ProjectType;
  /** Heuristic 1-5 rating of a free-text request. */
  estimateComplexity(text: string): number;
}

export const TECH_PATTERNS: Record<string, RegExp> = {
  python: /\b(?:python|django|fastapi|flask|pandas|numpy|pytorch)\b/i,
  javascript: /\b(?:javascript|node(?:\.?js)?|express|vue|angular|next\.?js)\b/i,
  typescript: /\b(?:typescript|tsx?)\b/i,
  react: /\b(?:react|jsx|next\.?js)\b/i,
  golang: /\b(?:golang|gin)\b/i,
  rust: /\b(?:rust|cargo|tokio|actix)\b/i,
  java: /\b(?:java|spring|maven|gradle|junit)\b/i,
  sql: /\b(?:sql|postgres(?:ql)?|mysql|sqlite|mongodb|redis)\b/i,
  cloud: /\b(?:aws|azure|gcp|docker|kubernetes|terraform)\b/i,
  frontend: /\b(?:frontend|front-end|html|css|react|vue|angular|svelte|tailwind|ui)\b/i,
  backend: /\b(?:backend|back-end|apis?|rest|graphql|microservices?|server)\b/i,
  devops: /\b(?:devops|ci\/cd|jenkins|github actions|deployments?)\b/i,
  testing: /\b(?:tests?|testing|jest|pytest|cypress|selenium|vitest)\b/i,
  security: /\b(?:security|auth|authentication|owasp|vulnerabilit(?:y|ies)|encryption)\b/i,
  data: /\b(?:data|etl|analytics|warehouse|spark|machine learning|ml)\b/i,
};

// Order doubles as the tie-break when two types score the same.
export const PROJECT_TYPE_PATTERNS: Array<[Exclude<ProjectType, 'generic'>, RegExp[]]> = [
  ['web-app', [/\bweb ?app\b/i, /\bwebsite\b/i, /\bdashboard\b/i, /\bfrontend\b/i, /\bui\b/i, /\buser interface\b/i, /\bpages?\b/i]],
  ['api-service', [/\bapis?\b/i, /\bendpoints?\b/i, /\brest\b/i, /\bgraphql\b/i, /\bbackend\b/i, /\bmicroservices?\b/i, /\bservice\b/i]],
  ['data-pipeline', [/\bpipelines?\b/i, /\betl\b/i, /\bingestion\b/i, /\banalytics\b/i, /\bwarehouse\b/i, /\bbatch\b/i, /\bstreaming\b/i]],
];

const SCALE_PATTERN = /\b(?:enterprise|distributed|scalable|real-time|mission-critical|large-scale|high-performance)\b/i;

export class KeywordClassifier implements CapabilityClassifier {
  constructor(private readonly patterns: Record<string, RegExp> = TECH_PATTERNS) {}

  extractTags(text: string): string[] {
    const tags: string[] = [];
    for (const [tag, pattern] of Object.entries(this.patterns)) {
      if (pattern.test(text)) tags.push(tag);
    }
    return tags.sort();
  }

  inferProjectType(text: string): ProjectType {
    let best: ProjectType = 'generic';
    let bestHits = 0;
    for (const [type, patterns] of PROJECT_TYPE_PATTERNS) {
      const hits = patterns.filter((p) => p.test(text)).length;
      if (hits > bestHits) {
        best = type;
        bestHits = hits;
      }
    }
    return best;
  }

  estimateComplexity(text: string): number {
    const tokens = text.split(/\s+/).filter(Boolean).length;
    const tags = this.extractTags(text).length;
    const scale = SCALE_PATTERN.test(text) ? 1 : 0;
    return clamp(1 + Math.floor(tokens / 15) + Math.floor(tags / 2) + scale, 1, 5);
  }
}

export const defaultClassifier: CapabilityClassifier = new KeywordClassifier();
