/**
 * Pipeline Artifacts — the data handed from one step to the next.
 *
 * Every artifact owns its quality gate: checkInvariants() returns
 * { ok, problems } and never throws. Artifacts are frozen on construction;
 * later steps read them but never change them.
 */

import type { ContentKind, Tone } from '@inkline/shared';

export const MIN_SOURCES = 2;
export const CREDIBILITY_THRESHOLD = 0.7;
export const MIN_DRAFT_CHARS = 100;
export const VOICE_SCORE_THRESHOLD = 0.7;

export type ArtifactKind =
  | 'research-brief'
  | 'content-brief'
  | 'draft-content'
  | 'voice-check-result'
  | 'production-output';

export interface GateResult {
  ok: boolean;
  problems: string[];
}

export type ArtifactJson = { kind: ArtifactKind } & Record<string, unknown>;

export interface Validatable {
  readonly kind: ArtifactKind;
  checkInvariants(): GateResult;
  toJSON(): ArtifactJson;
}

function gate(problems: string[]): GateResult {
  return { ok: problems.length === 0, problems };
}

// ─── Research ────────────────────────────────────────────────────

export interface Source {
  url: string;
  title: string;
  author: string | null;
  publishedAt: string | null;
  credibility: number; // 0-1
  keyQuotes: string[];
  keyFacts: string[];
}

export interface ResearchBriefInit {
  topic: string;
  sources: Array<Partial<Source> & Pick<Source, 'url' | 'title' | 'credibility'>>;
  keyFindings: string[];
  gaps?: string[];
  dataPoints?: Record<string, unknown>;
  createdAt?: string;
}

export class ResearchBrief implements Validatable {
  readonly kind = 'research-brief' as const;
  readonly topic: string;
  readonly sources: readonly Readonly<Source>[];
  readonly keyFindings: readonly string[];
  readonly gaps: readonly string[];
  readonly dataPoints: Readonly<Record<string, unknown>>;
  readonly createdAt: string;

  constructor(init: ResearchBriefInit) {
    this.topic = init.topic;
    this.sources = Object.freeze(init.sources.map(s => Object.freeze({
      url: s.url,
      title: s.title,
      author: s.author ?? null,
      publishedAt: s.publishedAt ?? null,
      credibility: s.credibility,
      keyQuotes: [...(s.keyQuotes ?? [])],
      keyFacts: [...(s.keyFacts ?? [])],
    })));
    this.keyFindings = Object.freeze([...init.keyFindings]);
    this.gaps = Object.freeze([...(init.gaps ?? [])]);
    this.dataPoints = Object.freeze({ ...init.dataPoints });
    this.createdAt = init.createdAt ?? new Date().toISOString();
    Object.freeze(this);
  }

  checkInvariants(): GateResult {
    const problems: string[] = [];

    if (!this.topic.trim()) {
      problems.push('Topic is required');
    }
    if (this.sources.length < MIN_SOURCES) {
      problems.push(`At least ${MIN_SOURCES} sources required`);
    }
    if (this.keyFindings.length === 0) {
      problems.push('Key findings cannot be empty');
    }
    if (!this.sources.some(s => s.credibility >= CREDIBILITY_THRESHOLD)) {
      problems.push(`At least 1 high-quality source (credibility >= ${CREDIBILITY_THRESHOLD}) required`);
    }

    return gate(problems);
  }

  toJSON(): ArtifactJson {
    return {
      kind: this.kind,
      topic: this.topic,
      sources: this.sources.map(s => ({ ...s })),
      keyFindings: [...this.keyFindings],
      gaps: [...this.gaps],
      dataPoints: { ...this.dataPoints },
      createdAt: this.createdAt,
    };
  }
}

// ─── Content Brief ───────────────────────────────────────────────

export type WordCountRange = readonly [min: number, max: number];

export interface ContentBriefInit {
  contentKind: ContentKind;
  targetAudience: string;
  keyMessages: string[];
  tone: Tone;
  requiredSections: string[];
  wordCountRange: WordCountRange;
  seoKeywords?: string[];
  brandGuidelines?: Record<string, unknown>;
}

export class ContentBrief implements Validatable {
  readonly kind = 'content-brief' as const;
  readonly contentKind: ContentKind;
  readonly targetAudience: string;
  readonly keyMessages: readonly string[];
  readonly tone: Tone;
  readonly requiredSections: readonly string[];
  readonly wordCountRange: WordCountRange;
  readonly seoKeywords: readonly string[];
  readonly brandGuidelines: Readonly<Record<string, unknown>>;

  constructor(init: ContentBriefInit) {
    this.contentKind = init.contentKind;
    this.targetAudience = init.targetAudience;
    this.keyMessages = Object.freeze([...init.keyMessages]);
    this.tone = init.tone;
    this.requiredSections = Object.freeze([...init.requiredSections]);
    this.wordCountRange = Object.freeze([init.wordCountRange[0], init.wordCountRange[1]] as const);
    this.seoKeywords = Object.freeze([...(init.seoKeywords ?? [])]);
    this.brandGuidelines = Object.freeze({ ...init.brandGuidelines });
    Object.freeze(this);
  }

  checkInvariants(): GateResult {
    const problems: string[] = [];
    const [min, max] = this.wordCountRange;

    if (!this.targetAudience.trim()) {
      problems.push('Target audience must be defined');
    }
    if (this.keyMessages.length < 1) {
      problems.push('At least 1 key message required');
    }
    if (this.requiredSections.length === 0) {
      problems.push('Required sections must be defined');
    }
    if (!(min > 0 && max >= min)) {
      problems.push(`Invalid word count range ${min}-${max}`);
    }

    return gate(problems);
  }

  toJSON(): ArtifactJson {
    return {
      kind: this.kind,
      contentKind: this.contentKind,
      targetAudience: this.targetAudience,
      keyMessages: [...this.keyMessages],
      tone: this.tone,
      requiredSections: [...this.requiredSections],
      wordCountRange: [...this.wordCountRange],
      seoKeywords: [...this.seoKeywords],
      brandGuidelines: { ...this.brandGuidelines },
    };
  }
}

// ─── Draft ───────────────────────────────────────────────────────

export interface DraftContentInit {
  text: string;
  contentKind: ContentKind;
  wordCount: number;
  brief?: ContentBrief | null;
  format?: string;
  metadata?: Record<string, unknown>;
}

export class DraftContent implements Validatable {
  readonly kind = 'draft-content' as const;
  readonly text: string;
  readonly contentKind: ContentKind;
  readonly wordCount: number;
  readonly brief: ContentBrief | null;
  readonly format: string;
  readonly metadata: Readonly<Record<string, unknown>>;

  constructor(init: DraftContentInit) {
    this.text = init.text;
    this.contentKind = init.contentKind;
    this.wordCount = init.wordCount;
    this.brief = init.brief ?? null;
    this.format = init.format ?? 'markdown';
    this.metadata = Object.freeze({ ...init.metadata });
    Object.freeze(this);
  }

  checkInvariants(): GateResult {
    const problems: string[] = [];

    if (this.text.trim().length < MIN_DRAFT_CHARS) {
      problems.push('Content is too short or empty');
    }
    if (!(this.wordCount > 0)) {
      problems.push('Invalid word count');
    }
    if (this.brief) {
      const [min, max] = this.brief.wordCountRange;
      if (!(this.wordCount >= min && this.wordCount <= max)) {
        problems.push(`Word count ${this.wordCount} outside target range ${min}-${max}`);
      }
    }

    return gate(problems);
  }

  toJSON(): ArtifactJson {
    return {
      kind: this.kind,
      text: this.text,
      contentKind: this.contentKind,
      wordCount: this.wordCount,
      brief: this.brief ? this.brief.toJSON() : null,
      format: this.format,
      metadata: { ...this.metadata },
    };
  }
}

// ─── Voice Check ─────────────────────────────────────────────────

export interface VoiceCheckResultInit {
  passed: boolean;
  score: number;
  issues?: string[];
  suggestions?: string[];
}

export class VoiceCheckResult implements Validatable {
  readonly kind = 'voice-check-result' as const;
  readonly passed: boolean;
  readonly score: number;
  readonly issues: readonly string[];
  readonly suggestions: readonly string[];

  constructor(init: VoiceCheckResultInit) {
    this.passed = init.passed;
    this.score = init.score;
    this.issues = Object.freeze([...(init.issues ?? [])]);
    this.suggestions = Object.freeze([...(init.suggestions ?? [])]);
    Object.freeze(this);
  }

  checkInvariants(): GateResult {
    const problems: string[] = [];

    if (!(this.score >= VOICE_SCORE_THRESHOLD)) {
      problems.push(`Brand voice score ${this.score} below threshold ${VOICE_SCORE_THRESHOLD}`);
    }
    if (!this.passed) {
      problems.push('Brand voice validation failed');
    }

    return gate(problems);
  }

  toJSON(): ArtifactJson {
    return {
      kind: this.kind,
      passed: this.passed,
      score: this.score,
      issues: [...this.issues],
      suggestions: [...this.suggestions],
    };
  }
}

// ─── Production ──────────────────────────────────────────────────

export interface ProductionOutputInit {
  path: string;
  format: string;
  contentKind: ContentKind;
  metadata?: Record<string, unknown>;
  createdAt?: string;
}

export class ProductionOutput implements Validatable {
  readonly kind = 'production-output' as const;
  readonly path: string;
  readonly format: string;
  readonly contentKind: ContentKind;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly createdAt: string;

  constructor(init: ProductionOutputInit) {
    this.path = init.path;
    this.format = init.format;
    this.contentKind = init.contentKind;
    this.metadata = Object.freeze({ ...init.metadata });
    this.createdAt = init.createdAt ?? new Date().toISOString();
    Object.freeze(this);
  }

  checkInvariants(): GateResult {
    const problems: string[] = [];

    if (!this.path.trim()) {
      problems.push('File path is required');
    }
    if (!this.format.trim()) {
      problems.push('File format is required');
    }

    return gate(problems);
  }

  toJSON(): ArtifactJson {
    return {
      kind: this.kind,
      path: this.path,
      format: this.format,
      contentKind: this.contentKind,
      metadata: { ...this.metadata },
      createdAt: this.createdAt,
    };
  }
}

export type Artifact =
  | ResearchBrief
  | ContentBrief
  | DraftContent
  | VoiceCheckResult
  | ProductionOutput;
