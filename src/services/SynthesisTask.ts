/**
 * Cross-platform synthesis. Answers four executive questions from the store
 * and the per-platform findings:
 *
 * 1. Are we growing or declining?
 * 2. Where is the leakage?
 * 3. Which platforms deserve attention?
 * 4. What levers should we pull?
 *
 * Each question stands alone; one that cannot be answered is logged and left out.
 */

import {
  confidenceFor,
  formatChange,
  windowTrend,
  WINDOW_DAYS,
} from '../analysis/statistics.js';
import type { PlatformProfile } from '../analysis/profiles.js';
import { SynthesisPreconditionError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import {
  compareConfidence,
  createFinding,
  type Confidence,
  type Finding,
  type Platform,
} from '../types/models.js';
import type { NarrativeWriter } from './NarrativeWriter.js';
import type { UnifiedStoreView } from './UnifiedStore.js';

export const SYNTHESIS_CALLER = 'synthesis';

const STRATEGY_ROLE =
  'You are a C-suite strategy advisor. Provide executive-level insights with clear recommendations.';
const MAX_LEVERS = 5;
/** Mean growth inside this band is "flat". */
const FLAT_GROWTH_PCT = 2;

export type PlatformFindings = Partial<Record<Platform, readonly Finding[]>>;

export interface ISynthesisTask {
  /** Throws SynthesisPreconditionError when every finding set is empty. */
  synthesize(store: UnifiedStoreView, perPlatform: PlatformFindings): Promise<Finding[]>;
}

interface Draft {
  title: string;
  question: string;
  facts: string[];
  summary: string;
  recommendation: string;
  metricBasis: string;
  timeRange: string;
  evidence: string[];
  confidence: Confidence;
}

interface PlatformSignal {
  profile: PlatformProfile;
  records: number;
  growth: number | null;
  engagement: number | null;
}

type Question = (signals: PlatformSignal[], perPlatform: PlatformFindings) => Draft;

export class SynthesisTask implements ISynthesisTask {
  constructor(
    private readonly profiles: readonly PlatformProfile[],
    private readonly narrativeWriter: NarrativeWriter | null,
    private readonly logger: ILogProvider
  ) {}

  async synthesize(store: UnifiedStoreView, perPlatform: PlatformFindings): Promise<Finding[]> {
    const hasFindings = Object.values(perPlatform).some((findings) => findings !== undefined && findings.length > 0);
    if (!hasFindings) {
      throw new SynthesisPreconditionError();
    }

    const signals = this.collectSignals(store);
    const questions: Array<[string, Question]> = [
      ['trend', (s) => this.trendDirection(s)],
      ['leakage', (s) => this.leakage(s, store)],
      ['prioritisation', (s) => this.prioritisation(s)],
      ['levers', (_s, p) => this.levers(p)],
    ];

    const findings: Finding[] = [];
    for (const [name, question] of questions) {
      try {
        findings.push(await this.finalize(question(signals, perPlatform)));
      } catch (err) {
        this.logger.warn('Synthesis question skipped', {
          question: name,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return findings;
  }

  private collectSignals(store: UnifiedStoreView): PlatformSignal[] {
    return this.profiles
      .map((profile) => {
        const records = store.recordsFor(profile.platform);
        const reach = windowTrend(records, (r) => r.metrics[profile.reachField]);
        const engagement = windowTrend(records, (r) => profile.engagement(r));
        return {
          profile,
          records: records.length,
          growth: reach?.changePct ?? null,
          engagement: engagement?.recentMean ?? null,
        };
      })
      .filter((s) => s.records > 0);
  }

  // ── Questions ──

  private trendDirection(signals: PlatformSignal[]): Draft {
    const growing = signals.filter((s): s is PlatformSignal & { growth: number } => s.growth !== null);
    if (growing.length === 0) {
      throw new Error(`No platform has two ${WINDOW_DAYS}-day windows of reach data`);
    }

    const meanGrowth = growing.reduce((sum, s) => sum + s.growth, 0) / growing.length;
    const direction = meanGrowth > FLAT_GROWTH_PCT ? 'growing' : meanGrowth < -FLAT_GROWTH_PCT ? 'declining' : 'flat';
    const lines = growing.map((s) => `${s.profile.label}: ${formatChange(s.growth)} ${s.profile.reachLabel}`);
    const fastest = [...growing].sort((a, b) => b.growth - a.growth)[0];

    return {
      title: 'Growth Trend',
      question: 'Are we growing or declining overall? What is the trend?',
      facts: [...lines, `Mean growth: ${formatChange(meanGrowth)}`],
      summary: `Overall reach is ${direction} (${formatChange(meanGrowth)} mean ${WINDOW_DAYS}-day change). ${lines.join('; ')}.`,
      recommendation: `Focus resources on ${fastest.profile.label}, the highest-growth channel.`,
      metricBasis: `${WINDOW_DAYS}-day growth rates across platforms`,
      timeRange: `Last ${WINDOW_DAYS} days`,
      evidence: lines,
      confidence: this.weakestConfidence(growing),
    };
  }

  private leakage(signals: PlatformSignal[], store: UnifiedStoreView): Draft {
    const rated = signals
      .filter((s): s is PlatformSignal & { engagement: number } => s.engagement !== null)
      .map((s) => ({ ...s, ratio: s.engagement / s.profile.lowEngagement }))
      .sort((a, b) => a.ratio - b.ratio);
    if (rated.length === 0) {
      throw new Error('No platform has engagement data');
    }

    const weakest = rated[0];
    const bounce = windowTrend(store.recordsFor('website'), (r) => r.metrics.bounceRate);
    const lines = rated.map(
      (s) =>
        `${s.profile.label} ${s.profile.engagementLabel}: ${s.profile.formatEngagement(s.engagement)} (floor ${s.profile.formatEngagement(s.profile.lowEngagement)})`
    );
    const bounceLine = bounce ? `Website bounce rate: ${(bounce.recentMean * 100).toFixed(1)}%` : null;
    const leaking = weakest.ratio < 1;

    return {
      title: 'Leakage Analysis',
      question: 'Where are we losing engagement? Identify the leakage points.',
      facts: [...lines, ...(bounceLine ? [bounceLine] : [])],
      summary: leaking
        ? `${weakest.profile.label} is the main leak: its ${weakest.profile.engagementLabel} sits below its floor.${bounceLine ? ` ${bounceLine}.` : ''}`
        : `No channel is below its engagement floor; ${weakest.profile.label} has the least headroom.${bounceLine ? ` ${bounceLine}.` : ''}`,
      recommendation: leaking
        ? weakest.profile.recommendations.engagementLow
        : `Keep monitoring ${weakest.profile.label} ${weakest.profile.engagementLabel}.`,
      metricBasis: 'Engagement & bounce metrics',
      timeRange: `Last ${WINDOW_DAYS} days`,
      evidence: [...lines, ...(bounceLine ? [bounceLine] : [])],
      confidence: this.weakestConfidence(rated),
    };
  }

  private prioritisation(signals: PlatformSignal[]): Draft {
    const scored = signals
      .filter((s): s is PlatformSignal & { engagement: number } => s.engagement !== null)
      .map((s) => ({
        ...s,
        score: s.engagement * s.profile.engagementWeight + (s.growth ?? 0) / 10,
      }))
      .sort((a, b) => b.score - a.score);
    if (scored.length === 0) {
      throw new Error('No platform can be scored');
    }

    const top = scored[0];
    const ranking = scored.map((s, i) => `${i + 1}. ${s.profile.label} (${s.score.toFixed(2)})`);

    return {
      title: 'Platform Prioritization',
      question: 'Which platform deserves the most attention and resources?',
      facts: ranking,
      summary: `${top.profile.label} ranks first on the composite of engagement and growth. Ranking: ${ranking.join(', ')}.`,
      recommendation: `Allocate the largest share of effort to ${top.profile.label}.`,
      metricBasis: `Top: ${top.profile.label}`,
      timeRange: 'Based on recent performance',
      evidence: ['Composite score of engagement and growth', ...ranking],
      confidence: this.weakestConfidence(scored),
    };
  }

  private levers(perPlatform: PlatformFindings): Draft {
    const labelFor = (platform: string): string =>
      this.profiles.find((p) => p.platform === platform)?.label ?? platform;

    const candidates = Object.entries(perPlatform).flatMap(([platform, findings]) =>
      (findings ?? []).map((finding) => ({ platform: labelFor(platform), finding }))
    );
    // sort is stable, so equal confidence keeps platform order
    const top = candidates
      .sort((a, b) => compareConfidence(b.finding.confidence, a.finding.confidence))
      .slice(0, MAX_LEVERS);
    if (top.length === 0) {
      throw new Error('No platform recommendations to rank');
    }

    const lines = top.map((c) => `${c.platform}: ${c.finding.recommendation}`);
    return {
      title: 'Strategic Recommendations',
      question: 'What strategic levers should we pull next quarter?',
      facts: lines,
      summary: `The ${top.length} strongest levers across platforms: ${lines.join(' | ')}`,
      recommendation: `Execute the top ${Math.min(3, top.length)} priority actions first: ${lines
        .slice(0, 3)
        .join('; ')}.`,
      metricBasis: 'Multi-platform analysis',
      timeRange: 'Next quarter',
      evidence: top.map((c) => `${c.platform}: ${c.finding.title} (${c.finding.confidence})`),
      confidence: top[0].finding.confidence,
    };
  }

  // ── Helpers ──

  private weakestConfidence(signals: readonly PlatformSignal[]): Confidence {
    return confidenceFor(Math.min(...signals.map((s) => s.records)));
  }

  private async finalize(draft: Draft): Promise<Finding> {
    const narrative = this.narrativeWriter
      ? await this.narrativeWriter.write({
          role: STRATEGY_ROLE,
          question: draft.question,
          facts: draft.facts,
          caller: SYNTHESIS_CALLER,
        })
      : null;

    return createFinding({
      title: draft.title,
      summary: narrative?.summary ?? draft.summary,
      confidence: draft.confidence,
      evidence: draft.evidence,
      recommendation: narrative?.recommendation ?? draft.recommendation,
      metricBasis: draft.metricBasis,
      timeRange: draft.timeRange,
      narrativeSource: narrative ? 'oracle' : 'statistical',
    });
  }
}
