/**
 * Per-platform analyst. Three features, each one Finding:
 * reach trend, engagement trend and posting cadence.
 * When a platform's exports carry neither reach nor engagement, the trend of
 * the first metric they do carry stands in, so enough records always yield a
 * finding. Numbers always come from the statistics; the narrative writer only words them.
 */

import {
  cadenceProfile,
  confidenceFor,
  formatChange,
  formatCount,
  formatPercent,
  windowTrend,
  WINDOW_DAYS,
  type WindowTrend,
} from '../analysis/statistics.js';
import type { PlatformProfile } from '../analysis/profiles.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import {
  CANONICAL_FIELDS,
  PLATFORM_FIELDS,
  createFinding,
  isCanonicalField,
  type CanonicalField,
  type Confidence,
  type Finding,
  type Platform,
  type TypedRecord,
} from '../types/models.js';
import { analysisTaskName, type IAnalysisTask } from './IAnalysisTask.js';
import type { NarrativeWriter } from './NarrativeWriter.js';
import type { UnifiedStoreView } from './UnifiedStore.js';

/** Cadence needs two full weeks to say anything about weekdays. */
const CADENCE_MIN_RECORDS = 14;
/** Changes inside this band count as flat. */
const FLAT_BAND_PCT = 5;

interface Draft {
  title: string;
  question: string;
  facts: string[];
  summary: string;
  recommendation: string;
  metricBasis: string;
  timeRange: string;
  evidence: string[];
}

export class PlatformAnalysisTask implements IAnalysisTask {
  readonly name: string;
  readonly platform: Platform;

  constructor(
    private readonly profile: PlatformProfile,
    private readonly narrativeWriter: NarrativeWriter | null,
    private readonly logger: ILogProvider
  ) {
    this.platform = profile.platform;
    this.name = analysisTaskName(profile.platform);
  }

  async analyze(store: UnifiedStoreView): Promise<Finding[]> {
    const records = store.recordsFor(this.platform);
    if (records.length < this.profile.minRecords) {
      this.logger.info('Not enough data for analysis', {
        platform: this.platform,
        records: records.length,
        required: this.profile.minRecords,
      });
      return [];
    }

    const confidence = confidenceFor(records.length);
    const drafts = [this.reachTrend(records), this.engagementTrend(records), this.cadence(records)].filter(
      (d): d is Draft => d !== null
    );
    if (drafts.length === 0) {
      drafts.push(this.fallback(records));
    }

    const findings: Finding[] = [];
    for (const draft of drafts) {
      findings.push(await this.finalize(draft, confidence));
    }

    this.logger.info('Platform analysis complete', {
      platform: this.platform,
      records: records.length,
      findings: findings.length,
    });
    return findings;
  }

  // ── Features ──

  private reachTrend(records: readonly TypedRecord[]): Draft | null {
    return this.metricTrend(records, this.profile.reachField, this.profile.reachLabel);
  }

  private metricTrend(records: readonly TypedRecord[], field: CanonicalField, label: string): Draft | null {
    const { profile } = this;
    const trend = windowTrend(records, (r) => r.metrics[field]);
    if (!trend) return null;

    const fmt = CANONICAL_FIELDS[field].kind === 'rate' ? (v: number) => formatPercent(v, 2) : formatCount;
    const recent = fmt(trend.recentMean);
    const comparison =
      trend.changePct === null
        ? `There is no previous ${WINDOW_DAYS}-day window to compare against.`
        : `That is ${formatChange(trend.changePct)} against the previous ${WINDOW_DAYS} days (${fmt(
            trend.priorMean ?? 0
          )}).`;

    return {
      title: `${profile.label}: ${capitalize(label)} Trend`,
      question: `Summarize the ${profile.label} ${label} trend and recommend next steps.`,
      facts: this.trendFacts(trend, label, fmt),
      summary: `${profile.label} averaged ${recent} daily ${label} over the last ${WINDOW_DAYS} days. ${comparison}`,
      recommendation: this.directionRecommendation(trend.changePct),
      metricBasis: `Avg daily ${label}: ${recent}`,
      timeRange: `${trend.recentStart} to ${trend.anchor}`,
      evidence: this.trendEvidence(trend, fmt),
    };
  }

  /** The platform's own fields first, then anything else the records carry. */
  private fallback(records: readonly TypedRecord[]): Draft {
    const platformFields = PLATFORM_FIELDS[this.platform];
    const otherFields = Object.keys(CANONICAL_FIELDS)
      .filter(isCanonicalField)
      .filter((f) => !platformFields.includes(f));

    for (const field of [...platformFields, ...otherFields]) {
      if (field === this.profile.reachField) continue;
      const draft = this.metricTrend(records, field, fieldLabel(field));
      if (draft) return draft;
    }
    return this.coverage(records);
  }

  private coverage(records: readonly TypedRecord[]): Draft {
    const { profile } = this;
    const first = records[0].date;
    const last = records[records.length - 1].date;

    return {
      title: `${profile.label}: Data Coverage`,
      question: `What should be exported next to analyse ${profile.label} performance?`,
      facts: [`${records.length} daily records between ${first} and ${last}`, 'No metric values to trend'],
      summary: `${profile.label} has ${records.length} daily records between ${first} and ${last}, but none carry a metric that can be trended.`,
      recommendation: `Export ${profile.reachLabel} and ${profile.engagementLabel} data for ${profile.label}.`,
      metricBasis: `Records: ${records.length}`,
      timeRange: `${first} to ${last}`,
      evidence: [`${records.length} daily ${profile.label} records`],
    };
  }

  private engagementTrend(records: readonly TypedRecord[]): Draft | null {
    const { profile } = this;
    const trend = windowTrend(records, (r) => profile.engagement(r));
    if (!trend) return null;

    const recent = profile.formatEngagement(trend.recentMean);
    const level =
      trend.recentMean < profile.lowEngagement
        ? `below the ${profile.formatEngagement(profile.lowEngagement)} floor`
        : trend.recentMean > profile.highEngagement
          ? `above the ${profile.formatEngagement(profile.highEngagement)} benchmark`
          : 'within the normal range';
    const change = trend.changePct === null ? '' : ` (${formatChange(trend.changePct)} vs the previous period)`;

    return {
      title: `${profile.label}: Engagement Efficiency`,
      question: `Summarize the ${profile.label} ${profile.engagementLabel} trend and recommend next steps.`,
      facts: this.trendFacts(trend, profile.engagementLabel, profile.formatEngagement),
      summary: `Recent ${profile.engagementLabel} is ${recent}${change}, ${level}.`,
      recommendation: this.engagementRecommendation(trend.recentMean),
      metricBasis: `${capitalize(profile.engagementLabel)}: ${recent}`,
      timeRange: `${trend.recentStart} to ${trend.anchor}`,
      evidence: this.trendEvidence(trend, profile.formatEngagement),
    };
  }

  private cadence(records: readonly TypedRecord[]): Draft | null {
    const { profile } = this;
    if (records.length < CADENCE_MIN_RECORDS) return null;

    const cadence = cadenceProfile(records, (r) => r.metrics[profile.reachField]);
    if (!cadence) return null;

    const first = records[0].date;
    const last = records[records.length - 1].date;
    const share = formatPercent(cadence.activeShare, 0);
    const best = `${cadence.bestDay.day} (${formatCount(cadence.bestDay.mean)} ${profile.reachLabel})`;
    const worst = `${cadence.worstDay.day} (${formatCount(cadence.worstDay.mean)})`;

    return {
      title: `${profile.label}: Posting Cadence`,
      question: `What is the best ${profile.label} posting cadence given this activity pattern?`,
      facts: [
        `Active on ${cadence.activeDays} of ${cadence.spanDays} days (${share})`,
        `Best weekday: ${best}`,
        `Weakest weekday: ${worst}`,
      ],
      summary: `${profile.label} was active on ${share} of days between ${first} and ${last}. ${best} is the strongest weekday and ${worst} the weakest.`,
      recommendation: `${profile.recommendations.cadence} Prioritise ${cadence.bestDay.day}s.`,
      metricBasis: `Active days: ${share}`,
      timeRange: `${first} to ${last}`,
      evidence: [`${records.length} daily ${profile.label} records`, `Weekday means of ${profile.reachLabel}`],
    };
  }

  // ── Helpers ──

  private async finalize(draft: Draft, confidence: Confidence): Promise<Finding> {
    const narrative = this.narrativeWriter
      ? await this.narrativeWriter.write({
          role: this.profile.analystRole,
          question: draft.question,
          facts: draft.facts,
          caller: `narrative:${this.platform}`,
        })
      : null;

    return createFinding({
      title: draft.title,
      summary: narrative?.summary ?? draft.summary,
      confidence,
      evidence: draft.evidence,
      recommendation: narrative?.recommendation ?? draft.recommendation,
      metricBasis: draft.metricBasis,
      timeRange: draft.timeRange,
      narrativeSource: narrative ? 'oracle' : 'statistical',
    });
  }

  private trendFacts(trend: WindowTrend, label: string, fmt: (v: number) => string): string[] {
    return [
      `Recent ${WINDOW_DAYS}-day average ${label}: ${fmt(trend.recentMean)}`,
      trend.priorMean === null
        ? `No previous ${WINDOW_DAYS}-day window`
        : `Previous ${WINDOW_DAYS}-day average ${label}: ${fmt(trend.priorMean)}`,
      ...(trend.changePct === null ? [] : [`Change: ${formatChange(trend.changePct)}`]),
    ];
  }

  private trendEvidence(trend: WindowTrend, fmt: (v: number) => string): string[] {
    return [
      `${trend.recentCount} ${this.profile.label} records in the last ${WINDOW_DAYS} days`,
      ...(trend.priorMean === null ? [] : [`Previous ${WINDOW_DAYS}-day average: ${fmt(trend.priorMean)}`]),
    ];
  }

  private directionRecommendation(changePct: number | null): string {
    const { recommendations } = this.profile;
    if (changePct === null || Math.abs(changePct) <= FLAT_BAND_PCT) return recommendations.reachFlat;
    return changePct > 0 ? recommendations.reachUp : recommendations.reachDown;
  }

  private engagementRecommendation(recentMean: number): string {
    const { recommendations, lowEngagement, highEngagement } = this.profile;
    if (recentMean < lowEngagement) return recommendations.engagementLow;
    if (recentMean > highEngagement) return recommendations.engagementHigh;
    return recommendations.engagementSteady;
  }
}

/** `uniqueVisitors` → `unique visitors`. */
function fieldLabel(field: CanonicalField): string {
  return field.replace(/([A-Z])/g, ' $1').toLowerCase();
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
