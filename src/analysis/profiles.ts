/**
 * Platform profiles: everything that differs between the per-platform analysts.
 * The analysis itself lives in PlatformAnalysisTask and is the same for all of them.
 */

import type { CanonicalField, Platform, TypedRecord } from '../types/models.js';
import { formatPercent } from './statistics.js';

export interface PlatformRecommendations {
  reachUp: string;
  reachDown: string;
  reachFlat: string;
  engagementLow: string;
  engagementSteady: string;
  engagementHigh: string;
  cadence: string;
}

export interface PlatformProfile {
  platform: Platform;
  label: string;
  /** The volume metric trends and cadence are measured on. */
  reachField: CanonicalField;
  reachLabel: string;
  /** Engagement as a fraction for one day, or null when the record cannot tell. */
  engagement(record: TypedRecord): number | null;
  engagementLabel: string;
  formatEngagement(value: number): string;
  /** System role for narrative prompts. */
  analystRole: string;
  /** Below this many records the analyst reports nothing. */
  minRecords: number;
  /** Recent engagement under this is leakage. */
  lowEngagement: number;
  highEngagement: number;
  /** Multiplier on recent engagement in the cross-platform priority score. */
  engagementWeight: number;
  recommendations: PlatformRecommendations;
}

const MIN_RECORDS = 7;

function ratio(numerator: number | undefined, denominator: number | undefined): number | null {
  if (numerator === undefined || denominator === undefined || denominator <= 0) return null;
  return numerator / denominator;
}

export const LINKEDIN_PROFILE: PlatformProfile = {
  platform: 'linkedin',
  label: 'LinkedIn',
  reachField: 'impressions',
  reachLabel: 'impressions',
  engagement: (r) => r.metrics.engagementRate ?? ratio(r.metrics.reactions, r.metrics.impressions),
  engagementLabel: 'engagement rate',
  formatEngagement: (v) => formatPercent(v, 2),
  analystRole: 'You are a LinkedIn marketing analyst. Provide concise, strategic insights.',
  minRecords: MIN_RECORDS,
  lowEngagement: 0.02,
  highEngagement: 0.06,
  engagementWeight: 10,
  recommendations: {
    reachUp: 'Keep the current posting mix and double down on the formats driving the lift.',
    reachDown: 'Audit recent posts for topic drift and reintroduce the formats that carried reach last period.',
    reachFlat: 'Test one new content format per week to break the plateau.',
    engagementLow: 'Monitor content quality vs. posting frequency; fewer, stronger posts beat daily filler.',
    engagementSteady: 'Hold cadence and add a clear call to action to every post.',
    engagementHigh: 'Repurpose the best-performing posts into articles and carousels.',
    cadence: 'Test 3-4 posts per week vs. daily posting.',
  },
};

export const INSTAGRAM_PROFILE: PlatformProfile = {
  platform: 'instagram',
  label: 'Instagram',
  reachField: 'impressions',
  reachLabel: 'impressions',
  engagement: (r) => {
    if (r.metrics.engagementRate !== undefined) return r.metrics.engagementRate;
    const { likes, comments, shares } = r.metrics;
    if (likes === undefined && comments === undefined && shares === undefined) return null;
    const interactions = (likes ?? 0) + (comments ?? 0) + (shares ?? 0);
    return ratio(interactions, r.metrics.reach ?? r.metrics.impressions);
  },
  engagementLabel: 'engagement rate',
  formatEngagement: (v) => formatPercent(v, 2),
  analystRole: 'You are an Instagram growth strategist. Focus on reach, discovery and community engagement.',
  minRecords: MIN_RECORDS,
  lowEngagement: 0.03,
  highEngagement: 0.1,
  engagementWeight: 10,
  recommendations: {
    reachUp: 'Balance viral content with community engagement.',
    reachDown: 'Lean on Reels and collaborations to recover discovery.',
    reachFlat: 'Increase Reels production to 60%+ of content mix.',
    engagementLow: 'Reply to comments within the first hour and end captions with a question.',
    engagementSteady: 'Keep the format mix and test carousel posts against single images.',
    engagementHigh: 'Convert engaged followers with stories that link to the website.',
    cadence: 'Schedule posts for the strongest weekday and keep a steady weekly rhythm.',
  },
};

export const WEBSITE_PROFILE: PlatformProfile = {
  platform: 'website',
  label: 'Website',
  reachField: 'pageViews',
  reachLabel: 'page views',
  // Share of visits that went past the first page.
  engagement: (r) => (r.metrics.bounceRate === undefined ? null : 1 - r.metrics.bounceRate),
  engagementLabel: 'engaged-visit share',
  formatEngagement: (v) => formatPercent(v, 1),
  analystRole: 'You are a website analytics specialist. Provide data-driven recommendations.',
  minRecords: MIN_RECORDS,
  lowEngagement: 0.4,
  highEngagement: 0.6,
  engagementWeight: 5,
  recommendations: {
    reachUp: 'Capture the extra traffic with newsletter sign-ups on top landing pages.',
    reachDown: 'Check search rankings and referral sources for the pages that lost traffic.',
    reachFlat: 'Publish and promote one cornerstone article per month.',
    engagementLow: 'Improve landing page relevance and load time.',
    engagementSteady: 'Add internal linking and CTAs to boost depth.',
    engagementHigh: 'Use the engaged audience to test gated content offers.',
    cadence: 'Time publishing and promotion for the highest-traffic weekday.',
  },
};

export const DEFAULT_PROFILES: readonly PlatformProfile[] = [LINKEDIN_PROFILE, INSTAGRAM_PROFILE, WEBSITE_PROFILE];
