/**
 * PATTERNS MODULE — Types
 */

import type { TeamSide } from '../../matches/contracts/match.types.js';

export type PatternEventKind =
  | 'goal'
  | 'yellow_card'
  | 'red_card'
  | 'possession'
  | 'momentum'
  | 'pressure';

export interface PatternEvent {
  readonly seq: number;          // monotonic per fixture
  readonly kind: PatternEventKind;
  readonly timestamp: number;    // snapshot capturedAt, epoch ms
  readonly matchMinute: number;  // elapsed minute at capture
  readonly team: string;
  readonly side: TeamSide;
  readonly value: number;
}

export const PATTERN_TYPES = [
  'goal_sequence',
  'card_sequence',
  'possession_swing',
  'momentum_shift',
  'pressure_buildup',
  'time_based_pattern',
] as const;

export type PatternType = (typeof PATTERN_TYPES)[number];

export const PATTERN_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type PatternSeverity = (typeof PATTERN_SEVERITIES)[number];

export type PatternMetadata = Record<string, number | string | boolean>;

export interface GamePattern {
  patternId: string;
  fixtureId: string;
  type: PatternType;
  name: string;
  description: string;
  severity: PatternSeverity;
  confidence: number;
  events: PatternEvent[];
  startTime: number;
  endTime: number;
  metadata: PatternMetadata;
}

export interface PatternAlertConfig {
  severityThreshold: PatternSeverity;
  enabled: boolean;
}

export interface PatternDetectorStats {
  fixtures: number;
  bufferedEvents: number;
  retainedPatterns: number;
}
