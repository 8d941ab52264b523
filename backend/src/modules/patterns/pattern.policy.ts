/**
 * Pattern Policy — scan thresholds
 */

export const PATTERN_POLICY = {
  bufferSize: 50,
  retentionMs: 2 * 60 * 60 * 1000,

  // broadcast threshold per type; types not listed are not broadcast
  alertDefaults: {
    goal_sequence: 'high',
    momentum_shift: 'high',
    time_based_pattern: 'high',
  },

  goalSequence: {
    maxGapSeconds: 300,
    highGapSeconds: 120,
    confidence: 0.9,
  },

  cardSequence: {
    windowSize: 3,
    maxSpanSeconds: 600,
    confidence: 0.8,
  },

  possessionSwing: {
    sampleWindow: 4,
    threshold: 20,
    confidence: 0.7,
  },

  momentumShift: {
    sampleWindow: 4,
    threshold: 30,
    confidence: 0.8,
  },

  pressureBuildup: {
    sampleWindow: 2,
    threshold: 70,
    scale: 100, // pressure index 0..1 sampled as 0..100
    confidence: 0.7,
  },

  timeBased: {
    lateMinute: 80,
    earlyMinute: 20,
    minEvents: 2,
    lateConfidence: 0.8,
    earlyConfidence: 0.7,
  },
} as const;
