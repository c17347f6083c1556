/**
 * Tests for the feature engine
 */

import { describe, it, expect } from '@jest/globals';
import {
  calculateViewVelocity,
  calculateVpvRatio,
  calculateEngagementRate,
  computeFeatures,
} from './metrics.js';
import { reported, UNREPORTED } from '../schemas/item.js';

const NOW = new Date('2026-01-10T12:00:00Z');

describe('calculateViewVelocity', () => {
  it('divides views by hours since upload', () => {
    expect(calculateViewVelocity(1000, '2026-01-10T02:00:00Z', NOW)).toBe(100);
  });

  it('returns 0 for uploads in the future or at the same instant', () => {
    expect(calculateViewVelocity(1000, '2026-01-11T00:00:00Z', NOW)).toBe(0);
    expect(calculateViewVelocity(1000, NOW.toISOString(), NOW)).toBe(0);
  });

  it('returns 0 for missing or unparseable dates', () => {
    expect(calculateViewVelocity(1000, undefined, NOW)).toBe(0);
    expect(calculateViewVelocity(1000, 'not-a-date', NOW)).toBe(0);
  });
});

describe('calculateVpvRatio', () => {
  it('divides views by subscribers', () => {
    expect(calculateVpvRatio(5000, 1000)).toBe(5);
  });

  it('returns 0 without subscribers', () => {
    expect(calculateVpvRatio(5000, 0)).toBe(0);
  });
});

describe('calculateEngagementRate', () => {
  it('divides likes plus comments by views', () => {
    expect(calculateEngagementRate(1000, 50, 10)).toBeCloseTo(0.06, 10);
  });

  it('clamps negative counts to 0', () => {
    expect(calculateEngagementRate(100, -5, 10)).toBeCloseTo(0.1, 10);
  });

  it('returns 0 without views', () => {
    expect(calculateEngagementRate(0, 50, 10)).toBe(0);
  });
});

describe('computeFeatures', () => {
  it('treats unreported counts as zero', () => {
    expect(
      computeFeatures({
        viewCount: reported(1200),
        likeCount: UNREPORTED,
        commentCount: reported(60),
        subscriberCount: 600,
        uploadDate: '2026-01-10T00:00:00Z',
        now: NOW,
      })
    ).toEqual({ viewVelocity: 100, vpvRatio: 2, engagementRate: 0.05 });
  });

  it('yields all zeros when views are unreported', () => {
    expect(
      computeFeatures({
        viewCount: UNREPORTED,
        likeCount: reported(10),
        commentCount: reported(5),
        subscriberCount: 600,
        uploadDate: '2026-01-10T00:00:00Z',
        now: NOW,
      })
    ).toEqual({ viewVelocity: 0, vpvRatio: 0, engagementRate: 0 });
  });
});
