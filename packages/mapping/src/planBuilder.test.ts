import { describe, it, expect } from 'vitest';
import { buildMappingPlan } from './planBuilder.js';
import { CodecConversionPolicy } from './policies/codecConversion.js';
import { LanguageReorderPolicy } from './policies/languageReorder.js';
import { audio, inventoryOf, subtitle, video } from './testing/probe.js';

describe('buildMappingPlan', () => {
  const inventory = inventoryOf(
    video(),
    subtitle('subrip', { language: 'eng' }),
    audio('aac', 2, { language: 'ger' }),
    video('mjpeg'),
    audio('dts', 6, { language: 'eng' }),
  );

  it('counts positions per codec type', () => {
    const plan = buildMappingPlan(inventory, new CodecConversionPolicy());

    expect(plan.streamMapping).toEqual([
      '-map', '0:v:0', '-map', '0:s:0', '-map', '0:a:0', '-map', '0:v:1', '-map', '0:a:1',
    ]);
  });

  it('starts every run from empty buckets', () => {
    const policy = new LanguageReorderPolicy({ searchString: 'eng' });
    const first = buildMappingPlan(inventory, policy);
    const second = buildMappingPlan(inventory, policy);

    expect(second.streamMapping).toEqual(first.streamMapping);
    expect(second.buckets.get('matched')).toHaveLength(1);
  });

  it('returns a frozen plan', () => {
    const plan = buildMappingPlan(inventory, new CodecConversionPolicy());

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.streamMapping)).toBe(true);
    expect(plan.policy).toBe('codec-conversion');
  });

  it('exposes buckets that cannot be changed after the plan is built', () => {
    const plan = buildMappingPlan(inventory, new LanguageReorderPolicy({ searchString: 'eng' }));

    expect(Object.isFrozen(plan.buckets)).toBe(true);
    expect('set' in plan.buckets).toBe(false);
    expect('delete' in plan.buckets).toBe(false);
    expect([...plan.buckets.keys()]).toEqual(['pre', 'matched', 'unmatched', 'post']);
    expect(Object.isFrozen(plan.buckets.get('matched'))).toBe(true);
  });

  it('handles a file without streams', () => {
    const plan = buildMappingPlan(inventoryOf(), new LanguageReorderPolicy());

    expect(plan.needsProcessing).toBe(false);
    expect(plan.streamMapping).toEqual(['-c', 'copy', '-disposition:a', '-default']);
  });
});
