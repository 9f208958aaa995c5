import { describe, it, expect } from 'vitest';
import { countIndicators } from '../retrieval/regulatory-patterns.js';
import { selectFallbackTopic, staticFallbackFor } from './static-fallback.js';

describe('selectFallbackTopic', () => {
  it.each([
    ['What are the CO2 emission targets?', 'emissions'],
    ['Which crash tests apply to SUVs?', 'safety'],
    ['How does type approval work in Japan?', 'homologation'],
    ['Which headlight rules apply?', 'general'],
    ['Tell me about trucks', 'general'],
  ] as const)('should map "%s" to %s', (query, topic) => {
    expect(selectFallbackTopic(query)).toBe(topic);
  });
});

describe('staticFallbackFor', () => {
  it('should attribute the text to the topic identity', () => {
    const fallback = staticFallbackFor('diesel exhaust limits');

    expect(fallback.topic).toBe('emissions');
    expect(fallback.sourceUrl).toBe('urn:autoreg:static-fallback:emissions');
    expect(fallback.sourceTitle).toBe('General guidance on vehicle emission regulations');
  });

  it.each([
    ['emissions', 'emission'],
    ['safety', 'safety'],
    ['homologation', 'homologation'],
    ['general', 'trucks'],
  ])('should ship substantial regulatory prose for %s', (topic, query) => {
    const fallback = staticFallbackFor(query);

    expect(fallback.topic).toBe(topic);
    expect(fallback.text.length).toBeGreaterThanOrEqual(200);
    expect(countIndicators(fallback.text)).toBeGreaterThanOrEqual(3);
  });
});
