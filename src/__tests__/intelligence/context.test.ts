/**
 * Workspace Context Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Strata } from '../../strata.js';
import type { Experience } from '../../types/index.js';
import { createTestClock, createTestStrata, type TestClock } from '../fixtures.js';

const LONG_CONTENT = `Ledger totals lag behind the payment events ${'x'.repeat(230)}`;

describe('IntelligenceLayer.context', () => {
  let strata: Strata;
  let time: TestClock;
  let saved: Experience;

  beforeEach(async () => {
    time = createTestClock();
    strata = await createTestStrata({ clock: time.clock });
    await strata.graph.addNode({ name: 'Ledger service', type: 'service' });
    saved = await strata.experiences.save({
      content: LONG_CONTENT,
      type: 'gotcha',
      confidence: 'medium',
      context: 'nightly batch',
      tags: ['billing'],
    });
  });

  afterEach(async () => {
    await strata.close();
  });

  it('should add shortened experiences to a summary', async () => {
    const result = await strata.intelligence.context({ keywords: 'ledger' });

    expect(result.nodes.map((n) => n.name)).toEqual(['Ledger service']);
    expect(result.experiences).toEqual([
      { id: saved.id, type: 'gotcha', content: LONG_CONTENT.slice(0, 200), relevance: 1 },
    ]);
    expect(result.count).toBe(2);
  });

  it('should add confidence, tags and context at full detail', async () => {
    const result = await strata.intelligence.context({ keywords: 'ledger', detail: 'full' });

    expect(result.experiences).toEqual([
      {
        id: saved.id,
        type: 'gotcha',
        content: LONG_CONTENT,
        relevance: 1,
        confidence: 'medium',
        tags: ['billing'],
        context: 'nightly batch',
      },
    ]);
  });

  it('should count each returned experience as an access', async () => {
    await strata.intelligence.context({ keywords: 'ledger' });
    expect((await strata.experiences.get(saved.id)).accessCount).toBe(1);
  });

  it('should leave out experiences below a relevance of 0.1', async () => {
    time.advanceDays(300);
    expect((await strata.intelligence.context({ keywords: 'ledger' })).experiences).toHaveLength(1);

    time.advanceDays(100);
    const result = await strata.intelligence.context({ keywords: 'ledger' });
    expect(result.experiences).toEqual([]);
    expect(result.count).toBe(1);
  });

  it('should not repeat an experience learned into a returned node', async () => {
    await strata.intelligence.learn({ content: 'Rotate signing keys quarterly', type: 'decision' });

    const result = await strata.intelligence.context({ keywords: 'signing keys' });
    expect(result.nodes.map((n) => n.name)).toEqual(['Decision: Rotate signing keys quarterly']);
    expect(result.experiences).toEqual([]);
  });
});
