import { describe, it, expect } from 'vitest';
import {
  FALLBACK_REASONING,
  FallbackPlanGenerator,
  SEARCH_INPUT_CANDIDATES,
  SUBMIT_CANDIDATES,
} from '../../src/planner/fallback-planner.js';

describe('FallbackPlanGenerator', () => {
  it('builds the baseline search plan', async () => {
    const plan = await new FallbackPlanGenerator().generate('find cheapest halloween dress');

    expect(plan.steps.map((step) => step.action)).toEqual(['type', 'click', 'wait']);
    expect(plan.confidence).toBe(0.8);
    expect(plan.reasoning).toBe(FALLBACK_REASONING);
    expect(plan.expectedOutcome).toBe('Search and find results for: find cheapest halloween dress');
    expect(plan.source).toBe('fallback');
    expect(plan.steps[0]).toMatchObject({ target: SEARCH_INPUT_CANDIDATES, data: 'find cheapest halloween dress' });
    expect(plan.steps[1]?.target).toEqual(SUBMIT_CANDIDATES);
    expect(plan.steps[2]).toMatchObject({ target: [], data: '5' });
  });

  it('appends an add-to-cart step for purchase goals', () => {
    const plan = new FallbackPlanGenerator().buildPlan('Buy a USB cable');

    expect(plan.steps).toHaveLength(4);
    expect(plan.steps[3]).toMatchObject({
      action: 'click',
      reasoning: 'Click on purchase or add to cart button if found',
    });
    expect(plan.steps[3]?.target[0]).toBe("button:has-text('Add to Cart')");
  });

  it('appends a play step for media goals', () => {
    const plan = new FallbackPlanGenerator().buildPlan('watch the trailer');

    expect(plan.steps).toHaveLength(4);
    expect(plan.steps[3]?.reasoning).toBe('Click play button for video content');
  });

  it('applies only the first matching rule', () => {
    const plan = new FallbackPlanGenerator().buildPlan('buy and play a video game');

    expect(plan.steps).toHaveLength(4);
    expect(plan.steps[3]?.reasoning).toBe('Click on purchase or add to cart button if found');
  });

  it('matches keywords as substrings', () => {
    const planner = new FallbackPlanGenerator();

    expect(planner.matchRule('display settings')?.name).toBe('media');
    expect(planner.matchRule('weather in Paris')).toBeUndefined();
  });

  it('always yields at least three bounded steps', () => {
    const planner = new FallbackPlanGenerator({ stepTimeoutMs: 4000 });

    for (const goal of ['', 'x', 'compare laptops under $500', 'ADD TO CART now']) {
      const plan = planner.buildPlan(goal);
      expect(plan.steps.length).toBeGreaterThanOrEqual(3);
      expect(plan.steps.every((step) => step.timeoutMs === 4000)).toBe(true);
    }
  });

  it('honours a configured confidence', () => {
    expect(new FallbackPlanGenerator({ confidence: 0.5 }).buildPlan('x').confidence).toBe(0.5);
  });
});
