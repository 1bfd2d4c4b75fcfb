import { describe, it, expect } from 'vitest';
import { Stage } from './stage';
import { renderTemplate } from './actions';
import { Gate } from '../gates/gate';
import { Lock } from '../locks/lock';
import { ItemSchema } from '../schema/schema';
import { createElement } from '../element/element';
import { ConfigurationError } from '../errors';

const emailGate = new Gate('email', [Lock.exists('email')]);
const termsGate = new Gate('terms', [Lock.equals('terms', true)]);
const schema = new ItemSchema({ name: 'base', requiredFields: ['id'] });

describe('Stage construction', () => {
  it('should copy and freeze action templates', () => {
    const fulfilling = [{ type: 'complete_field' as const, description: 'Add {n}' }];
    const copied = new Stage({ name: 'copy', actions: { fulfilling } });
    fulfilling.push({ type: 'complete_field', description: 'late' });

    expect(copied.actionTemplates.fulfilling).toHaveLength(1);
    expect(Object.isFrozen(copied.actionTemplates.fulfilling)).toBe(true);
    expect(Object.isFrozen(copied)).toBe(true);
  });

  it('should reject duplicate gate names', () => {
    expect(() => new Stage({ name: 's', gates: [emailGate, new Gate('email', [Lock.exists('x')])] }))
      .toThrow(ConfigurationError);
  });
});

describe('Stage.evaluate', () => {
  const stage = new Stage({ name: 'registration', gates: [emailGate, termsGate], schema });

  it('should pass when schema and all gates pass', () => {
    const result = stage.evaluate({ id: 1, email: 'a@b', terms: true });
    expect(result.overallPassed).toBe(true);
    expect(result.completion).toBe(1);
    expect(result.passedGates).toEqual(['email', 'terms']);
  });

  it('should average gate fraction with the schema score', () => {
    const result = stage.evaluate({ id: 1, email: 'a@b' });
    expect(result.overallPassed).toBe(false);
    expect(result.completion).toBe(0.75);
    expect(result.failedGates).toEqual(['terms']);
    expect(result.actions).toEqual(["Set terms to 'true'"]);
  });

  it('should run gates even when the schema fails', () => {
    const result = stage.evaluate({ email: 'a@b', terms: true });
    expect(result.schemaValid).toBe(false);
    expect(result.schemaErrors).toEqual(['Required field missing: id']);
    expect(result.gateResults).toHaveLength(2);
    expect(result.overallPassed).toBe(false);
    expect(result.completion).toBe(0.5);
  });

  it('should accept any passing gate under allowPartial', () => {
    const partial = new Stage({ name: 'p', gates: [emailGate, termsGate], allowPartial: true });
    expect(partial.evaluate({ email: 'a@b' }).overallPassed).toBe(true);
    expect(partial.evaluate({}).overallPassed).toBe(false);
  });

  it('should score stages without gates on the schema alone', () => {
    expect(new Stage({ name: 'bare' }).evaluate({}).completion).toBe(1);
    const schemaOnly = new Stage({ name: 'schema', schema });
    expect(schemaOnly.evaluate({}).completion).toBe(0);
    expect(schemaOnly.evaluate({ id: 1 }).overallPassed).toBe(true);
  });

  it('should report completion directly', () => {
    expect(stage.getCompletionPercentage({ id: 1, email: 'a@b' })).toBe(0.75);
  });

  it('should evaluate asynchronously', async () => {
    const result = await stage.evaluateAsync({ id: 1, email: 'a@b', terms: true });
    expect(result.overallPassed).toBe(true);
  });
});

describe('Stage queries', () => {
  const stage = new Stage({ name: 'registration', gates: [emailGate, termsGate], schema });

  it('should check compatibility against required fields', () => {
    expect(stage.isCompatibleWithElement({ id: 1 })).toBe(true);
    expect(stage.isCompatibleWithElement({ email: 'a@b' })).toBe(false);
  });

  it('should list required properties', () => {
    expect(Array.from(stage.getRequiredProperties()).sort()).toEqual(['email', 'id', 'terms']);
  });

  it('should look up gates by name', () => {
    expect(stage.getGate('terms')).toBe(termsGate);
    expect(stage.hasGate('missing')).toBe(false);
  });
});

describe('action templates', () => {
  const element = createElement({ user: { name: 'Ada' }, count: 3 });

  it('should substitute bound properties, then context', () => {
    expect(renderTemplate('Hello {who}, stage {stage}', element, { who: 'user.name' }, { stage: 'review' }))
      .toBe('Hello Ada, stage review');
  });

  it('should render unresolvable bindings as empty and leave unknown placeholders', () => {
    expect(renderTemplate('[{gone}] {unknown}', element, { gone: 'user.age' })).toBe('[] {unknown}');
  });

  it('should resolve stage templates per state', () => {
    const stage = new Stage({
      name: 'review',
      actions: {
        fulfilling: [
          { type: 'complete_field', description: 'Add {n} items in {stage}', priority: 'high', properties: { n: 'count' } },
        ],
      },
    });
    expect(stage.resolveActions('awaiting', element)).toBeNull();
    expect(stage.resolveActions('fulfilling', element)).toEqual([
      {
        type: 'complete_field',
        description: 'Add 3 items in review',
        priority: 'high',
        conditions: [],
        metadata: {},
      },
    ]);
  });
});
