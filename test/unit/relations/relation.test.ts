import {
  InMemoryRelationData, filteredData, isReady, provideData, resolveSpec,
} from '../../../src/relations/relation.js';
import type { Relation } from '../../../src/relations/relation.js';
import { SpecMismatchError } from '../../../src/errors.js';

function relation(overrides: Partial<Omit<Relation, 'role'>> = {}): Relation {
  return { role: 'consumer', name: 'test', requiredKeys: ['foo', 'bar'], ...overrides };
}

const SPEC = { vendor: 'apache', hadoop: '2.7.1' };

describe('relations', () => {
  describe('resolveSpec', () => {
    it('treats missing and empty specs as absent', async () => {
      expect(await resolveSpec(relation())).toBeNull();
      expect(await resolveSpec(relation({ spec: {} }))).toBeNull();
      expect(await resolveSpec(relation({ spec: () => null }))).toBeNull();
    });

    it('evaluates a callback on every call', async () => {
      let java: string | undefined;
      const rel = relation({ spec: () => (java ? { java } : null) });
      expect(await resolveSpec(rel)).toBeNull();
      java = '1.8.0';
      expect(await resolveSpec(rel)).toEqual({ java: '1.8.0' });
    });

    it('awaits an async callback', async () => {
      expect(await resolveSpec(relation({ spec: async () => SPEC }))).toEqual(SPEC);
    });
  });

  describe('filteredData', () => {
    const data = InMemoryRelationData.from({
      test: {
        'unit/0': { foo: 'a' },
        'unit/1': { foo: 'b', bar: 'c' },
        'unit/2': { foo: 'd', bar: 'e', spec: '{}' },
      },
    });

    it('keeps only units with every required key', async () => {
      expect(await filteredData(relation(), data)).toEqual({
        'unit/1': { foo: 'b', bar: 'c' },
        'unit/2': { foo: 'd', bar: 'e', spec: '{}' },
      });
    });

    it('also requires a spec when the local side has one', async () => {
      expect(Object.keys(await filteredData(relation({ spec: SPEC }), data))).toEqual(['unit/2']);
    });

    it('is empty for an unknown relation', async () => {
      expect(await filteredData(relation({ name: 'other' }), data)).toEqual({});
    });
  });

  describe('isReady', () => {
    it('is not ready without complete units', async () => {
      const data = InMemoryRelationData.from({ test: { 'unit/0': { foo: 'a' } } });
      expect(await isReady(relation(), data)).toBe(false);
    });

    it('is ready with one complete unit and no local spec', async () => {
      const data = InMemoryRelationData.from({ test: { 'unit/0': { foo: 'a' }, 'unit/1': { foo: 'b', bar: 'c' } } });
      expect(await isReady(relation(), data)).toBe(true);
    });

    it('ignores units that have not published a spec yet', async () => {
      const data = InMemoryRelationData.from({ test: { 'unit/0': { foo: 'a', bar: 'b' } } });
      expect(await isReady(relation({ spec: SPEC }), data)).toBe(false);
    });

    it('is ready when the remote spec covers the local one', async () => {
      const data = InMemoryRelationData.from({
        test: { 'unit/0': { foo: 'a', bar: 'b', spec: JSON.stringify({ ...SPEC, java: '1.8.0' }) } },
      });
      expect(await isReady(relation({ spec: SPEC }), data)).toBe(true);
    });

    it('raises on a mismatched spec', async () => {
      const remote = '{"vendor":"apache","hadoop":"2.6.0"}';
      const data = InMemoryRelationData.from({ test: { 'unit/0': { foo: 'a', bar: 'b', spec: remote } } });
      const err = await isReady(relation({ spec: SPEC }), data).then(() => null, (e: unknown) => e);
      expect(err).toBeInstanceOf(SpecMismatchError);
      if (err instanceof SpecMismatchError) {
        expect(err.message).toBe(`Spec mismatch with related unit unit/0: ${remote} != {"vendor":"apache","hadoop":"2.7.1"}`);
      }
    });

    it('raises on an unparsable spec', async () => {
      const data = InMemoryRelationData.from({ test: { 'unit/0': { foo: 'a', bar: 'b', spec: 'nope' } } });
      await expect(isReady(relation({ spec: SPEC }), data)).rejects.toThrow('Unparsable spec from related unit unit/0: nope');
    });
  });

  describe('provideData', () => {
    const ctx = { allReady: true, data: new InMemoryRelationData() };

    it('adds the local spec as JSON', async () => {
      const rel: Relation = {
        role: 'provider', name: 'test', requiredKeys: [], spec: SPEC, provide: async () => ({ foo: 'bar' }),
      };
      expect(await provideData(rel, ctx)).toEqual({ foo: 'bar', spec: '{"vendor":"apache","hadoop":"2.7.1"}' });
    });

    it('publishes only the spec on the consumer side', async () => {
      expect(await provideData(relation({ spec: SPEC }), ctx)).toEqual({ spec: '{"vendor":"apache","hadoop":"2.7.1"}' });
      expect(await provideData(relation(), ctx)).toEqual({});
    });
  });

  describe('InMemoryRelationData', () => {
    it('copies, replaces and removes unit data', () => {
      const data = new InMemoryRelationData();
      const bag = { foo: 'a' };
      data.setUnit('test', 'unit/0', bag);
      data.setUnit('test', 'unit/0', { foo: 'b' });
      data.setUnit('test', 'unit/1', { foo: 'c' });
      data.removeUnit('test', 'unit/1');
      data.removeUnit('missing', 'unit/0');
      expect(data.units('test')).toEqual({ 'unit/0': { foo: 'b' } });
      expect(bag).toEqual({ foo: 'a' });
    });
  });
});
