import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Baggage, BaggageValueError, baggageKey } from '../../baggage/baggage.ts';
import { TRANSFERS } from '../../baggage/keys.ts';

const LABEL = baggageKey('label', z.string());
const SCORES = baggageKey('scores', z.record(z.string(), z.number()));

describe('Baggage', () => {
  it('treats absence as a normal state', () => {
    const baggage = new Baggage();

    expect(baggage.get(LABEL)).toBeUndefined();
    expect(baggage.has(LABEL)).toBe(false);
    expect(baggage.writerOf('label')).toBeUndefined();
  });

  it('round-trips typed values', () => {
    const baggage = new Baggage();
    baggage.set(SCORES, { a: 1, b: 2 });

    expect(baggage.get(SCORES)).toEqual({ a: 1, b: 2 });
    expect(baggage.has('scores')).toBe(true);
    expect(baggage.keys()).toEqual(['scores']);
    expect(baggage.size).toBe(1);
  });

  it('rejects writes that do not match the key schema', () => {
    const baggage = new Baggage();

    try {
      // type-correct, but a log index must be an integer
      baggage.set(TRANSFERS, [
        { type: 'ERC20', contract: '0x01', from: '0x02', to: '0x03', amount: '5', logIndex: 1.5 },
      ]);
      expect.fail('expected a BaggageValueError');
    } catch (error) {
      expect(error).toBeInstanceOf(BaggageValueError);
      if (error instanceof BaggageValueError) expect(error.key).toBe('transfers');
    }
    expect(baggage.has(TRANSFERS)).toBe(false);
  });

  it('reads a malformed raw value as absent', () => {
    const baggage = new Baggage({ label: 42 });

    expect(baggage.getRaw('label')).toBe(42);
    expect(baggage.get(LABEL)).toBeUndefined();
  });

  it('marks seeded values as written by nobody and tool writes by the active tool', () => {
    const baggage = new Baggage({ seeded: true });
    baggage.enter('labeller');
    baggage.set(LABEL, 'hello');
    baggage.exit();

    expect(baggage.writerOf('seeded')).toBeNull();
    expect(baggage.writerOf('label')).toBe('labeller');
  });

  it('overwrites a key wholesale', () => {
    const baggage = new Baggage();
    baggage.set(SCORES, { a: 1 });
    baggage.set(SCORES, { b: 2 });

    expect(baggage.get(SCORES)).toEqual({ b: 2 });
  });

  it('only checks reads while a tool with ancestors is active', () => {
    const baggage = new Baggage();
    baggage.enter('producer');
    baggage.set(LABEL, 'x');
    baggage.enter('reader', new Set(['someone-else']));
    baggage.get(LABEL);
    baggage.enter('own-reader', null);
    baggage.get(LABEL);
    baggage.exit();
    baggage.get(LABEL);

    expect(baggage.getViolations()).toEqual([{ reader: 'reader', key: 'label', writer: 'producer' }]);
  });

  it('snapshots with excluded keys masked', () => {
    const baggage = Baggage.from({ raw_data: { big: true }, label: 'ok' });

    expect(baggage.snapshot(['raw_data'])).toEqual({
      raw_data: '<raw_data excluded>',
      label: 'ok',
    });
  });
});
