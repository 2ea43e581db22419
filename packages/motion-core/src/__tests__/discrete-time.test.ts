import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { createDiscreteTime } from '../time/index.js';
import { InvalidDurationError, InvalidIntervalError, MotionConfigError } from '../errors.js';

describe('createDiscreteTime', () => {
  it('yields floor(duration / dt) + 1 steps for an exact multiple', () => {
    const time = createDiscreteTime({ deltaTS: 0.1, durationS: 6 });
    const steps = [...time];

    expect(time.stepCount).toBe(61);
    expect(steps).toHaveLength(61);
    expect(steps[0]).toEqual({ index: 0, elapsedS: 0 });
    expect(steps.at(-1)?.index).toBe(60);
    expect(steps.at(-1)?.elapsedS).toBeCloseTo(6, 12);
  });

  it('drops the partial final step when duration is not a multiple', () => {
    const time = createDiscreteTime({ deltaTS: 0.3, durationS: 1 });
    const elapsed = [...time].map((s) => s.elapsedS);

    expect(elapsed).toHaveLength(4);
    expect(elapsed[3]).toBeCloseTo(0.9, 12);
  });

  it('yields two steps when duration equals dt', () => {
    const time = createDiscreteTime({ deltaTS: 0.5, durationS: 0.5 });
    expect([...time]).toEqual([
      { index: 0, elapsedS: 0 },
      { index: 1, elapsedS: 0.5 },
    ]);
  });

  it('computes elapsed time by multiplication, not accumulation', () => {
    const time = createDiscreteTime({ deltaTS: 0.1, durationS: 100 });
    for (const step of time) {
      expect(step.elapsedS).toBe(step.index * 0.1);
    }
  });

  it('keeps the final step when rounding puts it just past the duration', () => {
    const time = createDiscreteTime({ deltaTS: 0.1, durationS: 0.3 });
    const steps = [...time];

    expect(time.stepCount).toBe(4);
    expect(steps.at(-1)).toEqual({ index: 3, elapsedS: 0.30000000000000004 });
    expect(steps.at(-1)?.elapsedS).toBeLessThanOrEqual(0.3 + 1e-9 * 0.1 + Number.EPSILON);
  });

  it('restarts from index 0 on every iteration', () => {
    const time = createDiscreteTime({ deltaTS: 0.25, durationS: 1 });
    const first = [...time];
    const second = [...time.steps()];

    expect(second).toEqual(first);
    expect(first.map((s) => s.index)).toEqual([0, 1, 2, 3, 4]);
  });

  it('is lazy: a partial read does not run the rest of the sequence', () => {
    const time = createDiscreteTime({ deltaTS: 1e-6, durationS: 1e6 });
    const iterator = time.steps();

    expect(iterator.next().value).toEqual({ index: 0, elapsedS: 0 });
    expect(iterator.next().value).toEqual({ index: 1, elapsedS: 1e-6 });
  });

  describe('validation', () => {
    it.each([0, -0.1, Number.NaN, Number.POSITIVE_INFINITY])(
      'rejects deltaTS = %s with InvalidIntervalError',
      (deltaTS) => {
        let caught: unknown;
        try {
          createDiscreteTime({ deltaTS, durationS: 1 });
        } catch (err) {
          caught = err;
        }
        expect(caught).toBeInstanceOf(InvalidIntervalError);
        expect(caught).toBeInstanceOf(MotionConfigError);
        expect(caught).toMatchObject({ kind: 'invalid-interval', parameter: 'deltaTS' });
      },
    );

    it('rejects a duration shorter than one step', () => {
      expect(() => createDiscreteTime({ deltaTS: 1, durationS: 0.5 })).toThrow(InvalidDurationError);
    });

    it('reports the offending duration and interval', () => {
      try {
        createDiscreteTime({ deltaTS: 1, durationS: 0.5 });
        expect.unreachable();
      } catch (err) {
        expect(err).toMatchObject({
          kind: 'invalid-duration',
          parameter: 'durationS',
          value: 0.5,
          deltaTS: 1,
        });
      }
    });

    it('rejects an infinite duration', () => {
      expect(() => createDiscreteTime({ deltaTS: 1, durationS: Infinity })).toThrow(InvalidDurationError);
    });
  });

  describe('properties', () => {
    it('yields n + 1 evenly spaced, strictly increasing steps for duration in [n dt, (n + 0.9) dt]', () => {
      fc.assert(
        fc.property(
          fc.double({ min: 1e-3, max: 10, noNaN: true, noDefaultInfinity: true }),
          fc.integer({ min: 1, max: 500 }),
          fc.double({ min: 0, max: 0.9, noNaN: true, noDefaultInfinity: true }),
          (dt, n, fraction) => {
            const time = createDiscreteTime({ deltaTS: dt, durationS: (n + fraction) * dt });
            const steps = [...time];

            expect(steps).toHaveLength(n + 1);
            expect(time.stepCount).toBe(n + 1);
            for (let i = 1; i < steps.length; i++) {
              const prev = steps[i - 1]!;
              const cur = steps[i]!;
              expect(cur.elapsedS).toBeGreaterThan(prev.elapsedS);
              expect(Math.abs(cur.elapsedS - prev.elapsedS - dt)).toBeLessThan(1e-9);
            }
          },
        ),
        { numRuns: 200 },
      );
    });
  });
});
