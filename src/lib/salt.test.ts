import { describe, it, expect } from 'vitest';
import { Color } from './color';
import { Rng } from './random';
import { Salt } from './salt';

const red = new Color(255, 0, 0);
const blue = new Color(0, 0, 255);

describe('Salt', () => {
  it('never replaces without entries and draws nothing', () => {
    const rng = Rng.fromSeed(8n);
    const fresh = Rng.fromSeed(8n);
    expect(Salt.none().items).toEqual([]);
    expect(Salt.none().sample(rng)).toBeNull();
    expect(rng.float()).toBe(fresh.float());
  });

  it('always replaces at likeliness 1', () => {
    const salt = new Salt([{ color: red, likeliness: 1, variability: 0 }]);
    const rng = Rng.fromSeed(8n);
    for (let i = 0; i < 50; i++) expect(salt.sample(rng)).toEqual(red);
  });

  it('never replaces at likeliness 0', () => {
    const salt = new Salt([{ color: red, likeliness: 0, variability: 0 }]);
    const rng = Rng.fromSeed(8n);
    for (let i = 0; i < 50; i++) expect(salt.sample(rng)).toBeNull();
  });

  it('uses the first entry that fires', () => {
    const salt = new Salt([
      { color: red, likeliness: 0, variability: 0 },
      { color: blue, likeliness: 1, variability: 0 },
    ]);
    expect(salt.sample(Rng.fromSeed(1n))).toEqual(blue);
  });

  it('replaces roughly a likeliness share of samples', () => {
    const salt = new Salt([{ color: red, likeliness: 0.25, variability: 0 }]);
    const rng = Rng.fromSeed(31n);
    let hits = 0;
    for (let i = 0; i < 10000; i++) if (salt.sample(rng)) hits++;
    expect(hits / 10000).toBeGreaterThan(0.22);
    expect(hits / 10000).toBeLessThan(0.28);
  });
});
