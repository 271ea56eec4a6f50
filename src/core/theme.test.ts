import { describe, it, expect } from 'vitest';
import { Chooser } from '@/lib/chooser';
import { Color } from '@/lib/color';
import { Rng } from '@/lib/random';
import { Salt } from '@/lib/salt';
import type { ThemeItem } from '@/types/scene';
import { chooseColor, ColorItem } from './theme';

const green = new Color(0, 200, 0);

describe('ColorItem.sample', () => {
  it('returns the theme color at full distance without jitter', () => {
    const item = new ColorItem(new Color(10, 20, 30), 0, 100, green, Salt.none());
    expect(item.sample(Rng.fromSeed(1n))).toEqual(green);
  });

  it('returns the shade at zero distance without jitter', () => {
    const shade = new Color(10, 20, 30);
    const item = new ColorItem(shade, 0, 0, green, Salt.none());
    expect(item.sample(Rng.fromSeed(1n))).toEqual(shade);
  });

  it('lets the salt replace the blended color', () => {
    const white = new Color(255, 255, 255);
    const salt = new Salt([{ color: white, likeliness: 1, variability: 0 }]);
    const item = new ColorItem(new Color(10, 20, 30), 20, 40, green, salt);
    expect(item.sample(Rng.fromSeed(1n))).toEqual(white);
  });
});

describe('chooseColor', () => {
  it('falls back to black with the scene settings on an empty theme', () => {
    const item = chooseColor({ theme: new Chooser<ThemeItem>(), deviation: 20, distance: 40 }, Rng.fromSeed(3n));
    expect(item.theme).toEqual(Color.black());
    expect(item.deviation).toBe(20);
    expect(item.distance).toBe(40);
    expect(item.salt).toEqual(Salt.none());
  });

  it('applies per-item overrides', () => {
    const theme = new Chooser<ThemeItem>([[{ color: green, deviation: 3, distance: 90, salt: Salt.none() }, 1]]);
    const item = chooseColor({ theme, deviation: 20, distance: 40 }, Rng.fromSeed(3n));
    expect(item.theme).toEqual(green);
    expect(item.deviation).toBe(3);
    expect(item.distance).toBe(90);
  });

  it('draws the shade after the theme item', () => {
    const theme = new Chooser<ThemeItem>([[{ color: green, salt: Salt.none() }, 1]]);
    const rng = Rng.fromSeed(12n);
    const replay = Rng.fromSeed(12n);
    const item = chooseColor({ theme, deviation: 0, distance: 0 }, rng);
    replay.float();
    expect(item.shade).toEqual(Color.random(replay));
  });
});
