import { describe, it, expect } from 'vitest';
import { DEFAULTS } from '@/constants/defaults';
import { Chooser } from '@/lib/chooser';
import { Color } from '@/lib/color';
import { Rng } from '@/lib/random';
import { Salt } from '@/lib/salt';
import type { PatternPlan, SceneCfg, ThemeItem, TilingPlan } from '@/types/scene';
import { parseMetaConfig } from './metaConfig';
import { collectIssues } from './report';
import { resolveSceneCfg, type ResolveOptions } from './resolve';

function resolveToml(src: string, seed = 1430n, options: Partial<ResolveOptions> = {}): SceneCfg {
  const { report } = collectIssues();
  return resolveSceneCfg(parseMetaConfig(src, report), Rng.fromSeed(seed), { time: 1430, report, ...options });
}

const red = new Color(255, 0, 0);

describe('resolveSceneCfg', () => {
  it('falls back to defaults for an empty document', () => {
    const cfg = resolveToml('');
    expect(cfg.deviation).toBe(20);
    expect(cfg.distance).toBe(40);
    expect(cfg.frame).toEqual({ x: 0, y: 0, w: 1000, h: 600 });
    expect(cfg.lineWidth).toBe(1);
    expect(cfg.lineColor).toEqual(Color.black());
    const items = cfg.theme.extract();
    expect(items).toHaveLength(1);
    expect(items[0][1]).toBe(10);
  });

  it('is deterministic for a seed', () => {
    const a = resolveToml('', 77n);
    const b = resolveToml('', 77n);
    expect(a.tiling).toEqual(b.tiling);
    expect(a.pattern).toEqual(b.pattern);
    expect(a.theme.extract()).toEqual(b.theme.extract());
  });

  it('builds themes from named colors', () => {
    const cfg = resolveToml('[colors]\nA = "#FF0000"\n[themes]\nT = "A x5"\n');
    expect(cfg.theme.extract()).toEqual([[{ color: red, salt: Salt.none() }, 5]]);
  });

  it('derives a default theme from a named color when no theme is given', () => {
    const cfg = resolveToml('[colors]\nA = "#FF0000"\n');
    expect(cfg.theme.extract()).toEqual([[{ color: red, salt: Salt.none() }, 10]]);
  });

  it('follows the entry that matches the time', () => {
    const cfg = resolveToml(`
[shapes]
S = [["H", 3], ["FC", 1]]

[[entry]]
span = "1400-1500"
shapes = "S"
`);
    expect(cfg.tiling.kind).toBe('hexagons');
    expect(cfg.pattern).toEqual({ kind: 'free-circles', count: 10, width: 0, variation: 0, tightness: 0 });
  });

  it('applies every explicit setting', () => {
    const cfg = resolveToml(`
[global]
deviation = 5
distance = 60
size = 25
width = 300
height = 200

[shapes]
S = ["H", "PS"]

[data.patterns]
nb_parallel_stripes = 4
var_parallel_stripes = 3

[data.tilings]
size_hex = 30

[[entry]]
shapes = "S"
`);
    expect(cfg.deviation).toBe(5);
    expect(cfg.distance).toBe(60);
    expect(cfg.frame).toEqual({ x: 0, y: 0, w: 300, h: 200 });
    expect(cfg.tiling).toMatchObject({ kind: 'hexagons', size: 30 });
    expect(cfg.pattern).toEqual({ kind: 'parallel-stripes', count: 4, width: 0, variation: 3, tightness: 0 });
  });

  it('uses the global size for families without their own size', () => {
    const cfg = resolveToml('[global]\nsize = 25\n[shapes]\nS = ["T"]\n[[entry]]\nshapes = "S"\n');
    expect(cfg.tiling).toMatchObject({ kind: 'triangles', size: 25 });
  });

  it('draws rhombus diagonals and pentagon variants', () => {
    const rho = resolveToml('[shapes]\nS = ["R"]\n[[entry]]\nshapes = "S"\n');
    if (rho.tiling.kind !== 'rhombus') throw new Error(`unexpected tiling ${rho.tiling.kind}`);
    expect(rho.tiling.shortDiagonal).toBeGreaterThanOrEqual(0.4 * 15);
    expect(rho.tiling.shortDiagonal).toBeLessThan(15);

    const pen = resolveToml('[shapes]\nS = ["P"]\n[[entry]]\nshapes = "S"\n');
    if (pen.tiling.kind !== 'pentagons') throw new Error(`unexpected tiling ${pen.tiling.kind}`);
    expect([1, 2, 3, 4, 5, 6]).toContain(pen.tiling.variant);

    const fixed = resolveToml('[shapes]\nS = ["P4"]\n[[entry]]\nshapes = "S"\n');
    expect(fixed.tiling).toMatchObject({ kind: 'pentagons', variant: 4 });
  });

  it('reads the Delaunay point count', () => {
    const cfg = resolveToml('[shapes]\nS = ["D"]\n[data.tilings]\nnb_delaunay = 50\n[[entry]]\nshapes = "S"\n');
    expect(cfg.tiling).toEqual({ kind: 'delaunay', points: 50 });
  });

  describe('line settings', () => {
    const lines = `
[lines]
width = 3
color = "#FF0000"
hex_width = 2
hex_color = "#00FF00"
`;

    it('prefers per-tiling settings', () => {
      const cfg = resolveToml(`${lines}\n[shapes]\nS = ["H"]\n[[entry]]\nshapes = "S"\n`);
      expect(cfg.lineWidth).toBe(2);
      expect(cfg.lineColor).toEqual(new Color(0, 255, 0));
    });

    it('falls back to the section settings for other tilings', () => {
      const cfg = resolveToml(`${lines}\n[shapes]\nS = ["T"]\n[[entry]]\nshapes = "S"\n`);
      expect(cfg.lineWidth).toBe(3);
      expect(cfg.lineColor).toEqual(red);
    });

    it('lets the entry override the line color', () => {
      const cfg = resolveToml(`${lines}\n[shapes]\nS = ["H"]\n[[entry]]\nshapes = "S"\nline_color = "#0000FF"\n`);
      expect(cfg.lineColor).toEqual(new Color(0, 0, 255));
    });

    it('reports an unreadable line color and skips it', () => {
      const { report, issues } = collectIssues();
      const meta = parseMetaConfig('[lines]\ncolor = "nope"\n', report);
      const cfg = resolveSceneCfg(meta, Rng.fromSeed(1n), { time: 1430, report });
      expect(cfg.lineColor).toEqual(Color.black());
      expect(issues.map((i) => i.path)).toEqual(['lines.color']);
    });
  });

  it('takes injected defaults', () => {
    const cfg = resolveToml('', 1430n, { defaults: { ...DEFAULTS, deviation: 7, lineWidth: 4, width: 64, height: 32 } });
    expect(cfg.deviation).toBe(7);
    expect(cfg.lineWidth).toBe(4);
    expect(cfg.frame).toEqual({ x: 0, y: 0, w: 64, h: 32 });
  });

  describe('full document', () => {
    const document = (shapes: string) => `
[global]
deviation = 6
distance = 45
size = 19
width = 320
height = 240

[lines]
width = 3
color = "#FF0000"
del_width = 1.5
del_color = "#000001"
hex_width = 2
hex_color = "#000002"
tri_width = 2.5
tri_color = "#000003"
rho_width = 3.5
rho_color = "#000004"
hex_and_tri_width = 4
hex_and_tri_color = "#000005"
squ_and_tri_width = 4.5
squ_and_tri_color = "#000006"
pen_width = 5
pen_color = "#000007"

[colors]
A = "#102030"

[themes]
T = "A x5 ~3 !70"

[shapes]
S = ${shapes}

[data.patterns]
nb_free_circles = 11
nb_free_triangles = 12
nb_free_stripes = 13
nb_free_spirals = 4
nb_concentric_circles = 6
nb_parallel_stripes = 16
nb_crossed_stripes = 9
nb_parallel_waves = 17
nb_parallel_sawteeth = 18
var_parallel_stripes = 7
var_crossed_stripes = 8
width_spiral = 0.25
width_stripe = 0.125
width_wave = 0.375
width_sawtooth = 0.5
tightness_spiral = 0.75

[data.tilings]
size_hex = 21
size_tri = 22
size_hex_and_tri = 23
size_squ_and_tri = 24
size_rho = 26
size_pen = 27
nb_delaunay = 50

[[entry]]
themes = "T"
shapes = "S"
`;

    const theme = new Chooser<ThemeItem>([[{ color: new Color(16, 32, 48), deviation: 3, distance: 70, salt: Salt.none() }, 5]]);

    function resolveFull(shapes: string) {
      const { report, issues } = collectIssues();
      const cfg = resolveSceneCfg(parseMetaConfig(document(shapes), report), Rng.fromSeed(1430n), { time: 1430, report });
      return { cfg, issues };
    }

    const circles: PatternPlan = { kind: 'free-circles', count: 11, width: 0, variation: 0, tightness: 0 };
    const rotation = expect.any(Number);

    it.each<[token: string, tiling: TilingPlan, lineWidth: number, line: number]>([
      ['H', { kind: 'hexagons', size: 21, rotation }, 2, 2],
      ['T', { kind: 'triangles', size: 22, rotation }, 2.5, 3],
      ['H&T', { kind: 'hexagons-and-triangles', size: 23, rotation }, 4, 5],
      ['S&T', { kind: 'squares-and-triangles', size: 24, rotation }, 4.5, 6],
      ['R', { kind: 'rhombus', size: 26, shortDiagonal: expect.any(Number), rotation }, 3.5, 4],
      ['D', { kind: 'delaunay', points: 50 }, 1.5, 1],
      ['P3', { kind: 'pentagons', variant: 3, size: 27, rotation }, 5, 7],
    ])('resolves every setting for the %s tiling', (token, tiling, lineWidth, line) => {
      const { cfg, issues } = resolveFull(`["${token}", "FC"]`);
      expect(issues).toEqual([]);
      expect(cfg).toEqual({
        deviation: 6,
        distance: 45,
        frame: { x: 0, y: 0, w: 320, h: 240 },
        tiling,
        pattern: circles,
        lineWidth,
        lineColor: new Color(0, 0, line),
        theme,
      });
    });

    it.each<[token: string, pattern: PatternPlan]>([
      ['FC', circles],
      ['FT', { kind: 'free-triangles', count: 12, width: 0, variation: 0, tightness: 0 }],
      ['FR', { kind: 'free-stripes', count: 13, width: 0.125, variation: 0, tightness: 0 }],
      ['FP', { kind: 'free-spirals', count: 4, width: 0.25, variation: 0, tightness: 0.75 }],
      ['CC', { kind: 'concentric-circles', count: 6, width: 0, variation: 0, tightness: 0 }],
      ['PS', { kind: 'parallel-stripes', count: 16, width: 0, variation: 7, tightness: 0 }],
      ['CS', { kind: 'crossed-stripes', count: 9, width: 0.125, variation: 8, tightness: 0 }],
      ['PW', { kind: 'parallel-waves', count: 17, width: 0.375, variation: 0, tightness: 0 }],
      ['PT', { kind: 'parallel-sawteeth', count: 18, width: 0.5, variation: 0, tightness: 0 }],
    ])('resolves every setting for the %s pattern', (token, pattern) => {
      const { cfg, issues } = resolveFull(`["H", "${token}"]`);
      expect(issues).toEqual([]);
      expect(cfg).toEqual({
        deviation: 6,
        distance: 45,
        frame: { x: 0, y: 0, w: 320, h: 240 },
        tiling: { kind: 'hexagons', size: 21, rotation },
        pattern,
        lineWidth: 2,
        lineColor: new Color(0, 0, 2),
        theme,
      });
    });
  });
});
