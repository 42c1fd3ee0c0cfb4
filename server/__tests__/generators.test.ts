/**
 * Built-in generator tests
 * Scripted randomness pins exact output; seeded runs check that every item
 * answers its own question.
 */

import { describe, it, expect } from 'vitest';
import { assessmentItemSchema } from '../../shared/schema.js';
import {
  generateCircleItem,
  generateCoordinateItem,
  generateFallbackItem,
  generateLinearItem,
  generatePercentItem,
  generateQuadraticItem,
  formatMonicQuadratic,
} from '../ai/generators/index.js';
import { createRandomSource } from '../ai/random.js';
import { ScriptedRandom } from './support/scripted-random.js';

const SEEDS = Array.from({ length: 40 }, (_, i) => i + 1);

function captureInts(pattern: RegExp, text: string): number[] {
  const match = text.match(pattern);
  if (!match) throw new Error(`No match for ${pattern} in: ${text}`);
  return match.slice(1).map((s) => Number(s));
}

describe('generateCircleItem', () => {
  it('should build the area question for r = 5', () => {
    const item = generateCircleItem('moderate', new ScriptedRandom([5]));

    expect(item.question).toBe('A circle has a radius of 5 units. What is the area of the circle?');
    expect(item.options).toEqual(['$25\\pi$', '$10\\pi$', '$5\\pi$', '$50\\pi$', '$12\\pi$']);
    expect(item.options[item.correctIndex]).toBe('$25\\pi$');
    expect(item.explanation).toBe('Area formula: $A=\\pi r^2$. With $r=5$, $A=\\pi\\cdot 5^2=25\\pi$ square units.');
    expect(item.subject).toBe('Quantitative Math');
    expect(item.unit).toBe('Geometry and Measurement');
    expect(item.topic).toBe('Circles (Area, circumference)');
    expect(item.difficulty).toBe('moderate');
    expect(item.hasImage).toBe(false);
    expect(item.pointsData).toBeUndefined();
  });

  it('should pad when distractors collide (r = 4)', () => {
    const item = generateCircleItem('easy', new ScriptedRandom([4]));
    // 2r and floor(area / 2) are both 8
    expect(item.options).toEqual(['$16\\pi$', '$8\\pi$', '$4\\pi$', '$32\\pi$', '1']);
    expect(item.correctIndex).toBe(0);
  });

  it('should locate the correct option after shuffling', () => {
    const item = generateCircleItem('moderate', new ScriptedRandom([5], true));
    expect(item.options).toEqual(['$12\\pi$', '$50\\pi$', '$5\\pi$', '$10\\pi$', '$25\\pi$']);
    expect(item.correctIndex).toBe(4);
  });

  it.each(SEEDS)('should answer its own question (seed %i)', (seed) => {
    const item = generateCircleItem('moderate', createRandomSource(seed));
    const [r] = captureInts(/radius of (\d+) units/, item.question);

    assessmentItemSchema.parse(item);
    expect(r).toBeGreaterThanOrEqual(3);
    expect(r).toBeLessThanOrEqual(12);
    expect(item.options[item.correctIndex]).toBe(`$${r * r}\\pi$`);
  });
});

describe('generateQuadraticItem', () => {
  it('should format monic quadratics without zero or unit terms', () => {
    expect(formatMonicQuadratic(11, 30)).toBe('x^2 + 11x + 30 = 0');
    expect(formatMonicQuadratic(-1, -6)).toBe('x^2 - x - 6 = 0');
    expect(formatMonicQuadratic(0, -9)).toBe('x^2 - 9 = 0');
    expect(formatMonicQuadratic(4, 0)).toBe('x^2 + 4x = 0');
  });

  it('should build the equation from the sampled roots', () => {
    const item = generateQuadraticItem('moderate', new ScriptedRandom());

    expect(item.question).toBe('If $x^2 + 11x + 30 = 0$, what are all possible values of $x$?');
    expect(item.options).toEqual([
      '$x=-6$ and $x=-5$',
      '$x=-5$ and $x=-4$',
      '$x=6$ and $x=5$',
      '$x=-6$ and $x=-3$',
      '$x=-7$ and $x=-5$',
    ]);
    expect(item.correctIndex).toBe(0);
    expect(item.explanation).toBe('Factor: $(x + 6)(x + 5)=0$ so $x=-6$ or $x=-5$.');
    expect(item.unit).toBe('Algebra');
    expect(item.topic).toBe('Quadratic Equations & Functions (Finding roots/solutions, graphing)');
  });

  it.each(SEEDS)('should offer roots that solve the equation (seed %i)', (seed) => {
    const item = generateQuadraticItem('moderate', createRandomSource(seed));
    assessmentItemSchema.parse(item);

    const equation = item.question.match(/x\^2(?: ([+-]) (\d*)x)?(?: ([+-]) (\d+))? = 0/);
    expect(equation).not.toBeNull();
    const [, bSign, bMag, cSign, cMag] = equation ?? [];
    const b = bSign === undefined ? 0 : (bSign === '-' ? -1 : 1) * (bMag === '' ? 1 : Number(bMag));
    const c = cSign === undefined ? 0 : (cSign === '-' ? -1 : 1) * Number(cMag);

    const [r1, r2] = captureInts(/^\$x=(-?\d+)\$ and \$x=(-?\d+)\$$/, item.options[item.correctIndex]);
    expect(r1).not.toBe(r2);
    for (const r of [r1, r2]) {
      expect(r * r + b * r + c).toBe(0);
    }

    const solving = item.options.filter((option) =>
      captureInts(/^\$x=(-?\d+)\$ and \$x=(-?\d+)\$$/, option).every((r) => r * r + b * r + c === 0)
    );
    expect(solving).toEqual([item.options[item.correctIndex]]);
  });

  it('should not offer the sign flip of opposite roots as a distractor', () => {
    class OppositeRoots extends ScriptedRandom {
      sample<T>(values: readonly T[]): T[] {
        return values.filter((v) => v === -2 || v === 2);
      }
    }
    const item = generateQuadraticItem('moderate', new OppositeRoots());

    expect(item.question).toBe('If $x^2 - 4 = 0$, what are all possible values of $x$?');
    expect(item.options).toEqual([
      '$x=-2$ and $x=2$',
      '$x=-1$ and $x=3$',
      '$x=-2$ and $x=0$',
      '$x=-2$ and $x=4$',
      '$x=-3$ and $x=2$',
    ]);
    expect(item.correctIndex).toBe(0);
  });
});

describe('generateCoordinateItem', () => {
  const script = [2, -3, 2, 4, 0, -1, 0, 5, 1, -5, 3];

  it('should plot five points with the target first when unshuffled', () => {
    const item = generateCoordinateItem('easy', new ScriptedRandom(script));

    expect(item.question).toBe('Which point on the coordinate plane has an $x$-coordinate of 2?');
    expect(item.options).toEqual(['A', 'B', 'C', 'D', 'E']);
    expect(item.correctIndex).toBe(0);
    expect(item.pointsData).toEqual({ A: [2, -3], B: [4, 0], C: [-1, 0], D: [5, 1], E: [-5, 3] });
    expect(item.explanation).toBe('Point A is at $(2, -3)$ so its $x$-coordinate is 2.');
    expect(item.hasImage).toBe(true);
    expect(item.topic).toBe('Coordinate Geometry');
  });

  it('should label the target by its shuffled position', () => {
    const item = generateCoordinateItem('easy', new ScriptedRandom(script, true));

    expect(item.correctIndex).toBe(4);
    expect(item.pointsData).toEqual({ A: [-5, 3], B: [5, 1], C: [-1, 0], D: [4, 0], E: [2, -3] });
    expect(item.explanation).toBe('Point E is at $(2, -3)$ so its $x$-coordinate is 2.');
  });

  it.each(SEEDS)('should have exactly one point at the asked x (seed %i)', (seed) => {
    const item = generateCoordinateItem('easy', createRandomSource(seed));
    assessmentItemSchema.parse(item);

    const [x] = captureInts(/x\$-coordinate of (-?\d+)\?/, item.question);
    const points = item.pointsData ?? {};
    const matching = Object.entries(points).filter(([, [px]]) => px === x);

    expect(Object.keys(points)).toHaveLength(5);
    expect(matching).toHaveLength(1);
    expect(matching[0][0]).toBe(item.options[item.correctIndex]);
    for (const [px, py] of Object.values(points)) {
      expect(Math.abs(px)).toBeLessThanOrEqual(5);
      expect(Math.abs(py)).toBeLessThanOrEqual(5);
    }
  });
});

describe('generatePercentItem', () => {
  it('should compute the floored percentage', () => {
    const item = generatePercentItem('moderate', new ScriptedRandom([80]));

    expect(item.question).toBe(
      'In a group of 80 students, 25% are wearing glasses. How many students are wearing glasses?'
    );
    expect(item.options).toEqual(['20', '10', '15', '25', '30']);
    expect(item.correctIndex).toBe(0);
    expect(item.explanation).toBe('Compute 25% of 80: $\\frac{25}{100}\\times 80=20$.');
    expect(item.unit).toBe('Numbers and Operations');
  });

  it('should drop non-positive distractors and pad', () => {
    const item = generatePercentItem('moderate', new ScriptedRandom([40]));
    // correct is 10, so 10 - 10 = 0 is dropped
    expect(item.options).toEqual(['10', '5', '15', '20', '1']);
  });

  it.each(SEEDS)('should answer its own question (seed %i)', (seed) => {
    const item = generatePercentItem('moderate', createRandomSource(seed));
    assessmentItemSchema.parse(item);

    const [total, percentage] = captureInts(/group of (\d+) students, (\d+)%/, item.question);
    expect(item.options[item.correctIndex]).toBe(String(Math.floor((total * percentage) / 100)));
  });
});

describe('generateLinearItem', () => {
  it('should solve to x = 3 for a = 5, c = 2', () => {
    const item = generateLinearItem('easy', new ScriptedRandom([5, 2, 10, 3]));

    expect(item.question).toBe('If $5x + 1 = 2x + 10$, what is the value of $x$?');
    expect(item.options).toEqual(['3', '4', '2', '5', '6']);
    expect(item.options[item.correctIndex]).toBe('3');
    expect(item.explanation).toBe('$5x-2x=10-1$ so $3x=9$, hence $x=3$.');
    expect(item.topic).toBe('Interpreting Variables');
  });

  it('should write negative intercepts and unit coefficients cleanly', () => {
    const item = generateLinearItem('easy', new ScriptedRandom([10, 1, 5, 5]));

    expect(item.question).toBe('If $10x - 40 = x + 5$, what is the value of $x$?');
    expect(item.explanation).toBe('$10x-x=5-(-40)$ so $9x=45$, hence $x=5$.');
  });

  it.each(SEEDS)('should have an exact integer solution (seed %i)', (seed) => {
    const item = generateLinearItem('easy', createRandomSource(seed));
    assessmentItemSchema.parse(item);

    const match = item.question.match(/^If \$(\d+)x ([+-]) (\d+) = (\d*)x \+ (\d+)\$/);
    expect(match).not.toBeNull();
    const [, a, sign, bMag, c, d] = match ?? [];
    const b = (sign === '-' ? -1 : 1) * Number(bMag);
    const cValue = c === '' ? 1 : Number(c);

    const x = Number(item.options[item.correctIndex]);
    expect(Number(a) * x + b).toBe(cValue * x + Number(d));
  });
});

describe('generateFallbackItem', () => {
  it('should dispatch by topic keywords', () => {
    const random = createRandomSource(3);
    expect(generateFallbackItem('Circles (Area, circumference)', 'moderate', random).topic).toBe(
      'Circles (Area, circumference)'
    );
    expect(generateFallbackItem('quadratic roots', 'moderate', random).unit).toBe('Algebra');
    expect(generateFallbackItem('Coordinate Geometry', 'easy', random).hasImage).toBe(true);
    expect(generateFallbackItem('Percents', 'moderate', random).unit).toBe('Numbers and Operations');
  });

  it('should use the linear generator for unknown topics', () => {
    const item = generateFallbackItem('Probability', 'hard', new ScriptedRandom([5, 2, 10, 3]));
    expect(item.question).toBe('If $5x + 1 = 2x + 10$, what is the value of $x$?');
    expect(item.difficulty).toBe('hard');
  });
});
