import { describe, it, expect } from 'vitest';
import { buildSidePots, distributePots, findUncalledExcess, oddChipOrder } from './pot-manager';

describe('buildSidePots', () => {
  it('peels a main pot and a side pot off an all-in', () => {
    const pots = buildSidePots(new Map([['A', 100], ['B', 400], ['C', 400]]), new Set());
    expect(pots).toEqual([
      { amount: 300, eligible: ['A', 'B', 'C'], contributors: ['A', 'B', 'C'] },
      { amount: 600, eligible: ['B', 'C'], contributors: ['B', 'C'] },
    ]);
  });

  it('merges layers with the same eligible players', () => {
    const pots = buildSidePots(new Map([['A', 50], ['B', 100], ['C', 100]]), new Set(['A']));
    expect(pots).toEqual([
      { amount: 250, eligible: ['B', 'C'], contributors: ['A', 'B', 'C'] },
    ]);
  });

  it('folds a layer nobody can win into the one below', () => {
    const pots = buildSidePots(new Map([['A', 200], ['B', 100]]), new Set(['A']));
    expect(pots).toEqual([
      { amount: 300, eligible: ['B'], contributors: ['A', 'B'] },
    ]);
  });

  it('ignores players who put nothing in', () => {
    expect(buildSidePots(new Map([['A', 0]]), new Set())).toEqual([]);
  });
});

describe('findUncalledExcess', () => {
  it('returns what the biggest bettor put in above the next one', () => {
    expect(findUncalledExcess(new Map([['A', 500], ['B', 200], ['C', 0]]))).toEqual({ player: 'A', amount: 300 });
  });

  it('finds nothing when the top contribution is matched', () => {
    expect(findUncalledExcess(new Map([['A', 300], ['B', 100], ['C', 300]]))).toBeNull();
    expect(findUncalledExcess(new Map())).toBeNull();
  });
});

describe('oddChipOrder', () => {
  const seats = [
    { seat: 8, player: 'D', stack: 0 },
    { seat: 1, player: 'A', stack: 0 },
    { seat: 5, player: 'C', stack: 0 },
    { seat: 3, player: 'B', stack: 0 },
  ];

  it('starts left of the button', () => {
    expect(oddChipOrder(seats, 3)).toEqual(['C', 'D', 'A', 'B']);
  });

  it('falls back to seat order', () => {
    expect(oddChipOrder(seats, null)).toEqual(['A', 'B', 'C', 'D']);
  });
});

describe('distributePots', () => {
  const pot = (amount: number, eligible: string[]) => ({ amount, eligible, contributors: eligible });

  it('gives the odd chip to the first winner in order', () => {
    const shares = distributePots([pot(65, ['G', 'H'])], [['G', 'H']], ['H', 'N', 'G']);
    expect(shares).toEqual([
      { player: 'H', amount: 33, potIndex: 0 },
      { player: 'G', amount: 32, potIndex: 0 },
    ]);
  });

  it('splits three ways without losing a cent', () => {
    const shares = distributePots([pot(100, ['A', 'B', 'C'])], [['C', 'B', 'A']], ['A', 'B', 'C']);
    expect(shares.map(s => s.amount)).toEqual([34, 33, 33]);
    expect(shares.reduce((sum, s) => sum + s.amount, 0)).toBe(100);
  });

  it('drops winners who are not eligible for the pot', () => {
    const shares = distributePots(
      [pot(300, ['A', 'B', 'C']), pot(600, ['B', 'C'])],
      [['A'], ['A', 'B']],
      ['A', 'B', 'C'],
    );
    expect(shares).toEqual([
      { player: 'A', amount: 300, potIndex: 0 },
      { player: 'B', amount: 600, potIndex: 1 },
    ]);
  });

  it('splits each tier among its own winners', () => {
    const pots = [pot(100, ['A', 'B', 'C']), pot(40, ['B', 'C'])];
    expect(distributePots(pots, [['B', 'C'], ['B', 'C']], ['A', 'B', 'C'])).toEqual([
      { player: 'B', amount: 50, potIndex: 0 },
      { player: 'C', amount: 50, potIndex: 0 },
      { player: 'B', amount: 20, potIndex: 1 },
      { player: 'C', amount: 20, potIndex: 1 },
    ]);
    expect(distributePots(pots, [['A'], ['A', 'B', 'C']], ['A', 'B', 'C'])).toEqual([
      { player: 'A', amount: 100, potIndex: 0 },
      { player: 'B', amount: 20, potIndex: 1 },
      { player: 'C', amount: 20, potIndex: 1 },
    ]);
  });

  it('leaves a pot without winners unassigned', () => {
    expect(distributePots([pot(50, ['A'])], [[]], ['A'])).toEqual([]);
  });
});
