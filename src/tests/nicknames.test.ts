import { describe, expect, it } from 'vitest';
import { randomNickname, resolveNickname } from '../lib/nicknames.js';

describe('resolveNickname', () => {
  it('keeps a free nickname as is', () => {
    expect(resolveNickname('Saber', new Set(['Host']))).toBe('Saber');
  });

  it('appends the smallest free suffix starting at 2', () => {
    expect(resolveNickname('Saber', new Set(['Saber']))).toBe('Saber_2');
    expect(resolveNickname('Saber', new Set(['Saber', 'Saber_2']))).toBe('Saber_3');
    expect(resolveNickname('Saber', new Set(['Saber', 'Saber_3']))).toBe('Saber_2');
  });
});

describe('randomNickname', () => {
  it('draws a common role name most of the time', () => {
    const values = [0.5, 0.99];
    expect(randomNickname(() => values.shift() ?? 0)).toBe('Berserker');
  });

  it('draws a rare role name below the rare threshold', () => {
    const values = [0.01, 0.6];
    expect(randomNickname(() => values.shift() ?? 0)).toBe('Avenger');
  });
});
