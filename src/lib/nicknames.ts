const ROLE_NAMES = ['Archer', 'Saber', 'Caster', 'Assassin', 'Rider', 'Lancer', 'Berserker'];
const RARE_ROLE_NAMES = ['Ruler', 'Avenger'];
const RARE_ROLE_PROBABILITY = 0.02;

function pick(names: readonly string[], random: () => number): string {
  return names[Math.floor(random() * names.length)] ?? names[0] ?? 'Viewer';
}

export function randomNickname(random: () => number = Math.random): string {
  if (random() < RARE_ROLE_PROBABILITY) {
    return pick(RARE_ROLE_NAMES, random);
  }
  return pick(ROLE_NAMES, random);
}

/**
 * Returns `requested` when free, otherwise `requested_k` for the smallest
 * unused `k >= 2`.
 */
export function resolveNickname(requested: string, inUse: ReadonlySet<string>): string {
  if (!inUse.has(requested)) return requested;
  let counter = 2;
  while (inUse.has(`${requested}_${counter}`)) {
    counter += 1;
  }
  return `${requested}_${counter}`;
}
