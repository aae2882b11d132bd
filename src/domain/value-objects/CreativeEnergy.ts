/** creative energy 量表：1 = Depleted、2 = Neutral、3 = Energized */
export const ENERGY_LEVELS = [1, 2, 3] as const;

export const ENERGY_GLYPH = '🔋';

/** 只接受 "1"、"2"、"3"（允許前後空白），其餘一律視為無效輸入 */
export function parseEnergy(input: string): number | null {
  const trimmed = input.trim();
  const level = ENERGY_LEVELS.find((l) => String(l) === trimmed);
  return level ?? null;
}

export function energyGlyphs(level: number): string {
  return ENERGY_GLYPH.repeat(Math.max(0, Math.floor(level)));
}
