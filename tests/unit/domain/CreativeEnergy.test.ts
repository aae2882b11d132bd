import { describe, it, expect } from 'vitest';
import { energyGlyphs, parseEnergy } from '../../../src/domain/value-objects/CreativeEnergy.js';

describe('CreativeEnergy', () => {
  it('accepts 1, 2 and 3 with surrounding whitespace', () => {
    expect(parseEnergy('1')).toBe(1);
    expect(parseEnergy(' 2 ')).toBe(2);
    expect(parseEnergy('3\n')).toBe(3);
  });

  it('rejects anything else', () => {
    for (const input of ['', '0', '4', 'two', '1.0', '2a']) {
      expect(parseEnergy(input)).toBeNull();
    }
  });

  it('renders one glyph per whole level', () => {
    expect(energyGlyphs(2)).toBe('🔋🔋');
    expect(energyGlyphs(2.7)).toBe('🔋🔋');
    expect(energyGlyphs(0)).toBe('');
  });
});
