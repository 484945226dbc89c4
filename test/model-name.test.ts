import { describe, it, expect } from 'vitest';
import { normalizeModel, slugMake } from '../src/extract/model-name.js';

describe('normalizeModel', () => {
  it('joins hyphenated names with underscores', () => {
    expect(normalizeModel('CX-5')).toBe('cx_5');
  });

  it('strips displacement and trim words', () => {
    expect(normalizeModel('Silverado LTZ 5.3 4x4')).toBe('silverado_4x4');
    expect(normalizeModel('Sail 1.5 LS')).toBe('sail');
  });

  it('drops trim words joined by a hyphen', () => {
    expect(normalizeModel('Aveo-LS')).toBe('aveo');
    expect(normalizeModel('Aveo II-LS 1.4')).toBe('aveo');
    expect(normalizeModel('Sail-1.5')).toBe('sail');
    expect(normalizeModel('LS-')).toBe('');
  });

  it('counts a hyphenated name as one word', () => {
    expect(normalizeModel('CX-5 Grand Touring', { maxWords: 1 })).toBe('cx_5');
  });

  it('keeps only the first words', () => {
    expect(normalizeModel('Grand Cherokee Limited Overland')).toBe('grand_cherokee');
    expect(normalizeModel('Grand Cherokee', { maxWords: 1 })).toBe('grand');
  });

  it('leaves a version token that is glued to a word', () => {
    expect(normalizeModel('Model 3.0T')).toBe('model_3.0t');
  });

  it('is idempotent', () => {
    for (const raw of ['CX-5', 'Silverado LTZ 5.3 4x4', '  Corolla  Cross ', 'Yaris Sport', 'LS-', 'Aveo-LS', 'ls_aveo', 'Grand Cherokee']) {
      const once = normalizeModel(raw);
      expect(normalizeModel(once)).toBe(once);
    }
  });
});

describe('slugMake', () => {
  it('lower-cases and hyphenates', () => {
    expect(slugMake('Mercedes Benz')).toBe('mercedes-benz');
    expect(slugMake(' Toyota ')).toBe('toyota');
  });
});
