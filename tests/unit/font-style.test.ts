import { describe, it, expect } from 'vitest';
import {
  deriveFontStyleFromName,
  deriveFontWeightAndStyle,
  deriveFontWeightFromName
} from '../../src/fonts/font-style.js';

describe('font style helpers', () => {
  it('reads weights from PostScript names', () => {
    expect(deriveFontWeightFromName('Helvetica-Bold')).toBe(700);
    expect(deriveFontWeightFromName('OpenSans-SemiBold')).toBe(600);
    expect(deriveFontWeightFromName('Roboto-ExtraBold')).toBe(800);
    expect(deriveFontWeightFromName('SourceSans-Light')).toBe(300);
    expect(deriveFontWeightFromName('Inter-900')).toBe(900);
    expect(deriveFontWeightFromName('Times-Roman')).toBe(400);
  });

  it('reads italic and oblique styles', () => {
    expect(deriveFontStyleFromName('Arial-ItalicMT')).toBe('italic');
    expect(deriveFontStyleFromName('Helvetica-BoldOblique')).toBe('oblique');
    expect(deriveFontStyleFromName('Courier')).toBe('normal');
  });

  it('combines name and family', () => {
    expect(deriveFontWeightAndStyle({ fontName: 'F1', fontFamily: 'Georgia Bold Italic' })).toEqual({
      fontWeight: 700,
      fontStyle: 'italic'
    });
    expect(deriveFontWeightAndStyle({})).toEqual({ fontWeight: 400, fontStyle: 'normal' });
  });
});
