import { describe, expect, it } from 'vitest';
import { formatWorkOrderNumber, generateWorkOrderNumber } from './numbering.js';

describe('work order numbers', () => {
  it('pads the suffix to four digits', () => {
    expect(formatWorkOrderNumber('WO', new Date('2025-03-05T10:00:00Z'), 'UTC', 42)).toBe('WO-20250305-0042');
  });

  it('uses the business calendar day', () => {
    // 23:30Z on the 5th is already the 6th in Tokyo
    expect(formatWorkOrderNumber('WO', new Date('2025-03-05T23:30:00Z'), 'Asia/Tokyo', 7)).toBe('WO-20250306-0007');
  });

  it('generates numbers matching the format', () => {
    expect(generateWorkOrderNumber('MNT', new Date('2025-03-05T10:00:00Z'), 'UTC')).toMatch(/^MNT-20250305-\d{4}$/);
  });
});
