import { describe, it, expect } from 'vitest';
import { ResourceLedger } from './ledger';

describe('ResourceLedger', () => {
  it('starts each round with the full budget', () => {
    const l = new ResourceLedger(4);
    expect(l.remaining).toBe(4);
    expect(l.available_for('navigator')).toBe(4);
    expect(l.available_for('driller')).toBe(4);
  });

  it("limits a role to what the other role's hold leaves", () => {
    const l = new ResourceLedger(4);
    expect(l.hold('navigator', 3).ok).toBe(true);
    expect(l.available_for('driller')).toBe(1);

    const r = l.hold('driller', 2);
    expect(r.ok).toBe(false);
    if (!r.ok) {
      expect(r.error.code).toBe('InsufficientPU');
      expect(r.error.details).toEqual({ cost: 2, available: 1, remaining: 4 });
    }
    // 持有不扣款
    expect(l.remaining).toBe(4);
  });

  it('replaces a role hold instead of stacking it', () => {
    const l = new ResourceLedger(4);
    l.hold('navigator', 3);
    l.hold('navigator', 1);
    expect(l.available_for('driller')).toBe(3);
    l.release('navigator');
    expect(l.available_for('driller')).toBe(4);
  });

  it('debits on reserve and never goes negative', () => {
    const l = new ResourceLedger(4);
    expect(l.reserve('navigator', 3)).toEqual({ ok: true, remaining: 1 });
    const r = l.reserve('driller', 2);
    expect(r.ok).toBe(false);
    expect(l.remaining).toBe(1);
    expect(l.spent_by('navigator')).toBe(3);
    expect(l.spent_by('driller')).toBe(0);
  });

  it('rejects a negative or fractional cost', () => {
    const l = new ResourceLedger(4);
    expect(l.reserve('driller', -1).ok).toBe(false);
    expect(l.reserve('driller', 0.5).ok).toBe(false);
    expect(l.remaining).toBe(4);
  });

  it('round-trips through json', () => {
    const l = new ResourceLedger(4);
    l.hold('driller', 2);
    l.reserve('navigator', 1);
    const back = ResourceLedger.from_json(l.to_json());
    expect(back.to_json()).toEqual({
      budget: 4,
      remaining: 3,
      holds: { navigator: 0, driller: 2 },
      spent: { navigator: 1, driller: 0 },
    });
  });
});
