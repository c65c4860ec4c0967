import { resolveRequestId } from './request-id.middleware';

describe('resolveRequestId', () => {
  it('keeps the caller id', () => {
    expect(resolveRequestId('abc-123')).toBe('abc-123');
    expect(resolveRequestId(['first', 'second'])).toBe('first');
  });

  it('mints an id when none is usable', () => {
    expect(resolveRequestId(undefined)).toMatch(/^req-[0-9a-f-]{36}$/);
    expect(resolveRequestId('   ')).toMatch(/^req-/);
    expect(resolveRequestId([])).toMatch(/^req-/);
  });
});
