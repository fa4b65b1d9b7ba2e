import { TemporalService } from './temporal.service';

describe('TemporalService', () => {
  const service = new TemporalService();
  // Local noon on Sunday, 18 October 2026
  const reference = new Date(2026, 9, 18, 12, 0, 0);

  it('formats local days', () => {
    expect(service.dayKey(new Date(2026, 0, 5, 23, 59))).toBe('2026-01-05');
  });

  it('resolves relative days', () => {
    expect(service.resolveDay('Any meetings tomorrow?', reference)).toEqual({
      day: '2026-10-19',
      expression: 'tomorrow',
    });
  });

  it('keeps the reference day without a date expression', () => {
    expect(service.resolveDay('What is on my list?', reference)).toEqual({
      day: '2026-10-18',
    });
  });

  it('keeps the reference day for a bare time', () => {
    expect(service.resolveDay('Am I free at 3pm?', reference).day).toBe(
      '2026-10-18',
    );
  });

  it('labels today and tomorrow only', () => {
    expect(service.relativeLabel('2026-10-18', reference)).toBe('TODAY');
    expect(service.relativeLabel('2026-10-19', reference)).toBe('TOMORROW');
    expect(service.relativeLabel('2026-10-22', reference)).toBeNull();
  });
});
