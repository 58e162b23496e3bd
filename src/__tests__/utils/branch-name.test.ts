import { timestampedName } from '../../utils/branch-name';

describe('timestampedName', () => {
  it('should zero-pad day, month, hour and minute in local time', () => {
    expect(timestampedName('config-push', new Date(2025, 2, 5, 9, 7))).toBe('config-push-05032025-0907');
  });

  it('should format the last minute of the year', () => {
    expect(timestampedName('config-push', new Date(2024, 11, 31, 23, 59))).toBe(
      'config-push-31122024-2359',
    );
  });
});
