import { describe, it, expect, vi, afterEach } from 'vitest';
import { startScheduler, stopScheduler } from '../scheduler.js';
import { parseConfig } from '../../shared/config.js';
import { ConfigurationError } from '../../shared/errors.js';

const report = {
  title: 'New Users',
  from: 'users',
  id_column: 'user_id',
  created_at_column: 'creation_date',
  fields: [{ column: 'username', label: 'Username' }],
};

function runner() {
  return { runReport: vi.fn().mockResolvedValue({ status: 'success', rowsAppended: 0 }) };
}

afterEach(() => {
  stopScheduler();
});

describe('startScheduler', () => {
  it('schedules enabled reports only', () => {
    const config = parseConfig({
      window: { timezone: 'Asia/Tokyo' },
      reports: {
        'new-users': { ...report, cron: '0 8 * * *' },
        paused: { ...report, enabled: false },
      },
    });

    expect(startScheduler(runner(), config)).toEqual(['new-users']);
  });

  it('rejects an invalid cron expression before scheduling anything', () => {
    const config = parseConfig({
      reports: {
        good: { ...report, cron: '0 8 * * *' },
        bad: { ...report, cron: 'every morning' },
      },
    });

    expect(() => startScheduler(runner(), config)).toThrow(ConfigurationError);
  });

  it('does not run reports at start-up', () => {
    const r = runner();
    startScheduler(r, parseConfig({ reports: { 'new-users': { ...report, cron: '0 8 * * *' } } }));
    expect(r.runReport).not.toHaveBeenCalled();
  });
});
