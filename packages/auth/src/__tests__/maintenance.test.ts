import { describe, it, expect } from 'vitest';
import { MaintenanceStatus } from '../maintenance';

describe('MaintenanceStatus', () => {
  it('starts idle', () => {
    const status = new MaintenanceStatus();

    expect(status.current()).toBe('');
    expect(status.isUnderMaintenance()).toBe(false);
  });

  it('sets and clears the message', async () => {
    const status = new MaintenanceStatus();

    await status.set('Backup in progress');
    expect(status.current()).toBe('Backup in progress');
    expect(status.isUnderMaintenance()).toBe(true);

    await status.clear();
    expect(status.isUnderMaintenance()).toBe(false);
  });

  it('keeps the last write when updates race', async () => {
    const status = new MaintenanceStatus();

    await Promise.all([status.set('first'), status.set('second'), status.set('third')]);

    expect(status.current()).toBe('third');
  });

  it('clears after the guarded work fails', async () => {
    const status = new MaintenanceStatus();
    let observed = '';

    await expect(
      status.during('Fetching ids', async () => {
        observed = status.current();
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(observed).toBe('Fetching ids');
    expect(status.isUnderMaintenance()).toBe(false);
  });

  it('returns the guarded result', async () => {
    const status = new MaintenanceStatus();

    await expect(status.during('Fetching ids', async () => 42)).resolves.toBe(42);
    expect(status.current()).toBe('');
  });
});
