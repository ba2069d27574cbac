/**
 * Arbor CLI — Settings Resolution Tests
 *
 *   ST-U1: defaults derive from the application name and home directory
 *   ST-U2: ARBOR_* environment variables override defaults
 *   ST-U3: explicit options override the environment
 *   ST-U4: empty strings count as unset
 *   ST-U5: invalid history sizes are rejected
 */

import { describe, it, expect } from 'vitest';
import { resolveSettings, SettingsError } from '../src/settings.js';

const HOME = '/home/ops';

const FULL_ENV = {
  ARBOR_HISTORY_FILE: '/var/tmp/netctl.history',
  ARBOR_HISTORY_SIZE: '20',
  ARBOR_PROMPT: '$ ',
  ARBOR_LOG_FILE: '/var/tmp/parse.jsonl',
};

describe('resolveSettings', () => {
  it('ST-U1: defaults derive from the application name', () => {
    expect(resolveSettings('netctl', {}, {}, HOME)).toEqual({
      historyFile: '/home/ops/.netctl_history',
      historySize: 500,
      prompt: 'netctl> ',
      logFile: null,
    });
  });

  it('ST-U2: environment variables override defaults', () => {
    expect(resolveSettings('netctl', {}, FULL_ENV, HOME)).toEqual({
      historyFile: '/var/tmp/netctl.history',
      historySize: 20,
      prompt: '$ ',
      logFile: '/var/tmp/parse.jsonl',
    });
  });

  it('ST-U3: explicit options override the environment', () => {
    const settings = resolveSettings(
      'netctl',
      { historyFile: '/srv/h', historySize: '7', prompt: '> ' },
      FULL_ENV,
      HOME,
    );
    expect(settings).toEqual({
      historyFile: '/srv/h',
      historySize: 7,
      prompt: '> ',
      logFile: '/var/tmp/parse.jsonl',
    });
  });

  it('ST-U3b: numeric sizes are taken as given', () => {
    expect(resolveSettings('netctl', { historySize: 0 }, FULL_ENV, HOME).historySize).toBe(0);
  });

  it('ST-U4: empty strings count as unset', () => {
    const settings = resolveSettings('netctl', { prompt: '' }, { ARBOR_PROMPT: '', ARBOR_HISTORY_SIZE: '' }, HOME);
    expect(settings.prompt).toBe('netctl> ');
    expect(settings.historySize).toBe(500);
  });

  it('ST-U5: invalid history sizes are rejected', () => {
    expect(() => resolveSettings('netctl', {}, { ARBOR_HISTORY_SIZE: 'lots' }, HOME)).toThrow(
      new SettingsError('ARBOR_HISTORY_SIZE must be a non-negative integer, got "lots"'),
    );
    expect(() => resolveSettings('netctl', { historySize: -1 }, {}, HOME)).toThrow(
      '--history-size must be a non-negative integer, got "-1"',
    );
    expect(() => resolveSettings('netctl', { historySize: '2.5' }, {}, HOME)).toThrow(SettingsError);
  });
});
