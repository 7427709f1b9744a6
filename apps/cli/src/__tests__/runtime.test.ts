/**
 * Runtime wiring tests
 */

import { FixedDelayReadiness, PollingReadiness } from '@stackwright/feature-monitoring';
import { loadConfig } from '../lib/config.js';
import { createReadiness, createSequencerDeps, createUpdateDeps, watchSignals } from '../lib/runtime.js';

const base = { STACKWRIGHT_PROJECT_DIR: '/srv/app' };

describe('createReadiness', () => {
  it('should poll by default', () => {
    const config = loadConfig({}, base);
    const deps = createSequencerDeps(config, { kind: 'deploy', env: {} });

    expect(deps.readiness).toBeInstanceOf(PollingReadiness);
  });

  it('should wait blindly in fixed mode', () => {
    const config = loadConfig({ readiness: 'fixed' }, base);
    const deps = createSequencerDeps(config, { kind: 'deploy', env: {} });

    expect(createReadiness(config, deps.probe)).toBeInstanceOf(FixedDelayReadiness);
  });
});

describe('createSequencerDeps', () => {
  it('should point workspace, lock and probe at the configured project', () => {
    const config = loadConfig({}, base);
    const deps = createSequencerDeps(config, { kind: 'deploy', env: {} });

    expect(deps.workspace.envFilePath).toBe('/srv/app/.env');
    expect(deps.lock.path).toBe('/srv/app/.stackwright.lock');
    expect(deps.probe.url).toBe('http://localhost/health');
    expect(deps.runId).toMatch(/^[0-9a-f]{16}$/);
  });

  it('should add backup and source services for updates', () => {
    const config = loadConfig({}, base);
    const deps = createUpdateDeps(config, { env: {} });

    expect(deps.backup.destinationFor(new Date(2024, 2, 5, 14, 7, 9))).toBe('/backup/20240305_140709');
  });
});

describe('watchSignals', () => {
  it('should abort on SIGTERM and detach its listeners', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const before = process.listenerCount('SIGTERM');
    const cancellation = watchSignals();

    process.emit('SIGTERM', 'SIGTERM');

    expect(cancellation.signal.aborted).toBe(true);
    cancellation.dispose();
    expect(process.listenerCount('SIGTERM')).toBe(before);
    errorSpy.mockRestore();
  });
});
