/**
 * DeploySequencer Tests
 */

import {
  CancelledError,
  ConfigurationMissingError,
  DEPLOY_LIFECYCLE,
  DeploymentLockedError,
  ExternalCommandError,
  HealthCheckError,
} from '@stackwright/shared';
import { DeploySequencer } from '../deploy.service.js';
import type { LoggerLike } from '../types.js';
import { FakeWorkspace, createHarness } from './fakes.js';

describe('DeploySequencer', () => {
  describe('happy path', () => {
    it('should run every lifecycle step exactly once, in order', async () => {
      const h = createHarness();
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('success');
      expect(run.error).toBeUndefined();
      expect(run.steps.map((s) => s.name)).toEqual(['validate', 'prepare_directories', ...DEPLOY_LIFECYCLE]);
      expect(run.steps.every((s) => s.status === 'success')).toBe(true);
    });

    it('should issue the compose commands in deploy order', async () => {
      const h = createHarness();
      await new DeploySequencer(h.deps).run();

      expect(h.orchestrator.calls).toEqual(['down', 'pull', 'build --no-cache', 'up -d', 'ps', 'logs --tail=50']);
      expect(h.readiness.waits).toBe(1);
      expect(h.probe.calls).toBe(1);
    });

    it('should show status and recent logs to the operator', async () => {
      const h = createHarness();
      await new DeploySequencer(h.deps).run();

      expect(h.reporter.outputs).toEqual([
        { step: 'check_status', text: 'bot   Up' },
        { step: 'collect_logs', text: 'bot  | started' },
      ]);
    });

    it('should hold the lock for the run and release it afterwards', async () => {
      const h = createHarness();
      await new DeploySequencer(h.deps).run();

      expect(h.lock.acquisitions).toBe(1);
      expect(h.lock.releases).toBe(1);
      expect(h.lock.held).toBe(false);
    });

    it('should hand the finished run to the reporter', async () => {
      const h = createHarness();
      const run = await new DeploySequencer(h.deps).run();

      expect(h.reporter.run).toBe(run);
      expect(run.id).toBe('run-test');
      expect(run.kind).toBe('deploy');
      expect(run.duration).toBe(0);
    });

    it('should be safe to redeploy over a running stack', async () => {
      const h = createHarness();
      const first = await new DeploySequencer(h.deps).run();
      const second = await new DeploySequencer(h.deps).run();

      expect(first.outcome).toBe('success');
      expect(second.outcome).toBe('success');
      expect(h.orchestrator.calls.filter((c) => c === 'down')).toHaveLength(2);
      expect(h.orchestrator.running).toBe(true);
    });
  });

  describe('configuration', () => {
    it('should abort before any orchestrator call when the env file is missing', async () => {
      const h = createHarness({ envPresent: false });
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('configuration_missing');
      expect(run.error).toBeInstanceOf(ConfigurationMissingError);
      expect(run.error?.message).toBe('/srv/app/.env not found. Create it from .env.example before deploying.');
      expect(h.orchestrator.calls).toEqual([]);
      expect(h.workspace.ensureCalls).toBe(0);
      expect(h.lock.acquisitions).toBe(0);
      expect(h.reporter.events).toEqual(['start:validate', 'fatal:validate']);
    });

    it('should continue when directory preparation fails', async () => {
      const h = createHarness();
      const deps = { ...h.deps, workspace: new FakeWorkspace(true, new Error('EACCES: permission denied')) };
      const run = await new DeploySequencer(deps).run();

      expect(run.outcome).toBe('success');
      expect(run.steps[1]).toMatchObject({
        name: 'prepare_directories',
        status: 'failed',
        error: 'EACCES: permission denied',
      });
      expect(h.orchestrator.calls[0]).toBe('down');
    });
  });

  describe('fatal failures', () => {
    it('should stop after a failed build without starting anything', async () => {
      const h = createHarness();
      h.orchestrator.failures.build = { code: 1, stderr: 'ERROR: failed to solve' };
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('build_failed');
      expect(run.error).toBeInstanceOf(ExternalCommandError);
      expect(run.error?.message).toBe(
        'Command failed with exit code 1: docker-compose build --no-cache\nERROR: failed to solve',
      );
      expect(h.orchestrator.calls).toEqual(['down', 'pull', 'build --no-cache']);
      expect(h.readiness.waits).toBe(0);
      expect(h.probe.calls).toBe(0);
      expect(h.lock.releases).toBe(1);
    });

    it('should report start failures as start_failed', async () => {
      const h = createHarness();
      h.orchestrator.failures.start = { code: 1, stderr: 'port is already allocated' };
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('start_failed');
      expect(run.steps.map((s) => s.name)).toEqual([
        'validate',
        'prepare_directories',
        'stop_existing',
        'pull_images',
        'build_images',
        'start_services',
      ]);
      expect(h.probe.calls).toBe(0);
    });

    it('should log the failed step and the run outcome', async () => {
      const h = createHarness();
      h.orchestrator.failures.build = { code: 2, stderr: 'boom' };
      const logger: LoggerLike = {
        info: jest.fn(),
        error: jest.fn(),
        warn: jest.fn(),
        debug: jest.fn(),
        step: jest.fn(),
      };

      await new DeploySequencer({ ...h.deps, logger }).run();

      expect(logger.step).toHaveBeenCalledWith('build_images', {
        status: 'failed',
        duration: 0,
        error: 'Command failed with exit code 2: docker-compose build --no-cache\nboom',
        fatal: true,
      });
      expect(logger.error).toHaveBeenCalledWith(
        'deploy finished',
        expect.objectContaining({ outcome: 'build_failed' }),
      );
    });
  });

  describe('non-fatal failures', () => {
    it('should carry on when pulling images fails', async () => {
      const h = createHarness();
      h.orchestrator.failures.pull = { code: 1, stderr: 'pull access denied' };
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('success');
      expect(run.steps.find((s) => s.name === 'pull_images')?.status).toBe('failed');
      expect(h.reporter.events).toContain('failed:pull_images');
      expect(h.orchestrator.calls).toContain('up -d');
    });

    it('should carry on to the build when the teardown fails', async () => {
      const h = createHarness();
      h.orchestrator.failures.stop = { code: 1, stderr: 'Cannot connect to the Docker daemon' };
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('success');
      expect(run.steps.find((s) => s.name === 'stop_existing')).toMatchObject({
        status: 'failed',
        error: 'Command failed with exit code 1: docker-compose down\nCannot connect to the Docker daemon',
      });
      expect(h.reporter.events).toContain('failed:stop_existing');
      expect(h.orchestrator.calls).toEqual(['down', 'pull', 'build --no-cache', 'up -d', 'ps', 'logs --tail=50']);
    });

    it('should log a failed teardown as non-fatal', async () => {
      const h = createHarness();
      h.orchestrator.failures.stop = { code: 1, stderr: 'Cannot connect to the Docker daemon' };
      const logger: LoggerLike = {
        info: jest.fn(),
        error: jest.fn(),
        warn: jest.fn(),
        debug: jest.fn(),
        step: jest.fn(),
      };

      await new DeploySequencer({ ...h.deps, logger }).run();

      expect(logger.step).toHaveBeenCalledWith('stop_existing', {
        status: 'failed',
        duration: 0,
        error: 'Command failed with exit code 1: docker-compose down\nCannot connect to the Docker daemon',
        fatal: false,
      });
    });

    it('should carry on when status and log collection fail', async () => {
      const h = createHarness();
      h.orchestrator.failures.status = { code: 1, stderr: 'no such service' };
      h.orchestrator.failures.logs = { code: 1, stderr: 'no such service' };
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('success');
      expect(h.probe.calls).toBe(1);
    });
  });

  describe('health check', () => {
    it('should flag an unhealthy stack and dump the primary service logs', async () => {
      const h = createHarness({ healthy: false });
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('health_check_failed');
      expect(run.error).toBeInstanceOf(HealthCheckError);
      expect(run.error?.message).toBe(
        'Health check failed for http://localhost/health: connect ECONNREFUSED 127.0.0.1:80',
      );
      expect(h.orchestrator.calls.slice(-1)).toEqual(['logs bot']);
      expect(run.steps.slice(-2).map((s) => `${s.name}:${s.status}`)).toEqual([
        'health_probe:failed',
        'collect_service_logs:success',
      ]);
    });

    it('should dump logs of the configured primary service', async () => {
      const h = createHarness({ healthy: false, config: { primaryService: 'api' } });
      await new DeploySequencer(h.deps).run();

      expect(h.orchestrator.calls.slice(-1)).toEqual(['logs api']);
    });

    it('should leave the stack running when unhealthy', async () => {
      const h = createHarness({ healthy: false });
      await new DeploySequencer(h.deps).run();

      expect(h.orchestrator.running).toBe(true);
      expect(h.orchestrator.calls.filter((c) => c === 'down')).toHaveLength(1);
    });
  });

  describe('lock', () => {
    it('should refuse to run while another deployment holds the lock', async () => {
      const h = createHarness({ lockError: new DeploymentLockedError('/srv/app/.stackwright.lock', 4242) });
      const run = await new DeploySequencer(h.deps).run();

      expect(run.outcome).toBe('locked');
      expect(run.error).toBeInstanceOf(DeploymentLockedError);
      expect(h.orchestrator.calls).toEqual([]);
      expect(h.lock.releases).toBe(0);
    });
  });

  describe('cancellation', () => {
    it('should end as cancelled without running further steps', async () => {
      const h = createHarness();
      const controller = new AbortController();
      h.orchestrator.onCall = (op) => {
        if (op === 'build') controller.abort();
      };

      const run = await new DeploySequencer(h.deps).run(controller.signal);

      expect(run.outcome).toBe('cancelled');
      expect(run.error).toBeInstanceOf(CancelledError);
      expect(h.orchestrator.calls).toEqual(['down', 'pull', 'build --no-cache']);
      expect(h.lock.releases).toBe(1);
    });

    it('should not start when the signal is already aborted', async () => {
      const h = createHarness();
      const controller = new AbortController();
      controller.abort();

      const run = await new DeploySequencer(h.deps).run(controller.signal);

      expect(run.outcome).toBe('cancelled');
      expect(run.steps).toEqual([]);
      expect(h.lock.acquisitions).toBe(0);
    });
  });
});
