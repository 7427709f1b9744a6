/**
 * @stackwright/feature-monitoring
 *
 * HTTP health probe and readiness strategies (fixed delay, bounded poll).
 */

export { HttpHealthProbe } from './health.service.js';
export type { HealthProbe, HttpHealthProbeOptions } from './health.service.js';

export { FixedDelayReadiness, PollingReadiness } from './readiness.js';
export type { ReadinessStrategy, ReadinessReport, PollingReadinessOptions } from './readiness.js';
