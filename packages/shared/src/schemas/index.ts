export {
  sequencerConfigSchema,
  readinessConfigSchema,
  type SequencerConfig,
  type SequencerConfigInput,
  type ReadinessConfig,
} from './config.js';
