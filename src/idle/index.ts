export {
  FixedIdleSampler,
  SystemIdleSampler,
  XPRINTIDLE_PROBE,
  IOREG_PROBE,
  probeForPlatform,
  type IdleSampler,
  type IdleProbe,
  type CommandRunner,
  type SystemIdleSamplerOptions,
} from './idle-sampler.js';
