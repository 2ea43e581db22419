export {
  SUPPORTED_CONFIG_VERSIONS,
  parseVersion,
  isConfigCompatible,
  assertConfigCompatible,
  type ConfigComponent,
  type SemVer,
} from './version.js';
export { parseRecord, loadSimulationConfig, loadSimulationConfigFile } from './load-config.js';
export {
  buildDiscreteTime,
  buildMotionProfile,
  buildController,
  buildPlant,
  buildMotionFlow,
} from './build.js';
