// ---------------------------------------------------------------------------
// @axis-sim/motion-core: Single-Axis Closed-Loop Motion Simulation
// ---------------------------------------------------------------------------
// Barrel re-export. Components are listed leaf-first, in the order a tick
// uses them.
// ---------------------------------------------------------------------------

// Types and errors
export * from './types.js';
export * from './errors.js';

// Logging
export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogFields } from './logger.js';

// Discrete time sequencer
export * from './time/index.js';

// Motion profiles
export * from './profile/index.js';

// Controllers
export * from './controller/index.js';

// Plants
export * from './plant/index.js';

// Orchestration
export * from './flow/index.js';

// Config loading and component construction
export * from './loader/index.js';

// Tabular output
export * from './export/index.js';
