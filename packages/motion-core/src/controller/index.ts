export { createPidController } from './pid.js';
export { createStepController, createImpulseController } from './open-loop.js';
