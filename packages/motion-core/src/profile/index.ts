export { createTrapezoidalProfile } from './trapezoidal.js';
export { createImpulseProfile } from './impulse.js';
